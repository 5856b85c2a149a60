/**
 * Progress logger for waypoint.
 *
 * Everything goes to stderr; stdout carries only the answer or the
 * `--json` document.
 */

const RULE = '─'.repeat(50);

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// 1-based "[i/n]" counter for plan steps.
function counter(index: number, total: number): string {
  return `[${String(index + 1)}/${String(total)}]`;
}

// ── General ─────────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function section(title: string): void {
  write(`\n${RULE}\n▶  ${title}\n${RULE}`);
}

// ── Planning and steps ──────────────────────────────────────

export function llm(message: string): void {
  write(`🧠 ${message}`);
}

export function planned(stepCount: number): void {
  llm(`Planner: generated ${String(stepCount)} step(s)`);
}

export function step(index: number, total: number, description: string): void {
  write(`📋 ${counter(index, total)} ${description}`);
}

export function stepResult(
  index: number,
  total: number,
  success: boolean,
  description: string,
): void {
  write(`${success ? '✅' : '❌'} ${counter(index, total)} ${description}`);
}

export function tool(name: string, input: string): void {
  write(`🔧 ${name}(${input})`);
}

export function cancelled(message: string): void {
  write(`🛑 ${message}`);
}

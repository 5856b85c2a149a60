import type { RunRecord, StepResult } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputStep } from '../schema/jsonOutput.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputStep };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(run: RunRecord, exitCode: number): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    runId: run.runId,
    question: run.question,
    answer: run.answer,
    cancelled: run.cancelled,
    durationMs: run.durationMs,
    exitCode,
    steps: run.plan.map((step, index) => {
      const result = run.results[index];
      return result ? stepToJSON(result) : pendingStepToJSON(index, step);
    }),
  };
}

function stepToJSON(sr: StepResult): JsonOutputStep {
  return {
    index: sr.stepIndex,
    intent: sr.step.intent,
    subquery: sr.step.subquery,
    status: sr.status,
    answer: sr.answer,
    error: sr.error ?? null,
    durationMs: sr.durationMs,
  };
}

// Steps the run never reached (cancellation) are reported as failed with
// no answer.
function pendingStepToJSON(
  index: number,
  step: RunRecord['plan'][number],
): JsonOutputStep {
  return {
    index,
    intent: step.intent,
    subquery: step.subquery,
    status: 'failed',
    answer: '',
    error: 'not run',
    durationMs: 0,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const entries = Object.entries(value).sort(([a], [b]) => a.localeCompare(b));
  return Object.fromEntries(entries);
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(run: RunRecord): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# Waypoint Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Question** | ${escapeMarkdownCell(run.question)} |`);
  lines.push(`| **Run ID** | \`${run.runId}\` |`);
  lines.push(`| **Started** | ${run.startedAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
  lines.push(`| **Status** | ${runStatus(run)} |`);
  lines.push('');

  // Plan table
  lines.push(`## Plan`);
  lines.push('');
  lines.push(`| # | Intent | Subquery | Status |`);
  lines.push(`|---|--------|----------|--------|`);

  run.plan.forEach((step, index) => {
    const result = run.results[index];
    const status = result ? statusIcon(result) : '⏭️ not run';
    lines.push(
      `| ${String(index)} | ${step.intent} | ${escapeMarkdownCell(step.subquery)} | ${status} |`,
    );
  });

  lines.push('');

  // Per-step answers
  lines.push(`## Step Answers`);
  lines.push('');

  for (const sr of run.results) {
    lines.push(`### Step ${String(sr.stepIndex)}: ${sr.step.intent}`);
    lines.push('');
    lines.push(`> ${sr.step.subquery}`);
    lines.push('');
    lines.push(sr.answer);
    lines.push('');
  }

  // Final answer
  lines.push(`## Answer`);
  lines.push('');
  lines.push(run.answer);
  lines.push('');

  return lines.join('\n');
}

// ── Helpers ─────────────────────────────────────────────────

function runStatus(run: RunRecord): string {
  if (run.cancelled) return '🛑 cancelled';
  if (run.results.some((r) => r.status === 'failed')) return '⚠️ degraded';
  return '✅ completed';
}

function statusIcon(result: StepResult): string {
  return result.status === 'completed' ? '✅ completed' : '❌ failed';
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

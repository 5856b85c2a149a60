import { randomUUID } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';
import { InvalidArgumentError, Option } from 'commander';

import type { RunRecord } from '../schema/index.js';
import { EXIT_CODES, computeExitCode, formatPlanStep } from '../schema/index.js';
import { llmProviderSchema } from '../llm/index.js';
import type { LLMProvider } from '../llm/index.js';
import type { Orchestrator } from '../core/index.js';
import { createLoggingListener } from '../core/index.js';
import { generateMarkdown, generateJSON, serializeJSON } from '../report/index.js';
import {
  DEFAULT_CONFIG_PATH,
  LIMITS,
  MAX_TIMEOUT_SECONDS,
  TIMEOUTS,
  loadConfigIfPresent,
} from '../config/index.js';
import { createOrchestrator, resolveSettings } from '../app.js';
import type { AppOverrides } from '../app.js';
import * as log from '../utils/logger.js';

// ── Sample questions for `demo` ─────────────────────────────

export const DEMO_QUESTIONS = [
  'What tickets mention Safari?',
  'Get details for ticket SHOP-2847',
  'How are mobile conversions trending?',
  'Find P0 tickets and get details for the most critical one',
  'Are there checkout issues and are conversion rates down?',
  'Get details for SHOP-3001 and check if mobile metrics are affected',
  'Find Safari-related tickets, get details for SHOP-2847, and check Safari user metrics',
] as const;

// ── Option parsing ───────────────────────────────────────────

interface SharedOptions {
  config: string;
  json?: true;
  report?: string;
  provider?: LLMProvider;
  model?: string;
  dataDir?: string;
  plannerTimeout?: number;
  handlerTimeout?: number;
  maxPlanSteps?: number;
}

function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return n;
}

function parseTimeoutSeconds(value: string): number {
  const n = parsePositiveNumber(value);
  if (n > MAX_TIMEOUT_SECONDS) {
    throw new InvalidArgumentError(`Must be at most ${String(MAX_TIMEOUT_SECONDS)} seconds.`);
  }
  return n;
}

function parsePositiveInt(value: string): number {
  const n = parsePositiveNumber(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

function addSharedOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--json', 'Output JSON to stdout')
    .option('--report <path>', 'Write a markdown report to this file')
    .addOption(
      new Option('--provider <name>', 'LLM provider').choices(llmProviderSchema.options),
    )
    .option('--model <name>', 'Model override')
    .option('--data-dir <dir>', 'Directory holding tickets.json, docs.json, metrics.json')
    .option(
      '--planner-timeout <seconds>',
      `Planner call timeout (default ${String(TIMEOUTS.PLANNER_TIMEOUT / 1000)})`,
      parseTimeoutSeconds,
    )
    .option(
      '--handler-timeout <seconds>',
      `Per-step handler timeout (default ${String(TIMEOUTS.HANDLER_TIMEOUT / 1000)})`,
      parseTimeoutSeconds,
    )
    .option(
      '--max-plan-steps <n>',
      `Maximum steps kept from a plan (default ${String(LIMITS.MAX_PLAN_STEPS)})`,
      parsePositiveInt,
    );
}

function toOverrides(opts: SharedOptions): AppOverrides {
  return {
    provider: opts.provider,
    model: opts.model,
    dataDir: opts.dataDir,
    plannerTimeoutSec: opts.plannerTimeout,
    handlerTimeoutSec: opts.handlerTimeout,
    maxPlanSteps: opts.maxPlanSteps,
  };
}

async function buildOrchestrator(opts: SharedOptions): Promise<Orchestrator> {
  const fileConfig = await loadConfigIfPresent(opts.config);
  const settings = resolveSettings(fileConfig, toOverrides(opts));
  return createOrchestrator(settings, { onEvent: createLoggingListener() });
}

// ── Running one question ─────────────────────────────────────

export async function askQuestion(
  orchestrator: Orchestrator,
  question: string,
  signal?: AbortSignal,
): Promise<RunRecord> {
  const started = new Date();
  const result = await orchestrator.run(question, { signal });
  const finished = new Date();

  return {
    ...result,
    runId: randomUUID(),
    question,
    startedAt: started.toISOString(),
    finishedAt: finished.toISOString(),
    durationMs: finished.getTime() - started.getTime(),
  };
}

function printRun(run: RunRecord): void {
  process.stdout.write('\nEXECUTION PLAN:\n');
  run.plan.forEach((step, i) => {
    process.stdout.write(`   Step ${String(i)}: ${formatPlanStep(step)}\n`);
  });
  process.stdout.write(`\nANSWER:\n${run.answer}\n`);
  if (run.cancelled) process.stdout.write('\n(cancelled)\n');
}

async function emitRun(run: RunRecord, opts: SharedOptions): Promise<number> {
  const exitCode = computeExitCode(run);

  if (opts.json) {
    process.stdout.write(serializeJSON(generateJSON(run, exitCode)) + '\n');
  } else {
    printRun(run);
  }

  if (opts.report !== undefined) {
    const reportPath = path.resolve(opts.report);
    await mkdir(path.dirname(reportPath), { recursive: true });
    await writeFile(reportPath, generateMarkdown(run), 'utf-8');
    log.info(`Report written to ${reportPath}`);
  }

  return exitCode;
}

// ── Cancellation ─────────────────────────────────────────────

function cancelOnSigint(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSigint = (): void => {
    log.cancelled('Interrupt received, finishing current step boundary...');
    controller.abort(new Error('Interrupted'));
  };
  process.once('SIGINT', onSigint);
  return {
    signal: controller.signal,
    dispose: () => process.removeListener('SIGINT', onSigint),
  };
}

function exitCodeFor(err: unknown): number {
  if (
    typeof err === 'object' &&
    err !== null &&
    'exitCode' in err &&
    typeof err.exitCode === 'number'
  ) {
    return err.exitCode;
  }
  return EXIT_CODES.ERROR;
}

function reportError(err: unknown, prefix = 'Error'): void {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${prefix}: ${message}\n`);
}

// ── Command registration ─────────────────────────────────────

export function registerAskCommand(program: Command): void {
  addSharedOptions(
    program
      .command('ask')
      .description('Plan, route and answer one question')
      .argument('<question>', 'Free-form question'),
  ).action(async (question: string, opts: SharedOptions) => {
    if (question.trim().length === 0) {
      process.stderr.write('Error: question must not be empty\n');
      process.exitCode = EXIT_CODES.ERROR;
      return;
    }

    const { signal, dispose } = cancelOnSigint();
    try {
      const orchestrator = await buildOrchestrator(opts);
      log.section(question);
      const run = await askQuestion(orchestrator, question, signal);
      process.exitCode = await emitRun(run, opts);
    } catch (err) {
      reportError(err);
      process.exitCode = exitCodeFor(err);
    } finally {
      dispose();
    }
  });
}

export function registerDemoCommand(program: Command): void {
  addSharedOptions(
    program
      .command('demo')
      .description('Run the built-in sample questions in sequence'),
  ).action(async (opts: SharedOptions) => {
    const { signal, dispose } = cancelOnSigint();
    let worstExitCode = 0;

    try {
      const orchestrator = await buildOrchestrator(opts);

      for (const [i, question] of DEMO_QUESTIONS.entries()) {
        if (signal.aborted) break;
        log.section(`Query ${String(i + 1)}: ${question}`);
        try {
          const run = await askQuestion(orchestrator, question, signal);
          const exitCode = await emitRun(
            run,
            opts.report !== undefined
              ? { ...opts, report: path.join(opts.report, `query-${String(i + 1)}.md`) }
              : opts,
          );
          worstExitCode = Math.max(worstExitCode, exitCode);
        } catch (err) {
          reportError(err, `Error [query ${String(i + 1)}]`);
          worstExitCode = Math.max(worstExitCode, exitCodeFor(err));
        }
      }
    } catch (err) {
      reportError(err);
      worstExitCode = exitCodeFor(err);
    } finally {
      dispose();
    }

    process.exitCode = worstExitCode;
  });
}

export function registerCapabilitiesCommand(program: Command): void {
  program
    .command('capabilities')
    .description('Print the capability descriptions given to the planner')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--data-dir <dir>', 'Directory holding the datasets')
    .action(async (opts: { config: string; dataDir?: string }) => {
      try {
        const fileConfig = await loadConfigIfPresent(opts.config);
        const settings = resolveSettings(
          fileConfig,
          { provider: 'mock', dataDir: opts.dataDir },
        );
        const orchestrator = await createOrchestrator(settings);
        process.stdout.write(orchestrator.capabilityDescriptions + '\n');
      } catch (err) {
        reportError(err);
        process.exitCode = exitCodeFor(err);
      }
    });
}

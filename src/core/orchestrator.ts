import type {
  ExecutionPlan,
  OrchestrationResult,
  PlanStep,
  RawPlanStep,
  StepResult,
} from '../schema/index.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import type { CapabilityRegistry } from './registry.js';
import type { Planner } from './planner.js';
import type { OrchestratorEventListener } from './events.js';
import { noopListener } from './events.js';
import { PlannerError } from './errors.js';
import { validatePlan } from './validator.js';
import { synthesize } from './synthesizer.js';
import { assertTimeout, withTimeout } from './timeout.js';

// ── Public types ─────────────────────────────────────────────

export interface OrchestratorOptions {
  planner: Planner;
  registry: CapabilityRegistry;
  plannerTimeoutMs?: number | undefined;
  handlerTimeoutMs?: number | undefined;
  maxPlanSteps?: number | undefined;
  onEvent?: OrchestratorEventListener | undefined;
}

export interface RunOptions {
  signal?: AbortSignal | undefined;
}

export const CANCELLED_ANSWER = 'The request was cancelled before any step completed.';

// ── Context rendering ────────────────────────────────────────

export function renderContextEntry(result: StepResult): string {
  return `\nStep ${String(result.stepIndex)} (${result.step.intent}): ${result.answer}\n`;
}

export function degradedAnswer(stepIndex: number, step: PlanStep, reason: string): string {
  return `Step ${String(stepIndex)} (${step.intent}) could not be completed: ${reason}`;
}

// ── Orchestrator ─────────────────────────────────────────────

/**
 * Plans a question, runs each step through the capability registered for
 * its intent, and synthesizes the answers.
 *
 * Instances hold only read-only configuration; all per-call state lives
 * inside `run`, so one orchestrator can serve concurrent calls.
 */
export class Orchestrator {
  private readonly planner: Planner;
  private readonly registry: CapabilityRegistry;
  private readonly plannerTimeoutMs: number;
  private readonly handlerTimeoutMs: number;
  private readonly maxPlanSteps: number;
  private readonly emit: OrchestratorEventListener;

  constructor(options: OrchestratorOptions) {
    this.planner = options.planner;
    this.registry = options.registry.seal();
    this.plannerTimeoutMs = options.plannerTimeoutMs ?? TIMEOUTS.PLANNER_TIMEOUT;
    this.handlerTimeoutMs = options.handlerTimeoutMs ?? TIMEOUTS.HANDLER_TIMEOUT;
    this.maxPlanSteps = options.maxPlanSteps ?? LIMITS.MAX_PLAN_STEPS;
    this.emit = options.onEvent ?? noopListener;

    assertTimeout('Planner', this.plannerTimeoutMs);
    assertTimeout('Handler', this.handlerTimeoutMs);
    if (!Number.isInteger(this.maxPlanSteps) || this.maxPlanSteps < 1) {
      throw new RangeError(
        `maxPlanSteps must be a positive integer, got ${String(this.maxPlanSteps)}`,
      );
    }
  }

  get capabilityDescriptions(): string {
    return this.registry.describe();
  }

  async run(question: string, options: RunOptions = {}): Promise<OrchestrationResult> {
    if (question.trim().length === 0) {
      throw new TypeError('Question must be a non-empty string');
    }
    const { signal } = options;

    // 1. Plan
    let rawPlan: RawPlanStep[];
    try {
      rawPlan = await withTimeout('Planner', this.plannerTimeoutMs, signal, (s) =>
        this.planner.plan(question, this.capabilityDescriptions, { signal: s }),
      );
    } catch (err) {
      if (signal?.aborted) {
        this.emit({ type: 'run_cancelled', completedSteps: 0, totalSteps: 0 });
        return { answer: CANCELLED_ANSWER, plan: [], results: [], cancelled: true };
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new PlannerError(`Planner failed: ${message}`, { cause: err });
    }
    this.emit({ type: 'plan_received', question, stepCount: rawPlan.length });

    // 2. Validate / repair
    const plan: ExecutionPlan = validatePlan(
      rawPlan,
      this.registry,
      this.registry.defaultIntent,
      question,
      { maxSteps: this.maxPlanSteps, onEvent: this.emit },
    );
    this.emit({ type: 'plan_validated', plan });

    // 3–4. Execute sequentially, threading context forward
    const results: StepResult[] = [];
    let context = '';
    let cancelled = false;

    for (const [index, step] of plan.entries()) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      // A miss here means validation let an unknown intent through: fatal.
      const handler = this.registry.resolve(step.intent);
      this.emit({ type: 'step_started', stepIndex: index, total: plan.length, step });

      const snapshot = context;
      const startedAt = Date.now();
      let result: StepResult;
      try {
        const answer = await withTimeout(
          `Step ${String(index)} (${step.intent})`,
          this.handlerTimeoutMs,
          signal,
          (s) => handler.answer(step.subquery, snapshot, { signal: s }),
        );
        result = {
          stepIndex: index,
          step,
          answer,
          status: 'completed',
          durationMs: Date.now() - startedAt,
        };
        this.emit({ type: 'step_completed', total: plan.length, result });
      } catch (err) {
        if (signal?.aborted) {
          cancelled = true;
          break;
        }
        const reason = err instanceof Error ? err.message : String(err);
        result = {
          stepIndex: index,
          step,
          answer: degradedAnswer(index, step, reason),
          status: 'failed',
          error: reason,
          durationMs: Date.now() - startedAt,
        };
        this.emit({ type: 'step_failed', total: plan.length, result });
      }

      results.push(result);
      context += renderContextEntry(result);
    }

    if (cancelled) {
      this.emit({
        type: 'run_cancelled',
        completedSteps: results.length,
        totalSteps: plan.length,
      });
    }

    // 5. Synthesize
    if (cancelled && results.length === 0) {
      return { answer: CANCELLED_ANSWER, plan, results, cancelled };
    }
    const answer = synthesize(results);
    this.emit({ type: 'run_synthesized', stepCount: results.length });

    return { answer, plan, results, cancelled };
  }
}

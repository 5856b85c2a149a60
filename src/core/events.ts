import type { ExecutionPlan, PlanStep, StepResult } from '../schema/index.js';
import * as log from '../utils/logger.js';

// ── Event union ──────────────────────────────────────────────

export type OrchestratorEvent =
  | { type: 'plan_received'; question: string; stepCount: number }
  | {
      type: 'intent_substituted';
      stepIndex: number;
      requested: string | undefined;
      substituted: string;
    }
  | { type: 'subquery_substituted'; stepIndex: number; subquery: string }
  | { type: 'plan_fallback'; question: string; intent: string }
  | { type: 'plan_truncated'; received: number; kept: number }
  | { type: 'plan_validated'; plan: ExecutionPlan }
  | { type: 'step_started'; stepIndex: number; total: number; step: PlanStep }
  | { type: 'step_completed'; total: number; result: StepResult }
  | { type: 'step_failed'; total: number; result: StepResult }
  | { type: 'run_cancelled'; completedSteps: number; totalSteps: number }
  | { type: 'run_synthesized'; stepCount: number };

export type OrchestratorEventType = OrchestratorEvent['type'];

export type OrchestratorEventListener = (event: OrchestratorEvent) => void;

export const noopListener: OrchestratorEventListener = () => {};

// ── Logging listener ─────────────────────────────────────────

export function createLoggingListener(): OrchestratorEventListener {
  return (event) => {
    switch (event.type) {
      case 'plan_received':
        log.planned(event.stepCount);
        break;
      case 'intent_substituted':
        log.warn(
          `Unknown intent '${event.requested ?? '(missing)'}' at step ${String(event.stepIndex)}, defaulting to '${event.substituted}'`,
        );
        break;
      case 'subquery_substituted':
        log.warn(
          `Blank subquery at step ${String(event.stepIndex)}, using the original question`,
        );
        break;
      case 'plan_fallback':
        log.warn(`Empty plan returned, falling back to a single '${event.intent}' step`);
        break;
      case 'plan_truncated':
        log.warn(
          `Plan had ${String(event.received)} steps, keeping the first ${String(event.kept)}`,
        );
        break;
      case 'plan_validated':
        event.plan.forEach((s, i) => {
          log.detail(`Step ${String(i)}: [${s.intent}] ${s.subquery}`);
        });
        break;
      case 'step_started':
        log.step(event.stepIndex, event.total, `[${event.step.intent}] ${event.step.subquery}`);
        break;
      case 'step_completed':
        log.stepResult(
          event.result.stepIndex,
          event.total,
          true,
          `${event.result.step.intent} (${String(event.result.durationMs)}ms)`,
        );
        break;
      case 'step_failed':
        log.stepResult(
          event.result.stepIndex,
          event.total,
          false,
          `${event.result.step.intent}: ${event.result.error ?? 'failed'}`,
        );
        break;
      case 'run_cancelled':
        log.cancelled(
          `Cancelled after ${String(event.completedSteps)}/${String(event.totalSteps)} step(s)`,
        );
        break;
      case 'run_synthesized':
        log.info(`Synthesized answer from ${String(event.stepCount)} step(s)`);
        break;
    }
  };
}

import type { ExecutionPlan, PlanStep, RawPlanStep } from '../schema/index.js';
import { createPlanStep } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import type { CapabilityRegistry } from './registry.js';
import type { OrchestratorEventListener } from './events.js';
import { noopListener } from './events.js';

export interface ValidateOptions {
  maxSteps?: number | undefined;
  onEvent?: OrchestratorEventListener | undefined;
}

/**
 * Repair a raw planner output into an ExecutionPlan.
 *
 * Never throws. Every returned step names a registered intent and carries a
 * non-blank subquery, and the plan has at least one step. Repairs are
 * reported through `onEvent`.
 */
export function validatePlan(
  rawPlan: readonly RawPlanStep[],
  registry: CapabilityRegistry,
  defaultIntent: string,
  originalQuestion: string,
  options: ValidateOptions = {},
): ExecutionPlan {
  const emit = options.onEvent ?? noopListener;
  // A plan keeps at least one step, whatever the cap.
  const maxSteps = Math.max(1, Math.floor(options.maxSteps ?? LIMITS.MAX_PLAN_STEPS));

  const steps: PlanStep[] = rawPlan.map((raw, index) => {
    const requested = raw.intent?.trim().toLowerCase();
    let intent = defaultIntent;
    if (requested !== undefined && registry.has(requested)) {
      intent = requested;
    } else {
      emit({
        type: 'intent_substituted',
        stepIndex: index,
        requested: raw.intent,
        substituted: defaultIntent,
      });
    }

    let subquery = raw.subquery ?? '';
    if (subquery.trim().length === 0) {
      subquery = originalQuestion;
      emit({ type: 'subquery_substituted', stepIndex: index, subquery });
    }

    return createPlanStep(subquery, intent);
  });

  if (steps.length === 0) {
    emit({ type: 'plan_fallback', question: originalQuestion, intent: defaultIntent });
    return [createPlanStep(originalQuestion, defaultIntent)];
  }

  if (steps.length > maxSteps) {
    emit({ type: 'plan_truncated', received: steps.length, kept: maxSteps });
    return steps.slice(0, maxSteps);
  }

  return steps;
}

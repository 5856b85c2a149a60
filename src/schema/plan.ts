import { z } from 'zod';

// ── RawPlanStep ───────────────────────────────────────────────
// Planner output is untrusted: fields of the wrong type are treated as
// absent so that validation can repair them instead of rejecting the plan.

const looseString = z.string().optional().catch(undefined);

export const rawPlanStepSchema = z.object({
  subquery: looseString,
  intent: looseString,
});

export type RawPlanStep = z.infer<typeof rawPlanStepSchema>;

export const rawPlanSchema = z
  .array(z.unknown())
  .transform((entries) =>
    entries.flatMap((entry) => {
      const result = rawPlanStepSchema.safeParse(entry);
      return result.success ? [result.data] : [];
    }),
  );

export function parseRawPlan(data: unknown): RawPlanStep[] {
  return rawPlanSchema.parse(data);
}

// ── PlanStep / ExecutionPlan ──────────────────────────────────

export const planStepSchema = z.object({
  subquery: z.string().min(1),
  intent: z.string().min(1),
});

export type PlanStep = Readonly<z.infer<typeof planStepSchema>>;

/** Ordered steps; position is execution order. Non-empty once validated. */
export type ExecutionPlan = readonly PlanStep[];

export function createPlanStep(subquery: string, intent: string): PlanStep {
  return Object.freeze({ subquery, intent });
}

export function formatPlanStep(step: PlanStep): string {
  return `[${step.intent}] ${step.subquery}`;
}

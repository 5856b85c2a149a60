import { z } from 'zod';

import { planStepSchema } from './plan.js';
import type { ExecutionPlan } from './plan.js';

// ── StepResult ────────────────────────────────────────────────

export const stepStatusSchema = z.enum(['completed', 'failed']);

export type StepStatus = z.infer<typeof stepStatusSchema>;

export const stepResultSchema = z.object({
  stepIndex: z.number().int().nonnegative(),
  step: planStepSchema,
  answer: z.string(),
  status: stepStatusSchema,
  error: z.string().optional(),
  durationMs: z.number().int().nonnegative(),
});

export type StepResult = z.infer<typeof stepResultSchema>;

// ── OrchestrationResult ───────────────────────────────────────

export interface OrchestrationResult {
  answer: string;
  plan: ExecutionPlan;
  results: readonly StepResult[];
  cancelled: boolean;
}

// ── Run record (what the CLI reports on) ──────────────────────

export interface RunRecord extends OrchestrationResult {
  runId: string;
  question: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

// ── Exit codes ────────────────────────────────────────────────

export const EXIT_CODES = {
  OK: 0,
  DEGRADED: 1,
  CANCELLED: 2,
  PLANNER_FAILED: 3,
  ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// Deterministic: any failed step degrades the run, cancellation wins.
export function computeExitCode(result: OrchestrationResult): ExitCode {
  if (result.cancelled) return EXIT_CODES.CANCELLED;
  if (result.results.some((r) => r.status === 'failed')) {
    return EXIT_CODES.DEGRADED;
  }
  return EXIT_CODES.OK;
}

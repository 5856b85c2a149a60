import { z } from 'zod';

import { stepStatusSchema } from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Step output ─────────────────────────────────────────────

export const jsonOutputStepSchema = z.object({
  index: z.number().int().nonnegative(),
  intent: z.string().min(1),
  subquery: z.string().min(1),
  status: stepStatusSchema,
  answer: z.string(),
  error: z.string().nullable(),
  durationMs: z.number().int().nonnegative(),
});

export type JsonOutputStep = z.infer<typeof jsonOutputStepSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  question: z.string(),
  answer: z.string(),
  cancelled: z.boolean(),
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  steps: z.array(jsonOutputStepSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;

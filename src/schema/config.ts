import { z } from 'zod';

import { llmProviderSchema } from '../llm/client.js';
import { MAX_TIMEOUT_SECONDS } from '../config/defaults.js';

// ── Per-capability overrides ────────────────────────────────

export const capabilityConfigSchema = z.object({
  maxIterations: z.number().int().positive().max(20).optional(),
});

export type CapabilityConfig = z.infer<typeof capabilityConfigSchema>;

// ── Config file ─────────────────────────────────────────────

export const fileConfigSchema = z
  .object({
    provider: llmProviderSchema.optional(),
    model: z.string().min(1).optional(),
    dataDir: z.string().min(1).optional(),
    /** Seconds. */
    plannerTimeout: z.number().positive().max(MAX_TIMEOUT_SECONDS).optional(),
    /** Seconds, applied to every handler call. */
    handlerTimeout: z.number().positive().max(MAX_TIMEOUT_SECONDS).optional(),
    maxPlanSteps: z.number().int().positive().optional(),
    capabilities: z.record(z.string().min(1), capabilityConfigSchema).default({}),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

import { z } from 'zod';

// ── LLMClient interface ──────────────────────────────────────

export interface GenerateOptions {
  signal?: AbortSignal | undefined;
}

export interface LLMClient {
  generate(
    systemPrompt: string,
    userPrompt: string,
    options?: GenerateOptions,
  ): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

export function loadLLMConfig(
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  const provider = env['LLM_PROVIDER'] ?? 'anthropic';

  const apiKey = provider === 'anthropic'
    ? env['ANTHROPIC_API_KEY']
    : env['OPENAI_API_KEY'];

  return llmConfigSchema.parse({
    provider,
    apiKey: apiKey === '' ? undefined : apiKey,
    model: env['WAYPOINT_MODEL'] === '' ? undefined : env['WAYPOINT_MODEL'],
  });
}

/**
 * LLM module.
 * One `generate(system, user, { signal })` contract behind every provider.
 * The planner and the tool agents are its only callers.
 */

import type { LLMClient, LLMConfig, LLMProvider } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createMockClient } from './mock.js';

export * from './client.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export { createMockClient } from './mock.js';
export type { MockLLMClient, MockCall } from './mock.js';

// ── Provider table ──────────────────────────────────────────

interface ProviderEntry {
  /** Env var that supplies the key, or undefined when none is needed. */
  keyVar: string | undefined;
  create: (apiKey: string, model: string | undefined) => LLMClient;
}

const PROVIDERS: Record<LLMProvider, ProviderEntry> = {
  anthropic: { keyVar: 'ANTHROPIC_API_KEY', create: createAnthropicClient },
  openai: { keyVar: 'OPENAI_API_KEY', create: createOpenAIClient },
  mock: { keyVar: undefined, create: () => createMockClient() },
};

export function createLLMClient(config: LLMConfig): LLMClient {
  const entry = PROVIDERS[config.provider];
  if (entry.keyVar === undefined) return entry.create('', config.model);

  if (!config.apiKey) {
    throw new Error(
      `${entry.keyVar} is required when using the ${config.provider} provider`,
    );
  }
  return entry.create(config.apiKey, config.model);
}

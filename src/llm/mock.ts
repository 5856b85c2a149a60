import type { GenerateOptions, LLMClient } from './client.js';

const DEFAULT_RESPONSE = '{"action":"answer","answer":"mock"}';

export interface MockCall {
  systemPrompt: string;
  userPrompt: string;
}

export interface MockLLMClient extends LLMClient {
  readonly calls: readonly MockCall[];
}

/**
 * Mock LLM provider for testing.
 * Replays the provided canned responses in order, falling back to a default,
 * and records every prompt it was given.
 */
export function createMockClient(
  responses?: readonly string[],
): MockLLMClient {
  const calls: MockCall[] = [];

  return {
    calls,
    async generate(
      systemPrompt: string,
      userPrompt: string,
      options?: GenerateOptions,
    ): Promise<string> {
      options?.signal?.throwIfAborted();
      const response = responses?.[calls.length] ?? DEFAULT_RESPONSE;
      calls.push({ systemPrompt, userPrompt });
      return response;
    },
  };
}

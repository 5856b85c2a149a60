import Anthropic from '@anthropic-ai/sdk';

import type { GenerateOptions, LLMClient } from './client.js';
import { warn } from '../utils/logger.js';
import { waitForRetry } from './backoff.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
const MAX_TOKENS = 2048;
const MAX_RETRIES = 3;

// ── Rate-limit-aware wrapper ────────────────────────────────

function isRateLimitError(err: unknown): boolean {
  if (err instanceof Anthropic.RateLimitError) return true;
  if (err instanceof Error && err.message.includes('429')) return true;
  return false;
}

async function withRetry<T>(
  fn: () => Promise<T>,
  signal: AbortSignal | undefined,
): Promise<T> {
  for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRateLimitError(err) || attempt === MAX_RETRIES - 1) throw err;

      const waitMs = (attempt + 1) * 5000;
      warn(`[llm] Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await waitForRetry(waitMs, signal);
    }
  }

  throw new Error('Anthropic API: max retries exceeded due to rate limiting');
}

// ── Provider factory ─────────────────────────────────────────

export function createAnthropicClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const client = new Anthropic({ apiKey });

  return {
    async generate(
      systemPrompt: string,
      userPrompt: string,
      options?: GenerateOptions,
    ): Promise<string> {
      const signal = options?.signal;
      const response = await withRetry(
        () =>
          client.messages.create(
            {
              model: resolvedModel,
              max_tokens: MAX_TOKENS,
              system: systemPrompt,
              messages: [{ role: 'user', content: userPrompt }],
              temperature: 0,
            },
            signal !== undefined ? { signal } : {},
          ),
        signal,
      );

      const firstBlock = response.content[0];
      if (!firstBlock || firstBlock.type !== 'text') {
        throw new Error('Anthropic API returned no text content');
      }

      return firstBlock.text;
    },
  };
}

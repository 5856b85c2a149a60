import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  createLLMClient,
  createMockClient,
  createOpenAIClient,
  loadLLMConfig,
} from '../src/llm/index.js';
import { waitForRetry } from '../src/llm/backoff.js';

describe('loadLLMConfig', () => {
  it('defaults to anthropic', () => {
    expect(loadLLMConfig({})).toEqual({ provider: 'anthropic' });
  });

  it('picks the key for the selected provider and ignores empty values', () => {
    expect(
      loadLLMConfig({
        LLM_PROVIDER: 'openai',
        OPENAI_API_KEY: 'test-key',
        ANTHROPIC_API_KEY: 'other-key',
        WAYPOINT_MODEL: '',
      }),
    ).toEqual({ provider: 'openai', apiKey: 'test-key' });
  });

  it('rejects an unknown provider', () => {
    expect(() => loadLLMConfig({ LLM_PROVIDER: 'carrier-pigeon' })).toThrow();
  });
});

describe('createLLMClient', () => {
  it('requires an API key for hosted providers', () => {
    expect(() => createLLMClient({ provider: 'anthropic' })).toThrow(
      'ANTHROPIC_API_KEY is required when using the anthropic provider',
    );
    expect(() => createLLMClient({ provider: 'openai' })).toThrow(
      'OPENAI_API_KEY is required when using the openai provider',
    );
  });

  it('builds the mock provider without a key', async () => {
    const client = createLLMClient({ provider: 'mock' });

    expect(await client.generate('system', 'user')).toBe('{"action":"answer","answer":"mock"}');
  });
});

describe('createMockClient', () => {
  it('replays responses in order and records prompts', async () => {
    const client = createMockClient(['one', 'two']);

    expect(await client.generate('s1', 'u1')).toBe('one');
    expect(await client.generate('s2', 'u2')).toBe('two');
    expect(await client.generate('s3', 'u3')).toBe('{"action":"answer","answer":"mock"}');
    expect(client.calls).toEqual([
      { systemPrompt: 's1', userPrompt: 'u1' },
      { systemPrompt: 's2', userPrompt: 'u2' },
      { systemPrompt: 's3', userPrompt: 'u3' },
    ]);
  });

  it('rejects an aborted call without recording it', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stopped'));
    const client = createMockClient(['one']);

    await expect(client.generate('s', 'u', { signal: controller.signal })).rejects.toThrow('stopped');
    expect(client.calls).toHaveLength(0);
  });
});

describe('rate-limit back-off', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('stops waiting as soon as the signal aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(new Error('step cancelled')), 10);
    const started = Date.now();

    await expect(waitForRetry(10_000, controller.signal)).rejects.toThrow('step cancelled');
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it('resolves after the delay without a signal', async () => {
    await expect(waitForRetry(5)).resolves.toBeUndefined();
  });

  it('abandons an OpenAI retry when the call is cancelled', async () => {
    const fetchMock = vi.fn(
      async () => new Response('slow down', { status: 429, headers: { 'retry-after': '30' } }),
    );
    vi.stubGlobal('fetch', fetchMock);
    const controller = new AbortController();
    setTimeout(() => controller.abort(new Error('step timed out')), 10);

    await expect(
      createOpenAIClient('test-key').generate('s', 'u', { signal: controller.signal }),
    ).rejects.toThrow('step timed out');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

import { describe, expect, it } from 'vitest';

import { createLLMPlanner, createStaticPlanner } from '../src/core/index.js';
import { createMockClient } from '../src/llm/index.js';

const CAPABILITIES = 'Available intents:\n- search: find things';

describe('createLLMPlanner', () => {
  it('parses a bare JSON array and sends the question as the user prompt', async () => {
    const client = createMockClient([
      '[{"subquery":"find P0 tickets","intent":"search"},{"subquery":"get most critical","intent":"retrieve"}]',
    ]);

    const steps = await createLLMPlanner(client).plan('Find P0 tickets', CAPABILITIES);

    expect(steps).toEqual([
      { subquery: 'find P0 tickets', intent: 'search' },
      { subquery: 'get most critical', intent: 'retrieve' },
    ]);
    expect(client.calls).toHaveLength(1);
    expect(client.calls[0]?.userPrompt).toBe('Find P0 tickets');
    expect(client.calls[0]?.systemPrompt).toContain(CAPABILITIES);
  });

  it('unwraps fenced output, a plan object and renamed keys', async () => {
    const client = createMockClient([
      'Here is the plan:\n```json\n{"plan":[{"query":"mobile conversions","type":"analyze"}]}\n```',
    ]);

    const steps = await createLLMPlanner(client).plan('How are conversions?', CAPABILITIES);

    expect(steps).toEqual([{ subquery: 'mobile conversions', intent: 'analyze' }]);
  });

  it('keeps entries with wrongly typed fields for repair and drops non-objects', async () => {
    const client = createMockClient(['[{"subquery": 5, "intent": "search"}, "junk"]']);

    const steps = await createLLMPlanner(client).plan('q', CAPABILITIES);

    expect(steps).toEqual([{ intent: 'search' }]);
    expect(steps[0]?.subquery).toBeUndefined();
  });

  it('accepts an empty plan without a repair call', async () => {
    const client = createMockClient(['[]']);

    expect(await createLLMPlanner(client).plan('q', CAPABILITIES)).toEqual([]);
    expect(client.calls).toHaveLength(1);
  });

  it('makes one repair call when the first output is unusable', async () => {
    const client = createMockClient([
      'I would search first.',
      '[{"subquery":"search Safari","intent":"search"}]',
    ]);

    const steps = await createLLMPlanner(client).plan('Safari issues?', CAPABILITIES);

    expect(steps).toEqual([{ subquery: 'search Safari', intent: 'search' }]);
    expect(client.calls).toHaveLength(2);
    expect(client.calls[1]?.userPrompt).toContain('Question: Safari issues?');
    expect(client.calls[1]?.userPrompt).toContain('Invalid JSON');
    expect(client.calls[1]?.userPrompt).toContain('I would search first.');
  });

  it('quotes the question literally in the repair prompt', async () => {
    const client = createMockClient(['nope', '[]']);
    const question = 'Is $& or {{error}} in the $$ refund?';

    await createLLMPlanner(client).plan(question, CAPABILITIES);

    expect(client.calls[1]?.userPrompt).toContain(`Question: ${question}\n\nError: Invalid JSON`);
  });

  it('returns an empty plan when the repair also fails', async () => {
    const client = createMockClient(['no', '{"answer": "still no"}']);

    const steps = await createLLMPlanner(client).plan('q', CAPABILITIES);

    expect(steps).toEqual([]);
    expect(client.calls).toHaveLength(2);
  });

  it('propagates client failures', async () => {
    const controller = new AbortController();
    controller.abort();
    const client = createMockClient(['[]']);

    await expect(
      createLLMPlanner(client).plan('q', CAPABILITIES, { signal: controller.signal }),
    ).rejects.toThrow();
  });
});

describe('createStaticPlanner', () => {
  it('returns a fresh copy of its steps on every call', async () => {
    const planner = createStaticPlanner([{ subquery: 'a', intent: 'search' }]);

    const first = await planner.plan('q', '');
    const second = await planner.plan('q', '');

    expect(first).toEqual([{ subquery: 'a', intent: 'search' }]);
    expect(first[0]).not.toBe(second[0]);
  });
});

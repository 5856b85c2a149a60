import { describe, expect, it } from 'vitest';

import { createOrchestrator, resolveSettings } from '../src/app.js';
import { askQuestion } from '../src/cli/ask.js';
import { createMockClient } from '../src/llm/index.js';
import { computeExitCode } from '../src/schema/index.js';

function mockSettings(capabilities: Record<string, { maxIterations?: number }> = {}) {
  return resolveSettings({ capabilities }, { provider: 'mock' }, {});
}

describe('createOrchestrator', () => {
  it('answers a retrieve question end to end against the bundled data', async () => {
    const client = createMockClient([
      '[{"subquery":"Get details for ticket SHOP-2847","intent":"retrieve"}]',
      '{"action":"tool","tool":"get_ticket_details","input":{"ticketId":"SHOP-2847"}}',
      '{"action":"answer","answer":"SHOP-2847 is In Review"}',
    ]);
    const orchestrator = await createOrchestrator(mockSettings(), { client });

    const run = await askQuestion(orchestrator, 'Get details for ticket SHOP-2847');

    expect(run.answer).toBe('SHOP-2847 is In Review');
    expect(run.question).toBe('Get details for ticket SHOP-2847');
    expect(run.plan).toEqual([{ subquery: 'Get details for ticket SHOP-2847', intent: 'retrieve' }]);
    expect(computeExitCode(run)).toBe(0);
    expect(client.calls).toHaveLength(3);
    expect(client.calls[2]?.systemPrompt).toContain('Status: In Review');
  });

  it('describes the built-in capabilities to the planner', async () => {
    const client = createMockClient(['[]']);
    const orchestrator = await createOrchestrator(mockSettings(), { client });

    const descriptions = orchestrator.capabilityDescriptions;

    expect(descriptions.startsWith('Available intents:\n- search: ')).toBe(true);
    expect(descriptions).toContain('- "Get details for SHOP-2847" → retrieve');
    expect(descriptions.endsWith('If unsure, use: search')).toBe(true);

    await orchestrator.run('anything');
    expect(client.calls[0]?.systemPrompt).toContain(descriptions);
  });

  it('applies per-capability iteration limits from config', async () => {
    const client = createMockClient([
      '[{"subquery":"churn","intent":"analyze"}]',
      '{"action":"tool","tool":"list_metrics","input":{}}',
      'Everything is trending down.',
    ]);
    const orchestrator = await createOrchestrator(
      mockSettings({ analyze: { maxIterations: 1 } }),
      { client },
    );

    const result = await orchestrator.run('How are metrics trending?');

    expect(result.answer).toBe('Everything is trending down.');
    expect(client.calls).toHaveLength(3);
    expect(client.calls[2]?.systemPrompt).toContain('You have run out of tool calls');
    expect(client.calls[2]?.systemPrompt).toContain('• mobile_conversions: 3.2 (down -8.6%)');
  });
});

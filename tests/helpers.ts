import type { Capability, CapabilityHandler } from '../src/capabilities/index.js';
import { CapabilityRegistry } from '../src/core/index.js';
import type { PlanStep, StepResult } from '../src/schema/index.js';
import { createKnowledgeBase } from '../src/knowledge/index.js';
import type { KnowledgeBase } from '../src/knowledge/index.js';

export interface HandlerCall {
  subquery: string;
  context: string;
}

export interface RecordingHandler extends CapabilityHandler {
  calls: HandlerCall[];
}

/** Handler that records its inputs and answers with `reply`. */
export function recordingHandler(
  reply: string | ((subquery: string, context: string) => Promise<string> | string),
): RecordingHandler {
  const calls: HandlerCall[] = [];
  return {
    calls,
    async answer(subquery, context) {
      calls.push({ subquery, context });
      return typeof reply === 'string' ? reply : reply(subquery, context);
    },
  };
}

export function capability(intent: string, handler: CapabilityHandler): Capability {
  return { intent, description: `${intent} things`, examples: [], handler };
}

/** Unsealed registry over search / retrieve / analyze, default `search`. */
export function buildRegistry(handlers: {
  search?: CapabilityHandler;
  retrieve?: CapabilityHandler;
  analyze?: CapabilityHandler;
} = {}): CapabilityRegistry {
  return new CapabilityRegistry('search')
    .register(capability('search', handlers.search ?? recordingHandler('search-answer')))
    .register(capability('retrieve', handlers.retrieve ?? recordingHandler('retrieve-answer')))
    .register(capability('analyze', handlers.analyze ?? recordingHandler('analyze-answer')));
}

export function stepResult(
  stepIndex: number,
  intent: string,
  answer: string,
  subquery = `subquery ${String(stepIndex)}`,
): StepResult {
  const step: PlanStep = { subquery, intent };
  return { stepIndex, step, answer, status: 'completed', durationMs: 1 };
}

export function never<T>(): Promise<T> {
  return new Promise<T>(() => {});
}

export function testKnowledgeBase(): KnowledgeBase {
  return createKnowledgeBase({
    tickets: {
      'TST-1': {
        title: 'Login button misaligned',
        status: 'Open',
        assignee: 'Dana Park',
        priority: 'P2',
        description: 'Button overlaps footer on small screens.',
        created: '2024-03-01',
        updated: '2024-03-02',
      },
      'TST-2': {
        title: 'Search returns stale results',
        status: 'In Progress',
        assignee: 'Eli Moss',
        priority: 'P0',
        description: 'Index refresh job fails nightly.',
        created: '2024-03-03',
        updated: '2024-03-04',
      },
    },
    docs: {
      onboarding: {
        title: 'Onboarding Guide',
        content: 'How new engineers set up the search index locally.',
        updated: '2024-02-01',
      },
    },
    metrics: {
      signup_rate: {
        current: 4.5,
        previous: 4,
        trend: 'up',
        changePct: 12.5,
        period: 'week-over-week',
      },
      churn: {
        current: 2,
        previous: 2.5,
        trend: 'down',
        changePct: -20,
        period: 'month-over-month',
      },
    },
  });
}

import type { LLMClient } from '../llm/index.js';
import type { CapabilityConfig } from '../schema/index.js';
import type { KnowledgeBase, Tool } from '../knowledge/index.js';
import {
  createAnalyzeTools,
  createRetrieveTools,
  createSearchTools,
} from '../knowledge/index.js';
import { LIMITS } from '../config/defaults.js';
import { CapabilityRegistry } from '../core/registry.js';
import type { Capability } from './handler.js';
import { createToolAgentHandler } from './toolAgent.js';

// ── Built-in capabilities ────────────────────────────────────

interface CapabilitySpec {
  intent: string;
  description: string;
  examples: readonly string[];
  instructions: string;
  maxIterations: number;
  tools: (kb: KnowledgeBase) => Tool[];
}

export const DEFAULT_INTENT = 'search';

export const BUILTIN_CAPABILITIES: readonly CapabilitySpec[] = [
  {
    intent: 'search',
    description:
      'Use when you need to FIND tickets or docs using keywords (e.g. "find Safari issues", "search for checkout docs")',
    examples: [
      'What tickets are about Safari?',
      'Find checkout issues',
    ],
    instructions:
      'Search for relevant information in tickets and documentation. Summarize what was found, including ids and keys.',
    maxIterations: LIMITS.MAX_SEARCH_ITERATIONS,
    tools: createSearchTools,
  },
  {
    intent: 'retrieve',
    description:
      'Use when you have specific IDs and need DETAILS (e.g. "get ticket SHOP-2847", "get doc checkout-rewrite")',
    examples: ['Get details for SHOP-2847'],
    instructions:
      'Retrieve detailed information for specific tickets or documents by id or key. Previous steps may name the ids to fetch.',
    maxIterations: LIMITS.MAX_RETRIEVE_ITERATIONS,
    tools: createRetrieveTools,
  },
  {
    intent: 'analyze',
    description:
      'Use when you need to examine METRICS or TRENDS (e.g. "how are conversions trending?", "compare mobile vs desktop")',
    examples: ['Are mobile conversions down?'],
    instructions:
      'Analyze metrics, trends and data patterns. Report current and previous values and the direction of change.',
    maxIterations: LIMITS.MAX_ANALYZE_ITERATIONS,
    tools: createAnalyzeTools,
  },
];

// ── Registry factory ─────────────────────────────────────────

export interface DefaultRegistryOptions {
  /** Per-intent overrides, keyed by intent name. */
  capabilities?: Readonly<Record<string, CapabilityConfig>> | undefined;
}

export function createBuiltinCapabilities(
  client: LLMClient,
  kb: KnowledgeBase,
  options: DefaultRegistryOptions = {},
): Capability[] {
  return BUILTIN_CAPABILITIES.map((spec) => ({
    intent: spec.intent,
    description: spec.description,
    examples: spec.examples,
    handler: createToolAgentHandler(client, {
      capability: spec.intent,
      instructions: spec.instructions,
      tools: spec.tools(kb),
      maxIterations:
        options.capabilities?.[spec.intent]?.maxIterations ?? spec.maxIterations,
    }),
  }));
}

/** Registry with search, retrieve and analyze; sealed, default `search`. */
export function createDefaultRegistry(
  client: LLMClient,
  kb: KnowledgeBase,
  options: DefaultRegistryOptions = {},
): CapabilityRegistry {
  const registry = new CapabilityRegistry(DEFAULT_INTENT);
  for (const capability of createBuiltinCapabilities(client, kb, options)) {
    registry.register(capability);
  }
  return registry.seal();
}

/**
 * Capabilities module.
 * The handler contract plus the built-in search / retrieve / analyze
 * handlers, each a bounded tool-calling loop over the knowledge base.
 */

export type { Capability, CapabilityHandler, AnswerOptions } from './handler.js';
export { createToolAgentHandler, parseTurn, NO_CONTEXT } from './toolAgent.js';
export type { ToolAgentDefinition } from './toolAgent.js';
export {
  BUILTIN_CAPABILITIES,
  DEFAULT_INTENT,
  createBuiltinCapabilities,
  createDefaultRegistry,
} from './definitions.js';
export type { DefaultRegistryOptions } from './definitions.js';

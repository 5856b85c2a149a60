/**
 * Core orchestration module.
 * Planner → validator → registry routing → synthesizer.
 * No CLI and no provider-specific code.
 */

export { Orchestrator, renderContextEntry, degradedAnswer, CANCELLED_ANSWER } from './orchestrator.js';
export type { OrchestratorOptions, RunOptions } from './orchestrator.js';
export { createLLMPlanner, createStaticPlanner } from './planner.js';
export type { Planner, PlanOptions } from './planner.js';
export { validatePlan } from './validator.js';
export type { ValidateOptions } from './validator.js';
export { CapabilityRegistry } from './registry.js';
export { synthesize, formatSection, SECTION_SEPARATOR } from './synthesizer.js';
export { withTimeout } from './timeout.js';
export { createLoggingListener, noopListener } from './events.js';
export type {
  OrchestratorEvent,
  OrchestratorEventType,
  OrchestratorEventListener,
} from './events.js';
export {
  PlannerError,
  InvariantError,
  CapabilityNotFoundError,
  RegistryError,
  TimeoutError,
} from './errors.js';

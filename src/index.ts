/**
 * waypoint — plan-and-route question answering.
 *
 * Library entry point. The CLI lives in `cli/main.ts`.
 */

export * from './schema/index.js';
export * from './core/index.js';
export * from './capabilities/index.js';
export * from './knowledge/index.js';
export * from './llm/index.js';
export { generateMarkdown, generateJSON, serializeJSON } from './report/index.js';
export { TIMEOUTS, LIMITS, TOKEN_GUARDS, loadConfigFile, loadConfigIfPresent, ConfigError } from './config/index.js';
export { resolveSettings, createOrchestrator } from './app.js';
export type { AppOverrides, AppSettings, CreateOrchestratorOptions } from './app.js';

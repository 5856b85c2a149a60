/**
 * Report generation module.
 * Deterministic — no LLM calls.
 * Transforms a finished run into markdown + JSON artifacts.
 */

export { generateMarkdown, generateJSON, serializeJSON } from './reporter.js';
export type { JsonOutput, JsonOutputStep } from './reporter.js';

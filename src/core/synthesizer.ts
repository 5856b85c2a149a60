import type { StepResult } from '../schema/index.js';
import { InvariantError } from './errors.js';

export const SECTION_SEPARATOR = '\n\n';

export function formatSection(result: StepResult): string {
  return `${result.step.intent.toUpperCase()}: ${result.answer}`;
}

/**
 * Combine step answers into the final response.
 *
 * A single answer is returned verbatim. Several answers are labelled with
 * their intent and kept in plan order; they are never merged or reordered.
 */
export function synthesize(results: readonly StepResult[]): string {
  const [first, ...rest] = results;
  if (first === undefined) {
    throw new InvariantError('Cannot synthesize an answer from zero step results');
  }
  if (rest.length === 0) return first.answer;

  return results.map(formatSection).join(SECTION_SEPARATOR);
}

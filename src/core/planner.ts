import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { GenerateOptions, LLMClient } from '../llm/index.js';
import type { RawPlanStep } from '../schema/index.js';
import { parseRawPlan, rawPlanStepSchema } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { fillTemplate } from '../utils/template.js';

// ── Public types ─────────────────────────────────────────────

export interface PlanOptions {
  signal?: AbortSignal | undefined;
}

/**
 * Decomposes a question into (subquery, intent) pairs. Output is untrusted;
 * the orchestrator validates and repairs whatever comes back.
 */
export interface Planner {
  plan(
    question: string,
    capabilityDescriptions: string,
    options?: PlanOptions,
  ): Promise<RawPlanStep[]>;
}

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

// ── Static planner ───────────────────────────────────────────

/** Always returns the same plan. Used for scripting and tests. */
export function createStaticPlanner(steps: readonly RawPlanStep[]): Planner {
  return {
    async plan(): Promise<RawPlanStep[]> {
      return steps.map((s) => ({ ...s }));
    },
  };
}

// ── LLM planner ──────────────────────────────────────────────

export function createLLMPlanner(client: LLMClient): Planner {
  return {
    async plan(question, capabilityDescriptions, options = {}) {
      log.llm('Planner decomposing question...');
      const generateOptions: GenerateOptions = { signal: options.signal };
      const systemPrompt = await buildSystemPrompt(capabilityDescriptions);

      const raw = await client.generate(systemPrompt, question, generateOptions);
      const firstAttempt = tryParse(raw);
      if (firstAttempt.ok) return firstAttempt.steps;

      // Repair: one retry with the repair prompt
      log.warn(`Planner parse failed, attempting repair: ${firstAttempt.error}`);
      const repairPrompt = await buildRepairPrompt(question, raw, firstAttempt.error);
      const repaired = await client.generate(systemPrompt, repairPrompt, generateOptions);

      const secondAttempt = tryParse(repaired);
      if (secondAttempt.ok) return secondAttempt.steps;

      // An empty plan is repaired downstream into a single fallback step.
      log.warn(`Planner output unusable after repair: ${secondAttempt.error}`);
      return [];
    },
  };
}

// ── Template rendering ───────────────────────────────────────

async function buildSystemPrompt(capabilityDescriptions: string): Promise<string> {
  const template = await readFile(
    path.join(PROMPTS_DIR, 'planner.txt'),
    'utf-8',
  );

  return fillTemplate(template, { capabilities: capabilityDescriptions });
}

async function buildRepairPrompt(
  question: string,
  previousOutput: string,
  error: string,
): Promise<string> {
  const template = await readFile(
    path.join(PROMPTS_DIR, 'planner_repair.txt'),
    'utf-8',
  );

  return fillTemplate(template, { question, error, previousOutput });
}

// ── Pre-validation fixups ────────────────────────────────────
// Models sometimes wrap the list in an object or rename its keys.

function fixupRawPlan(parsed: unknown): unknown {
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    if ('plan' in parsed && Array.isArray(parsed.plan)) return fixupRawPlan(parsed.plan);
    if ('steps' in parsed && Array.isArray(parsed.steps)) return fixupRawPlan(parsed.steps);
    return parsed;
  }
  if (!Array.isArray(parsed)) return parsed;

  return parsed.map((entry: unknown) => {
    if (typeof entry !== 'object' || entry === null) return entry;
    const step: Record<string, unknown> = { ...entry };

    if (step['subquery'] === undefined) {
      step['subquery'] = step['query'] ?? step['question'];
    }
    if (step['intent'] === undefined) {
      step['intent'] = step['type'] ?? step['capability'];
    }

    return step;
  });
}

// ── JSON extraction + validation ─────────────────────────────

type ParseResult =
  | { ok: true; steps: RawPlanStep[] }
  | { ok: false; error: string };

export function tryParse(raw: string): ParseResult {
  const json = extractJSON(raw);

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: `Invalid JSON: ${message}` };
  }

  parsed = fixupRawPlan(parsed);
  if (!Array.isArray(parsed)) {
    return { ok: false, error: 'Expected a JSON array of steps' };
  }

  const usable = parsed.filter((entry) => rawPlanStepSchema.safeParse(entry).success);
  if (parsed.length > 0 && usable.length === 0) {
    return { ok: false, error: 'No entry in the plan is an object' };
  }

  return { ok: true, steps: parseRawPlan(usable) };
}

function extractJSON(raw: string): string {
  // Strip markdown fences if present
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  // Outermost array, else outermost object
  const start = raw.indexOf('[');
  const end = raw.lastIndexOf(']');
  if (start !== -1 && end > start) {
    const objStart = raw.indexOf('{');
    if (objStart === -1 || start < objStart) return raw.slice(start, end + 1);
  }

  const objStart = raw.indexOf('{');
  const objEnd = raw.lastIndexOf('}');
  if (objStart !== -1 && objEnd > objStart) return raw.slice(objStart, objEnd + 1);

  return raw.trim();
}

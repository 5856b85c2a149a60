import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { GenerateOptions, LLMClient } from '../llm/index.js';
import type { AgentToolCall, AgentTurn, ToolTranscriptEntry } from '../schema/index.js';
import { agentTurnSchema } from '../schema/index.js';
import type { Tool } from '../knowledge/index.js';
import { TOKEN_GUARDS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { fillTemplate } from '../utils/template.js';
import type { AnswerOptions, CapabilityHandler } from './handler.js';

// ── Public types ─────────────────────────────────────────────

export interface ToolAgentDefinition {
  capability: string;
  /** What this capability is for, inserted into the step prompt. */
  instructions: string;
  tools: readonly Tool[];
  maxIterations: number;
}

// ── Constants ────────────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

export const NO_CONTEXT = 'No previous context';

// ── Pre-validation fixups ────────────────────────────────────
// Models sometimes drop the "action" discriminator.

function fixupRawTurn(parsed: unknown): unknown {
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return parsed;
  }
  const turn: Record<string, unknown> = { ...parsed };

  if (turn['action'] === undefined) {
    if (typeof turn['tool'] === 'string') turn['action'] = 'tool';
    else if (typeof turn['answer'] === 'string') turn['action'] = 'answer';
  }
  if (turn['action'] === 'tool' && turn['input'] === undefined) {
    turn['input'] = turn['args'] ?? turn['arguments'];
  }

  return turn;
}

// ── JSON extraction ─────────────────────────────────────────

function extractJSON(raw: string): string | undefined {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start !== -1 && end > start) return raw.slice(start, end + 1);

  return undefined;
}

/**
 * Interpret one model reply. Anything that is not a well-formed tool call
 * or answer object is taken as a prose answer.
 */
export function parseTurn(raw: string): AgentTurn {
  const prose: AgentTurn = { action: 'answer', answer: raw.trim() };

  const json = extractJSON(raw);
  if (json === undefined) return prose;

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return prose;
  }

  const result = agentTurnSchema.safeParse(fixupRawTurn(parsed));
  return result.success ? result.data : prose;
}

// ── Prompt building ─────────────────────────────────────────

function formatTools(tools: readonly Tool[]): string {
  return tools
    .map((t) => `- ${t.name}(${t.parameters.join(', ')}): ${t.description}`)
    .join('\n');
}

function formatTranscript(transcript: readonly ToolTranscriptEntry[]): string {
  if (transcript.length === 0) return '(no tool calls yet)';

  return transcript
    .map(
      (e) =>
        `${String(e.iteration + 1)}. ${e.tool}(${e.input}) →\n${e.observation}`,
    )
    .join('\n\n');
}

function formatContext(context: string): string {
  const trimmed = context.trim();
  if (trimmed.length === 0) return NO_CONTEXT;
  // Keep the most recent steps when the context outgrows the guard.
  return trimmed.length > TOKEN_GUARDS.MAX_CONTEXT_CHARS
    ? trimmed.slice(-TOKEN_GUARDS.MAX_CONTEXT_CHARS)
    : trimmed;
}

async function renderTemplate(
  file: string,
  definition: ToolAgentDefinition,
  context: string,
  transcript: readonly ToolTranscriptEntry[],
): Promise<string> {
  const template = await readFile(path.join(PROMPTS_DIR, file), 'utf-8');

  return fillTemplate(template, {
    capability: definition.capability,
    instructions: definition.instructions,
    tools: formatTools(definition.tools),
    context: formatContext(context),
    transcript: formatTranscript(transcript),
  });
}

// ── Handler factory ─────────────────────────────────────────

/**
 * A capability handler that lets the model call lookup tools for at most
 * `maxIterations` turns, then asks for a best-effort answer from whatever
 * it has gathered.
 */
export function createToolAgentHandler(
  client: LLMClient,
  definition: ToolAgentDefinition,
): CapabilityHandler {
  const toolsByName = new Map(definition.tools.map((t) => [t.name, t]));

  function runTool(call: AgentToolCall): string {
    const tool = toolsByName.get(call.tool);
    if (!tool) {
      return `Unknown tool '${call.tool}'. Available: ${[...toolsByName.keys()].join(', ')}`;
    }
    return tool.invoke(call.input);
  }

  return {
    async answer(subquery: string, context: string, options: AnswerOptions = {}) {
      const generateOptions: GenerateOptions = { signal: options.signal };
      const transcript: ToolTranscriptEntry[] = [];

      for (let iteration = 0; iteration < definition.maxIterations; iteration++) {
        const prompt = await renderTemplate('capability_step.txt', definition, context, transcript);
        const raw = await client.generate(prompt, subquery, generateOptions);
        const turn = parseTurn(raw);

        if (turn.action === 'answer') {
          if (turn.answer.length > 0) return turn.answer;
          break;
        }

        const input = JSON.stringify(turn.input);
        log.tool(turn.tool, input);
        const observation = runTool(turn);
        transcript.push({
          iteration,
          tool: turn.tool,
          input,
          observation: observation.slice(0, TOKEN_GUARDS.MAX_OBSERVATION_CHARS),
        });
      }

      // Out of turns (or an empty reply): one last call for a best-effort answer.
      log.detail(`${definition.capability}: finalizing from ${String(transcript.length)} tool call(s)`);
      const finalPrompt = await renderTemplate('capability_final.txt', definition, context, transcript);
      const final = (await client.generate(finalPrompt, subquery, generateOptions)).trim();
      if (final.length > 0) return final;

      const last = transcript.at(-1);
      return last
        ? last.observation
        : `No answer could be produced for: ${subquery}`;
    },
  };
}

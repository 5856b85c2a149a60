import { z } from 'zod';

// ── Capability agent turn (tool call OR answer) ─────────────

const agentToolCallSchema = z.object({
  action: z.literal('tool'),
  tool: z.string().min(1),
  input: z.record(z.string(), z.unknown()).default({}),
});

const agentAnswerSchema = z.object({
  action: z.literal('answer'),
  answer: z.string().min(1),
});

export const agentTurnSchema = z.discriminatedUnion('action', [
  agentToolCallSchema,
  agentAnswerSchema,
]);

export type AgentTurn = z.infer<typeof agentTurnSchema>;
export type AgentToolCall = z.infer<typeof agentToolCallSchema>;
export type AgentAnswer = z.infer<typeof agentAnswerSchema>;

// ── Transcript entry ────────────────────────────────────────

export interface ToolTranscriptEntry {
  iteration: number;
  tool: string;
  input: string;
  observation: string;
}

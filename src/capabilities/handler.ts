// ── CapabilityHandler ────────────────────────────────────────
// Turns one subquery plus the accumulated context into an answer.
// "Nothing found" is an answer, not a rejection; only infrastructure
// failures reject.

export interface AnswerOptions {
  signal?: AbortSignal | undefined;
}

export interface CapabilityHandler {
  answer(
    subquery: string,
    context: string,
    options?: AnswerOptions,
  ): Promise<string>;
}

// ── Capability ───────────────────────────────────────────────

export interface Capability {
  /** Registry key, lower-case. */
  intent: string;
  /** One line shown to the planner. */
  description: string;
  /** Example questions that should route to this intent. */
  examples: readonly string[];
  handler: CapabilityHandler;
}

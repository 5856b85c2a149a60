// ── Planner ──────────────────────────────────────────────────

export class PlannerError extends Error {
  readonly exitCode = 3;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PlannerError';
  }
}

// ── Internal invariants ──────────────────────────────────────
// Raised only when the kernel's own guarantees are broken. Never repaired.

export class InvariantError extends Error {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

export class CapabilityNotFoundError extends InvariantError {
  constructor(readonly intent: string) {
    super(`No capability registered for intent "${intent}"`);
    this.name = 'CapabilityNotFoundError';
  }
}

// ── Registry construction ────────────────────────────────────

export class RegistryError extends Error {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'RegistryError';
  }
}

// ── Timeouts ─────────────────────────────────────────────────

export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${String(timeoutMs)}ms`);
    this.name = 'TimeoutError';
  }
}

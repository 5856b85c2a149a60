/**
 * Default configuration values.
 * All values are overridable via config file or CLI flags.
 */

export const TIMEOUTS = {
  PLANNER_TIMEOUT: 60_000,
  HANDLER_TIMEOUT: 90_000,
  // Node clamps larger timer delays to 1ms.
  MAX_TIMEOUT: 2 ** 31 - 1,
} as const;

/** Largest timeout accepted from config files and flags, in seconds. */
export const MAX_TIMEOUT_SECONDS = Math.floor(TIMEOUTS.MAX_TIMEOUT / 1000);

export const LIMITS = {
  MAX_PLAN_STEPS: 8,
  MAX_SEARCH_ITERATIONS: 4,
  MAX_RETRIEVE_ITERATIONS: 3,
  MAX_ANALYZE_ITERATIONS: 4,
} as const;

export const TOKEN_GUARDS = {
  MAX_CONTEXT_CHARS: 12_000,
  MAX_OBSERVATION_CHARS: 4_000,
} as const;

export const DEFAULT_CONFIG_PATH = '.waypoint.yaml';

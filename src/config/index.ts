/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated.
 */

export {
  TIMEOUTS,
  LIMITS,
  TOKEN_GUARDS,
  DEFAULT_CONFIG_PATH,
  MAX_TIMEOUT_SECONDS,
} from './defaults.js';
export { loadConfigFile, loadConfigIfPresent, ConfigError } from './loader.js';

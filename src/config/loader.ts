import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

// ── Error ────────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.waypoint.yaml` (or JSON) config file.
 * Throws a ConfigError if the file is unreadable or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  const raw = await readFile(configPath, 'utf-8');
  return parseConfig(raw, configPath);
}

/** Like loadConfigFile, but a missing file yields the empty config. */
export async function loadConfigIfPresent(
  configPath: string,
): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return fileConfigSchema.parse({});
    throw err;
  }
  return parseConfig(raw, configPath);
}

function parseConfig(raw: string, configPath: string): FileConfig {
  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${configPath}: ${message}`);
  }

  try {
    return fileConfigSchema.parse(parsed ?? {});
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new ConfigError(`${configPath}: ${issues}`);
    }
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}

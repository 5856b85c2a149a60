import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError, loadConfigFile, loadConfigIfPresent } from '../src/config/index.js';
import { DEFAULT_DATA_DIR } from '../src/knowledge/index.js';
import { resolveSettings } from '../src/app.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await mkdtemp(path.join(os.tmpdir(), 'waypoint-config-'));
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

async function writeConfig(name: string, contents: string): Promise<string> {
  const file = path.join(tmpDir, name);
  await writeFile(file, contents, 'utf-8');
  return file;
}

describe('loadConfigFile', () => {
  it('parses YAML', async () => {
    const file = await writeConfig(
      '.waypoint.yaml',
      'provider: mock\nplannerTimeout: 5\ncapabilities:\n  search:\n    maxIterations: 2\n',
    );

    expect(await loadConfigFile(file)).toEqual({
      provider: 'mock',
      plannerTimeout: 5,
      capabilities: { search: { maxIterations: 2 } },
    });
  });

  it('parses JSON by extension', async () => {
    const file = await writeConfig('waypoint.json', '{"maxPlanSteps": 3}');

    expect(await loadConfigFile(file)).toEqual({ maxPlanSteps: 3, capabilities: {} });
  });

  it('rejects unknown keys', async () => {
    const file = await writeConfig('.waypoint.yaml', 'bogus: 1\n');

    await expect(loadConfigFile(file)).rejects.toThrow(ConfigError);
    await expect(loadConfigFile(file)).rejects.toThrow(
      `${file}: (root): Unrecognized key(s) in object: 'bogus'`,
    );
  });

  it('names the offending field', async () => {
    const file = await writeConfig('.waypoint.yaml', 'maxPlanSteps: two\n');

    await expect(loadConfigFile(file)).rejects.toThrow(
      `${file}: maxPlanSteps: Expected number, received string`,
    );
  });

  it('rejects timeouts beyond the timer limit', async () => {
    const file = await writeConfig('.waypoint.yaml', 'handlerTimeout: 2147484\n');

    await expect(loadConfigFile(file)).rejects.toThrow(
      `${file}: handlerTimeout: Number must be less than or equal to 2147483`,
    );
  });

  it('rejects malformed YAML', async () => {
    const file = await writeConfig('.waypoint.yaml', 'provider: [mock\n');

    await expect(loadConfigFile(file)).rejects.toThrow(ConfigError);
  });
});

describe('loadConfigIfPresent', () => {
  it('returns the empty config for a missing file', async () => {
    expect(await loadConfigIfPresent(path.join(tmpDir, 'absent.yaml'))).toEqual({
      capabilities: {},
    });
  });

  it('treats an empty file as the empty config', async () => {
    const file = await writeConfig('.waypoint.yaml', '');

    expect(await loadConfigIfPresent(file)).toEqual({ capabilities: {} });
  });
});

describe('resolveSettings', () => {
  it('prefers flags, then the file, then the environment', () => {
    const settings = resolveSettings(
      { provider: 'openai', model: 'file-model', plannerTimeout: 5, capabilities: {} },
      { model: 'flag-model', handlerTimeoutSec: 2 },
      {
        LLM_PROVIDER: 'anthropic',
        OPENAI_API_KEY: 'test-key',
        WAYPOINT_MODEL: 'env-model',
      },
    );

    expect(settings).toEqual({
      llm: { provider: 'openai', apiKey: 'test-key', model: 'flag-model' },
      dataDir: DEFAULT_DATA_DIR,
      plannerTimeoutMs: 5000,
      handlerTimeoutMs: 2000,
      maxPlanSteps: undefined,
      capabilities: {},
    });
  });

  it('falls back to the environment', () => {
    const settings = resolveSettings(
      { capabilities: {} },
      {},
      { LLM_PROVIDER: 'mock', WAYPOINT_MODEL: 'env-model' },
    );

    expect(settings.llm).toEqual({ provider: 'mock', model: 'env-model' });
    expect(settings.plannerTimeoutMs).toBeUndefined();
  });
});

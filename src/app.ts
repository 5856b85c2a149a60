import type { FileConfig } from './schema/index.js';
import type { LLMClient, LLMConfig, LLMProvider } from './llm/index.js';
import { createLLMClient, loadLLMConfig } from './llm/index.js';
import { loadKnowledgeBase, DEFAULT_DATA_DIR } from './knowledge/index.js';
import { createDefaultRegistry } from './capabilities/index.js';
import { Orchestrator, createLLMPlanner } from './core/index.js';
import type { OrchestratorEventListener } from './core/index.js';

// ── Settings ─────────────────────────────────────────────────

/** Values the CLI resolved from flags; each one overrides the config file. */
export interface AppOverrides {
  provider?: LLMProvider | undefined;
  model?: string | undefined;
  dataDir?: string | undefined;
  plannerTimeoutSec?: number | undefined;
  handlerTimeoutSec?: number | undefined;
  maxPlanSteps?: number | undefined;
}

export interface AppSettings {
  llm: LLMConfig;
  dataDir: string;
  plannerTimeoutMs: number | undefined;
  handlerTimeoutMs: number | undefined;
  maxPlanSteps: number | undefined;
  capabilities: FileConfig['capabilities'];
}

// Precedence: flag > config file > env > defaults.
export function resolveSettings(
  fileConfig: FileConfig,
  overrides: AppOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): AppSettings {
  const provider = overrides.provider ?? fileConfig.provider;
  const envConfig = loadLLMConfig(
    provider !== undefined ? { ...env, LLM_PROVIDER: provider } : env,
  );
  const model = overrides.model ?? fileConfig.model ?? envConfig.model;
  const plannerTimeout = overrides.plannerTimeoutSec ?? fileConfig.plannerTimeout;
  const handlerTimeout = overrides.handlerTimeoutSec ?? fileConfig.handlerTimeout;

  return {
    llm: {
      provider: envConfig.provider,
      ...(envConfig.apiKey !== undefined ? { apiKey: envConfig.apiKey } : {}),
      ...(model !== undefined ? { model } : {}),
    },
    dataDir: overrides.dataDir ?? fileConfig.dataDir ?? DEFAULT_DATA_DIR,
    plannerTimeoutMs: plannerTimeout !== undefined ? plannerTimeout * 1000 : undefined,
    handlerTimeoutMs: handlerTimeout !== undefined ? handlerTimeout * 1000 : undefined,
    maxPlanSteps: overrides.maxPlanSteps ?? fileConfig.maxPlanSteps,
    capabilities: fileConfig.capabilities,
  };
}

// ── Assembly ─────────────────────────────────────────────────

export interface CreateOrchestratorOptions {
  client?: LLMClient | undefined;
  onEvent?: OrchestratorEventListener | undefined;
}

/**
 * Build the full stack: LLM client, knowledge base, sealed registry, LLM
 * planner and orchestrator. Done once per process.
 */
export async function createOrchestrator(
  settings: AppSettings,
  options: CreateOrchestratorOptions = {},
): Promise<Orchestrator> {
  const client = options.client ?? createLLMClient(settings.llm);
  const kb = await loadKnowledgeBase(settings.dataDir);
  const registry = createDefaultRegistry(client, kb, {
    capabilities: settings.capabilities,
  });

  return new Orchestrator({
    planner: createLLMPlanner(client),
    registry,
    plannerTimeoutMs: settings.plannerTimeoutMs,
    handlerTimeoutMs: settings.handlerTimeoutMs,
    maxPlanSteps: settings.maxPlanSteps,
    onEvent: options.onEvent,
  });
}

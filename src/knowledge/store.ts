import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { z } from 'zod';

import type { Doc, Metric, Ticket } from '../schema/index.js';
import {
  docCollectionSchema,
  metricCollectionSchema,
  ticketCollectionSchema,
} from '../schema/index.js';

// ── Types ────────────────────────────────────────────────────

export interface KnowledgeBase {
  tickets: ReadonlyMap<string, Ticket>;
  docs: ReadonlyMap<string, Doc>;
  metrics: ReadonlyMap<string, Metric>;
}

// ── Paths ────────────────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
export const DEFAULT_DATA_DIR = path.join(THIS_DIR, '..', '..', 'data');

// ── Loader ───────────────────────────────────────────────────

/**
 * Read and validate the three collections under `dataDir`.
 * Collections are loaded once; tools only ever read them.
 */
export async function loadKnowledgeBase(
  dataDir: string = DEFAULT_DATA_DIR,
): Promise<KnowledgeBase> {
  const [tickets, docs, metrics] = await Promise.all([
    loadCollection(dataDir, 'tickets.json', ticketCollectionSchema),
    loadCollection(dataDir, 'docs.json', docCollectionSchema),
    loadCollection(dataDir, 'metrics.json', metricCollectionSchema),
  ]);

  return createKnowledgeBase({ tickets, docs, metrics });
}

export function createKnowledgeBase(data: {
  tickets: Record<string, Ticket>;
  docs: Record<string, Doc>;
  metrics: Record<string, Metric>;
}): KnowledgeBase {
  return {
    tickets: new Map(Object.entries(data.tickets)),
    docs: new Map(Object.entries(data.docs)),
    metrics: new Map(Object.entries(data.metrics)),
  };
}

async function loadCollection<T>(
  dataDir: string,
  file: string,
  schema: z.ZodType<Record<string, T>>,
): Promise<Record<string, T>> {
  const filePath = path.join(dataDir, file);
  const raw = await readFile(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid dataset ${filePath}: ${message}`);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid dataset ${filePath}: ${result.error.message}`);
  }
  return result.data;
}

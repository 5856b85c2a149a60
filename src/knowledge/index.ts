/**
 * Knowledge module.
 * Static datasets (tickets, docs, metrics) and the lookup tools the
 * capability handlers call. Read-only after load.
 */

export { loadKnowledgeBase, createKnowledgeBase, DEFAULT_DATA_DIR } from './store.js';
export type { KnowledgeBase } from './store.js';
export { createSearchTools, createRetrieveTools, createAnalyzeTools } from './tools.js';
export type { Tool } from './tools.js';

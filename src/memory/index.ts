export type { Durability, InsertOptions, InsertResult, MemoryStore, RecallHit } from './memory-store.js';
export { JsonMemoryStore, createJsonMemoryStore } from './json-memory-store.js';
export type { JsonMemoryStoreConfig, MemoryState } from './json-memory-store.js';
export { sensationDedupKey, scoreRelevance, rankImpressions, excerpt } from './recall.js';

/**
 * Storage module exports.
 */

export type { Storage } from './storage.js';
export type { JSONStorageConfig } from './json-storage.js';
export { JSONStorage, createJSONStorage } from './json-storage.js';
export type { DeferredStorageConfig } from './deferred-storage.js';
export { DeferredStorage, createDeferredStorage } from './deferred-storage.js';

export type { Storage } from './storage.js';
export { JSONStorage, createJSONStorage, type JSONStorageConfig } from './json-storage.js';
export {
  DeferredStorage,
  createDeferredStorage,
  type DeferredStorageConfig,
} from './deferred-storage.js';

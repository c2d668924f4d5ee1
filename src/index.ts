/**
 * Barrel exports for age-graph-bridge: agtype decoding, the graph record
 * model, and per-context connection management for Apache AGE on
 * node-postgres.
 */

export * from './agtype/index.js';
export * from './connection/index.js';
export { LRUCache, DEFAULT_LRU_MAX_SIZE, type LRUCacheOptions, type LRUClearPredicate } from './cache/LRUCache.js';
export {
  AppSettings,
  loadAppSettings,
  PRIMARY_CONNECTION,
  type AgeSettings,
  type DbSettings,
} from './config/AppSettings.js';
export { createGraphBridge, type GraphBridge } from './bootstrap.js';
export * from './logging/index.js';
export {
  GraphBridgeError,
  GraphBridgeErrorCode,
  ValidationError,
  DecodeError,
  SchemaMismatchError,
  ResourceError,
  toError,
  type GraphBridgeErrorDetails,
} from './utils/errors.js';

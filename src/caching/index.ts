/**
 * Cache Module
 *
 * Tiered (exact + semantic) query caching in front of metered providers.
 */

export { FilesystemCacheStore } from './filesystem'
export { generateQueryCacheKey, normalizeQuery, parametersSignature, stableStringify } from './key'
export { MemoryCacheStore } from './memory'
export {
  type CacheLookup,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_CANDIDATE_LIMIT,
  DEFAULT_PURGE_INTERVAL_MS,
  type StoreOptions,
  TieredCache,
  type TieredCacheOptions,
  type TieredCacheStats
} from './tiered'
export type {
  CacheEntry,
  CacheParameters,
  CacheStore,
  CacheStoreStats,
  VectorCandidate
} from './types'

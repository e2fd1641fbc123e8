/**
 * Query Cache Types
 *
 * Storage contract for the tiered query cache. Implementations:
 * - MemoryCacheStore (tests, short-lived processes)
 * - FilesystemCacheStore (CLI, JSON files on disk)
 */

/** Request parameters that take part in the cache key. */
export type CacheParameters = Readonly<Record<string, string | number | boolean | null>>

export interface CacheEntry {
  readonly key: string
  /** Query text as the caller sent it */
  readonly queryText: string
  readonly parameters: CacheParameters
  readonly parametersSignature: string
  /** Present when the entry is indexed for similarity search */
  readonly embedding?: readonly number[] | undefined
  readonly embeddingModel?: string | undefined
  readonly payload: unknown
  readonly createdAt: number
  readonly expiresAt: number
  readonly hitCount: number
}

/**
 * Embedding of one stored entry, as handed to the similarity scan.
 */
export interface VectorCandidate {
  readonly key: string
  readonly embedding: Float32Array
  readonly createdAt: number
}

export interface CacheStoreStats {
  readonly entries: number
  /** Sum of hitCount over all stored entries */
  readonly totalHits: number
}

/**
 * Pluggable storage for cache entries.
 *
 * Stores report failures by throwing; the tiered cache turns them into
 * CacheUnavailableError.
 */
export interface CacheStore {
  get(key: string): Promise<CacheEntry | null>
  /** Insert or replace an entry */
  put(entry: CacheEntry): Promise<void>
  delete(key: string): Promise<void>
  /** Increment hitCount of an existing entry; no-op when missing */
  recordHit(key: string): Promise<void>
  /**
   * Most recent unexpired embedded entries for one parameter signature and
   * embedding model, newest first, at most `limit`.
   */
  recentVectors(
    signature: string,
    embeddingModel: string,
    limit: number,
    now: number
  ): Promise<VectorCandidate[]>
  /** Delete every entry with expiresAt < now and return how many were removed */
  purgeExpired(now: number): Promise<number>
  stats(): Promise<CacheStoreStats>
  clear(): Promise<void>
}

export function isExpired(entry: { readonly expiresAt: number }, now: number): boolean {
  return now > entry.expiresAt
}

/**
 * Tiered Query Cache
 *
 * Exact lookup by normalized query and parameters, then a bounded similarity
 * scan over recent entries made with the same parameters and embedding model.
 *
 * The cache never fails a request on its own account: embedding errors fall
 * back to exact-only lookups, and store errors surface as
 * CacheUnavailableError for the caller to treat as a miss.
 */

import { findTopK } from '../embeddings/cosine-similarity'
import type { EmbeddingProvider } from '../embeddings/types'
import { CacheUnavailableError, errorMessage } from '../errors'
import { type Logger, silentLogger } from '../logger'
import { generateQueryCacheKey, normalizeQuery, parametersSignature } from './key'
import { type CacheEntry, type CacheParameters, type CacheStore, isExpired } from './types'

export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000
export const DEFAULT_CANDIDATE_LIMIT = 200
export const DEFAULT_PURGE_INTERVAL_MS = 10 * 60 * 1000

export type CacheLookup<T> =
  | {
      readonly hit: true
      readonly payload: T
      readonly matchedBy: 'exact' | 'semantic'
      readonly similarity: number
      readonly key: string
    }
  | {
      readonly hit: false
      /** Query embedding computed during the probe, reusable by store() */
      readonly embedding?: Float32Array | undefined
    }

export interface TieredCacheStats {
  readonly entries: number
  readonly storedHits: number
  readonly exactHits: number
  readonly semanticHits: number
  readonly misses: number
  /** Session hit rate in percent, one decimal */
  readonly hitRate: number
}

export interface TieredCacheOptions<T> {
  readonly store: CacheStore
  /** Decides whether a stored payload can be returned as T */
  readonly isPayload: (value: unknown) => value is T
  /** Enables the semantic tier */
  readonly embedder?: EmbeddingProvider | undefined
  readonly ttlMs?: number | undefined
  /** Overrides the embedder's recommended threshold */
  readonly similarityThreshold?: number | undefined
  readonly candidateLimit?: number | undefined
  readonly purgeIntervalMs?: number | undefined
  readonly logger?: Logger | undefined
  readonly now?: (() => number) | undefined
}

export interface StoreOptions {
  /** Reuse an embedding from a previous miss instead of computing it again */
  readonly embedding?: Float32Array | undefined
  readonly ttlMs?: number | undefined
}

export class TieredCache<T> {
  private readonly backend: CacheStore
  private readonly isPayload: (value: unknown) => value is T
  private readonly embedder: EmbeddingProvider | undefined
  private readonly ttlMs: number
  private readonly threshold: number
  private readonly candidateLimit: number
  private readonly purgeIntervalMs: number
  private readonly logger: Logger
  private readonly now: () => number
  private lastPurgeAt: number
  private exactHits = 0
  private semanticHits = 0
  private misses = 0

  constructor(options: TieredCacheOptions<T>) {
    this.backend = options.store
    this.isPayload = options.isPayload
    this.embedder = options.embedder
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS
    this.threshold = options.similarityThreshold ?? options.embedder?.recommendedThreshold ?? 1
    this.candidateLimit = options.candidateLimit ?? DEFAULT_CANDIDATE_LIMIT
    this.purgeIntervalMs = options.purgeIntervalMs ?? DEFAULT_PURGE_INTERVAL_MS
    this.logger = options.logger ?? silentLogger
    this.now = options.now ?? Date.now
    this.lastPurgeAt = this.now()
  }

  /**
   * Probe the cache. Exact match first, then the semantic tier.
   *
   * @throws CacheUnavailableError when the store cannot be read
   */
  async lookup(
    query: string,
    parameters: CacheParameters,
    signal?: AbortSignal
  ): Promise<CacheLookup<T>> {
    const now = this.now()
    const key = generateQueryCacheKey(query, parameters)

    const exact = await this.readLive(key, now)
    if (exact) {
      await this.guard('record hit', () => this.backend.recordHit(key))
      this.exactHits++
      this.logger.verbose(`Cache hit (exact): ${normalizeQuery(query)}`)
      return { hit: true, payload: exact.payload, matchedBy: 'exact', similarity: 1, key }
    }

    if (!this.embedder) {
      this.misses++
      return { hit: false }
    }

    const embedding = await this.embedQuery(query, signal)
    if (!embedding) {
      this.misses++
      return { hit: false }
    }

    const candidates = await this.guard('scan', () =>
      this.backend.recentVectors(
        parametersSignature(parameters),
        this.embeddingModel(),
        this.candidateLimit,
        now
      )
    )
    for (const { candidate, similarity } of findTopK(embedding, candidates, 3, this.threshold)) {
      const entry = await this.readLive(candidate.key, now)
      if (!entry) continue
      await this.guard('record hit', () => this.backend.recordHit(candidate.key))
      this.semanticHits++
      this.logger.verbose(
        `Cache hit (semantic ${similarity.toFixed(3)}): "${normalizeQuery(query)}" ~ "${normalizeQuery(entry.queryText)}"`
      )
      return {
        hit: true,
        payload: entry.payload,
        matchedBy: 'semantic',
        similarity,
        key: entry.key
      }
    }

    this.misses++
    return { hit: false, embedding }
  }

  /**
   * Write one entry for a query. Indexed for similarity when an embedding is
   * available (passed in or computed here).
   *
   * @throws CacheUnavailableError when the store cannot be written
   */
  async store(
    query: string,
    parameters: CacheParameters,
    payload: T,
    options: StoreOptions = {}
  ): Promise<CacheEntry> {
    const now = this.now()
    const embedding = options.embedding ?? (await this.embedQuery(query))
    const model = embedding ? this.embeddingModel() : undefined

    const entry: CacheEntry = {
      key: generateQueryCacheKey(query, parameters),
      queryText: query,
      parameters,
      parametersSignature: parametersSignature(parameters),
      embedding: embedding ? Array.from(embedding) : undefined,
      embeddingModel: model,
      payload,
      createdAt: now,
      expiresAt: now + (options.ttlMs ?? this.ttlMs),
      hitCount: 0
    }
    await this.guard('write', () => this.backend.put(entry))

    if (now - this.lastPurgeAt >= this.purgeIntervalMs) {
      this.lastPurgeAt = now
      try {
        await this.purgeExpired()
      } catch (error) {
        this.logger.warn(`Cache purge failed: ${errorMessage(error)}`)
      }
    }
    return entry
  }

  /**
   * @throws CacheUnavailableError when the store cannot be purged
   */
  async purgeExpired(): Promise<number> {
    const removed = await this.guard('purge', () => this.backend.purgeExpired(this.now()))
    if (removed > 0) {
      this.logger.verbose(`Purged ${removed} expired cache entries`)
    }
    return removed
  }

  async getStats(): Promise<TieredCacheStats> {
    const { entries, totalHits } = await this.guard('stats', () => this.backend.stats())
    const hits = this.exactHits + this.semanticHits
    const total = hits + this.misses
    return {
      entries,
      storedHits: totalHits,
      exactHits: this.exactHits,
      semanticHits: this.semanticHits,
      misses: this.misses,
      hitRate: total > 0 ? Math.round((hits / total) * 1000) / 10 : 0
    }
  }

  async clear(): Promise<void> {
    await this.guard('clear', () => this.backend.clear())
  }

  /**
   * Read an entry that is unexpired and holds a usable payload.
   * Expired entries are deleted on the way.
   */
  private async readLive(
    key: string,
    now: number
  ): Promise<(CacheEntry & { readonly payload: T }) | null> {
    const entry = await this.guard('read', () => this.backend.get(key))
    if (!entry) return null

    if (isExpired(entry, now)) {
      await this.guard('delete', () => this.backend.delete(key))
      return null
    }
    const { payload } = entry
    if (!this.isPayload(payload)) {
      this.logger.warn(`Discarding cache entry ${key.slice(0, 12)} with unexpected payload`)
      await this.guard('delete', () => this.backend.delete(key))
      return null
    }
    return { ...entry, payload }
  }

  private async embedQuery(query: string, signal?: AbortSignal): Promise<Float32Array | undefined> {
    if (!this.embedder) return undefined
    try {
      const result = await this.embedder.embed(normalizeQuery(query), signal)
      if (result.ok) return result.value
      this.logger.warn(`Embedding failed, using exact cache only: ${result.error.message}`)
    } catch (error) {
      this.logger.warn(`Embedding failed, using exact cache only: ${errorMessage(error)}`)
    }
    return undefined
  }

  private embeddingModel(): string {
    return this.embedder ? `${this.embedder.model}/${this.embedder.dimensions}` : 'none'
  }

  private async guard<R>(operation: string, action: () => Promise<R>): Promise<R> {
    try {
      return await action()
    } catch (error) {
      if (error instanceof CacheUnavailableError) throw error
      throw new CacheUnavailableError(`Cache ${operation} failed: ${errorMessage(error)}`, error)
    }
  }
}

/**
 * In-memory cache store.
 *
 * Entries are immutable; a hit replaces the entry with an updated copy so a
 * reader holding the old object never sees it change.
 */

import {
  type CacheEntry,
  type CacheStore,
  type CacheStoreStats,
  isExpired,
  type VectorCandidate
} from './types'

export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry>()

  async get(key: string): Promise<CacheEntry | null> {
    return this.entries.get(key) ?? null
  }

  async put(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.key, Object.freeze({ ...entry }))
  }

  async delete(entryKey: string): Promise<void> {
    this.entries.delete(entryKey)
  }

  async recordHit(entryKey: string): Promise<void> {
    const entry = this.entries.get(entryKey)
    if (entry) {
      this.entries.set(entryKey, Object.freeze({ ...entry, hitCount: entry.hitCount + 1 }))
    }
  }

  async recentVectors(
    signature: string,
    embeddingModel: string,
    limit: number,
    now: number
  ): Promise<VectorCandidate[]> {
    const candidates: VectorCandidate[] = []
    for (const entry of this.entries.values()) {
      if (
        entry.parametersSignature !== signature ||
        entry.embeddingModel !== embeddingModel ||
        !entry.embedding ||
        isExpired(entry, now)
      ) {
        continue
      }
      candidates.push({
        key: entry.key,
        embedding: Float32Array.from(entry.embedding),
        createdAt: entry.createdAt
      })
    }
    return candidates.sort((a, b) => b.createdAt - a.createdAt).slice(0, limit)
  }

  async purgeExpired(now: number): Promise<number> {
    const kept = new Map<string, CacheEntry>()
    let removed = 0
    for (const [entryKey, entry] of this.entries) {
      if (isExpired(entry, now)) {
        removed++
      } else {
        kept.set(entryKey, entry)
      }
    }
    this.entries = kept
    return removed
  }

  async stats(): Promise<CacheStoreStats> {
    let totalHits = 0
    for (const entry of this.entries.values()) totalHits += entry.hitCount
    return { entries: this.entries.size, totalHits }
  }

  async clear(): Promise<void> {
    this.entries = new Map()
  }
}

/**
 * Filesystem-based Query Cache Store
 *
 * Stores cache entries as JSON files organized by key prefix, plus one
 * similarity index file per parameter signature. Every write goes to a temp
 * file that is renamed into place, so readers never see a partial file.
 */

import { rm } from 'node:fs/promises'
import { join } from 'node:path'
import {
  guardAgainstUserCache,
  isRecord,
  listOptional,
  readOptional,
  writeFileAtomic
} from '../shared/fs'
import { KeyedLock } from '../shared/keyed-lock'
import {
  type CacheEntry,
  type CacheStore,
  type CacheStoreStats,
  isExpired,
  type VectorCandidate
} from './types'

/** Index files keep at most this many records, newest last. */
const MAX_INDEX_RECORDS = 2000

interface IndexRecord {
  readonly key: string
  readonly model: string
  readonly createdAt: number
  readonly expiresAt: number
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number')
}

function isParameters(value: unknown): value is CacheEntry['parameters'] {
  return (
    isRecord(value) &&
    Object.values(value).every(
      (v) => v === null || ['string', 'number', 'boolean'].includes(typeof v)
    )
  )
}

function parseEntry(raw: string): CacheEntry | null {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch {
    return null
  }
  if (!isRecord(data)) return null
  const { key, queryText, parameters, parametersSignature, embedding, embeddingModel } = data
  const { payload, createdAt, expiresAt, hitCount } = data
  if (
    typeof key !== 'string' ||
    typeof queryText !== 'string' ||
    !isParameters(parameters) ||
    typeof parametersSignature !== 'string' ||
    typeof createdAt !== 'number' ||
    typeof expiresAt !== 'number' ||
    typeof hitCount !== 'number'
  ) {
    return null
  }
  return {
    key,
    queryText,
    parameters,
    parametersSignature,
    embedding: isNumberArray(embedding) ? embedding : undefined,
    embeddingModel: typeof embeddingModel === 'string' ? embeddingModel : undefined,
    payload,
    createdAt,
    expiresAt,
    hitCount
  }
}

function parseIndex(raw: string): IndexRecord[] {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch {
    return []
  }
  if (!Array.isArray(data)) return []
  const records: IndexRecord[] = []
  for (const item of data) {
    if (
      isRecord(item) &&
      typeof item.key === 'string' &&
      typeof item.model === 'string' &&
      typeof item.createdAt === 'number' &&
      typeof item.expiresAt === 'number'
    ) {
      records.push({
        key: item.key,
        model: item.model,
        createdAt: item.createdAt,
        expiresAt: item.expiresAt
      })
    }
  }
  return records
}

/**
 * Filesystem-based store for the tiered query cache.
 *
 * Directory structure:
 * ```
 * <cacheDir>/queries/
 * ├── entries/
 * │   └── ab/
 * │       └── abcd1234...json
 * └── index/
 *     └── <parameters signature>.json
 * ```
 *
 * Uses first 2 chars of the key as subdirectory to avoid too many files in one dir.
 */
export class FilesystemCacheStore implements CacheStore {
  private readonly root: string
  private readonly locks = new KeyedLock()

  constructor(cacheDir: string) {
    guardAgainstUserCache(cacheDir)
    this.root = join(cacheDir, 'queries')
  }

  async get(key: string): Promise<CacheEntry | null> {
    const raw = await readOptional(this.entryPath(key))
    return raw === null ? null : parseEntry(raw)
  }

  async put(entry: CacheEntry): Promise<void> {
    await this.locks.run(`entry:${entry.key}`, () =>
      writeFileAtomic(this.entryPath(entry.key), JSON.stringify(entry))
    )
    const model = entry.embeddingModel
    if (!entry.embedding || !model) return

    await this.updateIndex(entry.parametersSignature, (records) => {
      const next = records.filter((r) => r.key !== entry.key)
      next.push({ key: entry.key, model, createdAt: entry.createdAt, expiresAt: entry.expiresAt })
      return next.slice(-MAX_INDEX_RECORDS)
    })
  }

  async delete(key: string): Promise<void> {
    const existing = await this.get(key)
    await this.locks.run(`entry:${key}`, () => rm(this.entryPath(key), { force: true }))
    if (existing?.embedding) {
      await this.updateIndex(existing.parametersSignature, (records) =>
        records.filter((r) => r.key !== key)
      )
    }
  }

  async recordHit(key: string): Promise<void> {
    await this.locks.run(`entry:${key}`, async () => {
      const entry = await this.get(key)
      if (!entry) return
      await writeFileAtomic(
        this.entryPath(key),
        JSON.stringify({ ...entry, hitCount: entry.hitCount + 1 })
      )
    })
  }

  async recentVectors(
    signature: string,
    embeddingModel: string,
    limit: number,
    now: number
  ): Promise<VectorCandidate[]> {
    const raw = await readOptional(this.indexPath(signature))
    if (raw === null) return []

    const records = parseIndex(raw)
      .filter((r) => r.model === embeddingModel && !isExpired(r, now))
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, limit)

    const candidates: VectorCandidate[] = []
    for (const record of records) {
      const entry = await this.get(record.key)
      if (!entry?.embedding || isExpired(entry, now)) continue
      candidates.push({
        key: entry.key,
        embedding: Float32Array.from(entry.embedding),
        createdAt: entry.createdAt
      })
    }
    return candidates
  }

  async purgeExpired(now: number): Promise<number> {
    let removed = 0
    for (const path of await this.entryFiles()) {
      const raw = await readOptional(path)
      const entry = raw === null ? null : parseEntry(raw)
      // Unreadable files are dropped along with expired ones
      if (!entry || isExpired(entry, now)) {
        await rm(path, { force: true })
        removed++
      }
    }

    const indexDir = join(this.root, 'index')
    for (const file of await listOptional(indexDir)) {
      if (!file.endsWith('.json')) continue
      await this.updateIndex(file.slice(0, -'.json'.length), (records) =>
        records.filter((r) => !isExpired(r, now))
      )
    }
    return removed
  }

  async stats(): Promise<CacheStoreStats> {
    let entries = 0
    let totalHits = 0
    for (const path of await this.entryFiles()) {
      const raw = await readOptional(path)
      const entry = raw === null ? null : parseEntry(raw)
      if (!entry) continue
      entries++
      totalHits += entry.hitCount
    }
    return { entries, totalHits }
  }

  async clear(): Promise<void> {
    await rm(this.root, { recursive: true, force: true })
  }

  private async updateIndex(
    signature: string,
    update: (records: IndexRecord[]) => IndexRecord[]
  ): Promise<void> {
    const path = this.indexPath(signature)
    await this.locks.run(`index:${signature}`, async () => {
      const raw = await readOptional(path)
      const records = raw === null ? [] : parseIndex(raw)
      await writeFileAtomic(path, JSON.stringify(update(records)))
    })
  }

  private async entryFiles(): Promise<string[]> {
    const entriesDir = join(this.root, 'entries')
    const files: string[] = []
    for (const prefix of await listOptional(entriesDir)) {
      for (const file of await listOptional(join(entriesDir, prefix))) {
        if (file.endsWith('.json')) files.push(join(entriesDir, prefix, file))
      }
    }
    return files
  }

  private entryPath(key: string): string {
    return join(this.root, 'entries', key.slice(0, 2), `${key}.json`)
  }

  private indexPath(signature: string): string {
    return join(this.root, 'index', `${signature}.json`)
  }
}

/**
 * Run Stores
 *
 * Persistence for finished runs. The reference returned by `saveRun` is
 * what the topic cache records as a run's result.
 *
 * ```
 * <cacheDir>/runs/<reference>.json
 * ```
 */

import { randomUUID } from 'node:crypto'
import { join } from 'node:path'
import { guardAgainstUserCache, isRecord, readOptional, writeFileAtomic } from '../shared/fs'
import type { ResearchSource, RunStore, StoredRun } from './types'

const REFERENCE_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/

function isSource(value: unknown): value is ResearchSource {
  return (
    isRecord(value) &&
    typeof value.title === 'string' &&
    typeof value.url === 'string' &&
    typeof value.score === 'number'
  )
}

export function isStoredRun(value: unknown): value is StoredRun {
  if (!isRecord(value)) return false
  const { depth, queries, sources, provider, translatedFrom } = value
  return (
    typeof value.topic === 'string' &&
    typeof value.language === 'string' &&
    (depth === 'basic' || depth === 'advanced') &&
    typeof value.summary === 'string' &&
    typeof value.report === 'string' &&
    typeof value.analysis === 'string' &&
    Array.isArray(queries) &&
    queries.every((q) => typeof q === 'string') &&
    Array.isArray(sources) &&
    sources.every(isSource) &&
    (provider === null || typeof provider === 'string') &&
    typeof value.createdAt === 'number' &&
    typeof value.processingTimeMs === 'number' &&
    (translatedFrom === undefined || typeof translatedFrom === 'string')
  )
}

export class MemoryRunStore implements RunStore {
  private readonly runs = new Map<string, StoredRun>()

  async saveRun(run: StoredRun): Promise<string> {
    const reference = randomUUID()
    this.runs.set(reference, run)
    return reference
  }

  async loadRun(reference: string): Promise<StoredRun | null> {
    return this.runs.get(reference) ?? null
  }

  get size(): number {
    return this.runs.size
  }
}

export class FilesystemRunStore implements RunStore {
  private readonly root: string

  constructor(cacheDir: string) {
    guardAgainstUserCache(cacheDir)
    this.root = join(cacheDir, 'runs')
  }

  async saveRun(run: StoredRun): Promise<string> {
    const reference = randomUUID()
    await writeFileAtomic(this.path(reference), JSON.stringify(run, null, 2))
    return reference
  }

  /** Null for unknown references and for files that no longer parse. */
  async loadRun(reference: string): Promise<StoredRun | null> {
    if (!REFERENCE_PATTERN.test(reference)) return null
    const raw = await readOptional(this.path(reference))
    if (raw === null) return null
    try {
      const data: unknown = JSON.parse(raw)
      return isStoredRun(data) ? data : null
    } catch {
      return null
    }
  }

  private path(reference: string): string {
    return join(this.root, `${reference}.json`)
  }
}

/**
 * Topic-level Result Cache
 *
 * Remembers finished research runs per (topic, language) so a repeated
 * request is answered without running the pipeline again, and marks runs in
 * progress so concurrent requests for the same topic do not start a second
 * one. A finished run in the base language is offered as a partial hit for
 * other languages, which only need a translation.
 */

import { randomUUID } from 'node:crypto'
import { type Logger, silentLogger } from '../logger'
import { KeyedLock } from '../shared/keyed-lock'
import {
  normalizeTopic,
  type TopicCacheRecord,
  type TopicRecordStore,
  topicFileKey
} from './types'

export const DEFAULT_TOPIC_TTL_MS = 24 * 60 * 60 * 1000
export const DEFAULT_IN_PROGRESS_TTL_MS = 30 * 60 * 1000
export const DEFAULT_POLL_INTERVAL_MS = 1_000
export const BASE_LANGUAGE = 'en'

export type TopicLookup =
  | { readonly kind: 'hit'; readonly record: TopicCacheRecord }
  | { readonly kind: 'partial'; readonly record: TopicCacheRecord }
  | { readonly kind: 'miss' }

export type TopicBegin =
  | { readonly kind: 'started'; readonly record: TopicCacheRecord }
  | { readonly kind: 'in_progress'; readonly record: TopicCacheRecord }

export interface TopicCacheOptions {
  readonly store: TopicRecordStore
  readonly ttlMs?: number | undefined
  /** Markers older than this are treated as abandoned */
  readonly inProgressTtlMs?: number | undefined
  /** How often waitFor re-reads the store for runs owned by another process */
  readonly pollIntervalMs?: number | undefined
  readonly baseLanguage?: string | undefined
  readonly logger?: Logger | undefined
  readonly now?: (() => number) | undefined
}

export class TopicCache {
  private readonly store: TopicRecordStore
  private readonly ttlMs: number
  private readonly inProgressTtlMs: number
  private readonly pollIntervalMs: number
  private readonly baseLanguage: string
  private readonly logger: Logger
  private readonly now: () => number
  private readonly locks = new KeyedLock()
  /** Runs started by this process and not yet settled */
  private readonly active = new Set<string>()
  private readonly waiters = new Map<string, Set<() => void>>()

  constructor(options: TopicCacheOptions) {
    this.store = options.store
    this.ttlMs = options.ttlMs ?? DEFAULT_TOPIC_TTL_MS
    this.inProgressTtlMs = options.inProgressTtlMs ?? DEFAULT_IN_PROGRESS_TTL_MS
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    this.baseLanguage = options.baseLanguage ?? BASE_LANGUAGE
    this.logger = options.logger ?? silentLogger
    this.now = options.now ?? Date.now
  }

  async find(
    topic: string,
    language: string,
    options: { forceFresh?: boolean | undefined } = {}
  ): Promise<TopicLookup> {
    if (options.forceFresh) return { kind: 'miss' }

    const normalized = normalizeTopic(topic)
    const exact = await this.newestCompleted(normalized, language)
    if (exact) return { kind: 'hit', record: exact }

    if (language !== this.baseLanguage) {
      const base = await this.newestCompleted(normalized, this.baseLanguage)
      if (base) return { kind: 'partial', record: base }
    }
    return { kind: 'miss' }
  }

  /**
   * Claim a topic for a new run, unless one is already running.
   * `force` starts a run regardless.
   */
  async begin(
    topic: string,
    language: string,
    options: { force?: boolean | undefined } = {}
  ): Promise<TopicBegin> {
    const normalized = normalizeTopic(topic)
    return this.locks.run<TopicBegin>(`${normalized}\u0000${language}`, async () => {
      if (!options.force) {
        const running = await this.runningRecord(normalized, language)
        if (running) {
          this.logger.verbose(`Run for "${normalized}" (${language}) already in progress`)
          return { kind: 'in_progress', record: running }
        }
      }

      const record: TopicCacheRecord = {
        id: `${topicFileKey(normalized)}.${randomUUID()}`,
        normalizedTopic: normalized,
        language,
        status: 'in_progress',
        startedAt: this.now()
      }
      await this.store.put(record)
      this.active.add(record.id)
      return { kind: 'started', record }
    })
  }

  async complete(id: string, resultReference: string): Promise<TopicCacheRecord | null> {
    return this.settle(id, (record) => ({
      ...record,
      status: 'completed',
      completedAt: this.now(),
      resultReference
    }))
  }

  async fail(id: string, error: string): Promise<TopicCacheRecord | null> {
    return this.settle(id, (record) => ({
      ...record,
      status: 'failed',
      completedAt: this.now(),
      error
    }))
  }

  /**
   * Wait until a record leaves `in_progress`. Resolves with the record as it
   * stands when the timeout elapses or the signal aborts, or null when it
   * does not exist.
   */
  async waitFor(
    id: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<TopicCacheRecord | null> {
    const deadline = this.now() + timeoutMs
    for (;;) {
      const record = await this.store.get(id)
      if (!record || record.status !== 'in_progress') return record
      const remaining = deadline - this.now()
      if (remaining <= 0 || signal?.aborted) return record
      await this.nextChange(id, Math.min(remaining, this.pollIntervalMs), signal)
    }
  }

  async clear(): Promise<void> {
    await this.store.clear()
  }

  private async settle(
    id: string,
    update: (record: TopicCacheRecord) => TopicCacheRecord
  ): Promise<TopicCacheRecord | null> {
    const record = await this.store.get(id)
    if (!record) {
      this.logger.warn(`Topic record ${id} not found`)
      return null
    }
    const next = update(record)
    await this.store.put(next)
    this.active.delete(id)
    this.notify(id)
    return next
  }

  private async newestCompleted(
    normalized: string,
    language: string
  ): Promise<TopicCacheRecord | null> {
    const now = this.now()
    let newest: TopicCacheRecord | null = null
    for (const record of await this.store.list(normalized, language)) {
      const { completedAt } = record
      if (record.status !== 'completed' || completedAt === undefined) continue
      if (record.resultReference === undefined) continue
      if (now - completedAt > this.ttlMs) continue
      if (!newest || completedAt > (newest.completedAt ?? 0)) newest = record
    }
    return newest
  }

  private async runningRecord(
    normalized: string,
    language: string
  ): Promise<TopicCacheRecord | null> {
    const now = this.now()
    const running = (await this.store.list(normalized, language)).filter(
      (r) =>
        r.status === 'in_progress' &&
        (this.active.has(r.id) || now - r.startedAt <= this.inProgressTtlMs)
    )
    running.sort((a, b) => b.startedAt - a.startedAt)
    return running[0] ?? null
  }

  private nextChange(id: string, ms: number, signal: AbortSignal | undefined): Promise<void> {
    return new Promise((resolve) => {
      const waiters = this.waiters.get(id) ?? new Set<() => void>()
      this.waiters.set(id, waiters)
      const done = (): void => {
        clearTimeout(timer)
        signal?.removeEventListener('abort', done)
        waiters.delete(done)
        if (waiters.size === 0) this.waiters.delete(id)
        resolve()
      }
      const timer = setTimeout(done, ms)
      signal?.addEventListener('abort', done, { once: true })
      waiters.add(done)
    })
  }

  private notify(id: string): void {
    for (const wake of [...(this.waiters.get(id) ?? [])]) {
      wake()
    }
  }
}

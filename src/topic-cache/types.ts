/**
 * Topic Cache Types
 */

import { createHash } from 'node:crypto'

export type TopicRecordStatus = 'in_progress' | 'completed' | 'failed'

export interface TopicCacheRecord {
  readonly id: string
  readonly normalizedTopic: string
  readonly language: string
  readonly status: TopicRecordStatus
  readonly startedAt: number
  readonly completedAt?: number | undefined
  /** Where the finished result lives, as returned by the run store */
  readonly resultReference?: string | undefined
  readonly error?: string | undefined
}

/**
 * Persistence for topic records. `put` inserts or replaces by id.
 */
export interface TopicRecordStore {
  get(id: string): Promise<TopicCacheRecord | null>
  put(record: TopicCacheRecord): Promise<void>
  /** Every record for a topic and language, in no particular order */
  list(normalizedTopic: string, language: string): Promise<TopicCacheRecord[]>
  clear(): Promise<void>
}

export function normalizeTopic(topic: string): string {
  return topic.trim().toLowerCase().replace(/\s+/g, ' ')
}

/** Stable short key for a normalized topic; prefixes the ids of its records. */
export function topicFileKey(normalizedTopic: string): string {
  return createHash('sha256').update(normalizedTopic).digest('hex').slice(0, 24)
}

/**
 * Filesystem Topic Store
 *
 * One JSON file per topic holding the records of every language. Record ids
 * start with the topic's file name, so a record can be found from its id.
 *
 * ```
 * <cacheDir>/topics/<topic hash>.json
 * ```
 */

import { rm } from 'node:fs/promises'
import { join } from 'node:path'
import { guardAgainstUserCache, isRecord, readOptional, writeFileAtomic } from '../shared/fs'
import { KeyedLock } from '../shared/keyed-lock'
import {
  type TopicCacheRecord,
  type TopicRecordStatus,
  type TopicRecordStore,
  topicFileKey
} from './types'

const STATUSES: readonly TopicRecordStatus[] = ['in_progress', 'completed', 'failed']

function isStatus(value: unknown): value is TopicRecordStatus {
  return STATUSES.some((status) => status === value)
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function parseRecords(raw: string): TopicCacheRecord[] {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch {
    return []
  }
  if (!Array.isArray(data)) return []

  const records: TopicCacheRecord[] = []
  for (const item of data) {
    if (
      !isRecord(item) ||
      typeof item.id !== 'string' ||
      typeof item.normalizedTopic !== 'string' ||
      typeof item.language !== 'string' ||
      !isStatus(item.status) ||
      typeof item.startedAt !== 'number'
    ) {
      continue
    }
    records.push({
      id: item.id,
      normalizedTopic: item.normalizedTopic,
      language: item.language,
      status: item.status,
      startedAt: item.startedAt,
      completedAt: optionalNumber(item.completedAt),
      resultReference: optionalString(item.resultReference),
      error: optionalString(item.error)
    })
  }
  return records
}

export class FilesystemTopicStore implements TopicRecordStore {
  private readonly root: string
  private readonly locks = new KeyedLock()

  constructor(cacheDir: string) {
    guardAgainstUserCache(cacheDir)
    this.root = join(cacheDir, 'topics')
  }

  async get(id: string): Promise<TopicCacheRecord | null> {
    const fileKey = id.split('.')[0] ?? ''
    const records = await this.readFile(fileKey)
    return records.find((r) => r.id === id) ?? null
  }

  async put(record: TopicCacheRecord): Promise<void> {
    const fileKey = topicFileKey(record.normalizedTopic)
    await this.locks.run(fileKey, async () => {
      const records = (await this.readFile(fileKey)).filter((r) => r.id !== record.id)
      records.push(record)
      await writeFileAtomic(this.path(fileKey), JSON.stringify(records, null, 2))
    })
  }

  async list(normalizedTopic: string, language: string): Promise<TopicCacheRecord[]> {
    const records = await this.readFile(topicFileKey(normalizedTopic))
    return records.filter((r) => r.normalizedTopic === normalizedTopic && r.language === language)
  }

  async clear(): Promise<void> {
    await rm(this.root, { recursive: true, force: true })
  }

  private async readFile(fileKey: string): Promise<TopicCacheRecord[]> {
    if (!/^[0-9a-f]+$/.test(fileKey)) return []
    const raw = await readOptional(this.path(fileKey))
    return raw === null ? [] : parseRecords(raw)
  }

  private path(fileKey: string): string {
    return join(this.root, `${fileKey}.json`)
  }
}

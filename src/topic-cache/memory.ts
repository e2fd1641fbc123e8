import type { TopicCacheRecord, TopicRecordStore } from './types'

export class MemoryTopicStore implements TopicRecordStore {
  private readonly records = new Map<string, TopicCacheRecord>()

  async get(id: string): Promise<TopicCacheRecord | null> {
    return this.records.get(id) ?? null
  }

  async put(record: TopicCacheRecord): Promise<void> {
    this.records.set(record.id, Object.freeze({ ...record }))
  }

  async list(normalizedTopic: string, language: string): Promise<TopicCacheRecord[]> {
    return [...this.records.values()].filter(
      (r) => r.normalizedTopic === normalizedTopic && r.language === language
    )
  }

  async clear(): Promise<void> {
    this.records.clear()
  }
}

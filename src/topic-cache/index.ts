export { FilesystemTopicStore } from './filesystem'
export { MemoryTopicStore } from './memory'
export {
  BASE_LANGUAGE,
  DEFAULT_IN_PROGRESS_TTL_MS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_TOPIC_TTL_MS,
  type TopicBegin,
  TopicCache,
  type TopicCacheOptions,
  type TopicLookup
} from './topic-cache'
export {
  normalizeTopic,
  type TopicCacheRecord,
  type TopicRecordStatus,
  type TopicRecordStore,
  topicFileKey
} from './types'

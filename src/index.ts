/**
 * research-relay Core Library
 *
 * Request resilience and caching for a multi-step research pipeline: a
 * tiered exact/semantic query cache, provider fallback with circuit
 * breakers, sliding-window rate limiting, a streaming relay and a
 * topic-level result cache.
 *
 * @license AGPL-3.0
 */

// Cache module
export {
  type CacheEntry,
  type CacheLookup,
  type CacheParameters,
  type CacheStore,
  type CacheStoreStats,
  DEFAULT_CACHE_TTL_MS,
  FilesystemCacheStore,
  generateQueryCacheKey,
  MemoryCacheStore,
  normalizeQuery,
  TieredCache,
  type TieredCacheOptions,
  type TieredCacheStats
} from './caching/index'
// Credentials
export {
  buildGenerationCandidates,
  buildSearchCandidates,
  type CredentialProvider,
  keySourceLabel,
  type ResolvedCredentials,
  resolveCredentials,
  type UserKeys
} from './credentials/index'
// Embeddings module
export {
  cosineSimilarity,
  createEmbeddingProvider,
  type EmbeddingProvider,
  type EmbeddingProviderChoice,
  HashEmbeddingProvider,
  OpenAIEmbeddingProvider
} from './embeddings/index'
// Errors
export {
  CacheUnavailableError,
  errorMessage,
  PipelineCancelledError,
  PipelineStepError
} from './errors'
// Generation module
export {
  AnthropicBackend,
  type ChatMessage,
  type GenerationBackend,
  type GenerationDependencies,
  type GenerationProviderKind,
  type GenerationRequest,
  generateText,
  OpenAICompatibleBackend,
  streamText
} from './generation/index'
// Logging
export { createLogger, type Logger, silentLogger } from './logger'
// Research pipeline
export {
  CAPACITY_MESSAGE,
  DEFAULT_RESEARCH_PARAMETERS,
  FilesystemRunStore,
  GenerationTranslator,
  MemoryRunStore,
  type PipelineOutcome,
  type PipelineRequest,
  type PipelineStep,
  type ProgressEvent,
  type ResearchParameters,
  ResearchService,
  type ResearchServiceOptions,
  type RunState,
  type RunStatus,
  type RunStore,
  type StoredRun
} from './pipeline/index'
// Provider fallback and rate limiting
export { type Dispatched, dispatch, type ProviderCandidate } from './providers/dispatch'
export {
  DEFAULT_RATE_LIMITS,
  type RateLimit,
  type RateWindow,
  SlidingWindowRateLimiter
} from './providers/rate-limiter'
export {
  type CircuitPolicy,
  DEFAULT_CIRCUIT_POLICY,
  type ProviderRecord,
  ProviderRegistry
} from './providers/registry'
// Web search
export {
  BraveSearchBackend,
  type SearchBackend,
  type SearchRequest,
  type SearchResponse,
  type SearchResult,
  searchWithCache,
  TavilySearchBackend
} from './search/index'
// Streaming relay
export {
  type RelayResult,
  type RelayStatus,
  StreamInterruptedError,
  StreamRelay,
  type StreamSource
} from './streaming/index'
// Topic-level result cache
export {
  FilesystemTopicStore,
  MemoryTopicStore,
  TopicCache,
  type TopicCacheRecord,
  type TopicRecordStore
} from './topic-cache/index'
// Types
export type { ApiError, ApiErrorType, ProviderAttempt, Result } from './types'

export const VERSION = '0.1.0'

/**
 * CLI Runtime
 *
 * Builds the on-disk stores, caches and research service for one CLI
 * invocation from the resolved configuration.
 */

import { FilesystemCacheStore, TieredCache } from '../caching'
import { type Environment, resolveCredentials } from '../credentials'
import { createEmbeddingProvider } from '../embeddings'
import type { Logger } from '../logger'
import { defaultCandidateFactory, ResearchService } from '../pipeline/research-service'
import { FilesystemRunStore } from '../pipeline/run-store'
import { SlidingWindowRateLimiter } from '../providers/rate-limiter'
import { ProviderRegistry } from '../providers/registry'
import { isSearchResponse, type SearchResponse } from '../search'
import { FilesystemTopicStore, TopicCache } from '../topic-cache'
import type { CLIArgs } from './args'
import { loadConfig, type ResearchConfig, resolveResearchConfig } from './config'

export interface CacheRuntime {
  readonly config: ResearchConfig
  readonly searchCache: TieredCache<SearchResponse>
  readonly topicStore: FilesystemTopicStore
}

export interface ResearchRuntime extends CacheRuntime {
  readonly service: ResearchService
}

export async function loadResearchConfig(
  args: Pick<CLIArgs, 'cacheDir' | 'configFile'>,
  env: Environment = process.env
): Promise<ResearchConfig> {
  const file = await loadConfig(args.configFile)
  return resolveResearchConfig(file, { cacheDir: args.cacheDir, env })
}

/**
 * Caches without an embedder: enough for stats and cleanup.
 */
export function createCacheRuntime(config: ResearchConfig, logger: Logger): CacheRuntime {
  return {
    config,
    searchCache: new TieredCache({
      store: new FilesystemCacheStore(config.cacheDir),
      isPayload: isSearchResponse,
      ttlMs: config.cacheTtlMs,
      logger
    }),
    topicStore: new FilesystemTopicStore(config.cacheDir)
  }
}

export async function createResearchRuntime(
  config: ResearchConfig,
  logger: Logger,
  env: Environment = process.env
): Promise<ResearchRuntime> {
  const embedder = await createEmbeddingProvider({
    provider: config.embeddingProvider,
    openaiApiKey: resolveCredentials({}, env).openai?.apiKey,
    logger
  })

  const searchCache = new TieredCache({
    store: new FilesystemCacheStore(config.cacheDir),
    isPayload: isSearchResponse,
    embedder,
    ttlMs: config.cacheTtlMs,
    similarityThreshold: config.similarityThreshold,
    logger
  })
  const topicStore = new FilesystemTopicStore(config.cacheDir)

  const service = new ResearchService({
    runStore: new FilesystemRunStore(config.cacheDir),
    topicCache: new TopicCache({ store: topicStore, ttlMs: config.topicTtlMs, logger }),
    searchCache,
    registry: new ProviderRegistry({ policy: config.circuitPolicy, logger }),
    limiter: new SlidingWindowRateLimiter({ limits: config.rateLimits }),
    env,
    candidates: defaultCandidateFactory({
      models: config.models,
      searchTimeoutMs: config.searchTimeoutMs
    }),
    defaults: config.defaults,
    maxConcurrentRuns: config.maxConcurrentRuns,
    searchConcurrency: config.searchConcurrency,
    generationTimeoutMs: config.generationTimeoutMs,
    searchTimeoutMs: config.searchTimeoutMs,
    logger
  })

  return { config, searchCache, topicStore, service }
}

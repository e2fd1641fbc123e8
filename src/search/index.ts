/**
 * Web Search
 *
 * Cached, fault-tolerant web search: the tiered cache is probed first, and
 * misses go through the fallback chain over the configured search backends.
 * A broken cache degrades to uncached search; it never fails the search.
 */

import type { CacheParameters, TieredCache } from '../caching'
import { CacheUnavailableError, errorMessage } from '../errors'
import { silentLogger } from '../logger'
import { type DispatchContext, dispatch, type ProviderCandidate } from '../providers/dispatch'
import type { ProviderAttempt, Result } from '../types'
import type { SearchBackend, SearchRequest, SearchResponse } from './types'

export { BraveSearchBackend, parseBraveResponse } from './brave'
export { parseTavilyResponse, TavilySearchBackend } from './tavily'
export {
  DEFAULT_SEARCH_TIMEOUT_MS,
  isSearchResponse,
  type SearchBackend,
  type SearchDepth,
  type SearchRequest,
  type SearchResponse,
  type SearchResult
} from './types'

export interface SearchOutcome {
  readonly response: SearchResponse
  /** How the cache answered, or null when a backend was called */
  readonly cacheHit: 'exact' | 'semantic' | null
  /** Candidate id that served the request; null on a cache hit */
  readonly provider: string | null
  readonly attempts: readonly ProviderAttempt[]
}

export interface SearchDependencies extends DispatchContext {
  readonly cache?: TieredCache<SearchResponse> | undefined
  readonly candidates: readonly ProviderCandidate<SearchBackend>[]
}

export function searchCacheParameters(request: SearchRequest): CacheParameters {
  return { depth: request.depth, maxResults: request.maxResults }
}

const runSearch =
  (request: SearchRequest) =>
  (candidate: ProviderCandidate<SearchBackend>, signal: AbortSignal) =>
    candidate.client.search(request, signal)

export async function searchWithCache(
  request: SearchRequest,
  deps: SearchDependencies
): Promise<Result<SearchOutcome>> {
  const logger = deps.logger ?? silentLogger
  const { cache } = deps
  const parameters = searchCacheParameters(request)
  let embedding: Float32Array | undefined

  if (cache) {
    try {
      const cached = await cache.lookup(request.query, parameters, deps.signal)
      if (cached.hit) {
        return {
          ok: true,
          value: {
            response: cached.payload,
            cacheHit: cached.matchedBy,
            provider: null,
            attempts: []
          }
        }
      }
      embedding = cached.embedding
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) throw error
      logger.warn(`Search cache unavailable, searching without it: ${errorMessage(error)}`)
    }
  }

  const result = await dispatch(runSearch(request), deps.candidates, deps)
  if (!result.ok) {
    return result
  }

  const { value: response, provider, attempts } = result.value
  if (cache) {
    try {
      await cache.store(request.query, parameters, response, { embedding })
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) throw error
      logger.warn(`Could not cache search results: ${errorMessage(error)}`)
    }
  }

  return { ok: true, value: { response, cacheHit: null, provider, attempts } }
}

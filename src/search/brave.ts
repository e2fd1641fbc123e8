/**
 * Brave Search API
 *
 * Fallback web search. Brave returns snippets rather than page content, and
 * no relevance score, so results are scored by rank.
 */

import { handleHttpError, handleNetworkError, httpFetch } from '../http'
import type { Result } from '../types'
import {
  DEFAULT_SEARCH_TIMEOUT_MS,
  type SearchBackend,
  type SearchRequest,
  type SearchResponse,
  type SearchResult
} from './types'

const BRAVE_SEARCH_URL = 'https://api.search.brave.com/res/v1/web/search'
const BRAVE_MAX_COUNT = 20

interface BraveSearchResponse {
  web?: {
    results?: Array<{
      title?: string
      url?: string
      description?: string
      extra_snippets?: string[]
      page_age?: string
    }>
  }
}

export interface BraveConfig {
  readonly apiKey: string
  readonly timeoutMs?: number | undefined
}

export class BraveSearchBackend implements SearchBackend {
  readonly name = 'brave'

  constructor(private readonly config: BraveConfig) {}

  async search(request: SearchRequest, signal?: AbortSignal): Promise<Result<SearchResponse>> {
    const params = new URLSearchParams({
      q: request.query,
      count: String(Math.min(request.maxResults, BRAVE_MAX_COUNT))
    })

    try {
      const response = await httpFetch(`${BRAVE_SEARCH_URL}?${params.toString()}`, {
        headers: {
          Accept: 'application/json',
          'X-Subscription-Token': this.config.apiKey
        },
        signal,
        timeoutMs: this.config.timeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS
      })

      if (!response.ok) {
        return handleHttpError(response)
      }

      const data = (await response.json()) as BraveSearchResponse
      return { ok: true, value: parseBraveResponse(request, data) }
    } catch (error) {
      return handleNetworkError(error)
    }
  }
}

export function parseBraveResponse(
  request: SearchRequest,
  data: BraveSearchResponse
): SearchResponse {
  const raw = (data.web?.results ?? []).filter(
    (item) => typeof item.url === 'string' && item.url !== ''
  )
  const limited = raw.slice(0, request.maxResults)

  const results: SearchResult[] = limited.map((item, rank) => ({
    title: item.title ?? '',
    url: item.url ?? '',
    // Advanced depth folds in the extra snippets
    content:
      request.depth === 'advanced' && item.extra_snippets
        ? [item.description ?? '', ...item.extra_snippets].join('\n')
        : (item.description ?? ''),
    score: Math.round((1 - rank / limited.length) * 1000) / 1000,
    ...(item.page_age !== undefined && { publishedDate: item.page_age })
  }))

  return { query: request.query, results, backend: 'brave' }
}

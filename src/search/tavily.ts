/**
 * Tavily Search API
 *
 * Search built for LLM consumption: results come with extracted page content
 * and an optional generated answer.
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

const TAVILY_SEARCH_URL = 'https://api.tavily.com/search'

interface TavilySearchResponse {
  query?: string
  answer?: string | null
  results?: Array<{
    title?: string
    url?: string
    content?: string
    score?: number
    published_date?: string
  }> | null
}

export interface TavilyConfig {
  readonly apiKey: string
  readonly timeoutMs?: number | undefined
}

export class TavilySearchBackend implements SearchBackend {
  readonly name = 'tavily'

  constructor(private readonly config: TavilyConfig) {}

  async search(request: SearchRequest, signal?: AbortSignal): Promise<Result<SearchResponse>> {
    try {
      const response = await httpFetch(TAVILY_SEARCH_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiKey}`
        },
        body: JSON.stringify({
          query: request.query,
          search_depth: request.depth,
          max_results: request.maxResults,
          include_answer: true
        }),
        signal,
        timeoutMs: this.config.timeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS
      })

      if (!response.ok) {
        return handleHttpError(response)
      }

      const data = (await response.json()) as TavilySearchResponse
      return { ok: true, value: parseTavilyResponse(request.query, data) }
    } catch (error) {
      return handleNetworkError(error)
    }
  }
}

/**
 * Missing or non-list results count as an empty result set.
 */
export function parseTavilyResponse(query: string, data: TavilySearchResponse): SearchResponse {
  const raw = Array.isArray(data.results) ? data.results : []
  const results: SearchResult[] = raw
    .filter((item) => typeof item.url === 'string' && item.url !== '')
    .map((item) => ({
      title: item.title ?? '',
      url: item.url ?? '',
      content: item.content ?? '',
      score: typeof item.score === 'number' ? item.score : 0,
      ...(item.published_date !== undefined && { publishedDate: item.published_date })
    }))

  return {
    query,
    results,
    ...(data.answer ? { answer: data.answer } : {}),
    backend: 'tavily'
  }
}

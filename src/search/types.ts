/**
 * Web Search Types
 */

import type { Result } from '../types'

export type SearchDepth = 'basic' | 'advanced'

export interface SearchRequest {
  readonly query: string
  readonly maxResults: number
  readonly depth: SearchDepth
}

export interface SearchResult {
  readonly title: string
  readonly url: string
  readonly content: string
  /** Relevance in [0, 1] where the backend reports one, else 0 */
  readonly score: number
  readonly publishedDate?: string | undefined
}

export interface SearchResponse {
  readonly query: string
  readonly results: readonly SearchResult[]
  /** Short answer some backends generate alongside the results */
  readonly answer?: string | undefined
  /** Backend that produced the response */
  readonly backend: string
}

export interface SearchBackend {
  readonly name: string
  search(request: SearchRequest, signal?: AbortSignal): Promise<Result<SearchResponse>>
}

export const DEFAULT_SEARCH_TIMEOUT_MS = 20_000

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isSearchResult(value: unknown): value is SearchResult {
  return (
    isRecord(value) &&
    typeof value.title === 'string' &&
    typeof value.url === 'string' &&
    typeof value.content === 'string' &&
    typeof value.score === 'number' &&
    (value.publishedDate === undefined || typeof value.publishedDate === 'string')
  )
}

/**
 * Shape check for search responses read back from the cache.
 */
export function isSearchResponse(value: unknown): value is SearchResponse {
  return (
    isRecord(value) &&
    typeof value.query === 'string' &&
    typeof value.backend === 'string' &&
    (value.answer === undefined || typeof value.answer === 'string') &&
    Array.isArray(value.results) &&
    value.results.every(isSearchResult)
  )
}

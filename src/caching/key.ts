/**
 * Cache Key Generation
 *
 * Deterministic SHA256 keys for query caching. Two requests share a key when
 * their normalized query text and their parameters are identical.
 */

import { createHash } from 'node:crypto'
import type { CacheParameters } from './types'

/**
 * Sort object keys recursively for deterministic JSON stringification
 */
function sortKeys(obj: unknown): unknown {
  if (obj === null || typeof obj !== 'object') {
    return obj
  }

  if (Array.isArray(obj)) {
    return obj.map(sortKeys)
  }

  const sorted: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    sorted[key] = sortKeys(value)
  }
  return sorted
}

/**
 * JSON with object keys sorted at every level.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value)) ?? 'null'
}

/**
 * Lowercase, trim and collapse internal whitespace.
 */
export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase().replace(/\s+/g, ' ')
}

/**
 * Generate the exact-match key for a query.
 *
 * @example
 * ```ts
 * generateQueryCacheKey('  Solid State  Batteries', { depth: 'basic', maxResults: 5 })
 * // same key as generateQueryCacheKey('solid state batteries', { maxResults: 5, depth: 'basic' })
 * ```
 */
export function generateQueryCacheKey(query: string, parameters: CacheParameters): string {
  const input = `${normalizeQuery(query)}:${stableStringify(parameters)}`
  return createHash('sha256').update(input).digest('hex')
}

/**
 * Short fingerprint of the parameters alone. Semantic matches are only
 * considered between entries with the same signature.
 */
export function parametersSignature(parameters: CacheParameters): string {
  return createHash('sha256').update(stableStringify(parameters)).digest('hex').slice(0, 16)
}

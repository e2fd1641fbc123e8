/**
 * Hash Embeddings
 *
 * Feature-hashing vectorizer for short texts such as search queries. Needs no
 * network or API key. Unigrams, bigrams and trigrams are hashed into a fixed
 * number of signed buckets and the vector is L2-normalized.
 */

import { createHash } from 'node:crypto'
import type { Result } from '../types'
import type { EmbeddingProvider } from './types'

export const HASH_DIMENSIONS = 256
/** Hash vectors give much lower cosine values than neural models. */
export const HASH_SIMILARITY_THRESHOLD = 0.2

/**
 * Lowercase, replace anything that is not a letter, digit or whitespace with a
 * space, then emit words followed by joined bigrams and trigrams.
 */
export function tokenize(text: string): string[] {
  const words = text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter((word) => word.length > 0)

  const tokens = [...words]
  for (let i = 0; i < words.length - 1; i++) {
    tokens.push(`${words[i]}_${words[i + 1]}`)
  }
  for (let i = 0; i < words.length - 2; i++) {
    tokens.push(`${words[i]}_${words[i + 1]}_${words[i + 2]}`)
  }
  return tokens
}

export function hashEmbed(text: string, dimensions = HASH_DIMENSIONS): Float32Array {
  const vector = new Float32Array(dimensions)

  for (const token of tokenize(text)) {
    const digest = createHash('md5').update(token).digest('hex')
    const position = Number.parseInt(digest.slice(0, 8), 16) % dimensions
    const sign = Number.parseInt(digest.slice(8, 16), 16) % 2 === 0 ? 1 : -1
    vector[position] = (vector[position] ?? 0) + sign
  }

  let norm = 0
  for (const value of vector) norm += value * value
  norm = Math.sqrt(norm)
  if (norm > 0) {
    for (let i = 0; i < vector.length; i++) {
      vector[i] = (vector[i] ?? 0) / norm
    }
  }
  return vector
}

export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hash'
  readonly model: string
  readonly recommendedThreshold = HASH_SIMILARITY_THRESHOLD

  constructor(readonly dimensions = HASH_DIMENSIONS) {
    this.model = `hash-${dimensions}`
  }

  async embed(text: string): Promise<Result<Float32Array>> {
    return { ok: true, value: hashEmbed(text, this.dimensions) }
  }
}

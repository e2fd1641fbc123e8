import type { Result } from '../types'

/**
 * Turns text into a fixed-length vector.
 *
 * `recommendedThreshold` is the cosine similarity above which two texts are
 * treated as the same request. It differs widely between models.
 */
export interface EmbeddingProvider {
  readonly name: string
  readonly model: string
  readonly dimensions: number
  readonly recommendedThreshold: number
  embed(text: string, signal?: AbortSignal): Promise<Result<Float32Array>>
}

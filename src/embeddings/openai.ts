/**
 * OpenAI Embeddings
 *
 * text-embedding-3-small over HTTP, one text per request.
 */

import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import type { Result } from '../types'
import type { EmbeddingProvider } from './types'

export const OPENAI_EMBEDDING_MODEL = 'text-embedding-3-small'
export const OPENAI_EMBEDDING_DIMENSIONS = 1536
export const OPENAI_SIMILARITY_THRESHOLD = 0.85

const EMBEDDINGS_URL = 'https://api.openai.com/v1/embeddings'

interface OpenAIEmbeddingResponse {
  data: Array<{
    embedding: number[]
    index: number
  }>
}

export interface OpenAIEmbeddingConfig {
  readonly apiKey: string
  readonly model?: string | undefined
  readonly timeoutMs?: number | undefined
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai'
  readonly model: string
  readonly dimensions = OPENAI_EMBEDDING_DIMENSIONS
  readonly recommendedThreshold = OPENAI_SIMILARITY_THRESHOLD

  constructor(private readonly config: OpenAIEmbeddingConfig) {
    this.model = config.model ?? OPENAI_EMBEDDING_MODEL
  }

  async embed(text: string, signal?: AbortSignal): Promise<Result<Float32Array>> {
    try {
      const response = await httpFetch(EMBEDDINGS_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiKey}`
        },
        body: JSON.stringify({ model: this.model, input: text.trim() }),
        signal,
        timeoutMs: this.config.timeoutMs
      })

      if (!response.ok) {
        return handleHttpError(response)
      }

      const data = (await response.json()) as OpenAIEmbeddingResponse
      const embedding = data.data[0]?.embedding
      if (!embedding || embedding.length === 0) {
        return emptyResponseError()
      }
      return { ok: true, value: new Float32Array(embedding) }
    } catch (error) {
      return handleNetworkError(error)
    }
  }
}

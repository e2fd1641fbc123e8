/**
 * Embeddings Module
 *
 * Embedding providers used by the tiered cache's semantic tier, and the
 * factory that picks one from the available credentials.
 */

import { errorMessage } from '../errors'
import { type Logger, silentLogger } from '../logger'
import { HashEmbeddingProvider } from './hash'
import { OpenAIEmbeddingProvider } from './openai'
import type { EmbeddingProvider } from './types'

export { cosineSimilarity, findTopK } from './cosine-similarity'
export { HASH_DIMENSIONS, HashEmbeddingProvider, hashEmbed, tokenize } from './hash'
export {
  OPENAI_EMBEDDING_DIMENSIONS,
  OPENAI_EMBEDDING_MODEL,
  OpenAIEmbeddingProvider
} from './openai'
export type { EmbeddingProvider } from './types'

export type EmbeddingProviderChoice = 'auto' | 'hash' | 'openai'

export interface CreateEmbeddingProviderOptions {
  readonly openaiApiKey?: string | undefined
  readonly provider?: EmbeddingProviderChoice | undefined
  readonly timeoutMs?: number | undefined
  readonly logger?: Logger | undefined
}

/**
 * Pick the best available embedding provider.
 *
 * - `openai` with a key: OpenAI, unchecked.
 * - `auto` with a key: OpenAI if a probe embedding succeeds, hash otherwise.
 * - anything else: hash.
 */
export async function createEmbeddingProvider(
  options: CreateEmbeddingProviderOptions = {}
): Promise<EmbeddingProvider> {
  const logger = options.logger ?? silentLogger
  const choice = options.provider ?? 'auto'
  const apiKey = options.openaiApiKey

  if (apiKey && choice === 'openai') {
    logger.verbose('Using OpenAI embeddings')
    return new OpenAIEmbeddingProvider({ apiKey, timeoutMs: options.timeoutMs })
  }

  if (apiKey && choice === 'auto') {
    const candidate = new OpenAIEmbeddingProvider({ apiKey, timeoutMs: options.timeoutMs })
    try {
      const probe = await candidate.embed('test')
      if (probe.ok) {
        logger.verbose('Using OpenAI embeddings (auto-detected)')
        return candidate
      }
      logger.warn(`OpenAI embeddings unavailable, using hash embeddings: ${probe.error.message}`)
    } catch (error) {
      logger.warn(`OpenAI embeddings unavailable, using hash embeddings: ${errorMessage(error)}`)
    }
  }

  logger.verbose('Using hash embeddings')
  return new HashEmbeddingProvider()
}

/**
 * Text Generation Types
 */

import type { Result } from '../types'

export type GenerationProviderKind = 'openai' | 'deepseek' | 'anthropic'

export interface ChatMessage {
  readonly role: 'system' | 'user' | 'assistant'
  readonly content: string
}

export interface GenerationRequest {
  readonly messages: readonly ChatMessage[]
  readonly maxTokens?: number | undefined
  readonly temperature?: number | undefined
}

export interface GenerationBackend {
  readonly kind: GenerationProviderKind
  readonly model: string
  /** Complete response in one piece */
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<Result<string>>
  /**
   * Open a streamed response. HTTP errors come back as a failed Result;
   * errors after the stream has opened are thrown by the iterator as
   * StreamInterruptedError.
   */
  openStream(
    request: GenerationRequest,
    signal?: AbortSignal
  ): Promise<Result<AsyncIterable<string>>>
}

export const DEFAULT_MAX_TOKENS = 4000
export const DEFAULT_TEMPERATURE = 0.7
export const DEFAULT_GENERATION_TIMEOUT_MS = 120_000

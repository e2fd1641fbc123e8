/**
 * OpenAI-compatible Chat Completions
 *
 * OpenAI and DeepSeek speak the same protocol; only the endpoint, key and
 * model differ.
 */

import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import { readSseData, StreamInterruptedError } from '../streaming'
import type { Result } from '../types'
import { parseStreamEvent } from './events'
import { CHAT_COMPLETIONS_URLS, DEFAULT_MODELS } from './models'
import {
  DEFAULT_GENERATION_TIMEOUT_MS,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type GenerationBackend,
  type GenerationRequest
} from './types'

interface ChatCompletionResponse {
  choices: Array<{ message: { content: string | null } }>
}

interface ChatCompletionChunk {
  choices?: Array<{ delta?: { content?: string | null } }>
  error?: { message?: string }
}

export interface OpenAICompatibleConfig {
  readonly kind: 'openai' | 'deepseek'
  readonly apiKey: string
  readonly model?: string | undefined
  /** Overrides the provider's endpoint */
  readonly url?: string | undefined
  readonly timeoutMs?: number | undefined
}

export class OpenAICompatibleBackend implements GenerationBackend {
  readonly kind: 'openai' | 'deepseek'
  readonly model: string
  private readonly url: string

  constructor(private readonly config: OpenAICompatibleConfig) {
    this.kind = config.kind
    this.model = config.model ?? DEFAULT_MODELS[config.kind]
    this.url = config.url ?? CHAT_COMPLETIONS_URLS[config.kind]
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<Result<string>> {
    try {
      const response = await httpFetch(this.url, this.requestInit(request, false, signal))
      if (!response.ok) return handleHttpError(response)

      const data = (await response.json()) as ChatCompletionResponse
      const text = data.choices[0]?.message.content
      return text ? { ok: true, value: text } : emptyResponseError()
    } catch (error) {
      return handleNetworkError(error)
    }
  }

  async openStream(
    request: GenerationRequest,
    signal?: AbortSignal
  ): Promise<Result<AsyncIterable<string>>> {
    try {
      const response = await httpFetch(this.url, this.requestInit(request, true, signal))
      if (!response.ok) return handleHttpError(response)
      if (!response.body) return emptyResponseError()
      return { ok: true, value: this.deltas(response.body) }
    } catch (error) {
      return handleNetworkError(error)
    }
  }

  private async *deltas(body: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
    for await (const payload of readSseData(body)) {
      const chunk = parseStreamEvent<ChatCompletionChunk>(this.kind, payload)
      if (chunk.error) {
        throw new StreamInterruptedError({
          type: 'network',
          message: `${this.kind} stream failed: ${chunk.error.message ?? 'unknown error'}`
        })
      }
      const content = chunk.choices?.[0]?.delta?.content
      if (content) yield content
    }
  }

  private requestInit(request: GenerationRequest, stream: boolean, signal?: AbortSignal) {
    return {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.config.apiKey}`
      },
      body: JSON.stringify({
        model: this.model,
        messages: request.messages,
        max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: request.temperature ?? DEFAULT_TEMPERATURE,
        ...(stream && { stream: true })
      }),
      signal,
      timeoutMs: this.config.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS
    }
  }
}

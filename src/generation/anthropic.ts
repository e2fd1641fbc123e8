/**
 * Anthropic Messages API
 *
 * System messages move to the top-level `system` field; the rest are sent
 * as the conversation.
 */

import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import { readSseData, StreamInterruptedError } from '../streaming'
import type { ApiErrorType, Result } from '../types'
import { parseStreamEvent } from './events'
import { ANTHROPIC_MESSAGES_URL, ANTHROPIC_VERSION, DEFAULT_MODELS } from './models'
import {
  DEFAULT_GENERATION_TIMEOUT_MS,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type GenerationBackend,
  type GenerationRequest
} from './types'

interface AnthropicResponse {
  content: Array<{ type: string; text?: string }>
}

interface AnthropicStreamEvent {
  type?: string
  delta?: { type?: string; text?: string }
  error?: { type?: string; message?: string }
}

export interface AnthropicConfig {
  readonly apiKey: string
  readonly model?: string | undefined
  readonly timeoutMs?: number | undefined
}

function streamErrorType(anthropicType: string | undefined): ApiErrorType {
  switch (anthropicType) {
    case 'rate_limit_error':
      return 'rate_limit'
    case 'authentication_error':
    case 'permission_error':
      return 'auth'
    case 'invalid_request_error':
      return 'invalid_request'
    default:
      return 'network'
  }
}

export class AnthropicBackend implements GenerationBackend {
  readonly kind = 'anthropic'
  readonly model: string

  constructor(private readonly config: AnthropicConfig) {
    this.model = config.model ?? DEFAULT_MODELS.anthropic
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<Result<string>> {
    try {
      const response = await httpFetch(
        ANTHROPIC_MESSAGES_URL,
        this.requestInit(request, false, signal)
      )
      if (!response.ok) return handleHttpError(response)

      const data = (await response.json()) as AnthropicResponse
      const text = data.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join('')
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
      const response = await httpFetch(
        ANTHROPIC_MESSAGES_URL,
        this.requestInit(request, true, signal)
      )
      if (!response.ok) return handleHttpError(response)
      if (!response.body) return emptyResponseError()
      return { ok: true, value: this.deltas(response.body) }
    } catch (error) {
      return handleNetworkError(error)
    }
  }

  private async *deltas(body: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
    for await (const payload of readSseData(body)) {
      const event = parseStreamEvent<AnthropicStreamEvent>('anthropic', payload)
      if (event.type === 'error') {
        throw new StreamInterruptedError({
          type: streamErrorType(event.error?.type),
          message: `anthropic stream failed: ${event.error?.message ?? 'unknown error'}`
        })
      }
      if (event.type === 'message_stop') return
      if (event.type === 'content_block_delta' && event.delta?.type === 'text_delta') {
        const text = event.delta.text
        if (text) yield text
      }
    }
  }

  private requestInit(request: GenerationRequest, stream: boolean, signal?: AbortSignal) {
    const system = request.messages
      .filter((message) => message.role === 'system')
      .map((message) => message.content)
      .join('\n\n')
    const messages = request.messages.filter((message) => message.role !== 'system')

    return {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.config.apiKey,
        'anthropic-version': ANTHROPIC_VERSION
      },
      body: JSON.stringify({
        model: this.model,
        max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: request.temperature ?? DEFAULT_TEMPERATURE,
        ...(system ? { system } : {}),
        messages,
        ...(stream && { stream: true })
      }),
      signal,
      timeoutMs: this.config.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS
    }
  }
}

/**
 * Text Generation
 *
 * Generation over the provider fallback chain. `generateText` returns the
 * whole response; `streamText` relays it chunk by chunk. A stream can only
 * fall back to another provider until its first chunk arrives; after that a
 * failure ends the stream with the text produced so far. The per-call
 * timeout also bounds the gap between chunks.
 */

import { errorMessage } from '../errors'
import { silentLogger } from '../logger'
import {
  DEFAULT_CALL_TIMEOUT_MS,
  type DispatchContext,
  dispatch,
  type ProviderCandidate
} from '../providers/dispatch'
import { type ChunkSink, type RelayResult, StreamInterruptedError, StreamRelay } from '../streaming'
import type { ApiError, ProviderAttempt, Result } from '../types'
import type { GenerationBackend, GenerationRequest } from './types'

export { AnthropicBackend, type AnthropicConfig } from './anthropic'
export { DEFAULT_MODELS } from './models'
export { OpenAICompatibleBackend, type OpenAICompatibleConfig } from './openai-compatible'
export {
  type ChatMessage,
  DEFAULT_GENERATION_TIMEOUT_MS,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type GenerationBackend,
  type GenerationProviderKind,
  type GenerationRequest
} from './types'

export interface GenerationDependencies extends DispatchContext {
  readonly candidates: readonly ProviderCandidate<GenerationBackend>[]
}

export interface StreamDependencies extends GenerationDependencies {
  readonly relay?: StreamRelay | undefined
  readonly sink?: ChunkSink | undefined
}

export interface GeneratedText {
  readonly text: string
  readonly provider: string
  readonly attempts: readonly ProviderAttempt[]
}

export interface StreamedText extends RelayResult {
  readonly provider: string
  readonly attempts: readonly ProviderAttempt[]
}

export async function generateText(
  request: GenerationRequest,
  deps: GenerationDependencies
): Promise<Result<GeneratedText>> {
  const result = await dispatch(
    (candidate, signal) => candidate.client.generate(request, signal),
    deps.candidates,
    deps
  )
  if (!result.ok) return result
  const { value: text, provider, attempts } = result.value
  return { ok: true, value: { text, provider, attempts } }
}

/**
 * Stream a response through the relay.
 *
 * Resolves with a failed Result only when no provider could open a stream.
 * Once a stream is open the relay result is returned as is, `failed` and
 * `cancelled` statuses included.
 */
export async function streamText(
  request: GenerationRequest,
  deps: StreamDependencies
): Promise<Result<StreamedText>> {
  const logger = deps.logger ?? silentLogger
  const streamController = new AbortController()
  const forwardAbort = (): void => streamController.abort()
  if (deps.signal?.aborted) {
    streamController.abort()
  } else {
    deps.signal?.addEventListener('abort', forwardAbort, { once: true })
  }

  try {
    const opened = await dispatch(
      openFirstChunk(request, streamController.signal),
      deps.candidates,
      { ...deps, signal: streamController.signal }
    )
    if (!opened.ok) return opened

    const { value: stream, provider, attempts } = opened.value
    const relay = deps.relay ?? new StreamRelay({ logger })
    const handle = relay.start(
      (relaySignal) => {
        relaySignal.addEventListener('abort', () => streamController.abort(), { once: true })
        return stream
      },
      {
        sink: deps.sink,
        signal: streamController.signal,
        idleTimeoutMs: deps.timeoutMs ?? DEFAULT_CALL_TIMEOUT_MS
      }
    )
    const relayed = await handle.result

    if (relayed.status === 'failed' && relayed.error) {
      deps.registry.recordFailure(provider, relayed.error)
      logger.warn(
        `${provider} stream broke after ${relayed.chunkCount} chunk(s): ${relayed.error.message}`
      )
    }
    return { ok: true, value: { ...relayed, provider, attempts } }
  } finally {
    deps.signal?.removeEventListener('abort', forwardAbort)
  }
}

/**
 * Open a stream and wait for its first chunk, so that a provider that
 * accepts the request but fails before producing anything still counts as a
 * failed attempt. An opened stream follows `streamSignal` after the
 * dispatched call has returned.
 */
function openFirstChunk(request: GenerationRequest, streamSignal: AbortSignal) {
  return async (
    candidate: ProviderCandidate<GenerationBackend>,
    callSignal: AbortSignal
  ): Promise<Result<AsyncIterable<string>>> => {
    const controller = new AbortController()
    const stop = (): void => controller.abort()
    callSignal.addEventListener('abort', stop, { once: true })
    streamSignal.addEventListener('abort', stop, { once: true })
    let opened = false
    try {
      const first = await firstChunk(request, candidate, controller.signal)
      opened = first.ok
      return first
    } finally {
      callSignal.removeEventListener('abort', stop)
      if (!opened) {
        streamSignal.removeEventListener('abort', stop)
        controller.abort()
      }
    }
  }
}

async function firstChunk(
  request: GenerationRequest,
  candidate: ProviderCandidate<GenerationBackend>,
  signal: AbortSignal
): Promise<Result<AsyncIterable<string>>> {
  const opened = await candidate.client.openStream(request, signal)
  if (!opened.ok) return opened

  const iterator = opened.value[Symbol.asyncIterator]()
  for (;;) {
    let next: IteratorResult<string>
    try {
      next = await iterator.next()
    } catch (error) {
      return { ok: false, error: streamFailure(error) }
    }
    if (next.done) {
      return {
        ok: false,
        error: { type: 'invalid_response', message: 'Stream ended before any text' }
      }
    }
    if (next.value !== '') {
      return { ok: true, value: resume(next.value, iterator) }
    }
  }
}

async function* resume(first: string, rest: AsyncIterator<string>): AsyncGenerator<string> {
  yield first
  for (;;) {
    const next = await rest.next()
    if (next.done) return
    yield next.value
  }
}

function streamFailure(error: unknown): ApiError {
  if (error instanceof StreamInterruptedError) return error.apiError
  return { type: 'network', message: `Stream failed: ${errorMessage(error)}` }
}

/**
 * Streaming Relay
 *
 * Pulls text chunks from a source and forwards them to a sink while assembling
 * the full text. Delivery to the sink runs on its own loop through a bounded
 * queue, so a slow sink loses intermediate deliveries instead of slowing the
 * producer. The assembled text is the concatenation of every chunk the source
 * produced, whatever happened to delivery.
 */

import { errorMessage } from '../errors'
import { type Logger, silentLogger } from '../logger'
import type { ApiError } from '../types'

export const DEFAULT_RELAY_BUFFER_SIZE = 256
/** How long a finished relay waits for the sink to take the remaining deliveries */
export const DEFAULT_DRAIN_TIMEOUT_MS = 5_000

/** Produces text chunks; must stop when the signal aborts. */
export type StreamSource = (signal: AbortSignal) => AsyncIterable<string>

/** Receives each chunk with the text accumulated so far, itself included. */
export type ChunkSink = (chunk: string, accumulated: string) => void | Promise<void>

export type RelayStatus = 'completed' | 'cancelled' | 'failed'

export interface RelayResult {
  readonly text: string
  readonly chunkCount: number
  /** Deliveries dropped because the sink fell behind */
  readonly droppedDeliveries: number
  readonly status: RelayStatus
  readonly error?: ApiError | undefined
}

export interface RelayHandle {
  readonly result: Promise<RelayResult>
  /** Stop the source and delivery; the result keeps the text produced so far. */
  cancel(): void
}

export interface RelayOptions {
  readonly sink?: ChunkSink | undefined
  readonly signal?: AbortSignal | undefined
  readonly bufferSize?: number | undefined
  /** Longest gap allowed between chunks; the stream fails with a timeout after it */
  readonly idleTimeoutMs?: number | undefined
  readonly drainTimeoutMs?: number | undefined
}

/**
 * Thrown by stream sources to report a provider error mid-stream.
 */
export class StreamInterruptedError extends Error {
  constructor(readonly apiError: ApiError) {
    super(apiError.message)
    this.name = 'StreamInterruptedError'
  }
}

interface Delivery {
  readonly chunk: string
  readonly accumulated: string
}

export class StreamRelay {
  private readonly bufferSize: number
  private readonly drainTimeoutMs: number
  private readonly logger: Logger

  constructor(
    options: {
      bufferSize?: number | undefined
      drainTimeoutMs?: number | undefined
      logger?: Logger | undefined
    } = {}
  ) {
    this.bufferSize = options.bufferSize ?? DEFAULT_RELAY_BUFFER_SIZE
    this.drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS
    this.logger = options.logger ?? silentLogger
  }

  start(source: StreamSource, options: RelayOptions = {}): RelayHandle {
    const controller = new AbortController()
    const external = options.signal
    const onExternalAbort = (): void => controller.abort()
    if (external?.aborted) {
      controller.abort()
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true })
    }

    const sink = options.sink
    const bufferSize = Math.max(1, options.bufferSize ?? this.bufferSize)
    const chunks: string[] = []
    const queue: Delivery[] = []
    let dropped = 0
    let producing = true
    let wakeDelivery: (() => void) | undefined
    let stalled: ApiError | undefined
    let idleTimer: ReturnType<typeof setTimeout> | undefined
    const idleTimeoutMs = options.idleTimeoutMs
    const drainTimeoutMs = options.drainTimeoutMs ?? this.drainTimeoutMs

    const armIdleTimer = (): void => {
      if (idleTimeoutMs === undefined) return
      clearTimeout(idleTimer)
      idleTimer = setTimeout(() => {
        stalled = { type: 'timeout', message: `Stream stalled for ${idleTimeoutMs}ms` }
        controller.abort()
      }, idleTimeoutMs)
    }

    const notify = (): void => {
      const wake = wakeDelivery
      wakeDelivery = undefined
      wake?.()
    }

    const deliver = async (): Promise<void> => {
      if (!sink) return
      for (;;) {
        if (controller.signal.aborted) return
        const next = queue.shift()
        if (next) {
          try {
            await sink(next.chunk, next.accumulated)
          } catch (error) {
            this.logger.warn(`Stream sink failed: ${errorMessage(error)}`)
          }
          continue
        }
        if (!producing) return
        await new Promise<void>((resolve) => {
          wakeDelivery = resolve
        })
      }
    }

    const snapshot = (status: RelayStatus, error?: ApiError): RelayResult => ({
      text: chunks.join(''),
      chunkCount: chunks.length,
      droppedDeliveries: dropped,
      status,
      ...(error !== undefined && { error })
    })
    /** Result once the controller has aborted, by a caller or by the idle timer */
    const stopped = (): RelayResult =>
      stalled ? snapshot('failed', stalled) : snapshot('cancelled')

    const produce = async (): Promise<RelayResult> => {
      let accumulated = ''
      armIdleTimer()
      try {
        for await (const chunk of source(controller.signal)) {
          if (controller.signal.aborted) break
          armIdleTimer()
          if (chunk.length === 0) continue
          chunks.push(chunk)
          accumulated += chunk
          if (sink) {
            queue.push({ chunk, accumulated })
            if (queue.length > bufferSize) {
              queue.shift()
              dropped++
            }
            notify()
          }
        }
        return controller.signal.aborted ? stopped() : snapshot('completed')
      } catch (error) {
        if (controller.signal.aborted) return stopped()
        const apiError: ApiError =
          error instanceof StreamInterruptedError
            ? error.apiError
            : { type: 'network', message: `Stream interrupted: ${errorMessage(error)}` }
        return snapshot('failed', apiError)
      } finally {
        clearTimeout(idleTimer)
        producing = false
        notify()
      }
    }

    const cancelled = new Promise<RelayResult>((resolve) => {
      const onCancel = (): void => resolve(stopped())
      if (controller.signal.aborted) {
        onCancel()
      } else {
        controller.signal.addEventListener('abort', onCancel, { once: true })
      }
    })

    const delivery = deliver()
    const result = Promise.race([produce(), cancelled]).then(async (outcome) => {
      clearTimeout(idleTimer)
      external?.removeEventListener('abort', onExternalAbort)
      if (controller.signal.aborted) {
        notify()
        return outcome
      }
      if (!(await drained(delivery, drainTimeoutMs))) {
        this.logger.warn(`Stream sink still busy after ${drainTimeoutMs}ms, stopping delivery`)
        controller.abort()
        notify()
      }
      return snapshot(outcome.status, outcome.error)
    })

    return {
      result,
      cancel: () => controller.abort()
    }
  }
}

/** Whether delivery finished within the timeout. */
async function drained(delivery: Promise<void>, timeoutMs: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs)
  })
  try {
    return await Promise.race([delivery.then(() => true), timeout])
  } finally {
    clearTimeout(timer)
  }
}

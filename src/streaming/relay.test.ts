import { describe, expect, it, vi } from 'vitest'
import { createTestLogger, deferred } from '../test-support'
import { StreamInterruptedError, StreamRelay } from './relay'

async function* fromChunks(chunks: readonly string[]): AsyncGenerator<string> {
  for (const chunk of chunks) {
    yield chunk
  }
}

describe('StreamRelay', () => {
  it('assembles exactly the text the source produced', async () => {
    const chunks = ['Solar ', 'panels ', 'convert ', 'light', '.\n', 'ü']
    const relay = new StreamRelay()

    const result = await relay.start(() => fromChunks(chunks)).result

    expect(result).toEqual({
      text: chunks.join(''),
      chunkCount: 6,
      droppedDeliveries: 0,
      status: 'completed'
    })
  })

  it('delivers chunks in order with the accumulated text', async () => {
    const seen: Array<[string, string]> = []
    const relay = new StreamRelay()

    await relay.start(() => fromChunks(['a', 'b', 'c']), {
      sink: (chunk, accumulated) => {
        seen.push([chunk, accumulated])
      }
    }).result

    expect(seen).toEqual([
      ['a', 'a'],
      ['b', 'ab'],
      ['c', 'abc']
    ])
  })

  it('skips empty chunks', async () => {
    const sink = vi.fn()
    const relay = new StreamRelay()

    const result = await relay.start(() => fromChunks(['a', '', 'b']), { sink }).result

    expect(result.chunkCount).toBe(2)
    expect(sink).toHaveBeenCalledTimes(2)
  })

  it('drops the oldest pending deliveries when the sink falls behind', async () => {
    const sinkStarted = deferred()
    const sinkReleased = deferred()
    const delivered: string[] = []

    async function* source(): AsyncGenerator<string> {
      yield 'a'
      await sinkStarted.promise
      yield 'b'
      yield 'c'
      yield 'd'
      yield 'e'
      sinkReleased.resolve()
    }

    const relay = new StreamRelay()
    const result = await relay.start(source, {
      bufferSize: 2,
      sink: async (chunk) => {
        delivered.push(chunk)
        if (chunk === 'a') {
          sinkStarted.resolve()
          await sinkReleased.promise
        }
      }
    }).result

    expect(delivered).toEqual(['a', 'd', 'e'])
    expect(result.droppedDeliveries).toBe(2)
    expect(result.text).toBe('abcde')
    expect(result.status).toBe('completed')
  })

  it('returns the partial text when cancelled, even if the source never ends', async () => {
    const firstChunk = deferred()

    async function* source(): AsyncGenerator<string> {
      yield 'partial '
      yield 'answer'
      firstChunk.resolve()
      await new Promise(() => {})
    }

    const relay = new StreamRelay()
    const handle = relay.start(source)
    await firstChunk.promise
    handle.cancel()
    const result = await handle.result

    expect(result).toEqual({
      text: 'partial answer',
      chunkCount: 2,
      droppedDeliveries: 0,
      status: 'cancelled'
    })
  })

  it('stops when the caller signal aborts', async () => {
    const controller = new AbortController()
    let sourceSignal: AbortSignal | undefined

    async function* source(signal: AbortSignal): AsyncGenerator<string> {
      sourceSignal = signal
      yield 'one'
      controller.abort()
      yield 'two'
    }

    const relay = new StreamRelay()
    const result = await relay.start(source, { signal: controller.signal }).result

    expect(result.status).toBe('cancelled')
    expect(result.text).toBe('one')
    expect(sourceSignal?.aborted).toBe(true)
  })

  it('reports a cancelled result at once for an already aborted signal', async () => {
    const relay = new StreamRelay()

    const result = await relay.start(() => fromChunks(['never']), {
      signal: AbortSignal.abort()
    }).result

    expect(result.status).toBe('cancelled')
    expect(result.text).toBe('')
  })

  it('keeps the partial text when the provider fails mid-stream', async () => {
    async function* source(): AsyncGenerator<string> {
      yield 'half '
      throw new StreamInterruptedError({ type: 'rate_limit', message: 'Rate limited: slow down' })
    }

    const relay = new StreamRelay()
    const result = await relay.start(source).result

    expect(result).toEqual({
      text: 'half ',
      chunkCount: 1,
      droppedDeliveries: 0,
      status: 'failed',
      error: { type: 'rate_limit', message: 'Rate limited: slow down' }
    })
  })

  it('reports other source errors as network failures', async () => {
    async function* source(): AsyncGenerator<string> {
      yield 'x'
      throw new Error('socket hang up')
    }

    const relay = new StreamRelay()
    const result = await relay.start(source).result

    expect(result.status).toBe('failed')
    expect(result.error).toEqual({
      type: 'network',
      message: 'Stream interrupted: socket hang up'
    })
  })

  it('carries on when the sink throws', async () => {
    const logger = createTestLogger()
    const delivered: string[] = []
    const relay = new StreamRelay({ logger })

    const result = await relay.start(() => fromChunks(['a', 'b']), {
      sink: (chunk) => {
        if (chunk === 'a') throw new Error('closed')
        delivered.push(chunk)
      }
    }).result

    expect(result.status).toBe('completed')
    expect(result.text).toBe('ab')
    expect(delivered).toEqual(['b'])
    expect(logger.warn).toHaveBeenCalledWith('Stream sink failed: closed')
  })

  it('fails with a timeout when the source stalls between chunks', async () => {
    let sourceSignal: AbortSignal | undefined

    async function* source(signal: AbortSignal): AsyncGenerator<string> {
      sourceSignal = signal
      yield 'first '
      await new Promise(() => {})
    }

    const relay = new StreamRelay()
    const result = await relay.start(source, { idleTimeoutMs: 20 }).result

    expect(result).toEqual({
      text: 'first ',
      chunkCount: 1,
      droppedDeliveries: 0,
      status: 'failed',
      error: { type: 'timeout', message: 'Stream stalled for 20ms' }
    })
    expect(sourceSignal?.aborted).toBe(true)
  })

  it('does not wait forever for a sink that never settles', async () => {
    const logger = createTestLogger()
    const relay = new StreamRelay({ logger, drainTimeoutMs: 20 })

    const result = await relay.start(() => fromChunks(['a', 'b']), {
      sink: () => new Promise<void>(() => {})
    }).result

    expect(result.status).toBe('completed')
    expect(result.text).toBe('ab')
    expect(logger.warn).toHaveBeenCalledWith(
      'Stream sink still busy after 20ms, stopping delivery'
    )
  })
})

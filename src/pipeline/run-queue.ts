import { PipelineCancelledError } from '../errors'

export const DEFAULT_MAX_CONCURRENT_RUNS = 2

/**
 * Admits at most `concurrency` runs at a time; the rest wait in arrival
 * order. A waiting run whose signal aborts leaves the queue.
 */
export class RunQueue {
  private active = 0
  private readonly waiting: Array<() => void> = []

  constructor(readonly concurrency: number = DEFAULT_MAX_CONCURRENT_RUNS) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Run concurrency must be a positive integer, got ${concurrency}`)
    }
  }

  get running(): number {
    return this.active
  }

  get pending(): number {
    return this.waiting.length
  }

  get isFull(): boolean {
    return this.active >= this.concurrency
  }

  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.admit(signal)
    try {
      return await task()
    } finally {
      this.active--
      this.waiting.shift()?.()
    }
  }

  private admit(signal: AbortSignal | undefined): Promise<void> {
    if (signal?.aborted) return Promise.reject(new PipelineCancelledError('start'))
    if (!this.isFull) {
      this.active++
      return Promise.resolve()
    }
    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiting.indexOf(enter)
        if (index >= 0) this.waiting.splice(index, 1)
        reject(new PipelineCancelledError('start'))
      }
      const enter = (): void => {
        signal?.removeEventListener('abort', onAbort)
        this.active++
        resolve()
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      this.waiting.push(enter)
    })
  }
}

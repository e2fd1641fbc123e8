/**
 * Sliding-window Rate Limiter
 *
 * Admits at most N requests per window per provider (several windows may
 * apply, e.g. per minute and per hour), optionally capping requests in
 * flight. Waiters for one provider are admitted strictly in arrival order,
 * and each gives up with a `timeout` error once its own wait budget is spent.
 */

import type { Result } from '../types'

export interface RateWindow {
  readonly maxRequests: number
  readonly windowMs: number
}

export interface RateLimit {
  readonly windows: readonly RateWindow[]
  readonly maxConcurrent?: number | undefined
}

const MINUTE = 60_000
const HOUR = 60 * MINUTE

/** Limits per provider kind. */
export const DEFAULT_RATE_LIMITS: Readonly<Record<string, RateLimit>> = {
  openai: {
    windows: [
      { maxRequests: 20, windowMs: MINUTE },
      { maxRequests: 1000, windowMs: HOUR }
    ]
  },
  deepseek: {
    windows: [
      { maxRequests: 100, windowMs: MINUTE },
      { maxRequests: 5000, windowMs: HOUR }
    ]
  },
  anthropic: {
    windows: [
      { maxRequests: 50, windowMs: MINUTE },
      { maxRequests: 2000, windowMs: HOUR }
    ]
  },
  tavily: { windows: [{ maxRequests: 60, windowMs: MINUTE }] },
  brave: { windows: [{ maxRequests: 60, windowMs: MINUTE }] }
}

export const DEFAULT_RATE_LIMIT: RateLimit = { windows: [{ maxRequests: 60, windowMs: MINUTE }] }
export const DEFAULT_ACQUIRE_TIMEOUT_MS = 30_000

export interface Permit {
  /** Frees the in-flight slot. Safe to call more than once. */
  release(): void
}

export interface AcquireOptions {
  /** Provider kind used to look up limits (defaults to the name) */
  readonly kind?: string | undefined
  readonly timeoutMs?: number | undefined
  readonly signal?: AbortSignal | undefined
}

export interface RateLimiterSnapshot {
  readonly windowRequestTimestamps: readonly number[]
  readonly inFlight: number
  readonly queued: number
}

interface Waiter {
  settle(result: Result<Permit>): void
}

interface ProviderState {
  readonly limit: RateLimit
  timestamps: number[]
  inFlight: number
  readonly queue: Waiter[]
  wakeTimer: ReturnType<typeof setTimeout> | undefined
}

export interface RateLimiterOptions {
  readonly limits?: Readonly<Record<string, RateLimit>> | undefined
  readonly defaultLimit?: RateLimit | undefined
  readonly defaultTimeoutMs?: number | undefined
  readonly now?: (() => number) | undefined
}

export class SlidingWindowRateLimiter {
  private readonly states = new Map<string, ProviderState>()
  private readonly limits: Readonly<Record<string, RateLimit>>
  private readonly defaultLimit: RateLimit
  private readonly defaultTimeoutMs: number
  private readonly now: () => number

  constructor(options: RateLimiterOptions = {}) {
    this.limits = { ...DEFAULT_RATE_LIMITS, ...options.limits }
    this.defaultLimit = options.defaultLimit ?? DEFAULT_RATE_LIMIT
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_ACQUIRE_TIMEOUT_MS
    this.now = options.now ?? (() => Date.now())
  }

  limitFor(kind: string): RateLimit {
    return this.limits[kind] ?? this.defaultLimit
  }

  /**
   * Wait for a slot for `name`. Resolves with a permit, or with a `timeout`
   * error when the wait budget runs out, or `aborted` when the signal fires.
   */
  acquire(name: string, options: AcquireOptions = {}): Promise<Result<Permit>> {
    const { signal } = options
    if (signal?.aborted) {
      return Promise.resolve(abortedResult(name))
    }

    const state = this.stateFor(name, options.kind ?? name)
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs

    return new Promise((resolve) => {
      let settled = false
      const onAbort = (): void => {
        waiter.settle(abortedResult(name))
        this.pump(name)
      }
      const timer = setTimeout(() => {
        waiter.settle({
          ok: false,
          error: {
            type: 'timeout',
            message: `Rate limit for ${name}: no slot within ${timeoutMs}ms`
          }
        })
        this.pump(name)
      }, timeoutMs)

      const waiter: Waiter = {
        settle: (result) => {
          if (settled) return
          settled = true
          clearTimeout(timer)
          signal?.removeEventListener('abort', onAbort)
          const index = state.queue.indexOf(waiter)
          if (index >= 0) state.queue.splice(index, 1)
          resolve(result)
        }
      }

      signal?.addEventListener('abort', onAbort, { once: true })
      state.queue.push(waiter)
      this.pump(name)
    })
  }

  snapshot(name: string): RateLimiterSnapshot {
    const state = this.states.get(name)
    return {
      windowRequestTimestamps: state ? [...state.timestamps] : [],
      inFlight: state?.inFlight ?? 0,
      queued: state?.queue.length ?? 0
    }
  }

  /**
   * Admit queued waiters from the head while the limits allow, then sleep
   * until the earliest moment the head could be admitted.
   */
  private pump(name: string): void {
    const state = this.states.get(name)
    if (!state) return
    if (state.wakeTimer !== undefined) {
      clearTimeout(state.wakeTimer)
      state.wakeTimer = undefined
    }

    for (let head = state.queue[0]; head !== undefined; head = state.queue[0]) {
      const now = this.now()
      const wait = this.waitTime(state, now)
      if (wait === Number.POSITIVE_INFINITY) return
      if (wait > 0) {
        state.wakeTimer = setTimeout(() => {
          state.wakeTimer = undefined
          this.pump(name)
        }, wait)
        return
      }
      state.timestamps.push(now)
      state.inFlight++
      head.settle({ ok: true, value: this.createPermit(name, state) })
    }
  }

  /**
   * Milliseconds until one more request fits every window; Infinity when
   * only a release can make room.
   */
  private waitTime(state: ProviderState, now: number): number {
    const { limit } = state
    if (limit.maxConcurrent !== undefined && state.inFlight >= limit.maxConcurrent) {
      return Number.POSITIVE_INFINITY
    }

    const horizon = Math.max(0, ...limit.windows.map((w) => w.windowMs))
    state.timestamps = state.timestamps.filter((t) => t > now - horizon)

    let wait = 0
    for (const window of limit.windows) {
      const inWindow = state.timestamps.filter((t) => t > now - window.windowMs)
      if (inWindow.length < window.maxRequests) continue
      // The request that must slide out before one more fits
      const blocking = inWindow[inWindow.length - window.maxRequests] ?? now
      wait = Math.max(wait, blocking + window.windowMs - now)
    }
    return wait
  }

  private createPermit(name: string, state: ProviderState): Permit {
    let released = false
    return {
      release: () => {
        if (released) return
        released = true
        state.inFlight--
        this.pump(name)
      }
    }
  }

  private stateFor(name: string, kind: string): ProviderState {
    let state = this.states.get(name)
    if (!state) {
      state = {
        limit: this.limitFor(kind),
        timestamps: [],
        inFlight: 0,
        queue: [],
        wakeTimer: undefined
      }
      this.states.set(name, state)
    }
    return state
  }
}

function abortedResult(name: string): Result<never> {
  return { ok: false, error: { type: 'aborted', message: `Wait for ${name} was aborted` } }
}

/**
 * Provider Fallback Chain
 *
 * Tries an operation against an ordered list of provider candidates until
 * one succeeds. Open circuits are skipped without a call, every call waits for
 * a rate-limit slot and runs under its own timeout, and the full history of
 * attempts comes back with the result.
 */

import { errorMessage } from '../errors'
import { type Logger, silentLogger } from '../logger'
import type { ApiError, ProviderAttempt, Result } from '../types'
import type { SlidingWindowRateLimiter } from './rate-limiter'
import type { ProviderRegistry } from './registry'

export const DEFAULT_CALL_TIMEOUT_MS = 60_000

/**
 * One way of performing an operation: a provider plus the credentials and
 * client to use for it.
 */
export interface ProviderCandidate<C> {
  /** Unique per provider and key, used for health and rate-limit records */
  readonly id: string
  /** Provider kind, used to look up default rate limits */
  readonly kind: string
  /** Lower runs first */
  readonly priority: number
  readonly client: C
}

export type ProviderOperation<C, T> = (
  candidate: ProviderCandidate<C>,
  signal: AbortSignal
) => Promise<Result<T>>

export interface DispatchContext {
  readonly registry: ProviderRegistry
  readonly limiter: SlidingWindowRateLimiter
  /** Per-call timeout */
  readonly timeoutMs?: number | undefined
  /** Longest wait for a rate-limit slot before moving to the next candidate */
  readonly acquireTimeoutMs?: number | undefined
  readonly signal?: AbortSignal | undefined
  readonly logger?: Logger | undefined
}

export interface Dispatched<T> {
  readonly value: T
  /** Id of the candidate that succeeded */
  readonly provider: string
  /** Candidates that were skipped or failed before it */
  readonly attempts: readonly ProviderAttempt[]
}

export async function dispatch<C, T>(
  operation: ProviderOperation<C, T>,
  candidates: readonly ProviderCandidate<C>[],
  context: DispatchContext
): Promise<Result<Dispatched<T>>> {
  const { registry, limiter, signal } = context
  const logger = context.logger ?? silentLogger
  const timeoutMs = context.timeoutMs ?? DEFAULT_CALL_TIMEOUT_MS
  // Array.prototype.sort is stable, so equal priorities keep their given order
  const ordered = [...candidates].sort((a, b) => a.priority - b.priority)
  const attempts: ProviderAttempt[] = []

  for (const candidate of ordered) {
    if (signal?.aborted) return abortedResult(attempts)

    if (registry.isOpen(candidate.id)) {
      const until = new Date(registry.get(candidate.id).circuitOpenUntil).toISOString()
      attempts.push({
        provider: candidate.id,
        outcome: 'skipped',
        message: `circuit open until ${until}`,
        durationMs: 0
      })
      logger.verbose(`Skipping ${candidate.id}: circuit open`)
      continue
    }

    const startedAt = Date.now()
    const permit = await limiter.acquire(candidate.id, {
      kind: candidate.kind,
      timeoutMs: context.acquireTimeoutMs,
      signal
    })
    if (!permit.ok) {
      if (permit.error.type === 'aborted') return abortedResult(attempts)
      // A local queueing timeout says nothing about the provider's health
      attempts.push(failedAttempt(candidate.id, permit.error, startedAt))
      logger.warn(`${candidate.id} unavailable: ${permit.error.message}`)
      continue
    }

    let result: Result<T>
    try {
      result = await callWithTimeout(operation, candidate, timeoutMs, signal)
    } finally {
      permit.value.release()
    }

    if (result.ok) {
      registry.recordSuccess(candidate.id)
      if (attempts.length > 0) {
        logger.verbose(`${candidate.id} succeeded after ${attempts.length} fallback(s)`)
      }
      return { ok: true, value: { value: result.value, provider: candidate.id, attempts } }
    }

    if (signal?.aborted) return abortedResult(attempts)

    registry.recordFailure(candidate.id, result.error)
    attempts.push(failedAttempt(candidate.id, result.error, startedAt))
    logger.warn(`${candidate.id} failed (${result.error.type}): ${result.error.message}`)
  }

  return {
    ok: false,
    error: { type: 'exhausted', message: describeExhaustion(attempts), attempts }
  }
}

/**
 * Run one call with its own abort controller, linked to the caller's signal
 * while the call is pending. The controller is not aborted on success; an
 * operation whose result outlives the call links it to a signal of its own.
 */
async function callWithTimeout<C, T>(
  operation: ProviderOperation<C, T>,
  candidate: ProviderCandidate<C>,
  timeoutMs: number,
  signal: AbortSignal | undefined
): Promise<Result<T>> {
  const controller = new AbortController()
  const forwardAbort = (): void => controller.abort()
  signal?.addEventListener('abort', forwardAbort, { once: true })

  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<Result<never>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort()
      resolve({
        ok: false,
        error: { type: 'timeout', message: `${candidate.id} timed out after ${timeoutMs}ms` }
      })
    }, timeoutMs)
  })

  const call = operation(candidate, controller.signal).catch(
    (error: unknown): Result<never> => ({
      ok: false,
      error: { type: 'network', message: errorMessage(error) }
    })
  )

  try {
    return await Promise.race([call, timeout])
  } finally {
    clearTimeout(timer)
    signal?.removeEventListener('abort', forwardAbort)
  }
}

function failedAttempt(provider: string, error: ApiError, startedAt: number): ProviderAttempt {
  return {
    provider,
    outcome: 'failed',
    errorType: error.type,
    message: error.message,
    durationMs: Date.now() - startedAt
  }
}

function abortedResult(attempts: readonly ProviderAttempt[]): Result<never> {
  return { ok: false, error: { type: 'aborted', message: 'Request was cancelled', attempts } }
}

/**
 * e.g. "All providers failed: openai (skipped: circuit open until ...); deepseek (rate_limit: ...)"
 */
export function describeExhaustion(attempts: readonly ProviderAttempt[]): string {
  if (attempts.length === 0) {
    return 'No providers configured'
  }
  const parts = attempts.map((attempt) =>
    attempt.outcome === 'skipped'
      ? `${attempt.provider} (skipped: ${attempt.message})`
      : `${attempt.provider} (${attempt.errorType ?? 'error'}: ${attempt.message})`
  )
  return `All providers failed: ${parts.join('; ')}`
}

/**
 * HTTP Utilities
 *
 * Helper types and functions for HTTP requests made by the search, embedding
 * and generation backends. Every request carries a timeout and honours the
 * caller's abort signal.
 */

import type { Result } from './types'

const DEFAULT_TIMEOUT_MS = 30_000

/**
 * Check if running in CI environment.
 */
function isCI(): boolean {
  return process.env.CI === 'true'
}

/**
 * Check if running tests.
 */
function isTestMode(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true'
}

/**
 * Real HTTP requests are never allowed from tests running in CI.
 */
function shouldBlockHttpRequests(): boolean {
  return isCI() && isTestMode()
}

/**
 * Error thrown when a request is made while HTTP is blocked.
 */
class BlockedHttpRequestError extends Error {
  constructor(url: string) {
    super(
      `HTTP request to ${url} blocked: running tests in CI. ` +
        'Tests must stub httpFetch instead of calling real services.'
    )
    this.name = 'BlockedHttpRequestError'
  }
}

/**
 * The request did not produce response headers within its timeout.
 */
export class HttpTimeoutError extends Error {
  constructor(
    readonly url: string,
    readonly timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`)
    this.name = 'HttpTimeoutError'
  }
}

/**
 * The caller's signal aborted the request.
 */
export class HttpAbortedError extends Error {
  constructor(readonly url: string) {
    super(`Request to ${url} was aborted`)
    this.name = 'HttpAbortedError'
  }
}

/**
 * Standard HTTP response interface for API calls.
 * `body` is consumed by the streaming backends.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  body: AsyncIterable<Uint8Array> | null
  text(): Promise<string>
  json(): Promise<unknown>
}

export interface HttpRequestInit {
  method?: string | undefined
  headers?: Record<string, string> | undefined
  body?: string | undefined
  signal?: AbortSignal | undefined
  /** Time allowed until response headers arrive (default 30s). The body is not covered. */
  timeoutMs?: number | undefined
}

/**
 * Perform a fetch request and return a typed response.
 *
 * The timeout covers connection and headers only, so a streamed body can
 * outlive it. The caller's signal covers the whole exchange, body included,
 * and is released once the body has been read.
 *
 * @throws HttpTimeoutError when no response arrives in time
 * @throws HttpAbortedError when the caller's signal fires first
 */
export async function httpFetch(url: string, init: HttpRequestInit = {}): Promise<HttpResponse> {
  if (shouldBlockHttpRequests()) {
    throw new BlockedHttpRequestError(url)
  }

  const timeoutMs = init.timeoutMs ?? DEFAULT_TIMEOUT_MS
  const callerSignal = init.signal
  if (callerSignal?.aborted) {
    throw new HttpAbortedError(url)
  }

  const controller = new AbortController()
  let timedOut = false
  const timer = setTimeout(() => {
    timedOut = true
    controller.abort()
  }, timeoutMs)
  const forwardAbort = (): void => controller.abort()
  callerSignal?.addEventListener('abort', forwardAbort, { once: true })

  const detach = (): void => callerSignal?.removeEventListener('abort', forwardAbort)

  try {
    const response = (await fetch(url, {
      method: init.method ?? 'GET',
      headers: init.headers ?? {},
      body: init.body ?? null,
      signal: controller.signal
    })) as unknown as HttpResponse
    return releasingOnRead(response, detach)
  } catch (error) {
    detach()
    if (timedOut) throw new HttpTimeoutError(url, timeoutMs)
    if (callerSignal?.aborted) throw new HttpAbortedError(url)
    throw error
  } finally {
    clearTimeout(timer)
  }
}

/**
 * The caller's signal stays linked until the body has been read, then the
 * listener is removed.
 */
function releasingOnRead(response: HttpResponse, release: () => void): HttpResponse {
  const body = response.body
  return {
    ok: response.ok,
    status: response.status,
    headers: response.headers,
    body: body && readThenRelease(body, release),
    text: () => response.text().finally(release),
    json: () => response.json().finally(release)
  }
}

async function* readThenRelease(
  body: AsyncIterable<Uint8Array>,
  release: () => void
): AsyncGenerator<Uint8Array> {
  try {
    yield* body
  } finally {
    release()
  }
}

/**
 * Handle HTTP error responses uniformly across all API modules.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text()

  if (response.status === 429) {
    const retryAfter = response.headers.get('retry-after')
    return {
      ok: false,
      error: {
        type: 'rate_limit',
        message: `Rate limited: ${errorText}`,
        retryAfter: retryAfter ? Number.parseInt(retryAfter, 10) : undefined
      }
    }
  }

  if (response.status === 401 || response.status === 403) {
    return { ok: false, error: { type: 'auth', message: `Authentication failed: ${errorText}` } }
  }

  if (response.status === 402) {
    return { ok: false, error: { type: 'quota', message: `Quota exhausted: ${errorText}` } }
  }

  if (response.status === 400 || response.status === 404 || response.status === 422) {
    return {
      ok: false,
      error: { type: 'invalid_request', message: `Request rejected ${response.status}: ${errorText}` }
    }
  }

  return {
    ok: false,
    error: { type: 'network', message: `API error ${response.status}: ${errorText}` }
  }
}

/**
 * Handle network errors uniformly across all API modules.
 */
export function handleNetworkError(error: unknown): Result<never> {
  if (error instanceof HttpTimeoutError) {
    return { ok: false, error: { type: 'timeout', message: error.message } }
  }
  if (error instanceof HttpAbortedError) {
    return { ok: false, error: { type: 'aborted', message: error.message } }
  }
  const message = error instanceof Error ? error.message : String(error)
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}

/**
 * Create an error result for empty API responses.
 */
export function emptyResponseError(): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message: 'Empty response from API' } }
}

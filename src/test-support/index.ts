/**
 * Test Support Module
 *
 * Stand-ins for HTTP responses, loggers and backends used across the test suites.
 */

import { type Mock, vi } from 'vitest'
import type { HttpResponse } from '../http'
import type { Logger } from '../logger'

export type TestLogger = {
  readonly [K in keyof Logger]: Mock<Logger[K]>
}

/**
 * Logger whose methods are all spies.
 */
export function createTestLogger(): TestLogger {
  return {
    log: vi.fn<Logger['log']>(),
    verbose: vi.fn<Logger['verbose']>(),
    success: vi.fn<Logger['success']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
    progress: vi.fn<Logger['progress']>()
  }
}

/**
 * Response carrying a JSON body.
 */
export function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {}
): HttpResponse {
  const text = typeof body === 'string' ? body : JSON.stringify(body)
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: { get: (name: string) => headers[name.toLowerCase()] ?? null },
    body: null,
    text: async () => text,
    json: async () => body
  }
}

/**
 * Response whose body arrives as the given text pieces, UTF-8 encoded.
 */
export function streamResponse(pieces: readonly string[]): HttpResponse {
  const encoder = new TextEncoder()
  async function* body(): AsyncGenerator<Uint8Array> {
    for (const piece of pieces) {
      yield encoder.encode(piece)
    }
  }
  return {
    ok: true,
    status: 200,
    headers: { get: () => null },
    body: body(),
    text: async () => pieces.join(''),
    json: async () => JSON.parse(pieces.join(''))
  }
}

/**
 * SSE body with one `data:` line per payload, terminated by `[DONE]`.
 */
export function sseLines(payloads: readonly unknown[]): string[] {
  return [...payloads.map((p) => `data: ${JSON.stringify(p)}\n\n`), 'data: [DONE]\n\n']
}

export interface Deferred {
  readonly promise: Promise<void>
  readonly resolve: () => void
}

/**
 * Promise resolved from outside, for holding a fake at a known point.
 */
export function deferred(): Deferred {
  let resolve = (): void => {}
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

import { StreamInterruptedError } from '../streaming'

/**
 * Decode one SSE `data:` payload.
 *
 * @throws StreamInterruptedError when the payload is not JSON
 */
export function parseStreamEvent<T>(provider: string, payload: string): T {
  try {
    return JSON.parse(payload) as T
  } catch {
    throw new StreamInterruptedError({
      type: 'invalid_response',
      message: `${provider} sent a malformed stream event: ${payload.slice(0, 80)}`
    })
  }
}

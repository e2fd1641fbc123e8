/**
 * Server-sent events
 *
 * Line-oriented reader for the `data:` payloads of an SSE response body.
 * Multi-line events are not used by the providers we talk to, so each
 * `data:` line is one payload.
 */

const DONE_MARKER = '[DONE]'

function payloadOf(line: string): string | null {
  const trimmed = line.trim()
  if (!trimmed.startsWith('data:')) return null
  return trimmed.slice('data:'.length).trim()
}

/**
 * Yield every `data:` payload until the body ends or a `[DONE]` marker.
 * Comment, `event:` and blank lines are skipped.
 */
export async function* readSseData(body: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder()
  let buffer = ''

  for await (const bytes of body) {
    buffer += decoder.decode(bytes, { stream: true })
    const lines = buffer.split(/\r?\n/)
    buffer = lines.pop() ?? ''

    for (const line of lines) {
      const payload = payloadOf(line)
      if (payload === null || payload === '') continue
      if (payload === DONE_MARKER) return
      yield payload
    }
  }

  buffer += decoder.decode()
  const payload = payloadOf(buffer)
  if (payload && payload !== DONE_MARKER) {
    yield payload
  }
}

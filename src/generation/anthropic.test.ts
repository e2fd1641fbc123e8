import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { HttpRequestInit, HttpResponse } from '../http'

const mockHttpFetch = vi.hoisted(() =>
  vi.fn<(url: string, init?: HttpRequestInit) => Promise<HttpResponse>>()
)

vi.mock('../http', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../http')>()),
  httpFetch: mockHttpFetch
}))

import { StreamInterruptedError } from '../streaming'
import { jsonResponse, sseLines, streamResponse } from '../test-support'
import { AnthropicBackend } from './anthropic'

const REQUEST = {
  messages: [
    { role: 'system' as const, content: 'Be brief.' },
    { role: 'user' as const, content: 'What is a tide?' }
  ]
}

describe('AnthropicBackend', () => {
  beforeEach(() => {
    mockHttpFetch.mockReset()
  })

  it('moves system messages into the system field', async () => {
    mockHttpFetch.mockResolvedValueOnce(
      jsonResponse(200, {
        content: [
          { type: 'text', text: 'Sea level ' },
          { type: 'tool_use' },
          { type: 'text', text: 'change.' }
        ]
      })
    )
    const backend = new AnthropicBackend({ apiKey: 'test-key' })

    const result = await backend.generate(REQUEST)

    expect(result).toEqual({ ok: true, value: 'Sea level change.' })
    const [url, init] = mockHttpFetch.mock.calls[0] ?? []
    expect(url).toBe('https://api.anthropic.com/v1/messages')
    expect(init?.headers?.['x-api-key']).toBe('test-key')
    expect(JSON.parse(init?.body ?? '{}')).toEqual({
      model: 'claude-haiku-4-5',
      max_tokens: 4000,
      temperature: 0.7,
      system: 'Be brief.',
      messages: [{ role: 'user', content: 'What is a tide?' }]
    })
  })

  it('streams text deltas until message_stop', async () => {
    mockHttpFetch.mockResolvedValueOnce(
      streamResponse([
        'event: message_start\n',
        'data: {"type":"message_start"}\n\n',
        'event: content_block_delta\n',
        'data: {"type":"content_block_delta","delta":{"type":"text_delta","text":"Sea "}}\n\n',
        'data: {"type":"content_block_delta","delta":{"type":"text_delta","text":"level."}}\n\n',
        'data: {"type":"message_stop"}\n\n',
        'data: {"type":"content_block_delta","delta":{"type":"text_delta","text":"ignored"}}\n\n'
      ])
    )
    const backend = new AnthropicBackend({ apiKey: 'test-key' })

    const opened = await backend.openStream(REQUEST)
    if (!opened.ok) throw new Error('stream did not open')
    const chunks: string[] = []
    for await (const chunk of opened.value) chunks.push(chunk)

    expect(chunks).toEqual(['Sea ', 'level.'])
  })

  it('maps a rate-limit error event to a rate_limit interruption', async () => {
    mockHttpFetch.mockResolvedValueOnce(
      streamResponse(
        sseLines([{ type: 'error', error: { type: 'rate_limit_error', message: 'slow down' } }])
      )
    )
    const backend = new AnthropicBackend({ apiKey: 'test-key' })

    const opened = await backend.openStream(REQUEST)
    if (!opened.ok) throw new Error('stream did not open')

    let caught: unknown
    try {
      for await (const _chunk of opened.value) {
        // drain
      }
    } catch (error) {
      caught = error
    }
    expect(caught).toBeInstanceOf(StreamInterruptedError)
    expect(caught instanceof StreamInterruptedError && caught.apiError).toEqual({
      type: 'rate_limit',
      message: 'anthropic stream failed: slow down'
    })
  })

  it('maps a 402 to a quota error', async () => {
    mockHttpFetch.mockResolvedValueOnce(jsonResponse(402, 'credit balance too low'))
    const backend = new AnthropicBackend({ apiKey: 'test-key' })

    const result = await backend.generate(REQUEST)

    expect(!result.ok && result.error).toEqual({
      type: 'quota',
      message: 'Quota exhausted: credit balance too low'
    })
  })
})

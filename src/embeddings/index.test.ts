import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { HttpRequestInit, HttpResponse } from '../http'

// Use vi.hoisted to create mock before module mocking
const mockHttpFetch = vi.hoisted(() =>
  vi.fn<(url: string, init?: HttpRequestInit) => Promise<HttpResponse>>()
)

vi.mock('../http', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../http')>()),
  httpFetch: mockHttpFetch
}))

import { createTestLogger, jsonResponse } from '../test-support'
import { createEmbeddingProvider } from './index'

describe('createEmbeddingProvider', () => {
  beforeEach(() => {
    mockHttpFetch.mockReset()
  })

  it('uses hash embeddings without a key', async () => {
    const provider = await createEmbeddingProvider({ provider: 'auto' })

    expect(provider.name).toBe('hash')
    expect(mockHttpFetch).not.toHaveBeenCalled()
  })

  it('uses hash embeddings when asked to, even with a key', async () => {
    const provider = await createEmbeddingProvider({ openaiApiKey: 'test-key', provider: 'hash' })

    expect(provider.name).toBe('hash')
  })

  it('probes OpenAI in auto mode and keeps it when the probe works', async () => {
    mockHttpFetch.mockResolvedValueOnce(
      jsonResponse(200, { data: [{ embedding: [0.1, 0.2], index: 0 }] })
    )

    const provider = await createEmbeddingProvider({ openaiApiKey: 'test-key' })

    expect(provider.name).toBe('openai')
    expect(provider.recommendedThreshold).toBe(0.85)
    expect(mockHttpFetch).toHaveBeenCalledOnce()
  })

  it('falls back to hash embeddings when the probe fails', async () => {
    mockHttpFetch.mockResolvedValueOnce(jsonResponse(401, { error: 'bad key' }))
    const logger = createTestLogger()

    const provider = await createEmbeddingProvider({ openaiApiKey: 'test-key', logger })

    expect(provider.name).toBe('hash')
    expect(logger.warn).toHaveBeenCalledWith(
      'OpenAI embeddings unavailable, using hash embeddings: Authentication failed: {"error":"bad key"}'
    )
  })

  it('returns the embedding vector from the OpenAI response', async () => {
    const provider = await createEmbeddingProvider({ openaiApiKey: 'test-key', provider: 'openai' })
    mockHttpFetch.mockResolvedValueOnce(
      jsonResponse(200, { data: [{ embedding: [0.5, -0.5, 0.25], index: 0 }] })
    )

    const result = await provider.embed('  padded query  ')

    expect(result.ok && Array.from(result.value)).toEqual([0.5, -0.5, 0.25])
    const body = mockHttpFetch.mock.calls[0]?.[1]?.body
    expect(body).toBe('{"model":"text-embedding-3-small","input":"padded query"}')
  })

  it('reports an empty embedding as an invalid response', async () => {
    const provider = await createEmbeddingProvider({ openaiApiKey: 'test-key', provider: 'openai' })
    mockHttpFetch.mockResolvedValueOnce(jsonResponse(200, { data: [] }))

    const result = await provider.embed('query')

    expect(result.ok).toBe(false)
    expect(!result.ok && result.error.type).toBe('invalid_response')
  })
})

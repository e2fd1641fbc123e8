import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { HttpRequestInit, HttpResponse } from '../http'

const mockHttpFetch = vi.hoisted(() =>
  vi.fn<(url: string, init?: HttpRequestInit) => Promise<HttpResponse>>()
)

vi.mock('../http', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../http')>()),
  httpFetch: mockHttpFetch
}))

import { jsonResponse } from '../test-support'
import { BraveSearchBackend, parseBraveResponse } from './brave'

describe('BraveSearchBackend', () => {
  beforeEach(() => {
    mockHttpFetch.mockReset()
  })

  it('sends the query and capped count as URL parameters', async () => {
    mockHttpFetch.mockResolvedValueOnce(jsonResponse(200, {}))
    const backend = new BraveSearchBackend({ apiKey: 'test-key' })

    await backend.search({ query: 'tidal energy', maxResults: 50, depth: 'basic' })

    const [url, init] = mockHttpFetch.mock.calls[0] ?? []
    expect(url).toBe('https://api.search.brave.com/res/v1/web/search?q=tidal+energy&count=20')
    expect(init?.headers?.['X-Subscription-Token']).toBe('test-key')
  })

  it('reports a 429 as a rate limit with its retry-after', async () => {
    mockHttpFetch.mockResolvedValueOnce(jsonResponse(429, 'too many', { 'retry-after': '7' }))
    const backend = new BraveSearchBackend({ apiKey: 'test-key' })

    const result = await backend.search({ query: 'q', maxResults: 5, depth: 'basic' })

    expect(result).toEqual({
      ok: false,
      error: { type: 'rate_limit', message: 'Rate limited: too many', retryAfter: 7 }
    })
  })
})

describe('parseBraveResponse', () => {
  const data = {
    web: {
      results: [
        {
          title: 'First',
          url: 'https://example.com/1',
          description: 'one',
          extra_snippets: ['more one']
        },
        { title: 'Second', url: 'https://example.com/2', description: 'two', page_age: '2024-01-02' },
        { title: 'Third', url: 'https://example.com/3' },
        { title: 'Fourth', url: 'https://example.com/4', description: 'four' }
      ]
    }
  }

  it('scores results by rank and keeps at most maxResults', () => {
    const response = parseBraveResponse({ query: 'q', maxResults: 3, depth: 'basic' }, data)

    expect(response.results.map((r) => [r.title, r.score])).toEqual([
      ['First', 1],
      ['Second', 0.667],
      ['Third', 0.333]
    ])
    expect(response.results[1]?.publishedDate).toBe('2024-01-02')
    expect(response.results[2]?.content).toBe('')
    expect(response.backend).toBe('brave')
  })

  it('adds extra snippets to the content at advanced depth', () => {
    const response = parseBraveResponse({ query: 'q', maxResults: 1, depth: 'advanced' }, data)

    expect(response.results[0]?.content).toBe('one\nmore one')
  })

  it('returns no results when the web section is missing', () => {
    expect(parseBraveResponse({ query: 'q', maxResults: 5, depth: 'basic' }, {}).results).toEqual(
      []
    )
  })
})

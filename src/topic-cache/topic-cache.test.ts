import { afterEach, describe, expect, it, vi } from 'vitest'
import { MemoryTopicStore } from './memory'
import { TopicCache, type TopicCacheOptions } from './topic-cache'
import { normalizeTopic } from './types'

const HOUR = 60 * 60 * 1000

function createCache(overrides: Partial<TopicCacheOptions> = {}) {
  const clock = { now: 1_000_000 }
  const store = new MemoryTopicStore()
  const cache = new TopicCache({ store, now: () => clock.now, ...overrides })
  return { cache, store, clock }
}

async function completedRun(cache: TopicCache, topic: string, language: string, ref: string) {
  const begun = await cache.begin(topic, language)
  await cache.complete(begun.record.id, ref)
  return begun.record.id
}

describe('normalizeTopic', () => {
  it('lowercases, trims and collapses whitespace', () => {
    expect(normalizeTopic('  Solar \n  POWER ')).toBe('solar power')
  })
})

describe('TopicCache', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  describe('find', () => {
    it('misses when nothing has run', async () => {
      const { cache } = createCache()

      expect(await cache.find('solar power', 'en')).toEqual({ kind: 'miss' })
    })

    it('hits a completed run for the same normalized topic and language', async () => {
      const { cache } = createCache()
      await completedRun(cache, 'Solar Power', 'en', 'run-1')

      const lookup = await cache.find('  solar   power ', 'en')

      expect(lookup.kind).toBe('hit')
      expect(lookup.kind === 'hit' && lookup.record.resultReference).toBe('run-1')
    })

    it('misses when forceFresh is set', async () => {
      const { cache } = createCache()
      await completedRun(cache, 'solar power', 'en', 'run-1')

      expect(await cache.find('solar power', 'en', { forceFresh: true })).toEqual({ kind: 'miss' })
    })

    it('misses once the result is older than the TTL', async () => {
      const { cache, clock } = createCache()
      await completedRun(cache, 'solar power', 'en', 'run-1')

      clock.now += 24 * HOUR
      expect((await cache.find('solar power', 'en')).kind).toBe('hit')
      clock.now += 1
      expect((await cache.find('solar power', 'en')).kind).toBe('miss')
    })

    it('offers a base-language result as a partial hit for other languages', async () => {
      const { cache } = createCache()
      await completedRun(cache, 'solar power', 'en', 'run-en')

      const lookup = await cache.find('solar power', 'de')

      expect(lookup.kind).toBe('partial')
      expect(lookup.kind === 'partial' && lookup.record.resultReference).toBe('run-en')
    })

    it('does not offer other languages as partial hits for the base language', async () => {
      const { cache } = createCache()
      await completedRun(cache, 'solar power', 'de', 'run-de')

      expect((await cache.find('solar power', 'en')).kind).toBe('miss')
    })

    it('prefers the newest completed result', async () => {
      const { cache, clock } = createCache()
      await completedRun(cache, 'solar power', 'en', 'old')
      clock.now += 1_000
      const newer = await cache.begin('solar power', 'en', { force: true })
      clock.now += 1_000
      await cache.complete(newer.record.id, 'new')

      const lookup = await cache.find('solar power', 'en')

      expect(lookup.kind === 'hit' && lookup.record.resultReference).toBe('new')
    })

    it('ignores failed runs', async () => {
      const { cache } = createCache()
      const begun = await cache.begin('solar power', 'en')
      await cache.fail(begun.record.id, 'All providers failed')

      expect((await cache.find('solar power', 'en')).kind).toBe('miss')
    })
  })

  describe('begin', () => {
    it('reports a run already in progress for the same topic and language', async () => {
      const { cache } = createCache()

      const first = await cache.begin('solar power', 'en')
      const second = await cache.begin('Solar Power', 'en')

      expect(first.kind).toBe('started')
      expect(second).toEqual({ kind: 'in_progress', record: first.record })
    })

    it('claims a topic once under concurrent begins', async () => {
      const { cache } = createCache()

      const results = await Promise.all([
        cache.begin('solar power', 'en'),
        cache.begin('solar power', 'en'),
        cache.begin('solar power', 'en')
      ])

      expect(results.map((r) => r.kind).sort()).toEqual(['in_progress', 'in_progress', 'started'])
    })

    it('keeps languages apart', async () => {
      const { cache } = createCache()
      await cache.begin('solar power', 'en')

      expect((await cache.begin('solar power', 'fr')).kind).toBe('started')
    })

    it('starts a new run when forced', async () => {
      const { cache } = createCache()
      const first = await cache.begin('solar power', 'en')

      const forced = await cache.begin('solar power', 'en', { force: true })

      expect(forced.kind).toBe('started')
      expect(forced.record.id).not.toBe(first.record.id)
    })

    it('treats a marker from another process as abandoned after the in-progress TTL', async () => {
      const { cache, store, clock } = createCache()
      const other = new TopicCache({ store, now: () => clock.now })
      await other.begin('solar power', 'en')

      expect((await cache.begin('solar power', 'en')).kind).toBe('in_progress')
      clock.now += 30 * 60 * 1000 + 1
      expect((await cache.begin('solar power', 'en')).kind).toBe('started')
    })

    it('starts again after a failure', async () => {
      const { cache } = createCache()
      const first = await cache.begin('solar power', 'en')
      await cache.fail(first.record.id, 'boom')

      expect((await cache.begin('solar power', 'en')).kind).toBe('started')
    })
  })

  describe('complete and fail', () => {
    it('record the outcome on the record', async () => {
      const { cache, store, clock } = createCache()
      const begun = await cache.begin('solar power', 'en')
      clock.now += 5_000

      await cache.fail(begun.record.id, 'Search failed')

      expect(await store.get(begun.record.id)).toMatchObject({
        status: 'failed',
        completedAt: 1_005_000,
        error: 'Search failed'
      })
    })

    it('return null for an unknown record', async () => {
      const { cache } = createCache()

      expect(await cache.complete('missing', 'ref')).toBeNull()
    })
  })

  describe('waitFor', () => {
    it('resolves as soon as the run completes in this process', async () => {
      const { cache } = createCache({ pollIntervalMs: 60_000 })
      const begun = await cache.begin('solar power', 'en')

      const waiting = cache.waitFor(begun.record.id, 60_000)
      await cache.complete(begun.record.id, 'run-1')

      expect(await waiting).toMatchObject({ status: 'completed', resultReference: 'run-1' })
    })

    it('returns a settled record immediately', async () => {
      const { cache } = createCache()
      const id = await completedRun(cache, 'solar power', 'en', 'run-1')

      expect((await cache.waitFor(id, 0))?.status).toBe('completed')
    })

    it('returns null for an unknown record', async () => {
      const { cache } = createCache()

      expect(await cache.waitFor('missing', 1_000)).toBeNull()
    })

    it('gives up at the timeout with the record still in progress', async () => {
      vi.useFakeTimers()
      const { cache } = createCache({ now: () => Date.now(), pollIntervalMs: 1_000 })
      const begun = await cache.begin('solar power', 'en')

      const waiting = cache.waitFor(begun.record.id, 500)
      await vi.advanceTimersByTimeAsync(500)

      expect((await waiting)?.status).toBe('in_progress')
    })

    it('polls for runs owned by another process', async () => {
      vi.useFakeTimers()
      const { cache, store } = createCache({ now: () => Date.now(), pollIntervalMs: 1_000 })
      const other = new TopicCache({ store })
      const begun = await other.begin('solar power', 'en')

      const waiting = cache.waitFor(begun.record.id, 10_000)
      await other.complete(begun.record.id, 'run-1')
      await vi.advanceTimersByTimeAsync(1_000)

      expect((await waiting)?.resultReference).toBe('run-1')
    })

    it('stops waiting when the signal aborts', async () => {
      const { cache } = createCache({ pollIntervalMs: 60_000 })
      const begun = await cache.begin('solar power', 'en')
      const controller = new AbortController()

      const waiting = cache.waitFor(begun.record.id, 60_000, controller.signal)
      controller.abort()

      expect((await waiting)?.status).toBe('in_progress')
    })
  })
})

import { describe, expect, it, type Mock, vi } from 'vitest'
import type { GenerationBackend, GenerationRequest } from '../generation'
import type { SearchBackend } from '../search'
import { StreamInterruptedError } from '../streaming'
import { createTestLogger, deferred } from '../test-support'
import { MemoryTopicStore, TopicCache } from '../topic-cache'
import type { ApiError, Result } from '../types'
import {
  type CandidateFactory,
  ResearchService,
  type ResearchServiceOptions
} from './research-service'
import { MemoryRunStore } from './run-store'
import { CAPACITY_MESSAGE } from './status'
import type { ProgressEvent } from './types'

type GenerationStep = 'plan' | 'analysis' | 'summary' | 'translate'

const REPLIES: Record<Exclude<GenerationStep, 'translate'>, string> = {
  plan: '1. tidal power output\n2. tidal turbine costs',
  analysis: 'Tides are predictable.',
  summary: '  Tidal power is steady.\n'
}

function stepOf(request: GenerationRequest): GenerationStep {
  const system = request.messages[0]?.content ?? ''
  if (system.includes('search queries')) return 'plan'
  if (system.includes('research analyst')) return 'analysis'
  if (system.includes('translator')) return 'translate'
  return 'summary'
}

interface FakeGenerationOptions {
  readonly replies?: Partial<Record<GenerationStep, Result<string>>> | undefined
  readonly chunks?: readonly string[] | undefined
  readonly streamError?: ApiError | undefined
  readonly beforePlan?: (() => Promise<void>) | undefined
}

type FakeGeneration = GenerationBackend & {
  readonly generate: Mock<GenerationBackend['generate']>
  readonly openStream: Mock<GenerationBackend['openStream']>
}

function fakeGeneration(options: FakeGenerationOptions = {}): FakeGeneration {
  async function* stream(): AsyncGenerator<string> {
    for (const chunk of options.chunks ?? ['Tidal ', 'report.']) yield chunk
    if (options.streamError) throw new StreamInterruptedError(options.streamError)
  }
  return {
    kind: 'openai',
    model: 'test-model',
    generate: vi.fn<GenerationBackend['generate']>(async (request) => {
      const step = stepOf(request)
      if (step === 'plan') await options.beforePlan?.()
      const reply = options.replies?.[step]
      if (reply) return reply
      if (step === 'translate') {
        return { ok: true, value: `translated: ${request.messages[1]?.content ?? ''}` }
      }
      return { ok: true, value: REPLIES[step] }
    }),
    openStream: vi.fn<GenerationBackend['openStream']>(async () => ({ ok: true, value: stream() }))
  }
}

function fakeSearch(failing: readonly string[] = []) {
  return {
    name: 'tavily',
    search: vi.fn<SearchBackend['search']>(async (request) =>
      failing.includes(request.query)
        ? { ok: false, error: { type: 'network', message: 'API error 503: down' } }
        : {
            ok: true,
            value: {
              query: request.query,
              backend: 'tavily',
              results: [
                {
                  title: `About ${request.query}`,
                  url: `https://example.com/${request.query.replaceAll(' ', '-')}`,
                  content: `Notes on ${request.query}`,
                  score: request.query.length / 100
                }
              ]
            }
          }
    )
  }
}

function candidatesFor(generation: GenerationBackend, search: SearchBackend): CandidateFactory {
  return {
    generation: () => [{ id: 'openai', kind: 'test', priority: 0, client: generation }],
    search: () => [{ id: 'tavily', kind: 'test', priority: 0, client: search }]
  }
}

function createService(
  options: {
    generation?: FakeGeneration
    search?: ReturnType<typeof fakeSearch>
    overrides?: Partial<ResearchServiceOptions>
  } = {}
) {
  const generation = options.generation ?? fakeGeneration()
  const search = options.search ?? fakeSearch()
  const runStore = new MemoryRunStore()
  const topicCache = new TopicCache({ store: new MemoryTopicStore() })
  const logger = createTestLogger()
  const service = new ResearchService({
    runStore,
    topicCache,
    candidates: candidatesFor(generation, search),
    env: {},
    logger,
    ...options.overrides
  })
  return { service, generation, search, runStore, topicCache, logger }
}

function callsFor(generation: FakeGeneration, step: GenerationStep): number {
  return generation.generate.mock.calls.filter(([request]) => stepOf(request) === step).length
}

describe('ResearchService', () => {
  describe('fresh runs', () => {
    it('plans, searches, analyzes, writes and stores a report', async () => {
      const { service, search, runStore } = createService()

      const result = await service.runPipeline({ topic: 'Tidal Power' })

      expect(result.ok).toBe(true)
      if (!result.ok) return
      expect(result.value.source).toBe('fresh')
      expect(result.value.run).toMatchObject({
        topic: 'Tidal Power',
        language: 'en',
        depth: 'basic',
        summary: 'Tidal power is steady.',
        report: 'Tidal report.',
        analysis: 'Tides are predictable.',
        queries: ['tidal power output', 'tidal turbine costs'],
        provider: 'openai'
      })
      expect(result.value.run.sources.map((s) => s.url)).toEqual([
        'https://example.com/tidal-turbine-costs',
        'https://example.com/tidal-power-output'
      ])
      expect(search.search).toHaveBeenCalledWith(
        { query: 'tidal power output', maxResults: 5, depth: 'basic' },
        expect.any(AbortSignal)
      )
      expect(await runStore.loadRun(result.value.reference)).toEqual(result.value.run)
    })

    it('reports every step in the status', async () => {
      const { service } = createService()

      const result = await service.runPipeline({ topic: 'tidal power' })
      const status = result.ok ? service.getStatus(result.value.runId) : null

      expect(status).toMatchObject({
        state: 'completed',
        step: 'completed',
        progress: 100,
        partialPreview: 'Tidal power is steady.',
        finalResult: result.ok ? result.value.run : null
      })
      expect(status?.stepsLog.map((entry) => entry.step)).toEqual([
        'initializing',
        'planning',
        'searching',
        'analyzing',
        'generating',
        'summarizing',
        'persisting',
        'completed'
      ])
    })

    it('honors the requested parameters', async () => {
      const { service, search, logger } = createService()

      await service.runPipeline({
        topic: 'tidal power',
        parameters: { depth: 'advanced', maxResults: 8, maxQueries: 1 }
      })

      expect(search.search).toHaveBeenCalledTimes(1)
      expect(search.search).toHaveBeenCalledWith(
        { query: 'tidal power output', maxResults: 8, depth: 'advanced' },
        expect.any(AbortSignal)
      )
      expect(logger.verbose).toHaveBeenCalledWith('Search 1/1 finished: "tidal power output"')
    })

    it('streams the report text to the progress sink', async () => {
      const { service } = createService()
      const events: ProgressEvent[] = []

      await service.runPipeline({ topic: 'tidal power', onProgress: (e) => events.push(e) })

      const partials = events.filter((e) => e.partialText !== undefined)
      expect(partials.map((e) => e.partialText)).toEqual(['Tidal ', 'Tidal report.'])
      expect(partials.every((e) => e.step === 'generating')).toBe(true)
      expect(events.at(-1)).toEqual({
        step: 'completed',
        message: 'Research complete!',
        progress: 100
      })
    })

    it('researches in English and translates for other languages, keeping both', async () => {
      const { service, runStore } = createService()

      const result = await service.runPipeline({ topic: 'tidal power', language: ' FR ' })

      expect(result.ok).toBe(true)
      if (!result.ok) return
      expect(result.value.source).toBe('fresh')
      expect(result.value.run).toMatchObject({
        language: 'fr',
        report: 'translated: Tidal report.',
        summary: 'translated: Tidal power is steady.'
      })
      expect(runStore.size).toBe(2)

      const english = await service.runPipeline({ topic: 'tidal power', language: 'en' })
      expect(english.ok && english.value.source).toBe('topic_cache')
      expect(english.ok && english.value.reference).toBe(result.value.run.translatedFrom)
    })
  })

  describe('topic cache', () => {
    it('answers a repeated topic without running the pipeline', async () => {
      const { service, generation } = createService()

      const first = await service.runPipeline({ topic: '  Tidal   Power ' })
      const second = await service.runPipeline({ topic: 'tidal power' })

      expect(second.ok && second.value.source).toBe('topic_cache')
      expect(second.ok && second.value.reference).toBe(first.ok && first.value.reference)
      expect(generation.generate).toHaveBeenCalledTimes(3)
      expect(second.ok && service.getStatus(second.value.runId)?.message).toBe(
        'Found a recent result for this topic'
      )
    })

    it('runs again when asked for fresh results', async () => {
      const { service, generation } = createService()

      const first = await service.runPipeline({ topic: 'tidal power' })
      const second = await service.runPipeline({ topic: 'tidal power', forceFresh: true })

      expect(second.ok && second.value.source).toBe('fresh')
      expect(second.ok && second.value.reference).not.toBe(first.ok && first.value.reference)
      expect(callsFor(generation, 'plan')).toBe(2)
    })

    it('only translates when an English result exists', async () => {
      const { service, search } = createService()
      const base = await service.runPipeline({ topic: 'tidal power' })
      const searches = search.search.mock.calls.length

      const result = await service.runPipeline({ topic: 'tidal power', language: 'de' })

      expect(result.ok).toBe(true)
      if (!result.ok || !base.ok) return
      expect(result.value.source).toBe('translated')
      expect(result.value.run).toMatchObject({
        language: 'de',
        report: 'translated: Tidal report.',
        summary: 'translated: Tidal power is steady.',
        analysis: 'Tides are predictable.',
        translatedFrom: base.value.reference
      })
      expect(search.search).toHaveBeenCalledTimes(searches)

      const again = await service.runPipeline({ topic: 'tidal power', language: 'de' })
      expect(again.ok && again.value.reference).toBe(result.value.reference)
    })

    it('researches again when the stored run is gone', async () => {
      const { service, runStore, logger } = createService()
      const first = await service.runPipeline({ topic: 'tidal power' })
      vi.spyOn(runStore, 'loadRun').mockResolvedValue(null)

      const second = await service.runPipeline({ topic: 'tidal power' })

      expect(second.ok && second.value.source).toBe('fresh')
      expect(logger.warn).toHaveBeenCalledWith(
        `Stored run ${first.ok ? first.value.reference : ''} is missing, researching again`
      )
    })

    it('lets a concurrent request for the same topic wait for the running one', async () => {
      const release = deferred()
      const generation = fakeGeneration({ beforePlan: () => release.promise })
      const { service } = createService({ generation })

      const first = service.startPipeline({ topic: 'tidal power' })
      const second = service.startPipeline({ topic: 'Tidal Power' })
      await vi.waitFor(() => expect(service.getStatus(second.runId)?.step).toBe('waiting'))
      release.resolve()
      const [a, b] = await Promise.all([first.done, second.done])

      expect(a.ok && a.value.source).toBe('fresh')
      expect(b.ok && b.value.source).toBe('topic_cache')
      expect(b.ok && b.value.reference).toBe(a.ok && a.value.reference)
      expect(callsFor(generation, 'plan')).toBe(1)
    })

    it('researches without the topic cache when its store cannot be read', async () => {
      class UnreadableStore extends MemoryTopicStore {
        override async list(): Promise<never> {
          throw new Error('EACCES: permission denied')
        }
      }
      const topicCache = new TopicCache({ store: new UnreadableStore() })
      const { service, logger } = createService({ overrides: { topicCache } })

      const result = await service.runPipeline({ topic: 'tidal power' })

      expect(result.ok && result.value.source).toBe('fresh')
      expect(logger.warn).toHaveBeenCalledWith(
        'Topic cache lookup failed: EACCES: permission denied'
      )
      expect(logger.warn).toHaveBeenCalledWith('Topic cache claim failed: EACCES: permission denied')
    })

    it('keeps the result when the topic record cannot be updated', async () => {
      const store = new MemoryTopicStore()
      vi.spyOn(store, 'get').mockRejectedValue(new Error('EIO: i/o error'))
      const topicCache = new TopicCache({ store })
      const { service, logger, runStore } = createService({ overrides: { topicCache } })

      const result = await service.runPipeline({ topic: 'tidal power' })

      expect(result.ok && result.value.source).toBe('fresh')
      if (!result.ok) return
      expect(service.getStatus(result.value.runId)?.state).toBe('completed')
      expect(await runStore.loadRun(result.value.reference)).toEqual(result.value.run)
      expect(logger.warn).toHaveBeenCalledWith('Topic cache update failed: EIO: i/o error')
    })
  })

  describe('failures', () => {
    it('carries on when some searches fail', async () => {
      const { service, logger } = createService({ search: fakeSearch(['tidal turbine costs']) })

      const result = await service.runPipeline({ topic: 'tidal power' })

      expect(result.ok && result.value.run.sources.map((s) => s.url)).toEqual([
        'https://example.com/tidal-power-output'
      ])
      expect(logger.warn).toHaveBeenCalledWith(
        'Search failed for "tidal turbine costs": ' +
          'All providers failed: tavily (network: API error 503: down)'
      )
    })

    it('fails the run when every search fails, and does not cache it', async () => {
      const search = fakeSearch(['tidal power output', 'tidal turbine costs'])
      const { service, generation, topicCache } = createService({ search })

      const { runId, done } = service.startPipeline({ topic: 'tidal power' })
      const result = await done

      const message =
        'searching failed: All providers failed: tavily (network: API error 503: down)'
      expect(!result.ok && result.error).toMatchObject({ type: 'exhausted', message })
      expect(service.getStatus(runId)).toMatchObject({
        state: 'failed',
        message: `Research failed: ${message}`
      })
      expect(callsFor(generation, 'analysis')).toBe(0)
      expect(await topicCache.find('tidal power', 'en')).toEqual({ kind: 'miss' })
    })

    it('reports capacity problems with a friendly message', async () => {
      const generation = fakeGeneration({
        replies: {
          plan: { ok: false, error: { type: 'quota', message: 'Quota exhausted: plan limit' } }
        }
      })
      const { service } = createService({ generation })

      const { runId, done } = service.startPipeline({ topic: 'tidal power' })
      const result = await done

      expect(!result.ok && result.error.message).toBe(
        'planning failed: All providers failed: openai (quota: Quota exhausted: plan limit)'
      )
      expect(service.getStatus(runId)).toMatchObject({
        state: 'temporarily_unavailable',
        step: 'failed',
        message: CAPACITY_MESSAGE
      })
    })

    it('fails with the partial report in the preview when the stream breaks', async () => {
      const generation = fakeGeneration({
        chunks: ['Tidal '],
        streamError: { type: 'network', message: 'connection reset' }
      })
      const { service } = createService({ generation })

      const { runId, done } = service.startPipeline({ topic: 'tidal power' })
      const result = await done

      expect(!result.ok && result.error).toEqual({
        type: 'network',
        message: 'generating failed: connection reset'
      })
      expect(service.getStatus(runId)).toMatchObject({
        state: 'failed',
        message: 'Research failed: generating failed: connection reset',
        partialPreview: 'Tidal '
      })
    })

    it('rejects an empty topic', async () => {
      const { service, generation } = createService()

      const result = await service.runPipeline({ topic: '   ' })

      expect(!result.ok && result.error).toEqual({
        type: 'invalid_request',
        message: 'initializing failed: Topic is required'
      })
      expect(generation.generate).not.toHaveBeenCalled()
    })
  })

  describe('cancellation', () => {
    it('stops at the next step boundary', async () => {
      const planStarted = deferred()
      const release = deferred()
      const generation = fakeGeneration({
        beforePlan: async () => {
          planStarted.resolve()
          await release.promise
        }
      })
      const { service, search, topicCache } = createService({ generation })

      const { runId, done } = service.startPipeline({ topic: 'tidal power' })
      await planStarted.promise
      expect(service.cancel(runId)).toBe(true)
      release.resolve()
      const result = await done

      expect(result).toEqual({
        ok: false,
        error: { type: 'aborted', message: 'Cancelled before searching' }
      })
      expect(service.getStatus(runId)?.state).toBe('cancelled')
      expect(search.search).not.toHaveBeenCalled()
      expect(service.cancel(runId)).toBe(false)
      expect(await topicCache.find('tidal power', 'en')).toEqual({ kind: 'miss' })
    })

    it('does nothing for an already aborted signal', async () => {
      const { service, generation } = createService()

      const result = await service.runPipeline({
        topic: 'tidal power',
        signal: AbortSignal.abort()
      })

      expect(!result.ok && result.error).toEqual({
        type: 'aborted',
        message: 'Cancelled before initializing'
      })
      expect(generation.generate).not.toHaveBeenCalled()
    })

    it('returns false for unknown runs', () => {
      expect(createService().service.cancel('missing')).toBe(false)
    })
  })

  describe('concurrency', () => {
    it('queues runs beyond the concurrent run limit', async () => {
      const release = deferred()
      let gated = false
      const generation = fakeGeneration({
        beforePlan: async () => {
          if (gated) return
          gated = true
          await release.promise
        }
      })
      const { service } = createService({ generation, overrides: { maxConcurrentRuns: 1 } })

      const first = service.startPipeline({ topic: 'tidal power' })
      const second = service.startPipeline({ topic: 'wave power' })
      await vi.waitFor(() =>
        expect(service.getStatus(second.runId)?.stepsLog.map((e) => e.step)).toContain('queued')
      )

      expect(service.getStatus(second.runId)?.state).toBe('queued')
      expect(service.getStatus(first.runId)?.step).toBe('planning')
      release.resolve()
      const results = await Promise.all([first.done, second.done])
      expect(results.map((r) => r.ok && r.value.source)).toEqual(['fresh', 'fresh'])
    })
  })
})

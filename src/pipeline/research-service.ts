/**
 * Research Service
 *
 * Runs the research pipeline: topic cache probe, query planning, web search,
 * analysis, a streamed report, a summary, translation for non-English runs,
 * and persistence. Each run is detached; callers either await `done` or poll
 * `getStatus` with the run id.
 *
 * Steps run strictly in order inside a run. Runs share the provider
 * registry, the rate limiter and both caches, and at most
 * `maxConcurrentRuns` of them do pipeline work at once.
 */

import { randomUUID } from 'node:crypto'
import type { TieredCache } from '../caching'
import {
  buildGenerationCandidates,
  buildSearchCandidates,
  type CandidateOptions,
  type Environment,
  type ResolvedCredentials,
  resolveCredentials
} from '../credentials'
import { errorMessage, PipelineCancelledError, PipelineStepError } from '../errors'
import {
  DEFAULT_GENERATION_TIMEOUT_MS,
  DEFAULT_MAX_TOKENS,
  type GenerationBackend,
  type GenerationDependencies,
  type GenerationRequest,
  generateText,
  streamText
} from '../generation'
import { type Logger, silentLogger } from '../logger'
import type { ProviderCandidate } from '../providers/dispatch'
import { SlidingWindowRateLimiter } from '../providers/rate-limiter'
import { ProviderRegistry } from '../providers/registry'
import {
  DEFAULT_SEARCH_TIMEOUT_MS,
  type SearchBackend,
  type SearchDependencies,
  type SearchResponse,
  searchWithCache
} from '../search'
import { runWorkerPool } from '../shared/worker-pool'
import {
  BASE_LANGUAGE,
  DEFAULT_IN_PROGRESS_TTL_MS,
  type TopicCache,
  type TopicCacheRecord,
  type TopicLookup
} from '../topic-cache'
import type { ApiError, Result } from '../types'
import {
  analysisMessages,
  collectSources,
  languageName,
  parseQueries,
  queryPlanMessages,
  reportMessages,
  summaryMessages
} from './prompts'
import { RunQueue } from './run-queue'
import { describeFailure, StatusTracker } from './status'
import { GenerationTranslator } from './translator'
import {
  DEFAULT_RESEARCH_PARAMETERS,
  type PipelineOutcome,
  type PipelineRequest,
  type PipelineStep,
  type ResearchParameters,
  type ResearchSource,
  type RunStatus,
  type RunStore,
  type StoredRun,
  type Translator
} from './types'

export const DEFAULT_SEARCH_CONCURRENCY = 3

const MISS: TopicLookup = { kind: 'miss' }

/** Builds the fallback chains for one run from its credentials. */
export interface CandidateFactory {
  generation(credentials: ResolvedCredentials): readonly ProviderCandidate<GenerationBackend>[]
  search(credentials: ResolvedCredentials): readonly ProviderCandidate<SearchBackend>[]
}

export function defaultCandidateFactory(
  options: { models?: CandidateOptions['models']; searchTimeoutMs?: number | undefined } = {}
): CandidateFactory {
  return {
    generation: (credentials) => buildGenerationCandidates(credentials, { models: options.models }),
    search: (credentials) =>
      buildSearchCandidates(credentials, { timeoutMs: options.searchTimeoutMs })
  }
}

export interface ResearchServiceOptions {
  readonly runStore: RunStore
  readonly topicCache: TopicCache
  readonly searchCache?: TieredCache<SearchResponse> | undefined
  readonly registry?: ProviderRegistry | undefined
  readonly limiter?: SlidingWindowRateLimiter | undefined
  /** Server-side keys; defaults to process.env */
  readonly env?: Environment | undefined
  readonly candidates?: CandidateFactory | undefined
  readonly createTranslator?: ((deps: GenerationDependencies) => Translator) | undefined
  readonly defaults?: Partial<ResearchParameters> | undefined
  readonly maxConcurrentRuns?: number | undefined
  readonly searchConcurrency?: number | undefined
  /** Longest wait for a concurrent run of the same topic */
  readonly waitTimeoutMs?: number | undefined
  readonly generationTimeoutMs?: number | undefined
  readonly searchTimeoutMs?: number | undefined
  readonly acquireTimeoutMs?: number | undefined
  readonly logger?: Logger | undefined
  readonly now?: (() => number) | undefined
}

export interface StartedRun {
  readonly runId: string
  /** Rejects only on errors outside the pipeline's own failure handling */
  readonly done: Promise<Result<PipelineOutcome>>
}

interface RunJob {
  readonly runId: string
  readonly topic: string
  readonly language: string
  readonly parameters: ResearchParameters
  readonly forceFresh: boolean
  readonly credentials: ResolvedCredentials
  readonly signal: AbortSignal
  readonly startedAt: number
}

interface RunContext {
  readonly generation: GenerationDependencies
  readonly search: SearchDependencies
}

interface LoadedRun {
  readonly reference: string
  readonly run: StoredRun
}

function checkpoint(signal: AbortSignal, step: PipelineStep): void {
  if (signal.aborted) throw new PipelineCancelledError(step)
}

function expectOk<T>(result: Result<T>, step: PipelineStep): T {
  if (!result.ok) throw new PipelineStepError(step, result.error)
  return result.value
}

export class ResearchService {
  private readonly runStore: RunStore
  private readonly topicCache: TopicCache
  private readonly searchCache: TieredCache<SearchResponse> | undefined
  private readonly registry: ProviderRegistry
  private readonly limiter: SlidingWindowRateLimiter
  private readonly env: Environment
  private readonly candidates: CandidateFactory
  private readonly createTranslator: (deps: GenerationDependencies) => Translator
  private readonly defaults: ResearchParameters
  private readonly queue: RunQueue
  private readonly searchConcurrency: number
  private readonly waitTimeoutMs: number
  private readonly generationTimeoutMs: number
  private readonly searchTimeoutMs: number
  private readonly acquireTimeoutMs: number | undefined
  private readonly logger: Logger
  private readonly now: () => number
  private readonly tracker: StatusTracker
  private readonly controllers = new Map<string, AbortController>()

  constructor(options: ResearchServiceOptions) {
    this.runStore = options.runStore
    this.topicCache = options.topicCache
    this.searchCache = options.searchCache
    this.logger = options.logger ?? silentLogger
    this.registry = options.registry ?? new ProviderRegistry({ logger: this.logger })
    this.limiter = options.limiter ?? new SlidingWindowRateLimiter()
    this.env = options.env ?? process.env
    this.candidates = options.candidates ?? defaultCandidateFactory()
    this.createTranslator = options.createTranslator ?? ((deps) => new GenerationTranslator(deps))
    this.defaults = { ...DEFAULT_RESEARCH_PARAMETERS, ...options.defaults }
    this.queue = new RunQueue(options.maxConcurrentRuns)
    this.searchConcurrency = options.searchConcurrency ?? DEFAULT_SEARCH_CONCURRENCY
    this.waitTimeoutMs = options.waitTimeoutMs ?? DEFAULT_IN_PROGRESS_TTL_MS
    this.generationTimeoutMs = options.generationTimeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS
    this.searchTimeoutMs = options.searchTimeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS
    this.acquireTimeoutMs = options.acquireTimeoutMs
    this.now = options.now ?? Date.now
    this.tracker = new StatusTracker(this.logger, this.now)
  }

  /** Run the pipeline and wait for it to finish. */
  runPipeline(request: PipelineRequest): Promise<Result<PipelineOutcome>> {
    return this.startPipeline(request).done
  }

  /** Start a run in the background. Its status is available at once. */
  startPipeline(request: PipelineRequest): StartedRun {
    const runId = randomUUID()
    const language = (request.language ?? BASE_LANGUAGE).trim().toLowerCase() || BASE_LANGUAGE
    const controller = new AbortController()
    const forwardAbort = (): void => controller.abort()
    if (request.signal?.aborted) {
      controller.abort()
    } else {
      request.signal?.addEventListener('abort', forwardAbort, { once: true })
    }
    this.controllers.set(runId, controller)
    this.tracker.create(runId, request.topic, language, request.onProgress)

    const job: RunJob = {
      runId,
      topic: request.topic.trim(),
      language,
      parameters: { ...this.defaults, ...request.parameters },
      forceFresh: request.forceFresh ?? false,
      credentials: resolveCredentials(request.userKeys, this.env),
      signal: controller.signal,
      startedAt: this.now()
    }
    const done = this.execute(job).finally(() => {
      request.signal?.removeEventListener('abort', forwardAbort)
      this.controllers.delete(runId)
    })
    return { runId, done }
  }

  getStatus(runId: string): RunStatus | null {
    return this.tracker.get(runId)
  }

  /**
   * Cancel a run. It stops at the next step boundary; an in-flight provider
   * call receives the abort as well. False when the run is unknown or has
   * already finished.
   */
  cancel(runId: string): boolean {
    const controller = this.controllers.get(runId)
    if (!controller || this.tracker.isFinished(runId)) return false
    controller.abort()
    return true
  }

  private async execute(job: RunJob): Promise<Result<PipelineOutcome>> {
    try {
      const outcome = await this.research(job)
      this.tracker.complete(job.runId, outcome)
      this.logger.verbose(`Run ${job.runId} finished (${outcome.source})`)
      return { ok: true, value: outcome }
    } catch (error) {
      const failure = describeFailure(error)
      this.tracker.fail(job.runId, failure)
      if (failure.state === 'cancelled') {
        this.logger.verbose(`Run ${job.runId} cancelled`)
      } else {
        this.logger.error(`Research on "${job.topic}" failed: ${failure.error.message}`)
      }
      if (error instanceof PipelineStepError || error instanceof PipelineCancelledError) {
        return { ok: false, error: failure.error }
      }
      throw error
    }
  }

  private async research(job: RunJob): Promise<PipelineOutcome> {
    const { runId, topic, language, signal } = job
    checkpoint(signal, 'initializing')
    this.tracker.step(runId, 'initializing', 5, 'Checking for recent results...')
    if (!topic) {
      throw new PipelineStepError('initializing', {
        type: 'invalid_request',
        message: 'Topic is required'
      })
    }

    const lookup = await this.topicCacheCall(
      'lookup',
      () => this.topicCache.find(topic, language, { forceFresh: job.forceFresh }),
      MISS
    )
    if (lookup.kind === 'hit') {
      const cached = await this.loadCached(lookup.record)
      if (cached) return { runId, ...cached, source: 'topic_cache' }
    }
    const base = lookup.kind === 'partial' ? await this.loadCached(lookup.record) : null

    let claim = await this.topicCacheCall(
      'claim',
      () => this.topicCache.begin(topic, language, { force: job.forceFresh }),
      null
    )
    if (claim?.kind === 'in_progress') {
      const running = claim.record
      this.tracker.step(runId, 'waiting', 8, 'This topic is already being researched, waiting...')
      const settled = await this.topicCacheCall(
        'wait',
        () => this.topicCache.waitFor(running.id, this.waitTimeoutMs, signal),
        null
      )
      checkpoint(signal, 'planning')
      const finished = settled ? await this.loadCached(settled) : null
      if (finished) return { runId, ...finished, source: 'topic_cache' }
      this.logger.verbose(`Concurrent run for "${topic}" did not finish, researching anyway`)
      claim = await this.topicCacheCall(
        'claim',
        () => this.topicCache.begin(topic, language, { force: true }),
        null
      )
    }

    const recordId = claim?.record.id
    try {
      if (this.queue.isFull) {
        this.tracker.step(runId, 'queued', 5, 'Waiting for a free research slot...')
      }
      const outcome = await this.queue.run(
        () => (base ? this.translateOnly(job, base) : this.fresh(job)),
        signal
      )
      if (recordId !== undefined) {
        await this.topicCacheCall(
          'update',
          () => this.topicCache.complete(recordId, outcome.reference),
          null
        )
      }
      return outcome
    } catch (error) {
      if (recordId !== undefined) {
        await this.topicCacheCall(
          'update',
          () => this.topicCache.fail(recordId, errorMessage(error)),
          null
        )
      }
      throw error
    }
  }

  /** Topic cache failures are logged and the run carries on without it. */
  private async topicCacheCall<T, F>(
    action: string,
    call: () => Promise<T>,
    fallback: F
  ): Promise<T | F> {
    try {
      return await call()
    } catch (error) {
      this.logger.warn(`Topic cache ${action} failed: ${errorMessage(error)}`)
      return fallback
    }
  }

  /** A completed record's stored run, or null when it is gone. */
  private async loadCached(record: TopicCacheRecord): Promise<LoadedRun | null> {
    const reference = record.resultReference
    if (record.status !== 'completed' || reference === undefined) return null
    const run = await this.runStore.loadRun(reference)
    if (!run) {
      this.logger.warn(`Stored run ${reference} is missing, researching again`)
      return null
    }
    return { reference, run }
  }

  private context(job: RunJob): RunContext {
    const shared = {
      registry: this.registry,
      limiter: this.limiter,
      acquireTimeoutMs: this.acquireTimeoutMs,
      signal: job.signal,
      logger: this.logger
    }
    return {
      generation: {
        ...shared,
        timeoutMs: this.generationTimeoutMs,
        candidates: this.candidates.generation(job.credentials)
      },
      search: {
        ...shared,
        timeoutMs: this.searchTimeoutMs,
        cache: this.searchCache,
        candidates: this.candidates.search(job.credentials)
      }
    }
  }

  private async fresh(job: RunJob): Promise<PipelineOutcome> {
    const { runId, topic, language, parameters, signal } = job
    const context = this.context(job)

    checkpoint(signal, 'planning')
    this.tracker.step(runId, 'planning', 10, 'Planning search queries...')
    const queries = await this.planQueries(topic, parameters.maxQueries, context.generation)

    checkpoint(signal, 'searching')
    this.tracker.step(runId, 'searching', 25, `Searching the web (${queries.length} queries)...`)
    const responses = await this.searchAll(queries, parameters, context.search)
    const sources = collectSources(responses)

    checkpoint(signal, 'analyzing')
    this.tracker.step(runId, 'analyzing', 45, `Analyzing ${sources.length} sources...`)
    const analysis = await this.generate(
      'analyzing',
      { messages: analysisMessages(topic, responses), maxTokens: 2000, temperature: 0.3 },
      context.generation
    )

    checkpoint(signal, 'generating')
    this.tracker.step(runId, 'generating', 60, 'Writing the report...')
    const report = await this.streamReport(runId, topic, analysis, sources, context.generation)

    checkpoint(signal, 'summarizing')
    this.tracker.step(runId, 'summarizing', 85, 'Writing the executive summary...')
    const summary = await this.generate(
      'summarizing',
      { messages: summaryMessages(report.text), maxTokens: 400, temperature: 0.3 },
      context.generation
    )

    const finishedAt = this.now()
    const baseRun: StoredRun = {
      topic,
      language: BASE_LANGUAGE,
      depth: parameters.depth,
      summary: summary.trim(),
      report: report.text,
      analysis,
      queries,
      sources,
      provider: report.provider,
      createdAt: finishedAt,
      processingTimeMs: finishedAt - job.startedAt
    }

    checkpoint(signal, 'persisting')
    if (language === BASE_LANGUAGE) {
      this.tracker.step(runId, 'persisting', 95, 'Saving results...')
      const reference = await this.runStore.saveRun(baseRun)
      return { runId, reference, source: 'fresh', run: baseRun }
    }

    // The base-language run is kept too, so other languages only need a translation
    this.tracker.step(runId, 'persisting', 88, 'Saving English results...')
    const baseReference = await this.runStore.saveRun(baseRun)
    await this.topicCacheCall(
      'update',
      async () => {
        const baseClaim = await this.topicCache.begin(topic, BASE_LANGUAGE, { force: true })
        return this.topicCache.complete(baseClaim.record.id, baseReference)
      },
      null
    )

    const translated = await this.translateRun(
      job,
      { reference: baseReference, run: baseRun },
      context.generation,
      [90, 93]
    )
    this.tracker.step(runId, 'persisting', 96, 'Saving translated results...')
    const reference = await this.runStore.saveRun(translated)
    return { runId, reference, source: 'fresh', run: translated }
  }

  private async translateOnly(job: RunJob, base: LoadedRun): Promise<PipelineOutcome> {
    const { runId, language, signal } = job
    this.tracker.step(
      runId,
      'initializing',
      20,
      `Found a recent English result, preparing a ${languageName(language)} translation...`
    )
    const translated = await this.translateRun(job, base, this.context(job).generation, [50, 80])

    checkpoint(signal, 'persisting')
    this.tracker.step(runId, 'persisting', 95, 'Saving results...')
    const reference = await this.runStore.saveRun(translated)
    return { runId, reference, source: 'translated', run: translated }
  }

  private async translateRun(
    job: RunJob,
    base: LoadedRun,
    generation: GenerationDependencies,
    [reportProgress, summaryProgress]: readonly [number, number]
  ): Promise<StoredRun> {
    const { runId, language, signal } = job
    const translator = this.createTranslator(generation)
    const target = languageName(language)

    checkpoint(signal, 'translating')
    this.tracker.step(runId, 'translating', reportProgress, `Translating report to ${target}...`)
    const report = expectOk(
      await translator.translate(base.run.report, language, signal),
      'translating'
    )

    checkpoint(signal, 'translating')
    this.tracker.step(runId, 'translating', summaryProgress, `Translating summary to ${target}...`)
    const summary = expectOk(
      await translator.translate(base.run.summary, language, signal),
      'translating'
    )

    const finishedAt = this.now()
    return {
      ...base.run,
      language,
      report,
      summary,
      translatedFrom: base.reference,
      createdAt: finishedAt,
      processingTimeMs: finishedAt - job.startedAt
    }
  }

  private async planQueries(
    topic: string,
    maxQueries: number,
    deps: GenerationDependencies
  ): Promise<string[]> {
    const text = await this.generate(
      'planning',
      { messages: queryPlanMessages(topic, maxQueries), maxTokens: 500 },
      deps
    )
    const queries = parseQueries(text, topic, maxQueries)
    this.logger.verbose(`Planned ${queries.length} search queries for "${topic}"`)
    return queries
  }

  /**
   * Run every query, tolerating individual failures. Fails only when no
   * query produced a response.
   */
  private async searchAll(
    queries: readonly string[],
    { depth, maxResults }: ResearchParameters,
    deps: SearchDependencies
  ): Promise<SearchResponse[]> {
    const { results, errors } = await runWorkerPool(
      queries,
      (query) => searchWithCache({ query, maxResults, depth }, deps),
      {
        concurrency: this.searchConcurrency,
        signal: deps.signal,
        onProgress: ({ index, completed, total }) =>
          this.logger.verbose(`Search ${completed}/${total} finished: "${queries[index]}"`)
      }
    )
    const [thrown] = errors
    if (thrown) throw thrown.error
    if (deps.signal) checkpoint(deps.signal, 'analyzing')

    const responses: SearchResponse[] = []
    let firstError: ApiError | undefined
    for (const [index, result] of results.entries()) {
      if (!result) continue
      if (result.ok) {
        const { response, cacheHit } = result.value
        if (cacheHit) this.logger.verbose(`Search cache ${cacheHit} hit: "${response.query}"`)
        responses.push(response)
        continue
      }
      this.logger.warn(`Search failed for "${queries[index]}": ${result.error.message}`)
      firstError ??= result.error
    }

    if (responses.length === 0) {
      throw new PipelineStepError(
        'searching',
        firstError ?? { type: 'exhausted', message: 'No search queries to run' }
      )
    }
    return responses
  }

  private async generate(
    step: PipelineStep,
    request: GenerationRequest,
    deps: GenerationDependencies
  ): Promise<string> {
    return expectOk(await generateText(request, deps), step).text
  }

  private async streamReport(
    runId: string,
    topic: string,
    analysis: string,
    sources: readonly ResearchSource[],
    deps: GenerationDependencies
  ): Promise<{ text: string; provider: string }> {
    const streamed = expectOk(
      await streamText(
        {
          messages: reportMessages(topic, analysis, sources),
          maxTokens: DEFAULT_MAX_TOKENS,
          temperature: 0.5
        },
        { ...deps, sink: (_chunk, accumulated) => this.tracker.preview(runId, accumulated) }
      ),
      'generating'
    )

    if (streamed.status === 'cancelled') {
      throw new PipelineStepError('generating', {
        type: 'aborted',
        message: `Cancelled after ${streamed.chunkCount} chunk(s) of the report`
      })
    }
    if (streamed.status === 'failed') {
      throw new PipelineStepError(
        'generating',
        streamed.error ?? { type: 'network', message: 'Report stream failed' }
      )
    }
    return { text: streamed.text, provider: streamed.provider }
  }
}

/**
 * Run status tracking for polling callers.
 */

import { errorMessage, PipelineCancelledError, PipelineStepError } from '../errors'
import { type Logger, silentLogger } from '../logger'
import type { ApiError } from '../types'
import type {
  PipelineOutcome,
  PipelineStep,
  ProgressSink,
  RunState,
  RunStatus,
  StepLogEntry
} from './types'

/** Characters of streamed text kept as the preview (the tail end) */
export const PREVIEW_CHARS = 500

export const CAPACITY_MESSAGE =
  'Service temporarily unavailable due to high demand. Please try again in a few minutes.'

export interface RunFailure {
  readonly state: Extract<RunState, 'failed' | 'temporarily_unavailable' | 'cancelled'>
  readonly message: string
  readonly error: ApiError
}

function isCapacityError(error: ApiError): boolean {
  if (error.type === 'rate_limit' || error.type === 'quota') return true
  if (error.type !== 'exhausted') return false
  const failed = (error.attempts ?? []).filter((a) => a.outcome === 'failed')
  return (
    failed.length > 0 &&
    failed.every((a) => a.errorType === 'rate_limit' || a.errorType === 'quota')
  )
}

/** Status for a run that ended with `error`. */
export function describeFailure(error: unknown): RunFailure {
  if (error instanceof PipelineCancelledError) {
    return {
      state: 'cancelled',
      message: 'Research cancelled',
      error: { type: 'aborted', message: error.message }
    }
  }
  if (error instanceof PipelineStepError) {
    const apiError: ApiError = { ...error.apiError, message: error.message }
    if (error.apiError.type === 'aborted') {
      return { state: 'cancelled', message: 'Research cancelled', error: apiError }
    }
    if (isCapacityError(error.apiError)) {
      return { state: 'temporarily_unavailable', message: CAPACITY_MESSAGE, error: apiError }
    }
    return { state: 'failed', message: `Research failed: ${error.message}`, error: apiError }
  }
  const message = errorMessage(error)
  return {
    state: 'failed',
    message: `Research failed: ${message}`,
    error: { type: 'invalid_response', message }
  }
}

interface TrackedRun {
  runId: string
  topic: string
  language: string
  state: RunState
  step: PipelineStep
  progress: number
  message: string
  partialPreview: string
  stepsLog: StepLogEntry[]
  outcome: PipelineOutcome | null
  error: ApiError | undefined
  startedAt: number
  completedAt: number | undefined
  sink: ProgressSink | undefined
}

export class StatusTracker {
  private readonly runs = new Map<string, TrackedRun>()

  constructor(
    private readonly logger: Logger = silentLogger,
    private readonly now: () => number = Date.now
  ) {}

  create(runId: string, topic: string, language: string, sink?: ProgressSink): void {
    this.runs.set(runId, {
      runId,
      topic,
      language,
      state: 'queued',
      step: 'queued',
      progress: 0,
      message: 'Waiting to start...',
      partialPreview: '',
      stepsLog: [],
      outcome: null,
      error: undefined,
      startedAt: this.now(),
      completedAt: undefined,
      sink
    })
  }

  /** Enter a step. Every call is recorded in the steps log. */
  step(runId: string, step: PipelineStep, progress: number, message: string): void {
    const run = this.runs.get(runId)
    if (!run) return
    run.state = step === 'queued' ? 'queued' : 'running'
    run.step = step
    run.progress = progress
    run.message = message
    run.stepsLog.push({ step, message, progress, at: this.now() })
    this.emit(run)
  }

  /** Update the streamed preview without adding to the steps log. */
  preview(runId: string, text: string): void {
    const run = this.runs.get(runId)
    if (!run) return
    run.partialPreview = text.slice(-PREVIEW_CHARS)
    this.emit(run, text)
  }

  complete(runId: string, outcome: PipelineOutcome): void {
    const run = this.runs.get(runId)
    if (!run) return
    const message =
      outcome.source === 'topic_cache'
        ? 'Found a recent result for this topic'
        : 'Research complete!'
    run.outcome = outcome
    run.partialPreview = outcome.run.summary.slice(0, PREVIEW_CHARS)
    this.finish(run, 'completed', 'completed', message)
  }

  fail(runId: string, failure: RunFailure): void {
    const run = this.runs.get(runId)
    if (!run) return
    run.error = failure.error
    const step = failure.state === 'cancelled' ? 'cancelled' : 'failed'
    this.finish(run, failure.state, step, failure.message)
  }

  get(runId: string): RunStatus | null {
    const run = this.runs.get(runId)
    if (!run) return null
    return {
      runId: run.runId,
      topic: run.topic,
      language: run.language,
      state: run.state,
      step: run.step,
      progress: run.progress,
      message: run.message,
      partialPreview: run.partialPreview,
      stepsLog: [...run.stepsLog],
      finalResult: run.outcome?.run ?? null,
      reference: run.outcome?.reference ?? null,
      source: run.outcome?.source ?? null,
      ...(run.error && { error: run.error }),
      startedAt: run.startedAt,
      ...(run.completedAt !== undefined && { completedAt: run.completedAt }),
      processingTimeMs: (run.completedAt ?? this.now()) - run.startedAt
    }
  }

  isFinished(runId: string): boolean {
    const state = this.runs.get(runId)?.state
    return state !== undefined && state !== 'queued' && state !== 'running'
  }

  private finish(run: TrackedRun, state: RunState, step: PipelineStep, message: string): void {
    const progress = state === 'completed' ? 100 : run.progress
    run.state = state
    run.step = step
    run.progress = progress
    run.message = message
    run.completedAt = this.now()
    run.stepsLog.push({ step, message, progress, at: run.completedAt })
    this.emit(run)
  }

  private emit(run: TrackedRun, partialText?: string): void {
    if (!run.sink) return
    try {
      run.sink({
        step: run.step,
        message: run.message,
        progress: run.progress,
        ...(partialText !== undefined && { partialText })
      })
    } catch (error) {
      this.logger.warn(`Progress sink failed: ${errorMessage(error)}`)
    }
  }
}

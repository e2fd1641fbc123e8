import { describe, expect, it, vi } from 'vitest'
import { PipelineCancelledError, PipelineStepError } from '../errors'
import { createTestLogger } from '../test-support'
import { CAPACITY_MESSAGE, describeFailure, PREVIEW_CHARS, StatusTracker } from './status'
import type { PipelineOutcome, StoredRun } from './types'

const RUN: StoredRun = {
  topic: 'tidal power',
  language: 'en',
  depth: 'basic',
  summary: 'Tides are steady.',
  report: 'Report',
  analysis: 'Analysis',
  queries: ['tides'],
  sources: [],
  provider: 'openai',
  createdAt: 2_000,
  processingTimeMs: 1_000
}

function createTracker() {
  const clock = { now: 1_000 }
  const logger = createTestLogger()
  const tracker = new StatusTracker(logger, () => clock.now)
  return { tracker, clock, logger }
}

describe('describeFailure', () => {
  it('gives the capacity message for rate limits and quota', () => {
    const failure = describeFailure(
      new PipelineStepError('planning', { type: 'quota', message: 'Quota exhausted: plan limit' })
    )

    expect(failure).toEqual({
      state: 'temporarily_unavailable',
      message: CAPACITY_MESSAGE,
      error: { type: 'quota', message: 'planning failed: Quota exhausted: plan limit' }
    })
  })

  it('treats exhaustion as capacity only when every failure was a rate limit or quota', () => {
    const exhausted = (errorTypes: Array<'rate_limit' | 'quota' | 'auth'>) =>
      new PipelineStepError('searching', {
        type: 'exhausted',
        message: 'All providers failed',
        attempts: errorTypes.map((errorType) => ({
          provider: errorType,
          outcome: 'failed' as const,
          errorType,
          message: errorType,
          durationMs: 1
        }))
      })

    expect(describeFailure(exhausted(['rate_limit', 'quota'])).state).toBe(
      'temporarily_unavailable'
    )
    expect(describeFailure(exhausted(['rate_limit', 'auth'])).state).toBe('failed')
    expect(describeFailure(exhausted([])).state).toBe('failed')
  })

  it('prefixes other step failures', () => {
    const failure = describeFailure(
      new PipelineStepError('analyzing', { type: 'network', message: 'API error 500: boom' })
    )

    expect(failure.state).toBe('failed')
    expect(failure.message).toBe('Research failed: analyzing failed: API error 500: boom')
  })

  it('reports cancellation', () => {
    expect(describeFailure(new PipelineCancelledError('searching'))).toEqual({
      state: 'cancelled',
      message: 'Research cancelled',
      error: { type: 'aborted', message: 'Cancelled before searching' }
    })
    expect(
      describeFailure(new PipelineStepError('generating', { type: 'aborted', message: 'stop' }))
        .state
    ).toBe('cancelled')
  })

  it('wraps unexpected errors', () => {
    expect(describeFailure(new Error('disk full')).message).toBe('Research failed: disk full')
  })
})

describe('StatusTracker', () => {
  it('starts queued', () => {
    const { tracker } = createTracker()
    tracker.create('run-1', 'tidal power', 'en')

    expect(tracker.get('run-1')).toMatchObject({
      state: 'queued',
      step: 'queued',
      progress: 0,
      finalResult: null,
      stepsLog: []
    })
  })

  it('logs every step and reports it to the sink', () => {
    const { tracker, clock } = createTracker()
    const sink = vi.fn()
    tracker.create('run-1', 'tidal power', 'en', sink)

    clock.now = 1_500
    tracker.step('run-1', 'planning', 10, 'Planning search queries...')

    expect(tracker.get('run-1')?.stepsLog).toEqual([
      { step: 'planning', message: 'Planning search queries...', progress: 10, at: 1_500 }
    ])
    expect(sink).toHaveBeenCalledWith({
      step: 'planning',
      message: 'Planning search queries...',
      progress: 10
    })
  })

  it('keeps the tail of streamed text as the preview, outside the steps log', () => {
    const { tracker } = createTracker()
    const sink = vi.fn()
    tracker.create('run-1', 'tidal power', 'en', sink)
    tracker.step('run-1', 'generating', 60, 'Writing the report...')
    const text = `${'a'.repeat(100)}${'b'.repeat(PREVIEW_CHARS)}`

    tracker.preview('run-1', text)

    const status = tracker.get('run-1')
    expect(status?.partialPreview).toBe('b'.repeat(PREVIEW_CHARS))
    expect(status?.stepsLog).toHaveLength(1)
    expect(sink).toHaveBeenLastCalledWith(expect.objectContaining({ partialText: text }))
  })

  it('completes with the final result and processing time', () => {
    const { tracker, clock } = createTracker()
    tracker.create('run-1', 'tidal power', 'en')
    const outcome: PipelineOutcome = {
      runId: 'run-1',
      reference: 'ref-1',
      source: 'fresh',
      run: RUN
    }

    clock.now = 4_000
    tracker.complete('run-1', outcome)

    expect(tracker.get('run-1')).toMatchObject({
      state: 'completed',
      step: 'completed',
      progress: 100,
      message: 'Research complete!',
      partialPreview: 'Tides are steady.',
      finalResult: RUN,
      reference: 'ref-1',
      source: 'fresh',
      completedAt: 4_000,
      processingTimeMs: 3_000
    })
    expect(tracker.isFinished('run-1')).toBe(true)
  })

  it('records failures', () => {
    const { tracker } = createTracker()
    tracker.create('run-1', 'tidal power', 'en')
    tracker.step('run-1', 'searching', 25, 'Searching...')

    tracker.fail('run-1', describeFailure(new PipelineCancelledError('analyzing')))

    expect(tracker.get('run-1')).toMatchObject({
      state: 'cancelled',
      step: 'cancelled',
      progress: 25,
      message: 'Research cancelled',
      error: { type: 'aborted', message: 'Cancelled before analyzing' }
    })
  })

  it('survives a throwing sink', () => {
    const { tracker, logger } = createTracker()
    tracker.create('run-1', 'tidal power', 'en', () => {
      throw new Error('closed')
    })

    tracker.step('run-1', 'planning', 10, 'Planning...')

    expect(tracker.get('run-1')?.step).toBe('planning')
    expect(logger.warn).toHaveBeenCalledWith('Progress sink failed: closed')
  })

  it('returns null for unknown runs', () => {
    expect(createTracker().tracker.get('missing')).toBeNull()
  })
})

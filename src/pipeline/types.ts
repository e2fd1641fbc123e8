/**
 * Research pipeline types.
 */

import type { UserKeys } from '../credentials'
import type { SearchDepth } from '../search'
import type { ApiError, Result } from '../types'

export type PipelineStep =
  | 'queued'
  | 'initializing'
  | 'waiting'
  | 'planning'
  | 'searching'
  | 'analyzing'
  | 'generating'
  | 'summarizing'
  | 'translating'
  | 'persisting'
  | 'completed'
  | 'failed'
  | 'cancelled'

export type RunState =
  | 'queued'
  | 'running'
  | 'completed'
  | 'failed'
  | 'temporarily_unavailable'
  | 'cancelled'

export interface ResearchParameters {
  readonly depth: SearchDepth
  /** Results per search query */
  readonly maxResults: number
  /** Search queries planned per run */
  readonly maxQueries: number
}

export const DEFAULT_RESEARCH_PARAMETERS: ResearchParameters = {
  depth: 'basic',
  maxResults: 5,
  maxQueries: 5
}

export interface ProgressEvent {
  readonly step: PipelineStep
  readonly message: string
  /** 0-100 */
  readonly progress: number
  /** Text generated so far by the step, while it streams */
  readonly partialText?: string | undefined
}

export type ProgressSink = (event: ProgressEvent) => void

export interface PipelineRequest {
  readonly topic: string
  readonly language?: string | undefined
  readonly parameters?: Partial<ResearchParameters> | undefined
  /** Skip the topic cache and research from scratch */
  readonly forceFresh?: boolean | undefined
  readonly userKeys?: UserKeys | undefined
  readonly onProgress?: ProgressSink | undefined
  readonly signal?: AbortSignal | undefined
}

export interface ResearchSource {
  readonly title: string
  readonly url: string
  readonly score: number
}

/** A finished run as handed to the RunStore. */
export interface StoredRun {
  readonly topic: string
  readonly language: string
  readonly depth: SearchDepth
  readonly summary: string
  readonly report: string
  readonly analysis: string
  readonly queries: readonly string[]
  readonly sources: readonly ResearchSource[]
  /** Candidate id of the provider that wrote the report */
  readonly provider: string | null
  readonly createdAt: number
  readonly processingTimeMs: number
  /** Reference of the run this one was translated from */
  readonly translatedFrom?: string | undefined
}

export interface RunStore {
  saveRun(run: StoredRun): Promise<string>
  loadRun(reference: string): Promise<StoredRun | null>
}

export interface Translator {
  translate(text: string, targetLanguage: string, signal?: AbortSignal): Promise<Result<string>>
}

export type PipelineSource = 'fresh' | 'topic_cache' | 'translated'

export interface PipelineOutcome {
  readonly runId: string
  readonly reference: string
  readonly source: PipelineSource
  readonly run: StoredRun
}

export interface StepLogEntry {
  readonly step: PipelineStep
  readonly message: string
  readonly progress: number
  readonly at: number
}

export interface RunStatus {
  readonly runId: string
  readonly topic: string
  readonly language: string
  readonly state: RunState
  readonly step: PipelineStep
  readonly progress: number
  readonly message: string
  readonly partialPreview: string
  readonly stepsLog: readonly StepLogEntry[]
  readonly finalResult: StoredRun | null
  readonly reference: string | null
  readonly source: PipelineSource | null
  readonly error?: ApiError | undefined
  readonly startedAt: number
  readonly completedAt?: number | undefined
  readonly processingTimeMs: number
}

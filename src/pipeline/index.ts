export {
  analysisMessages,
  collectSources,
  formatSourceMaterial,
  languageName,
  parseQueries,
  queryPlanMessages,
  reportMessages,
  summaryMessages,
  translationMessages
} from './prompts'
export {
  type CandidateFactory,
  DEFAULT_SEARCH_CONCURRENCY,
  defaultCandidateFactory,
  ResearchService,
  type ResearchServiceOptions,
  type StartedRun
} from './research-service'
export { DEFAULT_MAX_CONCURRENT_RUNS, RunQueue } from './run-queue'
export { FilesystemRunStore, isStoredRun, MemoryRunStore } from './run-store'
export {
  CAPACITY_MESSAGE,
  describeFailure,
  PREVIEW_CHARS,
  type RunFailure,
  StatusTracker
} from './status'
export { GenerationTranslator } from './translator'
export {
  DEFAULT_RESEARCH_PARAMETERS,
  type PipelineOutcome,
  type PipelineRequest,
  type PipelineSource,
  type PipelineStep,
  type ProgressEvent,
  type ProgressSink,
  type ResearchParameters,
  type ResearchSource,
  type RunState,
  type RunStatus,
  type RunStore,
  type StepLogEntry,
  type StoredRun,
  type Translator
} from './types'

/**
 * Error classes thrown across module boundaries.
 *
 * Provider calls return Result values; these are for the places where an
 * exception is the contract (storage failures, aborted pipeline steps).
 */

import type { ApiError } from './types/common'

/**
 * The cache's backing store could not be read or written.
 * Callers treat this as a cache miss and keep going.
 */
export class CacheUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'CacheUnavailableError'
  }
}

export class PipelineStepError extends Error {
  constructor(
    readonly step: string,
    readonly apiError: ApiError
  ) {
    super(`${step} failed: ${apiError.message}`)
    this.name = 'PipelineStepError'
  }
}

export class PipelineCancelledError extends Error {
  constructor(readonly step: string) {
    super(`Cancelled before ${step}`)
    this.name = 'PipelineCancelledError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

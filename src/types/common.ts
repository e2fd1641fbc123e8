/**
 * Common Types
 *
 * Shared types used across multiple modules: Result, ApiError, provider attempts.
 */

// Result Types
export type ApiErrorType =
  | 'rate_limit'
  | 'auth'
  | 'quota'
  | 'network'
  | 'timeout'
  | 'invalid_response'
  | 'invalid_request'
  | 'exhausted'
  | 'aborted'

/**
 * One entry in a fallback chain's history: which candidate was tried and what happened.
 */
export interface ProviderAttempt {
  readonly provider: string
  readonly outcome: 'skipped' | 'failed'
  readonly errorType?: ApiErrorType | undefined
  readonly message: string
  readonly durationMs: number
}

export interface ApiError {
  readonly type: ApiErrorType
  readonly message: string
  readonly retryAfter?: number | undefined
  /** Present when the error summarizes a fallback chain */
  readonly attempts?: readonly ProviderAttempt[] | undefined
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ApiError }

/**
 * Errors that mean the provider refuses every request with these credentials.
 * Retrying the same provider will not help.
 */
export function isRejectedError(error: ApiError): boolean {
  return error.type === 'auth' || error.type === 'quota'
}

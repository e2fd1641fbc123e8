export type { ApiError, ApiErrorType, ProviderAttempt, Result } from './common'
export { isRejectedError } from './common'

/**
 * Provider Registry
 *
 * Health records for every provider the fallback chain has touched, and the
 * circuit-breaker policy that decides when a provider is skipped.
 * State lives for the lifetime of the process.
 */

import { type Logger, silentLogger } from '../logger'
import { type ApiError, isRejectedError } from '../types'

export interface CircuitPolicy {
  /** Consecutive failures that open the circuit */
  readonly failureThreshold: number
  /** First open period; doubles with every further failure */
  readonly baseOpenMs: number
  readonly maxOpenMs: number
}

export const DEFAULT_CIRCUIT_POLICY: CircuitPolicy = {
  failureThreshold: 3,
  baseOpenMs: 30_000,
  maxOpenMs: 5 * 60_000
}

export interface ProviderRecord {
  readonly name: string
  readonly consecutiveFailures: number
  /** Epoch ms until which the provider is skipped; 0 when closed */
  readonly circuitOpenUntil: number
  /** How many times the circuit has opened */
  readonly openCount: number
  readonly lastError?: ApiError | undefined
  readonly lastSuccessAt?: number | undefined
}

export interface ProviderRegistryOptions {
  readonly policy?: Partial<CircuitPolicy> | undefined
  readonly logger?: Logger | undefined
  readonly now?: (() => number) | undefined
}

export class ProviderRegistry {
  private readonly records = new Map<string, ProviderRecord>()
  private readonly policy: CircuitPolicy
  private readonly logger: Logger
  private readonly now: () => number

  constructor(options: ProviderRegistryOptions = {}) {
    this.policy = { ...DEFAULT_CIRCUIT_POLICY, ...options.policy }
    this.logger = options.logger ?? silentLogger
    this.now = options.now ?? Date.now
  }

  get(name: string): ProviderRecord {
    return (
      this.records.get(name) ?? {
        name,
        consecutiveFailures: 0,
        circuitOpenUntil: 0,
        openCount: 0
      }
    )
  }

  /**
   * True while the open period lasts. Once it has passed, the next call is
   * let through as a trial; its failure reopens the circuit for longer.
   */
  isOpen(name: string): boolean {
    return this.now() < this.get(name).circuitOpenUntil
  }

  recordSuccess(name: string): void {
    const record = this.get(name)
    if (record.circuitOpenUntil > 0) {
      this.logger.verbose(`Circuit for ${name} closed`)
    }
    this.records.set(name, {
      ...record,
      consecutiveFailures: 0,
      circuitOpenUntil: 0,
      lastSuccessAt: this.now()
    })
  }

  recordFailure(name: string, error: ApiError): void {
    const record = this.get(name)
    if (error.type === 'invalid_request') {
      // Only this request was refused; the provider itself is healthy
      this.records.set(name, { ...record, lastError: error })
      return
    }
    const consecutiveFailures = record.consecutiveFailures + 1
    const { failureThreshold, baseOpenMs, maxOpenMs } = this.policy

    let openMs = 0
    if (isRejectedError(error)) {
      openMs = maxOpenMs
    } else if (consecutiveFailures >= failureThreshold) {
      openMs = Math.min(baseOpenMs * 2 ** (consecutiveFailures - failureThreshold), maxOpenMs)
    }

    const next: ProviderRecord = {
      ...record,
      consecutiveFailures,
      lastError: error,
      circuitOpenUntil: openMs > 0 ? this.now() + openMs : record.circuitOpenUntil,
      openCount: openMs > 0 ? record.openCount + 1 : record.openCount
    }
    this.records.set(name, next)

    if (openMs > 0) {
      this.logger.warn(
        `Circuit for ${name} opened for ${Math.round(openMs / 1000)}s after ${consecutiveFailures} failure(s): ${error.type}`
      )
    }
  }

  snapshot(): ProviderRecord[] {
    return [...this.records.values()]
  }

  reset(name?: string): void {
    if (name === undefined) {
      this.records.clear()
    } else {
      this.records.delete(name)
    }
  }
}

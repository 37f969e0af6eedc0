import { logger } from '@infra/logging'
import type { CircuitState } from '@shared/interfaces/common'

export interface CircuitBreakerOptions {
  failureThreshold: number
  recoveryTimeoutMs: number
  halfOpenMaxCalls: number
  now?: () => number
}

/**
 * Stops calling the geolocation providers after repeated exhausted lookups, then lets a
 * limited number of trial lookups through once the recovery timeout has passed.
 */
export class CircuitBreaker {
  private _state: CircuitState = 'closed'
  private failureCount = 0
  private successCount = 0
  private halfOpenCalls = 0
  private lastFailureAt: number | null = null
  private readonly now: () => number

  constructor(private readonly options: CircuitBreakerOptions) {
    this.now = options.now ?? Date.now
  }

  get state(): CircuitState {
    return this._state
  }

  canExecute(): boolean {
    if (this._state === 'closed') return true

    if (this._state === 'open') {
      const elapsed = this.now() - (this.lastFailureAt ?? 0)
      if (elapsed < this.options.recoveryTimeoutMs) return false

      this._state = 'half-open'
      this.halfOpenCalls = 1
      this.successCount = 0
      logger.info('Circuit breaker entering half-open state')
      return true
    }

    if (this.halfOpenCalls < this.options.halfOpenMaxCalls) {
      this.halfOpenCalls += 1
      return true
    }
    return false
  }

  recordSuccess(): void {
    if (this._state === 'half-open') {
      this.successCount += 1
      if (this.successCount >= this.options.halfOpenMaxCalls) {
        this.reset()
        logger.info('Circuit breaker closed')
      }
      return
    }

    this.failureCount = 0
  }

  recordFailure(): void {
    this.failureCount += 1
    this.lastFailureAt = this.now()

    if (this._state === 'half-open') {
      this._state = 'open'
      logger.warn('Circuit breaker opened after a failed trial lookup')
      return
    }

    if (this._state === 'closed' && this.failureCount >= this.options.failureThreshold) {
      this._state = 'open'
      logger.warn(`Circuit breaker opened (${this.failureCount} consecutive failures)`)
    }
  }

  reset(): void {
    this._state = 'closed'
    this.failureCount = 0
    this.successCount = 0
    this.halfOpenCalls = 0
    this.lastFailureAt = null
  }
}

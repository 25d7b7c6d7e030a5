import { logger } from './logger'
import { CircuitOpenError, ConfigError, getErrorMessage, getErrorStatus } from './TransportError'

/**
 * Circuit breaker states
 */
export enum CircuitState {
  CLOSED = 'CLOSED',      // Normal operation
  OPEN = 'OPEN',          // Failing fast
  HALF_OPEN = 'HALF_OPEN' // One probe decides recovery
}

/**
 * Which failures count towards opening the circuit
 */
export enum FailurePolicy {
  ALL_EXCEPTIONS = 'ALL_EXCEPTIONS',
  SERVER_ERRORS_ONLY = 'SERVER_ERRORS_ONLY',
  EXCLUDE_CLIENT_ERRORS = 'EXCLUDE_CLIENT_ERRORS',
  CUSTOM = 'CUSTOM',
}

export type FailurePredicate = (error: unknown) => boolean

/**
 * Circuit breaker configuration
 */
export interface CircuitBreakerOptions {
  /** Consecutive countable failures before the circuit opens */
  failureThreshold: number
  /** Time in ms to stay OPEN before a probe is let through */
  resetTimeoutMs: number
  /** Quiet period in ms after which the failure count is forgotten (0 disables) */
  failureDecayMs: number
  failurePolicy: FailurePolicy
  /** Required with FailurePolicy.CUSTOM */
  failurePredicate?: FailurePredicate
  now?: () => number
}

export const DEFAULT_CIRCUIT_BREAKER_OPTIONS = {
  failureThreshold: 5,
  resetTimeoutMs: 30000,
  failureDecayMs: 60000,
  failurePolicy: FailurePolicy.ALL_EXCEPTIONS,
} as const

interface BreakerSnapshot {
  readonly phase: CircuitState
  readonly consecutiveFailures: number
  readonly lastFailureAt: number
  readonly lastDecayAt: number
  readonly probeInFlight: boolean
  /** Bumped by reset(); a probe only settles the generation that admitted it */
  readonly generation: number
}

export interface CircuitBreakerStats {
  state: CircuitState
  failureCount: number
  failureThreshold: number
  resetTimeoutMs: number
  failureDecayMs: number
  failurePolicy: FailurePolicy
  totalRequests: number
  successfulRequests: number
  failedRequests: number
  rejectedRequests: number
  circuitTrips: number
  halfOpenTestInProgress: boolean
  statusCodes: Record<number, number>
  millisSinceLastFailure?: number
}

type Admitted = { admitted: true; probe: boolean; generation: number }

type Admission =
  | Admitted
  | { admitted: false; rejection: CircuitOpenError }

const INITIAL_SNAPSHOT: BreakerSnapshot = Object.freeze({
  phase: CircuitState.CLOSED,
  consecutiveFailures: 0,
  lastFailureAt: 0,
  lastDecayAt: 0,
  probeInFlight: false,
  generation: 0,
})

export function resolveFailurePredicate(policy: FailurePolicy, custom?: FailurePredicate): FailurePredicate {
  switch (policy) {
    case FailurePolicy.SERVER_ERRORS_ONLY:
      return (error) => {
        const status = getErrorStatus(error) ?? 0
        return status >= 500 && status <= 599
      }
    case FailurePolicy.EXCLUDE_CLIENT_ERRORS:
      return (error) => {
        const status = getErrorStatus(error) ?? 0
        return status < 400 || status >= 500
      }
    case FailurePolicy.CUSTOM:
      if (!custom) {
        throw new ConfigError('Custom failure policy requires a failure predicate')
      }
      return custom
    case FailurePolicy.ALL_EXCEPTIONS:
      return () => true
  }
}

/**
 * Circuit breaker state machine shared by every caller of one client.
 *
 * All state lives in one immutable snapshot that is only ever replaced through
 * compareAndSet. A transition decided on a stale read loses and re-reads.
 * Awaiting the wrapped call is the only suspension point.
 */
export class CircuitBreaker {
  private snapshot: BreakerSnapshot = INITIAL_SNAPSHOT
  private readonly options: Required<Omit<CircuitBreakerOptions, 'failurePredicate'>>
  private readonly isCountable: FailurePredicate

  private totalRequests = 0
  private successfulRequests = 0
  private failedRequests = 0
  private rejectedRequests = 0
  private circuitTrips = 0
  private readonly statusCodes = new Map<number, number>()

  constructor(options: Partial<CircuitBreakerOptions> = {}) {
    this.options = {
      failureThreshold: options.failureThreshold ?? DEFAULT_CIRCUIT_BREAKER_OPTIONS.failureThreshold,
      resetTimeoutMs: options.resetTimeoutMs ?? DEFAULT_CIRCUIT_BREAKER_OPTIONS.resetTimeoutMs,
      failureDecayMs: options.failureDecayMs ?? DEFAULT_CIRCUIT_BREAKER_OPTIONS.failureDecayMs,
      failurePolicy: options.failurePolicy ?? (options.failurePredicate ? FailurePolicy.CUSTOM : DEFAULT_CIRCUIT_BREAKER_OPTIONS.failurePolicy),
      now: options.now ?? Date.now,
    }

    if (!Number.isInteger(this.options.failureThreshold) || this.options.failureThreshold < 1) {
      throw new ConfigError('Failure threshold must be at least 1')
    }
    if (!(this.options.resetTimeoutMs >= 0)) {
      throw new ConfigError('Reset timeout must be non-negative')
    }
    if (!(this.options.failureDecayMs >= 0)) {
      throw new ConfigError('Failure decay time must be non-negative')
    }

    const predicate = resolveFailurePredicate(this.options.failurePolicy, options.failurePredicate)
    // A misconfigured request says nothing about the backend
    this.isCountable = (error) => !(error instanceof ConfigError) && predicate(error)
  }

  /**
   * Execute a function with circuit breaker protection
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.totalRequests++

    const admission = this.admit()
    if (!admission.admitted) {
      this.rejectedRequests++
      throw admission.rejection
    }

    try {
      const result = await fn()
      this.successfulRequests++
      this.onSuccess(admission)
      return result
    } catch (error) {
      this.failedRequests++
      this.recordStatus(error)
      throw this.onFailure(error, admission)
    } finally {
      if (admission.probe) {
        this.releaseProbe(admission.generation)
      }
    }
  }

  /**
   * Run a call outside phase gating and let its outcome set the phase.
   * Success closes the circuit; a failure while HALF_OPEN reopens it.
   */
  async healthCheck(fn: () => Promise<unknown>): Promise<boolean> {
    try {
      await fn()
      this.transition((current) => ({
        ...current,
        phase: CircuitState.CLOSED,
        consecutiveFailures: 0,
      }))
      logger.info('Health check succeeded, circuit CLOSED')
      return true
    } catch (error) {
      const reopened = this.transition((current) => current.phase === CircuitState.HALF_OPEN
        ? { ...current, phase: CircuitState.OPEN, lastFailureAt: this.options.now() }
        : undefined)
      logger.warn('Health check failed', {
        error: getErrorMessage(error),
        state: reopened ? CircuitState.OPEN : this.snapshot.phase,
      })
      return false
    }
  }

  /**
   * Get current circuit breaker state
   */
  getState(): CircuitState {
    return this.snapshot.phase
  }

  getFailureCount(): number {
    return this.snapshot.consecutiveFailures
  }

  getStats(): CircuitBreakerStats {
    const current = this.snapshot
    return {
      state: current.phase,
      failureCount: current.consecutiveFailures,
      failureThreshold: this.options.failureThreshold,
      resetTimeoutMs: this.options.resetTimeoutMs,
      failureDecayMs: this.options.failureDecayMs,
      failurePolicy: this.options.failurePolicy,
      totalRequests: this.totalRequests,
      successfulRequests: this.successfulRequests,
      failedRequests: this.failedRequests,
      rejectedRequests: this.rejectedRequests,
      circuitTrips: this.circuitTrips,
      halfOpenTestInProgress: current.probeInFlight,
      statusCodes: Object.fromEntries(this.statusCodes),
      millisSinceLastFailure: current.lastFailureAt > 0 ? this.options.now() - current.lastFailureAt : undefined,
    }
  }

  /**
   * Manually reset the circuit breaker
   */
  reset(): void {
    this.transition((current) => ({ ...INITIAL_SNAPSHOT, generation: current.generation + 1 }))
    logger.info('Circuit breaker manually reset to CLOSED')
  }

  private compareAndSet(expected: BreakerSnapshot, next: BreakerSnapshot): boolean {
    if (this.snapshot !== expected) {
      return false
    }
    this.snapshot = Object.freeze(next)
    return true
  }

  /**
   * Apply `update` to the current snapshot until the swap succeeds.
   * Returns false when `update` declines the transition.
   */
  private transition(update: (current: BreakerSnapshot) => BreakerSnapshot | undefined): boolean {
    for (;;) {
      const current = this.snapshot
      const next = update(current)
      if (!next) return false
      if (this.compareAndSet(current, next)) return true
    }
  }

  private admit(): Admission {
    for (;;) {
      const now = this.options.now()
      const current = this.snapshot

      if (current.phase === CircuitState.CLOSED) {
        if (this.shouldDecay(current, now)) {
          if (this.compareAndSet(current, { ...current, consecutiveFailures: 0, lastDecayAt: now })) {
            logger.debug('Circuit breaker failure count decayed', { failures: current.consecutiveFailures })
          }
          continue
        }
        return { admitted: true, probe: false, generation: current.generation }
      }

      if (current.phase === CircuitState.OPEN) {
        const elapsed = now - current.lastFailureAt
        if (elapsed < this.options.resetTimeoutMs) {
          return { admitted: false, rejection: this.rejection(now, current) }
        }
        if (this.compareAndSet(current, { ...current, phase: CircuitState.HALF_OPEN, probeInFlight: true })) {
          logger.info('Circuit breaker transitioning to HALF_OPEN for recovery attempt', { elapsedMs: elapsed })
          return { admitted: true, probe: true, generation: current.generation }
        }
        continue
      }

      if (current.probeInFlight) {
        return { admitted: false, rejection: this.rejection(now, current) }
      }
      if (this.compareAndSet(current, { ...current, probeInFlight: true })) {
        return { admitted: true, probe: true, generation: current.generation }
      }
    }
  }

  private shouldDecay(current: BreakerSnapshot, now: number): boolean {
    return this.options.failureDecayMs > 0 &&
      current.consecutiveFailures > 0 &&
      now - current.lastDecayAt >= this.options.failureDecayMs
  }

  private rejection(now: number, current: BreakerSnapshot): CircuitOpenError {
    return new CircuitOpenError('Circuit breaker is open', {
      millisSinceLastFailure: now - current.lastFailureAt,
      resetTimeoutMs: this.options.resetTimeoutMs,
    })
  }

  private onSuccess(admission: Admitted): void {
    if (!admission.probe) return

    const closed = this.transition((current) => this.settles(current, admission.generation)
      ? { ...current, phase: CircuitState.CLOSED, consecutiveFailures: 0, probeInFlight: false }
      : undefined)
    if (closed) {
      logger.info('Circuit breaker transitioned to CLOSED (service recovered)')
    }
  }

  /**
   * Record a failure and return the error the caller should see
   */
  private onFailure(error: unknown, admission: Admitted): unknown {
    if (!this.isCountable(error)) {
      return error
    }

    if (admission.probe) {
      const reopened = this.transition((current) => this.settles(current, admission.generation)
        ? { ...current, phase: CircuitState.OPEN, lastFailureAt: this.options.now(), probeInFlight: false }
        : undefined)
      if (reopened) {
        logger.warn('Circuit breaker probe failed, circuit OPEN again', { error: getErrorMessage(error) })
      }
      return error
    }

    for (;;) {
      const now = this.options.now()
      const current = this.snapshot
      // Failures that finish after another caller opened the circuit, or after a reset, are not counted again
      if (current.phase !== CircuitState.CLOSED || current.generation !== admission.generation) {
        return error
      }

      const failures = current.consecutiveFailures + 1
      const lastDecayAt = current.consecutiveFailures === 0 ? now : current.lastDecayAt

      if (failures < this.options.failureThreshold) {
        if (this.compareAndSet(current, { ...current, consecutiveFailures: failures, lastDecayAt })) {
          logger.warn('Circuit breaker recorded failure', {
            failureCount: failures,
            failureThreshold: this.options.failureThreshold,
            error: getErrorMessage(error),
          })
          return error
        }
        continue
      }

      const opened: BreakerSnapshot = {
        ...current,
        phase: CircuitState.OPEN,
        consecutiveFailures: failures,
        lastFailureAt: now,
        lastDecayAt,
      }
      if (this.compareAndSet(current, opened)) {
        this.circuitTrips++
        logger.error('Circuit breaker OPEN - failing fast', {
          failureCount: failures,
          resetTimeoutMs: this.options.resetTimeoutMs,
          error: getErrorMessage(error),
        })
        return new CircuitOpenError(`Circuit opened due to failure: ${getErrorMessage(error)}`, {
          millisSinceLastFailure: 0,
          resetTimeoutMs: this.options.resetTimeoutMs,
          tripped: true,
          cause: error,
        })
      }
    }
  }

  private releaseProbe(generation: number): void {
    this.transition((current) => current.probeInFlight && current.generation === generation
      ? { ...current, probeInFlight: false }
      : undefined)
  }

  private settles(current: BreakerSnapshot, generation: number): boolean {
    return current.phase === CircuitState.HALF_OPEN && current.generation === generation
  }

  private recordStatus(error: unknown): void {
    const status = getErrorStatus(error)
    if (status !== undefined) {
      this.statusCodes.set(status, (this.statusCodes.get(status) ?? 0) + 1)
    }
  }
}

import type { Executor, RequestSpec } from '../types'
import { CircuitBreaker, type CircuitBreakerOptions, type CircuitBreakerStats, type CircuitState } from '../../utils/circuit-breaker'

/**
 * Executor decorator that adds the circuit breaker pattern
 * Prevents cascading failures by failing fast when the backend is down
 */
export class CircuitBreakerHttpClient implements Executor {
  private readonly circuitBreaker: CircuitBreaker

  constructor(
    private readonly inner: Executor,
    breaker: CircuitBreaker | Partial<CircuitBreakerOptions> = {}
  ) {
    this.circuitBreaker = breaker instanceof CircuitBreaker ? breaker : new CircuitBreaker(breaker)
  }

  async execute<T>(spec: RequestSpec<T>): Promise<T> {
    return this.circuitBreaker.execute(() => this.inner.execute(spec))
  }

  /**
   * Probe the backend directly, bypassing OPEN/HALF_OPEN gating
   */
  async performHealthCheck(spec: RequestSpec<unknown>): Promise<boolean> {
    return this.circuitBreaker.healthCheck(() => this.inner.execute(spec))
  }

  getState(): CircuitState {
    return this.circuitBreaker.getState()
  }

  getFailureCount(): number {
    return this.circuitBreaker.getFailureCount()
  }

  /**
   * Get circuit breaker metrics for monitoring
   */
  getCircuitBreakerStats(): CircuitBreakerStats {
    return this.circuitBreaker.getStats()
  }

  /**
   * Manually reset the circuit breaker
   */
  resetCircuitBreaker(): void {
    this.circuitBreaker.reset()
  }
}

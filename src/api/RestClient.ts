import type { Executor, ExecutorDecorator, RequestBody, RequestSpec } from '../http/types'
import type { HeaderMap } from '../http/headers'
import type { RequestInterceptor } from '../http/interceptors/types'
import type { AuthStrategy } from '../auth/AuthStrategy'
import { RequestBuilder } from '../http/RequestBuilder'
import { HttpClientFactory } from '../http/HttpClientFactory'
import { AsyncHttpClient } from '../http/AsyncHttpClient'
import { FluentHttpClient } from '../http/FluentHttpClient'
import type { CircuitBreakerHttpClient } from '../http/decorators/CircuitBreakerHttpClient'
import type { CircuitBreakerStats } from '../utils/circuit-breaker'
import { RequestOrchestrator } from './RequestOrchestrator'
import { loadConfig, type ClientConfig } from '../config'
import { logger, setLogLevel } from '../utils/logger'
import { getErrorInfo } from '../utils/TransportError'

export interface RestClientOptions {
  /** Defaults to loadConfig() */
  config?: ClientConfig
  auth?: AuthStrategy
  /** Replaces the fetch transport */
  transport?: Executor
  defaultHeaders?: HeaderMap
  interceptors?: RequestInterceptor[]
  decorators?: ExecutorDecorator[]
}

/**
 * Facade over the whole execution chain
 * Offers throwing, promise-pool and Result-based calling styles over one shared breaker
 *
 * @example
 * const client = new RestClient({
 *   config: { ...defaultConfig(), baseUrl: 'https://api.example.com' },
 *   auth: new BearerTokenStrategy('test-token'),
 * })
 * const user = await client.get<User>('/users/1')
 */
export class RestClient implements Executor {
  readonly config: ClientConfig
  private readonly orchestrator: RequestOrchestrator
  private readonly circuitBreaker?: CircuitBreakerHttpClient
  private readonly asyncClient: AsyncHttpClient
  private readonly fluentClient: FluentHttpClient

  constructor(options: RestClientOptions = {}) {
    this.config = options.config ?? loadConfig()
    if (this.config.logLevel) {
      setLogLevel(this.config.logLevel)
    }

    const builder = HttpClientFactory.fromConfig(this.config).withLogging(this.config.logging.enabled)
    if (options.transport) {
      builder.withTransport(options.transport)
    }
    for (const interceptor of options.interceptors ?? []) {
      builder.withInterceptor(interceptor)
    }
    for (const decorator of options.decorators ?? []) {
      builder.withCustomDecorator(decorator)
    }

    const { executor, circuitBreaker } = builder.compose()
    this.circuitBreaker = circuitBreaker

    this.orchestrator = new RequestOrchestrator(executor, options.auth, {
      baseUrl: this.config.baseUrl,
      defaultHeaders: options.defaultHeaders,
      maxAuthRetries: this.config.authRetry.maxRetries,
      retryOnAuthFailure: this.config.authRetry.enabled,
      authRetryDelayMs: this.config.authRetry.delayMs,
      timingEnabled: this.config.logging.timingEnabled,
      loggingEnabled: this.config.logging.enabled,
      logRequestBody: this.config.logging.logRequestBody,
    })

    this.asyncClient = new AsyncHttpClient(this.orchestrator, this.config.asyncPoolSize)
    this.fluentClient = new FluentHttpClient(this.orchestrator, this.config.baseUrl)
  }

  execute<T>(spec: RequestSpec<T>): Promise<T> {
    return this.orchestrator.execute(spec)
  }

  get<T>(endpoint: string, queryParams: Record<string, string> = {}): Promise<T> {
    return this.execute(RequestBuilder.get<T>(endpoint).queryParams(queryParams).build())
  }

  post<T>(endpoint: string, body?: RequestBody): Promise<T> {
    const builder = RequestBuilder.post<T>(endpoint)
    return this.execute((body === undefined ? builder : builder.body(body)).build())
  }

  put<T>(endpoint: string, body?: RequestBody): Promise<T> {
    const builder = RequestBuilder.put<T>(endpoint)
    return this.execute((body === undefined ? builder : builder.body(body)).build())
  }

  patch<T>(endpoint: string, body?: RequestBody): Promise<T> {
    const builder = RequestBuilder.patch<T>(endpoint)
    return this.execute((body === undefined ? builder : builder.body(body)).build())
  }

  delete<T>(endpoint: string): Promise<T> {
    return this.execute(RequestBuilder.delete<T>(endpoint).build())
  }

  /**
   * Calls scheduled on the bounded worker pool
   */
  async(): AsyncHttpClient {
    return this.asyncClient
  }

  /**
   * Calls that resolve to Result values instead of rejecting
   */
  fluent(): FluentHttpClient {
    return this.fluentClient
  }

  /**
   * Undefined when the circuit breaker is disabled
   */
  getCircuitBreakerStats(): CircuitBreakerStats | undefined {
    return this.circuitBreaker?.getCircuitBreakerStats()
  }

  resetCircuitBreaker(): void {
    this.circuitBreaker?.resetCircuitBreaker()
  }

  /**
   * Probe `endpoint` directly. With a breaker, its outcome sets the circuit state.
   */
  async performHealthCheck(endpoint: string = '/'): Promise<boolean> {
    const spec = this.orchestrator.applyHeaders(RequestBuilder.get<unknown>(endpoint).responseType('void').build())
    if (this.circuitBreaker) {
      return this.circuitBreaker.performHealthCheck(spec)
    }

    try {
      await this.orchestrator.execute(spec)
      return true
    } catch (error: unknown) {
      logger.warn('Health check failed', { endpoint, ...getErrorInfo(error) })
      return false
    }
  }

  /**
   * Drain the async worker pool. The throwing and Result APIs keep working.
   */
  shutdown(): Promise<void> {
    return this.asyncClient.shutdown()
  }
}

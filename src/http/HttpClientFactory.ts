import type { Executor, ExecutorDecorator } from './types'
import type { HeaderMap } from './headers'
import type { RequestInterceptor } from './interceptors/types'
import { FetchHttpClient } from './FetchHttpClient'
import { FluentHttpClient } from './FluentHttpClient'
import { AsyncHttpClient, DEFAULT_ASYNC_POOL_SIZE } from './AsyncHttpClient'
import { InterceptingHttpClient, DEFAULT_MAX_RETRIES } from './decorators/InterceptingHttpClient'
import { CircuitBreakerHttpClient } from './decorators/CircuitBreakerHttpClient'
import { LoggingHttpClient } from './decorators/LoggingHttpClient'
import { RetryInterceptor, type RetryOptions } from './interceptors/RetryInterceptor'
import { FailurePolicy, type CircuitBreakerOptions, type FailurePredicate } from '../utils/circuit-breaker'
import type { ClientConfig } from '../config'

/**
 * Fully decorated executor plus a handle on its breaker, when one was added
 */
export interface ComposedClient {
  executor: Executor
  circuitBreaker?: CircuitBreakerHttpClient
}

interface TransportLogging {
  logRequestBody: boolean
  logResponseBody: boolean
  maxLoggedBodyLength: number
}

/**
 * Factory for creating HTTP clients with decorator chain
 * Composes multiple decorators to add resilience features
 */
export class HttpClientFactory {
  static builder(baseUrl: string = ''): HttpClientBuilder {
    return new HttpClientBuilder(baseUrl)
  }

  static fromConfig(config: ClientConfig): HttpClientBuilder {
    return new HttpClientBuilder(config.baseUrl).withConfig(config)
  }

  /**
   * Create a resilient client with the full decorator chain:
   * LoggingHttpClient → CircuitBreakerHttpClient → InterceptingHttpClient → FetchHttpClient
   */
  static createResilientClient(config: ClientConfig): Executor {
    return HttpClientFactory.fromConfig(config).withLogging().build()
  }
}

/**
 * Step-by-step chain assembly. Layers, innermost first:
 * transport, custom decorators, interceptors, circuit breaker, logging.
 */
export class HttpClientBuilder {
  private transport?: Executor
  private defaultHeaders: HeaderMap = {}
  private timeoutMs = 30000
  private transportLogging: TransportLogging = {
    logRequestBody: false,
    logResponseBody: false,
    maxLoggedBodyLength: 4000,
  }
  private breakerOptions?: Partial<CircuitBreakerOptions>
  private retryOptions?: Partial<RetryOptions>
  private readonly interceptors: RequestInterceptor[] = []
  private maxRetries = DEFAULT_MAX_RETRIES
  private maxRetriesExplicit = false
  private readonly decorators: ExecutorDecorator[] = []
  private logging = false
  private asyncPoolSize = DEFAULT_ASYNC_POOL_SIZE

  constructor(private baseUrl: string = '') {}

  /**
   * Apply every transport, breaker, retry and logging setting from a loaded config
   */
  withConfig(config: ClientConfig): this {
    this.baseUrl = config.baseUrl
    this.timeoutMs = config.timeoutMs
    this.asyncPoolSize = config.asyncPoolSize
    this.transportLogging = {
      logRequestBody: config.logging.logRequestBody,
      logResponseBody: config.logging.logResponseBody,
      maxLoggedBodyLength: config.logging.maxLoggedBodyLength,
    }

    const { enabled: breakerEnabled, ...breaker } = config.circuitBreaker
    this.breakerOptions = breakerEnabled ? { ...this.breakerOptions, ...breaker } : undefined

    const { enabled: retryEnabled, ...retry } = config.retry
    this.retryOptions = retryEnabled ? { ...this.retryOptions, ...retry } : undefined
    if (retryEnabled) {
      this.maxRetries = retry.maxRetries
    }

    return this
  }

  /**
   * Replace the fetch transport with any executor
   */
  withTransport(transport: Executor): this {
    this.transport = transport
    return this
  }

  /**
   * Headers the built-in fetch transport sends with every request
   */
  withDefaultHeaders(headers: HeaderMap): this {
    this.defaultHeaders = { ...this.defaultHeaders, ...headers }
    return this
  }

  withTimeout(timeoutMs: number): this {
    this.timeoutMs = timeoutMs
    return this
  }

  withCircuitBreaker(options: Partial<CircuitBreakerOptions> = {}): this {
    this.breakerOptions = { ...this.breakerOptions, ...options }
    return this
  }

  /**
   * Enables the breaker if needed and makes `predicate` decide what counts as a failure
   */
  withFailurePredicate(predicate: FailurePredicate): this {
    this.breakerOptions = {
      ...this.breakerOptions,
      failurePolicy: FailurePolicy.CUSTOM,
      failurePredicate: predicate,
    }
    return this
  }

  /**
   * A larger `maxRetries` also raises the global ceiling unless withMaxRetries set it
   */
  withRetry(options: Partial<RetryOptions> = {}): this {
    this.retryOptions = { ...this.retryOptions, ...options }
    if (options.maxRetries !== undefined && !this.maxRetriesExplicit) {
      this.maxRetries = Math.max(this.maxRetries, options.maxRetries)
    }
    return this
  }

  withInterceptor(interceptor: RequestInterceptor): this {
    this.interceptors.push(interceptor)
    return this
  }

  /**
   * Global retry ceiling across all interceptors
   */
  withMaxRetries(maxRetries: number): this {
    this.maxRetries = maxRetries
    this.maxRetriesExplicit = true
    return this
  }

  /**
   * Wrap the transport; decorators added first sit closest to it
   */
  withCustomDecorator(decorator: ExecutorDecorator): this {
    this.decorators.push(decorator)
    return this
  }

  withLogging(enabled: boolean = true): this {
    this.logging = enabled
    return this
  }

  compose(): ComposedClient {
    // 1. Core transport (innermost layer)
    let executor: Executor = this.transport ?? new FetchHttpClient({
      baseUrl: this.baseUrl,
      defaultHeaders: this.defaultHeaders,
      timeoutMs: this.timeoutMs,
      ...this.transportLogging,
    })

    // 2. Custom decorators
    for (const decorate of this.decorators) {
      executor = decorate(executor)
    }

    // 3. Interceptor chain, retry included
    const interceptors = [...this.interceptors]
    if (this.retryOptions) {
      interceptors.push(new RetryInterceptor(this.retryOptions))
    }
    if (interceptors.length > 0) {
      executor = new InterceptingHttpClient(executor, interceptors, this.maxRetries)
    }

    // 4. Circuit breaker
    let circuitBreaker: CircuitBreakerHttpClient | undefined
    if (this.breakerOptions) {
      circuitBreaker = new CircuitBreakerHttpClient(executor, this.breakerOptions)
      executor = circuitBreaker
    }

    // 5. Logging (outermost layer)
    if (this.logging) {
      executor = new LoggingHttpClient(executor)
    }

    return { executor, circuitBreaker }
  }

  build(): Executor {
    return this.compose().executor
  }

  buildFluent(): FluentHttpClient {
    return new FluentHttpClient(this.build(), this.baseUrl)
  }

  buildAsync(poolSize: number = this.asyncPoolSize): AsyncHttpClient {
    return new AsyncHttpClient(this.build(), poolSize)
  }
}

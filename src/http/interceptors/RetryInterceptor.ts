import type { HttpMethod, RequestSpec } from '../types'
import type { InterceptorChain, RequestInterceptor } from './types'
import { remainingTime } from '../RequestBuilder'
import { ConfigError, HttpError, NetworkError, getErrorMessage, getErrorStatus } from '../../utils/TransportError'
import { logger } from '../../utils/logger'

export type RetryPredicate = (error: unknown, request: RequestSpec<unknown>) => boolean

export interface RetryOptions {
  maxRetries: number
  initialDelayMs: number
  backoffMultiplier: number
  maxDelayMs: number
  /** Which failures are worth another attempt */
  retryOn: RetryPredicate
  /** Methods that may be re-sent */
  retryableMethods: readonly HttpMethod[]
  order: number
  now: () => number
}

export const IDEMPOTENT_METHODS: readonly HttpMethod[] = ['GET', 'HEAD', 'OPTIONS', 'PUT', 'DELETE']

export const DEFAULT_RETRY_OPTIONS: Omit<RetryOptions, 'now'> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2.0,
  maxDelayMs: 30000,
  retryOn: isTransientFailure,
  retryableMethods: IDEMPOTENT_METHODS,
  order: 100,
}

/**
 * Network failures and 5xx responses. Never 4xx, an open circuit,
 * an auth failure or a misconfiguration.
 */
export function isTransientFailure(error: unknown): boolean {
  if (error instanceof NetworkError) {
    return true
  }
  return error instanceof HttpError && (getErrorStatus(error) ?? 0) >= 500
}

/**
 * Exponential backoff retry interceptor
 * Waits initialDelay × multiplier^attempt (capped at maxDelay) before each retry
 */
export class RetryInterceptor implements RequestInterceptor {
  readonly order: number
  private readonly options: RetryOptions

  constructor(options: Partial<RetryOptions> = {}) {
    this.options = {
      maxRetries: options.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries,
      initialDelayMs: options.initialDelayMs ?? DEFAULT_RETRY_OPTIONS.initialDelayMs,
      backoffMultiplier: options.backoffMultiplier ?? DEFAULT_RETRY_OPTIONS.backoffMultiplier,
      maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs,
      retryOn: options.retryOn ?? DEFAULT_RETRY_OPTIONS.retryOn,
      retryableMethods: options.retryableMethods ?? DEFAULT_RETRY_OPTIONS.retryableMethods,
      order: options.order ?? DEFAULT_RETRY_OPTIONS.order,
      now: options.now ?? Date.now,
    }
    this.order = this.options.order

    if (!Number.isInteger(this.options.maxRetries) || this.options.maxRetries < 0) {
      throw new ConfigError('maxRetries must be a non-negative integer')
    }
    if (this.options.initialDelayMs < 0 || this.options.maxDelayMs < 0) {
      throw new ConfigError('Retry delays must be non-negative')
    }
    if (this.options.backoffMultiplier < 1) {
      throw new ConfigError('Backoff multiplier must be at least 1')
    }
  }

  static builder(): RetryInterceptorBuilder {
    return new RetryInterceptorBuilder()
  }

  get maxRetries(): number {
    return this.options.maxRetries
  }

  /**
   * Delay before retry number `attempt` (0-based)
   */
  delayFor(attempt: number): number {
    const delay = this.options.initialDelayMs * Math.pow(this.options.backoffMultiplier, attempt)
    return Math.min(delay, this.options.maxDelayMs)
  }

  async onError<T>(error: unknown, request: RequestSpec<T>, chain: InterceptorChain): Promise<T> {
    const attempt = chain.retryCount

    if (attempt >= this.options.maxRetries || attempt >= chain.maxRetries) {
      logger.debug('Retries exhausted', { attempts: attempt + 1, endpoint: request.endpoint })
      throw error
    }
    if (!this.options.retryableMethods.includes(request.method) || !this.options.retryOn(error, request)) {
      throw error
    }

    const delay = this.delayFor(attempt)
    if (remainingTime(request, this.options.now()) <= delay) {
      logger.warn('Retry skipped, request deadline would pass', {
        delayMs: delay,
        endpoint: request.endpoint,
      })
      throw error
    }

    logger.warn(`Retrying after ${delay}ms (attempt ${attempt + 1}/${this.options.maxRetries})`, {
      method: request.method,
      endpoint: request.endpoint,
      status: getErrorStatus(error),
      error: getErrorMessage(error),
    })
    await new Promise(resolve => setTimeout(resolve, delay))

    return chain.retry(request)
  }
}

export class RetryInterceptorBuilder {
  private readonly options: Partial<RetryOptions> = {}

  maxRetries(maxRetries: number): this {
    this.options.maxRetries = maxRetries
    return this
  }

  initialDelay(ms: number): this {
    this.options.initialDelayMs = ms
    return this
  }

  backoffMultiplier(multiplier: number): this {
    this.options.backoffMultiplier = multiplier
    return this
  }

  maxDelay(ms: number): this {
    this.options.maxDelayMs = ms
    return this
  }

  retryOn(predicate: RetryPredicate): this {
    this.options.retryOn = predicate
    return this
  }

  retryableMethods(...methods: HttpMethod[]): this {
    this.options.retryableMethods = methods
    return this
  }

  order(order: number): this {
    this.options.order = order
    return this
  }

  clock(now: () => number): this {
    this.options.now = now
    return this
  }

  build(): RetryInterceptor {
    return new RetryInterceptor(this.options)
  }
}

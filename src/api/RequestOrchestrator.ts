import type { Executor, RequestSpec } from '../http/types'
import { mergeHeaders, type HeaderMap } from '../http/headers'
import { remainingTime, withHeaders } from '../http/RequestBuilder'
import { checkEndpoint } from '../http/url'
import type { AuthStrategy } from '../auth/AuthStrategy'
import { NoAuthStrategy } from '../auth/NoAuthStrategy'
import {
  AuthRefreshError,
  CircuitOpenError,
  UnauthorizedError,
  getErrorMessage,
} from '../utils/TransportError'
import { logger } from '../utils/logger'

export interface OrchestratorOptions {
  /** Base URL of the transport below; absolute endpoints are refused when set */
  baseUrl?: string
  /** Sent with every request, overridden by the request's own headers */
  defaultHeaders?: HeaderMap
  /** Refresh-and-retry rounds after a 401 */
  maxAuthRetries?: number
  retryOnAuthFailure?: boolean
  /** Pause between a refresh and the retried request */
  authRetryDelayMs?: number
  timingEnabled?: boolean
  loggingEnabled?: boolean
  logRequestBody?: boolean
  now?: () => number
}

/**
 * Per-call control loop: applies default and auth headers, times the call,
 * and refreshes credentials when the backend answers 401
 *
 * Only the auth-refresh loop lives here. Transient failures are retried by
 * the interceptor chain below; an open circuit is never retried.
 */
export class RequestOrchestrator implements Executor {
  private readonly baseUrl: string
  private readonly defaultHeaders: Readonly<HeaderMap>
  private readonly maxAuthRetries: number
  private readonly retryOnAuthFailure: boolean
  private readonly authRetryDelayMs: number
  private readonly timingEnabled: boolean
  private readonly loggingEnabled: boolean
  private readonly logRequestBody: boolean
  private readonly now: () => number

  constructor(
    private readonly inner: Executor,
    private readonly auth: AuthStrategy = new NoAuthStrategy(),
    options: OrchestratorOptions = {}
  ) {
    this.baseUrl = options.baseUrl ?? ''
    this.defaultHeaders = Object.freeze({ ...options.defaultHeaders })
    this.maxAuthRetries = options.maxAuthRetries ?? 1
    this.retryOnAuthFailure = options.retryOnAuthFailure ?? true
    this.authRetryDelayMs = options.authRetryDelayMs ?? 0
    this.timingEnabled = options.timingEnabled ?? true
    this.loggingEnabled = options.loggingEnabled ?? true
    this.logRequestBody = options.logRequestBody ?? false
    this.now = options.now ?? Date.now
  }

  async execute<T>(spec: RequestSpec<T>): Promise<T> {
    const configError = checkEndpoint(this.baseUrl, spec.endpoint)
    if (configError) {
      logger.warn('Request rejected before dispatch', { endpoint: spec.endpoint, error: configError.message })
      throw configError
    }

    if (!this.timingEnabled) {
      return this.executeWithAuthRetry(spec, this.maxAuthRetries, false)
    }

    const startTime = this.now()
    try {
      return await this.executeWithAuthRetry(spec, this.maxAuthRetries, false)
    } finally {
      if (this.loggingEnabled) {
        const duration = this.now() - startTime
        logger.info(`Request completed in ${duration}ms: ${spec.method} ${spec.endpoint}`, { durationMs: duration })
      }
    }
  }

  private async executeWithAuthRetry<T>(spec: RequestSpec<T>, retriesLeft: number, refreshed: boolean): Promise<T> {
    if (this.loggingEnabled) {
      this.logRequest(spec)
    }

    if (this.auth.needsRefresh()) {
      logger.debug('Credentials about to expire, refreshing before request')
      await this.refreshCredentials()
    }

    const request = this.applyHeaders(spec)

    try {
      return await this.inner.execute(request)
    } catch (error: unknown) {
      if (error instanceof CircuitOpenError) {
        logger.warn('Circuit breaker is open', { endpoint: spec.endpoint, tripped: error.tripped })
        throw error
      }
      if (!(error instanceof UnauthorizedError)) {
        throw error
      }

      if (retriesLeft > 0 && this.retryOnAuthFailure && remainingTime(spec, this.now()) > 0) {
        logger.debug('Token expired, attempting refresh', { retriesLeft })
        await this.refreshCredentials()
        if (this.authRetryDelayMs > 0) {
          await new Promise(resolve => setTimeout(resolve, this.authRetryDelayMs))
        }
        return this.executeWithAuthRetry(spec, retriesLeft - 1, true)
      }

      if (refreshed) {
        logger.error('Token refresh failed after maximum retries', { endpoint: spec.endpoint })
        throw new AuthRefreshError('Token refresh failed after maximum retries', error)
      }
      throw error
    }
  }

  /**
   * Default headers, then the request's own, then authentication
   */
  applyHeaders<T>(spec: RequestSpec<T>): RequestSpec<T> {
    return withHeaders(spec, this.auth.apply(mergeHeaders(this.defaultHeaders, spec.headers)))
  }

  /**
   * A refresh that resolves false still lets the request be retried;
   * one that throws ends the call.
   */
  private async refreshCredentials(): Promise<void> {
    let refreshed: boolean
    try {
      refreshed = await this.auth.refresh()
    } catch (error: unknown) {
      logger.error('Credential refresh threw', { error: getErrorMessage(error) })
      throw new AuthRefreshError(`Token refresh failed: ${getErrorMessage(error)}`, error)
    }

    if (refreshed) {
      logger.debug('Credentials refreshed successfully')
    } else {
      logger.warn('Credential refresh failed')
    }
  }

  private logRequest(spec: RequestSpec<unknown>): void {
    logger.info(`Executing ${spec.method} request to: ${spec.endpoint}`)
    if (this.logRequestBody && spec.body !== undefined) {
      logger.debug('Request body', { body: spec.body })
    }
  }
}

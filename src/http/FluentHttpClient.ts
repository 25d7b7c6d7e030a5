import type { Executor, RequestBody, RequestSpec } from './types'
import { RequestBuilder } from './RequestBuilder'
import { checkEndpoint } from './url'
import { Result } from '../result/Result'
import { ApiError, ApiErrorType } from '../result/ApiError'
import {
  CircuitOpenError,
  ConfigError,
  HttpError,
  NetworkError,
  TransportError,
  UnauthorizedError,
  getErrorMessage,
} from '../utils/TransportError'
import { logger } from '../utils/logger'

/**
 * Classify a failure into exactly one ApiError type.
 * Precedence: circuit open, 401, misconfiguration, other 4xx/5xx, network.
 */
export function toApiError(error: unknown): ApiError {
  if (error instanceof CircuitOpenError) {
    return ApiError.circuitOpenError(error.message)
  }

  if (!(error instanceof TransportError)) {
    return ApiError.networkError(`Unexpected error: ${getErrorMessage(error)}`)
  }

  const { statusCode, body, message } = error
  if (statusCode === 401 || error.kind === 'Unauthorized') {
    return ApiError.authError(message, statusCode, body)
  }
  if (error instanceof ConfigError) {
    return ApiError.configError(message, statusCode, body)
  }
  if (statusCode >= 400 && statusCode < 600) {
    return ApiError.httpError(message, statusCode, body)
  }
  if (error instanceof NetworkError || error.cause instanceof NetworkError) {
    return ApiError.networkError(message)
  }
  return ApiError.httpError(message, statusCode, body)
}

/**
 * Rebuild a throwable failure carrying the ApiError's status, body and message
 */
export function toTransportError(error: ApiError): TransportError {
  switch (error.errorType) {
    case ApiErrorType.CIRCUIT_OPEN:
      return new CircuitOpenError(error.message)
    case ApiErrorType.AUTH_ERROR:
      return new UnauthorizedError(error.message, error.statusCode, error.responseBody)
    case ApiErrorType.CONFIG_ERROR:
      return new ConfigError(error.message, error.statusCode, error.responseBody)
    case ApiErrorType.NETWORK_ERROR:
      return new NetworkError(error.message)
    case ApiErrorType.HTTP_ERROR:
      return new HttpError(error.message, error.statusCode, error.responseBody)
  }
}

/**
 * Exception-free adapter: every outcome is a Result
 *
 * @example
 * const fluent = new FluentHttpClient(executor, 'https://api.test')
 * const users = await fluent.get<User[]>('/users')
 * if (users.isFailure()) logger.warn('Listing failed', { error: users.getError().toString() })
 */
export class FluentHttpClient implements Executor {
  constructor(
    private readonly inner: Executor,
    private readonly baseUrl: string = ''
  ) {}

  /**
   * Never rejects. Misconfigured requests fail before the delegate is called.
   */
  async executeWithResult<T>(spec: RequestSpec<T>): Promise<Result<T, ApiError>> {
    const conflict = checkEndpoint(this.baseUrl, spec.endpoint)
    if (conflict) {
      logger.warn('Request rejected before dispatch', { endpoint: spec.endpoint, error: conflict.message })
      return Result.failure(toApiError(conflict))
    }

    try {
      return Result.success(await this.inner.execute(spec))
    } catch (error: unknown) {
      const apiError = toApiError(error)
      logger.debug('Request failed', {
        method: spec.method,
        endpoint: spec.endpoint,
        errorType: apiError.errorType,
        status: apiError.statusCode,
      })
      return Result.failure(apiError)
    }
  }

  /**
   * Throwing bridge over executeWithResult
   */
  async execute<T>(spec: RequestSpec<T>): Promise<T> {
    const result = await this.executeWithResult(spec)
    return result.getOrElseThrow(toTransportError)
  }

  get<T>(endpoint: string, queryParams: Record<string, string> = {}): Promise<Result<T, ApiError>> {
    return this.executeWithResult(RequestBuilder.get<T>(endpoint).queryParams(queryParams).build())
  }

  post<T>(endpoint: string, body?: RequestBody): Promise<Result<T, ApiError>> {
    return this.executeWithResult(withBody(RequestBuilder.post<T>(endpoint), body).build())
  }

  put<T>(endpoint: string, body?: RequestBody): Promise<Result<T, ApiError>> {
    return this.executeWithResult(withBody(RequestBuilder.put<T>(endpoint), body).build())
  }

  patch<T>(endpoint: string, body?: RequestBody): Promise<Result<T, ApiError>> {
    return this.executeWithResult(withBody(RequestBuilder.patch<T>(endpoint), body).build())
  }

  delete<T>(endpoint: string): Promise<Result<T, ApiError>> {
    return this.executeWithResult(RequestBuilder.delete<T>(endpoint).build())
  }
}

function withBody<T>(builder: RequestBuilder<T>, body: RequestBody | undefined): RequestBuilder<T> {
  return body === undefined ? builder : builder.body(body)
}

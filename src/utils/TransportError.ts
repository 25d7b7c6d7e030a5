/**
 * Closed set of failure kinds an Executor can reject with
 */
export type FailureKind = 'HttpError' | 'Unauthorized' | 'CircuitOpen' | 'Network' | 'Config'

/**
 * RFC 9457 Problem Details for HTTP APIs
 * @see https://www.rfc-editor.org/rfc/rfc9457.html
 */
export interface ProblemDetails {
  title: string
  status: number
  detail?: string
}

interface TransportErrorOptions {
  cause?: unknown
}

/**
 * Base class of every failure produced by the execution chain.
 * A statusCode of 0 means no HTTP status was obtained.
 */
export abstract class TransportError extends Error {
  abstract readonly kind: FailureKind
  readonly statusCode: number
  readonly body?: string

  protected constructor(message: string, statusCode: number, body?: string, options?: TransportErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = new.target.name
    this.statusCode = statusCode
    this.body = body

    // Maintains proper stack trace for where error was thrown (V8 engines)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/**
 * Non-2xx response from a reachable server
 */
export class HttpError extends TransportError {
  readonly kind = 'HttpError'
  /** RFC 9457: Short, human-readable summary */
  readonly title?: string
  /** RFC 9457: Human-readable explanation specific to this occurrence */
  readonly detail?: string

  constructor(message: string, statusCode: number, body?: string, problem?: ProblemDetails, options?: TransportErrorOptions) {
    super(message, statusCode, body, options)
    this.title = problem?.title
    this.detail = problem?.detail
  }
}

/**
 * HTTP 401: the credentials are missing, invalid or expired
 */
export class UnauthorizedError extends TransportError {
  readonly kind = 'Unauthorized'

  constructor(message: string = 'Token expired or invalid', statusCode: number = 401, body?: string) {
    super(message, statusCode, body)
  }
}

/**
 * Still unauthorized after at least one credential refresh was attempted
 */
export class AuthRefreshError extends TransportError {
  readonly kind = 'Unauthorized'

  constructor(message: string, cause: unknown) {
    super(message, getErrorStatus(cause) ?? 401, getErrorBody(cause), { cause })
  }
}

interface CircuitOpenDetails {
  millisSinceLastFailure?: number
  resetTimeoutMs?: number
  /** true when this request's own failure opened the circuit */
  tripped?: boolean
  cause?: unknown
}

/**
 * Rejection by an open circuit breaker
 */
export class CircuitOpenError extends TransportError {
  readonly kind = 'CircuitOpen'
  readonly millisSinceLastFailure: number
  readonly resetTimeoutMs: number
  readonly tripped: boolean

  constructor(message: string = 'Circuit breaker is open', details: CircuitOpenDetails = {}) {
    super(message, 0, undefined, { cause: details.cause })
    this.millisSinceLastFailure = details.millisSinceLastFailure ?? 0
    this.resetTimeoutMs = details.resetTimeoutMs ?? 0
    this.tripped = details.tripped ?? false
  }

  /**
   * Estimated time until the breaker lets a probe through.
   * Negative once the reset timeout has already elapsed.
   */
  get estimatedMillisUntilReset(): number {
    if (this.resetTimeoutMs > 0) {
      return this.resetTimeoutMs - this.millisSinceLastFailure
    }
    return 0
  }
}

/**
 * Connectivity or I/O failure before a status code was obtained
 */
export class NetworkError extends TransportError {
  readonly kind = 'Network'

  constructor(message: string, options?: TransportErrorOptions) {
    super(message, 0, undefined, options)
  }
}

/**
 * Structural misuse detected before dispatch
 */
export class ConfigError extends TransportError {
  readonly kind = 'Config'

  constructor(message: string, statusCode: number = 0, body?: string) {
    super(message, statusCode, body)
  }
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError
}

/**
 * Get error message safely from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return 'Unknown error'
}

/**
 * Get HTTP status safely from unknown error, undefined when none was received
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (error instanceof TransportError) {
    return error.statusCode > 0 ? error.statusCode : undefined
  }
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    const { statusCode } = error
    return typeof statusCode === 'number' && statusCode > 0 ? statusCode : undefined
  }
  return undefined
}

export function getErrorBody(error: unknown): string | undefined {
  return error instanceof TransportError ? error.body : undefined
}

/**
 * Get structured error info for logging
 */
export function getErrorInfo(error: unknown): {
  kind?: FailureKind
  status?: number
  title?: string
  detail?: string
  message: string
} {
  if (error instanceof HttpError) {
    return {
      kind: error.kind,
      status: error.statusCode,
      title: error.title,
      detail: error.detail,
      message: error.message,
    }
  }
  if (error instanceof TransportError) {
    return {
      kind: error.kind,
      status: getErrorStatus(error),
      message: error.message,
    }
  }
  return {
    message: getErrorMessage(error),
  }
}

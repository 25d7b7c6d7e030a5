import type { Executor, RequestBody, RequestSpec } from './types'
import { ContentTypes, mergeHeaders, type HeaderMap } from './headers'
import { remainingTime } from './RequestBuilder'
import { buildUrl } from './url'
import {
  HttpError,
  NetworkError,
  UnauthorizedError,
  getErrorMessage,
  isTransportError,
  type ProblemDetails,
} from '../utils/TransportError'
import { logger } from '../utils/logger'

export interface FetchHttpClientOptions {
  baseUrl: string
  defaultHeaders?: HeaderMap
  /** Per-attempt timeout, further bounded by the request deadline */
  timeoutMs?: number
  logRequestBody?: boolean
  logResponseBody?: boolean
  maxLoggedBodyLength?: number
  now?: () => number
}

const METHODS_WITH_BODY = new Set(['POST', 'PUT', 'PATCH'])

/**
 * Base transport using the native fetch API
 * Maps every outcome onto the transport failure taxonomy
 */
export class FetchHttpClient implements Executor {
  private readonly baseUrl: string
  private readonly defaultHeaders: Readonly<HeaderMap>
  private readonly timeoutMs: number
  private readonly logRequestBody: boolean
  private readonly logResponseBody: boolean
  private readonly maxLoggedBodyLength: number
  private readonly now: () => number

  constructor(options: FetchHttpClientOptions) {
    this.baseUrl = options.baseUrl
    this.defaultHeaders = Object.freeze({ ...options.defaultHeaders })
    this.timeoutMs = options.timeoutMs ?? 30000
    this.logRequestBody = options.logRequestBody ?? false
    this.logResponseBody = options.logResponseBody ?? false
    this.maxLoggedBodyLength = options.maxLoggedBodyLength ?? 4000
    this.now = options.now ?? Date.now
  }

  getBaseUrl(): string {
    return this.baseUrl
  }

  async execute<T>(spec: RequestSpec<T>): Promise<T> {
    const url = buildUrl(this.baseUrl, spec.endpoint, spec.queryParams)
    const timeoutMs = Math.min(this.timeoutMs, remainingTime(spec, this.now()))
    if (timeoutMs <= 0) {
      throw new NetworkError(`Request deadline exceeded before dispatch: ${spec.method} ${spec.endpoint}`)
    }

    const body = METHODS_WITH_BODY.has(spec.method) ? encodeBody(spec.body) : undefined

    logger.debug('HTTP Request', {
      method: spec.method,
      url,
      ...(this.logRequestBody && typeof body === 'string' ? { body: this.truncate(body) } : {}),
    })

    let response: Response
    try {
      response = await fetch(url, {
        method: spec.method,
        headers: mergeHeaders(this.defaultHeaders, spec.headers),
        body,
        signal: AbortSignal.timeout(timeoutMs),
      })
    } catch (error: unknown) {
      throw toNetworkError(error, spec, timeoutMs)
    }

    logger.debug('HTTP Response', {
      status: response.status,
      url,
    })

    if (!response.ok) {
      throw await this.toFailure(response)
    }

    return this.decode(response, spec)
  }

  private async decode<T>(response: Response, spec: RequestSpec<T>): Promise<T> {
    let raw: unknown
    let text: string | undefined

    try {
      switch (spec.responseType) {
        case 'void':
          await response.arrayBuffer()
          raw = undefined
          break
        case 'bytes':
          raw = new Uint8Array(await response.arrayBuffer())
          break
        case 'text':
          text = await response.text()
          raw = text
          break
        case 'json':
          text = await response.text()
          raw = text === '' ? undefined : JSON.parse(text)
          break
      }

      if (this.logResponseBody && text !== undefined) {
        logger.debug('HTTP Response body', { status: response.status, body: this.truncate(text) })
      }

      if (spec.parse) {
        return spec.parse(raw)
      }
      // Unvalidated body, typed by the caller
      return raw as T
    } catch (error: unknown) {
      if (isTransportError(error)) throw error
      throw new HttpError(
        `Failed to decode response body: ${getErrorMessage(error)}`,
        response.status,
        text,
        undefined,
        { cause: error }
      )
    }
  }

  private async toFailure(response: Response): Promise<Error> {
    const contentType = response.headers.get('content-type') || ''
    const errorText = await response.text().catch(() => '')

    if (this.logResponseBody) {
      logger.debug('HTTP Error body', { status: response.status, body: this.truncate(errorText) })
    }

    if (response.status === 401) {
      return new UnauthorizedError('Token expired or invalid', 401, errorText)
    }

    // RFC 9457 Problem Details response
    if (contentType.includes(ContentTypes.PROBLEM_JSON)) {
      const problem = parseProblem(errorText)
      if (problem) {
        const message = problem.detail
          ? `${problem.title}: ${problem.detail}`
          : problem.title
        return new HttpError(message, problem.status || response.status, errorText, problem)
      }
    }

    // Generic JSON error response
    let errorMessage = errorText || response.statusText
    if (contentType.includes(ContentTypes.APPLICATION_JSON)) {
      try {
        errorMessage = JSON.stringify(JSON.parse(errorText))
      } catch {
        // Keep original text if JSON parsing fails
      }
    }

    return new HttpError(`HTTP ${response.status}: ${errorMessage}`, response.status, errorText)
  }

  private truncate(text: string): string {
    return text.length > this.maxLoggedBodyLength
      ? `${text.slice(0, this.maxLoggedBodyLength)}... (truncated)`
      : text
  }
}

function encodeBody(body: RequestBody | undefined): string | Uint8Array | undefined {
  if (body === undefined || typeof body === 'string' || body instanceof Uint8Array) {
    return body
  }
  return JSON.stringify(body)
}

function parseProblem(text: string): ProblemDetails | undefined {
  try {
    const parsed: unknown = JSON.parse(text)
    if (typeof parsed !== 'object' || parsed === null || !('title' in parsed)) {
      return undefined
    }
    const { title } = parsed
    if (typeof title !== 'string') {
      return undefined
    }
    return {
      title,
      status: 'status' in parsed && typeof parsed.status === 'number' ? parsed.status : 0,
      detail: 'detail' in parsed && typeof parsed.detail === 'string' ? parsed.detail : undefined,
    }
  } catch {
    return undefined
  }
}

function toNetworkError(error: unknown, spec: RequestSpec<unknown>, timeoutMs: number): NetworkError {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new NetworkError(`Request timed out after ${timeoutMs}ms: ${spec.method} ${spec.endpoint}`, { cause: error })
  }
  return new NetworkError(`Network error: ${getErrorMessage(error)}`, { cause: error })
}

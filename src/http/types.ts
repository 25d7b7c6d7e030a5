export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS'

/**
 * Shape the response body is decoded into
 */
export type ResponseType = 'json' | 'text' | 'bytes' | 'void'

export type RequestBody = string | Uint8Array | Record<string, unknown> | unknown[] | number | boolean

/**
 * Immutable description of one logical request.
 * TResponse is the decoded response type; `parse` validates the raw decoded value into it.
 */
export interface RequestSpec<TResponse = unknown> {
  readonly endpoint: string
  readonly method: HttpMethod
  readonly headers: Readonly<Record<string, string>>
  readonly queryParams: Readonly<Record<string, string>>
  readonly body?: RequestBody
  readonly responseType: ResponseType
  readonly parse?: (raw: unknown) => TResponse
  /** Absolute epoch-ms deadline for the whole logical call, including retries */
  readonly deadline?: number
}

/**
 * Core execution contract
 * The base transport and every decorator implement this interface
 */
export interface Executor {
  execute<T>(spec: RequestSpec<T>): Promise<T>
}

/**
 * Wraps an executor with additional behaviour
 */
export type ExecutorDecorator = (inner: Executor) => Executor

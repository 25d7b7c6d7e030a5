import type { HttpMethod, RequestBody, RequestSpec, ResponseType } from './types'
import { defaultJsonHeaders, mergeHeaders, type HeaderMap } from './headers'

/**
 * Fluent builder for immutable RequestSpec values
 *
 * @example
 * const spec = RequestBuilder.get<User>('/users/1')
 *   .queryParam('expand', 'roles')
 *   .timeout(5000)
 *   .build()
 */
export class RequestBuilder<TResponse = unknown> {
  private method: HttpMethod = 'GET'
  private headerMap: HeaderMap = defaultJsonHeaders()
  private query: Record<string, string> = {}
  private payload?: RequestBody
  private shape: ResponseType = 'json'
  private parser?: (raw: unknown) => TResponse
  private deadlineAt?: number

  constructor(private endpoint: string = '') {}

  static get<T = unknown>(endpoint: string): RequestBuilder<T> {
    return new RequestBuilder<T>(endpoint).withMethod('GET')
  }

  static post<T = unknown>(endpoint: string): RequestBuilder<T> {
    return new RequestBuilder<T>(endpoint).withMethod('POST')
  }

  static put<T = unknown>(endpoint: string): RequestBuilder<T> {
    return new RequestBuilder<T>(endpoint).withMethod('PUT')
  }

  static patch<T = unknown>(endpoint: string): RequestBuilder<T> {
    return new RequestBuilder<T>(endpoint).withMethod('PATCH')
  }

  static delete<T = unknown>(endpoint: string): RequestBuilder<T> {
    return new RequestBuilder<T>(endpoint).withMethod('DELETE')
  }

  static head(endpoint: string): RequestBuilder<undefined> {
    return new RequestBuilder<undefined>(endpoint).withMethod('HEAD').responseType('void')
  }

  static options<T = unknown>(endpoint: string): RequestBuilder<T> {
    return new RequestBuilder<T>(endpoint).withMethod('OPTIONS')
  }

  withEndpoint(endpoint: string): this {
    this.endpoint = endpoint
    return this
  }

  withMethod(method: HttpMethod): this {
    this.method = method
    return this
  }

  header(name: string, value: string): this {
    this.headerMap = mergeHeaders(this.headerMap, { [name]: value })
    return this
  }

  /**
   * Replace the header set (the JSON defaults included)
   */
  headers(headers: HeaderMap): this {
    this.headerMap = mergeHeaders(headers)
    return this
  }

  queryParam(name: string, value: string): this {
    this.query = { ...this.query, [name]: value }
    return this
  }

  queryParams(params: Record<string, string>): this {
    this.query = { ...params }
    return this
  }

  body(body: RequestBody): this {
    this.payload = body
    return this
  }

  responseType(type: ResponseType): this {
    this.shape = type
    return this
  }

  parse(parser: (raw: unknown) => TResponse): this {
    this.parser = parser
    return this
  }

  /**
   * Overall budget for the logical call, measured from now
   */
  timeout(ms: number, now: number = Date.now()): this {
    this.deadlineAt = now + ms
    return this
  }

  deadline(epochMs: number): this {
    this.deadlineAt = epochMs
    return this
  }

  build(): RequestSpec<TResponse> {
    if (!this.endpoint) {
      throw new Error('RequestBuilder: endpoint is required')
    }

    return Object.freeze({
      endpoint: this.endpoint,
      method: this.method,
      headers: Object.freeze({ ...this.headerMap }),
      queryParams: Object.freeze({ ...this.query }),
      body: this.payload,
      responseType: this.shape,
      parse: this.parser,
      deadline: this.deadlineAt,
    })
  }
}

/**
 * Derive a spec carrying a different header set
 */
export function withHeaders<T>(spec: RequestSpec<T>, headers: Readonly<HeaderMap>): RequestSpec<T> {
  return Object.freeze({
    ...spec,
    headers: Object.freeze({ ...headers }),
  })
}

/**
 * Time left before the spec's deadline, Infinity when it has none
 */
export function remainingTime(spec: RequestSpec<unknown>, now: number = Date.now()): number {
  return spec.deadline === undefined ? Infinity : spec.deadline - now
}

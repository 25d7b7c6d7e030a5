import type { RequestSpec } from '../types'
import type { RequestInterceptor } from './types'
import { mergeHeaders, type HeaderMap } from '../headers'
import { withHeaders } from '../RequestBuilder'

/**
 * Stamps a fixed set of headers onto every attempt, overriding same-named request headers
 */
export class HeaderInterceptor implements RequestInterceptor {
  private readonly headers: Readonly<HeaderMap>

  constructor(headers: HeaderMap, readonly order: number = 0) {
    this.headers = Object.freeze({ ...headers })
  }

  beforeRequest<T>(request: RequestSpec<T>): RequestSpec<T> {
    return withHeaders(request, mergeHeaders(request.headers, this.headers))
  }
}

import type { HeaderMap } from '../http/headers'

export enum AuthType {
  NONE = 'NONE',
  BASIC = 'BASIC',
  BEARER_TOKEN = 'BEARER_TOKEN',
}

/**
 * Credentials source consulted by the request orchestrator on every call
 */
export interface AuthStrategy {
  readonly type: AuthType

  /** True when credentials should be refreshed before the next request */
  needsRefresh(): boolean

  /**
   * Obtain fresh credentials. Resolves false when nothing changed,
   * including when another refresh is already in flight.
   */
  refresh(): Promise<boolean>

  /** Return `headers` with the authentication headers added */
  apply(headers: Readonly<HeaderMap>): HeaderMap
}

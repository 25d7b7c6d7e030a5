import { AuthType, type AuthStrategy } from './AuthStrategy'
import { basicAuth, mergeHeaders, type HeaderMap } from '../http/headers'

/**
 * HTTP Basic credentials. Nothing to refresh.
 */
export class BasicAuthStrategy implements AuthStrategy {
  readonly type = AuthType.BASIC

  constructor(
    private readonly username: string,
    private readonly password: string
  ) {}

  needsRefresh(): boolean {
    return false
  }

  async refresh(): Promise<boolean> {
    return true
  }

  apply(headers: Readonly<HeaderMap>): HeaderMap {
    return mergeHeaders(headers, basicAuth(this.username, this.password))
  }
}

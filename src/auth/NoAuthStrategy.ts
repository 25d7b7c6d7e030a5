import { AuthType, type AuthStrategy } from './AuthStrategy'
import type { HeaderMap } from '../http/headers'

export class NoAuthStrategy implements AuthStrategy {
  readonly type = AuthType.NONE

  needsRefresh(): boolean {
    return false
  }

  async refresh(): Promise<boolean> {
    return true
  }

  apply(headers: Readonly<HeaderMap>): HeaderMap {
    return { ...headers }
  }
}

import { AuthType, type AuthStrategy } from './AuthStrategy'
import { bearerAuth, mergeHeaders, type HeaderMap } from '../http/headers'
import { logger } from '../utils/logger'

export interface BearerToken {
  token: string
  /** Epoch ms after which the token is considered expired */
  expiresAt?: number
}

/**
 * Fetches a new token, or resolves undefined when none could be issued
 */
export type TokenRefresher = () => Promise<BearerToken | undefined>

export interface BearerTokenOptions {
  refresh?: TokenRefresher
  expiresAt?: number
  /** Refresh this long before expiry */
  refreshMarginMs?: number
  now?: () => number
}

/**
 * Static or refreshable bearer token
 */
export class BearerTokenStrategy implements AuthStrategy {
  readonly type = AuthType.BEARER_TOKEN
  private token: string
  private expiresAt?: number
  private refreshing = false
  private readonly refresher?: TokenRefresher
  private readonly refreshMarginMs: number
  private readonly now: () => number

  constructor(token: string, options: BearerTokenOptions = {}) {
    this.token = token
    this.expiresAt = options.expiresAt
    this.refresher = options.refresh
    this.refreshMarginMs = options.refreshMarginMs ?? 0
    this.now = options.now ?? Date.now
  }

  getToken(): string {
    return this.token
  }

  needsRefresh(): boolean {
    if (!this.refresher || this.expiresAt === undefined) {
      return false
    }
    return this.now() >= this.expiresAt - this.refreshMarginMs
  }

  /**
   * Single-flight: a call made while another refresh is pending resolves false
   */
  async refresh(): Promise<boolean> {
    if (!this.refresher) {
      return false
    }
    if (this.refreshing) {
      logger.debug('Token refresh already in progress')
      return false
    }

    this.refreshing = true
    try {
      const next = await this.refresher()
      if (!next) {
        logger.warn('Token refresh returned no token')
        return false
      }
      this.token = next.token
      this.expiresAt = next.expiresAt
      logger.info('Bearer token refreshed', { expiresAt: next.expiresAt })
      return true
    } finally {
      this.refreshing = false
    }
  }

  apply(headers: Readonly<HeaderMap>): HeaderMap {
    if (!this.token) {
      return { ...headers }
    }
    return mergeHeaders(headers, bearerAuth(this.token))
  }
}

import type { AuthStrategy } from './AuthStrategy'
import { NoAuthStrategy } from './NoAuthStrategy'
import { BasicAuthStrategy } from './BasicAuthStrategy'
import { BearerTokenStrategy, type BearerTokenOptions } from './BearerTokenStrategy'

export type AuthConfig =
  | { type: 'none' }
  | { type: 'basic'; username: string; password: string }
  | ({ type: 'bearer'; token: string } & BearerTokenOptions)

export function createAuthStrategy(config: AuthConfig = { type: 'none' }): AuthStrategy {
  switch (config.type) {
    case 'none':
      return new NoAuthStrategy()
    case 'basic':
      return new BasicAuthStrategy(config.username, config.password)
    case 'bearer': {
      const { token, ...options } = config
      return new BearerTokenStrategy(token, options)
    }
  }
}

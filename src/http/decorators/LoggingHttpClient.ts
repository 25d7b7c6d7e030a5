import type { Executor, RequestSpec } from '../types'
import { logger } from '../../utils/logger'
import { CircuitOpenError, getErrorInfo, getErrorStatus } from '../../utils/TransportError'

/**
 * Executor decorator that adds error logging
 * Logs failed requests without interfering with normal operation
 */
export class LoggingHttpClient implements Executor {
  constructor(private readonly inner: Executor) {}

  async execute<T>(spec: RequestSpec<T>): Promise<T> {
    try {
      return await this.inner.execute(spec)
    } catch (error: unknown) {
      const status = getErrorStatus(error)

      // Let application layer handle 4xx errors with context
      // Only log server errors (5xx) and network errors
      if (error instanceof CircuitOpenError) {
        logger.warn('HTTP Request rejected by circuit breaker', {
          endpoint: spec.endpoint,
          method: spec.method,
          tripped: error.tripped,
        })
      } else if (!status || status >= 500) {
        logger.error('HTTP Request Failed', {
          endpoint: spec.endpoint,
          method: spec.method,
          ...getErrorInfo(error),
        })
      }

      throw error
    }
  }
}

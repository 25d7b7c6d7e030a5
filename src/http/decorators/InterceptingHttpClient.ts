import type { Executor, RequestSpec } from '../types'
import type { InterceptorChain, RequestInterceptor } from '../interceptors/types'
import { logger } from '../../utils/logger'

export const DEFAULT_MAX_RETRIES = 3

/** Retries spent so far by one logical call, shared by every interceptor */
interface RetryBudget {
  used: number
}

/**
 * Executor decorator that runs requests through an ordered interceptor stack
 *
 * beforeRequest hooks run in ascending `order`, afterResponse hooks in reverse.
 * On failure each onError hook gets a turn in ascending order; the first to
 * resolve wins, a rejection hands its (possibly replaced) failure to the next.
 */
export class InterceptingHttpClient implements Executor {
  private readonly interceptors: readonly RequestInterceptor[]

  constructor(
    private readonly inner: Executor,
    interceptors: readonly RequestInterceptor[] = [],
    private readonly maxRetries: number = DEFAULT_MAX_RETRIES
  ) {
    // Array.prototype.sort is stable, equal orders keep registration order
    this.interceptors = Object.freeze(
      [...interceptors].sort((a, b) => (a.order ?? 0) - (b.order ?? 0))
    )
  }

  async execute<T>(spec: RequestSpec<T>): Promise<T> {
    return this.executeWithRetry(spec, { used: 0 })
  }

  getInterceptors(): readonly RequestInterceptor[] {
    return this.interceptors
  }

  private async executeWithRetry<T>(spec: RequestSpec<T>, budget: RetryBudget): Promise<T> {
    let request = spec
    for (const interceptor of this.interceptors) {
      if (interceptor.beforeRequest) {
        request = interceptor.beforeRequest(request)
      }
    }

    let failure: unknown
    try {
      const response = await this.inner.execute(request)
      return await this.applyAfterResponse(response, request)
    } catch (error: unknown) {
      failure = error
    }

    const chain = this.createChain(budget, () => failure)

    for (const interceptor of this.interceptors) {
      if (!interceptor.onError) continue
      let recovered: T
      try {
        recovered = await interceptor.onError(failure, request, chain)
      } catch (rethrown: unknown) {
        failure = rethrown
        continue
      }
      return this.applyAfterResponse(recovered, request)
    }

    throw failure
  }

  private createChain(budget: RetryBudget, currentFailure: () => unknown): InterceptorChain {
    const maxRetries = this.maxRetries
    return {
      get retryCount() {
        return budget.used
      },
      maxRetries,
      retry: <R>(request: RequestSpec<R>): Promise<R> => {
        if (budget.used >= maxRetries) {
          logger.warn('Retry ceiling reached', {
            maxRetries: this.maxRetries,
            method: request.method,
            endpoint: request.endpoint,
          })
          return Promise.reject(currentFailure())
        }
        budget.used++
        logger.debug(`Retrying request (attempt ${budget.used})`, {
          method: request.method,
          endpoint: request.endpoint,
        })
        return this.executeWithRetry(request, budget)
      },
    }
  }

  private async applyAfterResponse<T>(response: T, request: RequestSpec<T>): Promise<T> {
    let current = response
    for (let i = this.interceptors.length - 1; i >= 0; i--) {
      const interceptor = this.interceptors[i]
      if (interceptor?.afterResponse) {
        current = await interceptor.afterResponse(current, request)
      }
    }
    return current
  }
}

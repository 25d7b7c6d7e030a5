import type { RequestSpec } from '../types'

/**
 * Handle given to onError so an interceptor can re-run the request
 */
export interface InterceptorChain {
  /**
   * Re-execute the request through the whole interceptor stack.
   * Rejects with the current failure once the global ceiling is reached.
   */
  retry<T>(request: RequestSpec<T>): Promise<T>
  /** Retries already made for this logical call, by any interceptor */
  readonly retryCount: number
  /** Global ceiling shared by every interceptor */
  readonly maxRetries: number
}

/**
 * Hook into request execution
 * Lower `order` runs first on the way in, last on the way out.
 */
export interface RequestInterceptor {
  readonly order?: number

  /**
   * Runs on every attempt, retries included, so it must be idempotent
   */
  beforeRequest?<T>(request: RequestSpec<T>): RequestSpec<T>

  afterResponse?<T>(response: T, request: RequestSpec<T>): T | Promise<T>

  /**
   * Resolve to recover, reject (with the same or another failure) to pass it on
   */
  onError?<T>(error: unknown, request: RequestSpec<T>, chain: InterceptorChain): Promise<T>
}

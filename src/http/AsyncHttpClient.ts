import type { Executor, RequestSpec } from './types'
import { WorkerPool, type WorkerPoolSnapshot } from '../utils/worker-pool'

export const DEFAULT_ASYNC_POOL_SIZE = 4

/**
 * Promise-returning adapter that schedules calls on a bounded worker pool
 * Every decorator sits below this adapter and sees one execution per call
 */
export class AsyncHttpClient implements Executor {
  private readonly pool: WorkerPool

  constructor(
    private readonly inner: Executor,
    poolSize: number = DEFAULT_ASYNC_POOL_SIZE
  ) {
    this.pool = new WorkerPool(poolSize, 'Async client')
  }

  /**
   * Queue the request; settles with the outcome the direct path would produce
   */
  executeAsync<T>(spec: RequestSpec<T>): Promise<T> {
    return this.pool.submit(() => this.inner.execute(spec))
  }

  /**
   * Run on the caller's turn, bypassing the pool
   */
  execute<T>(spec: RequestSpec<T>): Promise<T> {
    return this.inner.execute(spec)
  }

  /**
   * Reject new work and wait for queued and in-flight calls. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    return this.pool.shutdown()
  }

  isShutdown(): boolean {
    return this.pool.isShutdown()
  }

  getPoolStats(): WorkerPoolSnapshot {
    return this.pool.snapshot()
  }
}

import { ConfigError } from './TransportError'
import { logger } from './logger'

interface QueuedTask {
  run: () => Promise<void>
}

export interface WorkerPoolSnapshot {
  size: number
  active: number
  queued: number
  shutdown: boolean
}

/**
 * Fixed number of concurrent workers fed from an unbounded FIFO queue.
 *
 * - At most `size` tasks run at once; the rest wait their turn.
 * - After shutdown() new submissions reject, queued and running tasks finish.
 */
export class WorkerPool {
  private active = 0
  private readonly queue: QueuedTask[] = []
  private closed = false
  private drained?: Promise<void>
  private resolveDrained?: () => void

  constructor(
    readonly size: number,
    private readonly name: string = 'worker-pool'
  ) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new ConfigError(`Pool size must be a positive integer (got ${size})`)
    }
  }

  /**
   * Schedule a task. Resolves or rejects with the task's own outcome.
   */
  submit<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new ConfigError(`${this.name} has been shut down`))
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: () => Promise.resolve().then(task).then(resolve, reject),
      })
      this.dispatch()
    })
  }

  /**
   * Stop accepting work and wait for everything already submitted. Idempotent.
   */
  shutdown(): Promise<void> {
    if (!this.closed) {
      this.closed = true
      logger.debug('Worker pool shutting down', { name: this.name, active: this.active, queued: this.queue.length })
    }
    if (!this.drained) {
      this.drained = new Promise<void>((resolve) => {
        this.resolveDrained = resolve
      })
      this.checkDrained()
    }
    return this.drained
  }

  isShutdown(): boolean {
    return this.closed
  }

  snapshot(): WorkerPoolSnapshot {
    return {
      size: this.size,
      active: this.active,
      queued: this.queue.length,
      shutdown: this.closed,
    }
  }

  private dispatch(): void {
    while (this.active < this.size) {
      const next = this.queue.shift()
      if (!next) return

      this.active++
      // run() settles the submitter's promise itself and never rejects
      void next.run().finally(() => {
        this.active--
        this.dispatch()
        this.checkDrained()
      })
    }
  }

  private checkDrained(): void {
    if (this.closed && this.active === 0 && this.queue.length === 0) {
      this.resolveDrained?.()
    }
  }
}

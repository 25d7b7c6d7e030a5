import { describe, expect, it } from 'vitest'
import { AsyncHttpClient } from '../src/http/AsyncHttpClient'
import { CircuitBreakerHttpClient } from '../src/http/decorators/CircuitBreakerHttpClient'
import { MockHttpClient } from '../src/http/MockHttpClient'
import { RequestBuilder } from '../src/http/RequestBuilder'
import { WorkerPool } from '../src/utils/worker-pool'
import { CircuitOpenError, ConfigError, HttpError } from '../src/utils/TransportError'

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined
  const promise = new Promise<T>((settle) => {
    resolve = settle
  })
  return { promise, resolve }
}

describe('WorkerPool', () => {
  it('runs at most size tasks at once, in submission order', async () => {
    const pool = new WorkerPool(2)
    const started: number[] = []
    const gates = [deferred<void>(), deferred<void>(), deferred<void>()]

    const results = gates.map((gate, index) => pool.submit(async () => {
      started.push(index)
      await gate.promise
      return index
    }))
    await Promise.resolve()
    await Promise.resolve()

    expect(started).toEqual([0, 1])
    expect(pool.snapshot()).toEqual({ size: 2, active: 2, queued: 1, shutdown: false })

    gates[0]?.resolve()
    await expect(results[0]).resolves.toBe(0)
    gates[1]?.resolve()
    gates[2]?.resolve()

    await expect(Promise.all(results)).resolves.toEqual([0, 1, 2])
    expect(started).toEqual([0, 1, 2])
  })

  it('settles with the task outcome', async () => {
    const pool = new WorkerPool(1)

    await expect(pool.submit(async () => {
      throw new HttpError('HTTP 500: boom', 500)
    })).rejects.toThrow('HTTP 500: boom')
    await expect(pool.submit(async () => 'next')).resolves.toBe('next')
  })

  it('drains submitted work on shutdown and rejects new work', async () => {
    const pool = new WorkerPool(1, 'Test pool')
    const gate = deferred<string>()
    const pending = pool.submit(() => gate.promise)
    const queued = pool.submit(async () => 'queued')

    const drained = pool.shutdown()
    expect(pool.shutdown()).toBe(drained)
    expect(pool.isShutdown()).toBe(true)

    await expect(pool.submit(async () => 'late')).rejects.toThrow('Test pool has been shut down')

    gate.resolve('first')
    await expect(pending).resolves.toBe('first')
    await expect(queued).resolves.toBe('queued')
    await expect(drained).resolves.toBeUndefined()
    expect(pool.snapshot()).toEqual({ size: 1, active: 0, queued: 0, shutdown: true })
  })

  it('resolves shutdown right away when idle', async () => {
    await expect(new WorkerPool(3).shutdown()).resolves.toBeUndefined()
  })

  it.each([0, -1, 1.5])('rejects a pool size of %s', (size) => {
    expect(() => new WorkerPool(size)).toThrow(ConfigError)
  })
})

describe('AsyncHttpClient', () => {
  it('settles every concurrent call with a value or an open circuit', async () => {
    let invocations = 0
    const mock = new MockHttpClient().addResponder('GET', '/jobs', () => {
      invocations++
      if (invocations === 2) {
        throw new HttpError('HTTP 500: worker crashed', 500)
      }
      return `job ${invocations}`
    })
    const breaker = new CircuitBreakerHttpClient(mock, { failureThreshold: 1, resetTimeoutMs: 30000 })
    const client = new AsyncHttpClient(breaker, 4)
    const spec = RequestBuilder.get<string>('/jobs').build()

    const outcomes = await Promise.allSettled(Array.from({ length: 5 }, () => client.executeAsync(spec)))

    const fulfilled = outcomes.filter(outcome => outcome.status === 'fulfilled')
    const open = outcomes.filter(outcome => outcome.status === 'rejected' && outcome.reason instanceof CircuitOpenError)
    expect(fulfilled.length + open.length).toBe(5)
    expect(fulfilled.length).toBeGreaterThanOrEqual(1)
    expect(open.length).toBeGreaterThanOrEqual(1)

    await client.shutdown()
  })

  it('matches the direct path outcome', async () => {
    const mock = new MockHttpClient()
      .addResponse('GET', '/ok', 'fine')
      .addFailure('GET', '/bad', () => new HttpError('HTTP 502: bad gateway', 502))
    const client = new AsyncHttpClient(mock)

    await expect(client.executeAsync(RequestBuilder.get('/ok').build())).resolves.toBe('fine')
    await expect(client.execute(RequestBuilder.get('/ok').build())).resolves.toBe('fine')
    await expect(client.executeAsync(RequestBuilder.get('/bad').build())).rejects.toMatchObject({ statusCode: 502 })
    await expect(client.execute(RequestBuilder.get('/bad').build())).rejects.toMatchObject({ statusCode: 502 })
  })

  it('rejects calls after shutdown', async () => {
    const mock = new MockHttpClient().addResponse('*', /.*/, 'ok')
    const client = new AsyncHttpClient(mock, 2)

    await client.shutdown()

    expect(client.isShutdown()).toBe(true)
    await expect(client.executeAsync(RequestBuilder.get('/late').build())).rejects.toThrow('Async client has been shut down')
    expect(mock.getTotalInvocations()).toBe(0)
    expect(client.getPoolStats()).toEqual({ size: 2, active: 0, queued: 0, shutdown: true })
  })
})

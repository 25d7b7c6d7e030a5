import { describe, expect, it } from 'vitest'
import { CircuitBreakerHttpClient } from '../src/http/decorators/CircuitBreakerHttpClient'
import { MockHttpClient } from '../src/http/MockHttpClient'
import { RequestBuilder } from '../src/http/RequestBuilder'
import { CircuitBreaker, CircuitState, FailurePolicy } from '../src/utils/circuit-breaker'
import { CircuitOpenError, HttpError } from '../src/utils/TransportError'

function manualClock(start: number = 5_000_000) {
  let current = start
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms
    },
  }
}

const getStatus = RequestBuilder.get<string>('/status').build()

describe('CircuitBreakerHttpClient', () => {
  it('fails fast after the threshold and probes again after the reset timeout', async () => {
    const clock = manualClock()
    const mock = new MockHttpClient().addFailure('GET', '/status', () => new HttpError('HTTP 500: down', 500))
    const client = new CircuitBreakerHttpClient(mock, { failureThreshold: 3, resetTimeoutMs: 1000, now: clock.now })

    await expect(client.execute(getStatus)).rejects.toBeInstanceOf(HttpError)
    await expect(client.execute(getStatus)).rejects.toBeInstanceOf(HttpError)
    await expect(client.execute(getStatus)).rejects.toBeInstanceOf(CircuitOpenError)
    expect(mock.getTotalInvocations()).toBe(3)

    mock.reset()
    mock.addResponse('GET', '/status', 'up')

    await expect(client.execute(getStatus)).rejects.toBeInstanceOf(CircuitOpenError)
    expect(mock.getTotalInvocations()).toBe(0)

    clock.advance(1000)
    await expect(client.execute(getStatus)).resolves.toBe('up')
    expect(mock.getInvocationCount('GET', '/status')).toBe(1)
    expect(client.getState()).toBe(CircuitState.CLOSED)
  })

  it('never opens on 404 under SERVER_ERRORS_ONLY but opens on 500', async () => {
    const mock = new MockHttpClient()
      .addFailure('GET', '/missing', () => new HttpError('HTTP 404: missing', 404))
      .addFailure('GET', '/broken', () => new HttpError('HTTP 500: broken', 500))
    const client = new CircuitBreakerHttpClient(mock, {
      failureThreshold: 3,
      failurePolicy: FailurePolicy.SERVER_ERRORS_ONLY,
    })
    const missing = RequestBuilder.get('/missing').build()
    const broken = RequestBuilder.get('/broken').build()

    for (let i = 0; i < 3; i++) {
      await expect(client.execute(missing)).rejects.toMatchObject({ statusCode: 404 })
    }
    expect(client.getState()).toBe(CircuitState.CLOSED)

    for (let i = 0; i < 3; i++) {
      await client.execute(broken).catch(() => undefined)
    }
    expect(client.getState()).toBe(CircuitState.OPEN)
    expect(client.getCircuitBreakerStats().statusCodes).toEqual({ 404: 3, 500: 3 })
  })

  it('sends a single probe to the delegate under concurrent load', async () => {
    const clock = manualClock()
    const mock = new MockHttpClient().addFailure('GET', '/status', () => new HttpError('HTTP 503: busy', 503))
    const client = new CircuitBreakerHttpClient(mock, { failureThreshold: 1, resetTimeoutMs: 200, now: clock.now })
    await client.execute(getStatus).catch(() => undefined)
    clock.advance(200)

    let release: (value: string) => void = () => undefined
    const gate = new Promise<string>((resolve) => {
      release = resolve
    })
    mock.reset()
    mock.addResponder('GET', '/status', () => gate)

    const calls = Array.from({ length: 8 }, () => client.execute(getStatus))
    expect(mock.getTotalInvocations()).toBe(1)

    release('up')
    const outcomes = await Promise.allSettled(calls)

    expect(mock.getTotalInvocations()).toBe(1)
    expect(outcomes.filter(o => o.status === 'fulfilled')).toHaveLength(1)
    expect(outcomes.filter(o => o.status === 'rejected' && o.reason instanceof CircuitOpenError)).toHaveLength(7)
  })

  it('performHealthCheck bypasses the open circuit and closes it on success', async () => {
    const mock = new MockHttpClient().addFailure('GET', '/status', () => new HttpError('HTTP 500: down', 500))
    const client = new CircuitBreakerHttpClient(mock, { failureThreshold: 1, resetTimeoutMs: 60000 })
    await client.execute(getStatus).catch(() => undefined)
    expect(client.getState()).toBe(CircuitState.OPEN)

    await expect(client.performHealthCheck(getStatus)).resolves.toBe(false)
    expect(mock.getTotalInvocations()).toBe(2)
    expect(client.getState()).toBe(CircuitState.OPEN)

    mock.reset()
    mock.addResponse('GET', '/status', 'up')

    await expect(client.performHealthCheck(getStatus)).resolves.toBe(true)
    expect(client.getState()).toBe(CircuitState.CLOSED)
  })

  it('shares an injected breaker and resets it', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1 })
    const mock = new MockHttpClient().addFailure('*', /.*/, () => new HttpError('HTTP 502: bad gateway', 502))
    const client = new CircuitBreakerHttpClient(mock, breaker)

    await client.execute(getStatus).catch(() => undefined)
    expect(breaker.getState()).toBe(CircuitState.OPEN)

    client.resetCircuitBreaker()
    expect(client.getState()).toBe(CircuitState.CLOSED)
    expect(client.getFailureCount()).toBe(0)
  })
})

import { afterEach, describe, expect, it, vi } from 'vitest'
import { InterceptingHttpClient } from '../src/http/decorators/InterceptingHttpClient'
import { RetryInterceptor, isTransientFailure } from '../src/http/interceptors/RetryInterceptor'
import { HeaderInterceptor } from '../src/http/interceptors/HeaderInterceptor'
import type { RequestInterceptor } from '../src/http/interceptors/types'
import type { RequestSpec } from '../src/http/types'
import { MockHttpClient } from '../src/http/MockHttpClient'
import { RequestBuilder } from '../src/http/RequestBuilder'
import {
  CircuitOpenError,
  ConfigError,
  HttpError,
  NetworkError,
  UnauthorizedError,
} from '../src/utils/TransportError'

function flakyEndpoint(failures: number, failure: (attempt: number) => Error) {
  const attempts: number[] = []
  const mock = new MockHttpClient().addResponder('*', /.*/, () => {
    attempts.push(Date.now())
    if (attempts.length <= failures) {
      throw failure(attempts.length)
    }
    return 'ok'
  })
  return { mock, attempts }
}

const unavailable = (attempt: number) => new HttpError(`HTTP 503: attempt ${attempt}`, 503)

describe('RetryInterceptor', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('retries with exponential backoff until the call succeeds', async () => {
    vi.useFakeTimers()
    const { mock, attempts } = flakyEndpoint(2, unavailable)
    const retry = RetryInterceptor.builder().maxRetries(2).initialDelay(100).backoffMultiplier(2.0).build()
    const client = new InterceptingHttpClient(mock, [retry])

    const result = client.execute(RequestBuilder.get<string>('/flaky').build())
    await vi.runAllTimersAsync()

    await expect(result).resolves.toBe('ok')
    expect(attempts).toHaveLength(3)
    expect(attempts[1] - attempts[0]).toBe(100)
    expect(attempts[2] - attempts[1]).toBe(200)
  })

  it('surfaces the last failure once its retries are spent', async () => {
    const { mock, attempts } = flakyEndpoint(10, unavailable)
    const retry = new RetryInterceptor({ maxRetries: 2, initialDelayMs: 0 })
    const client = new InterceptingHttpClient(mock, [retry])

    await expect(client.execute(RequestBuilder.get('/flaky').build())).rejects.toThrow('HTTP 503: attempt 3')
    expect(attempts).toHaveLength(3)
  })

  const nonRetryable: Array<[string, Error]> = [
    ['a 4xx response', new HttpError('HTTP 404: missing', 404)],
    ['an open circuit', new CircuitOpenError()],
    ['an auth failure', new UnauthorizedError()],
    ['a misconfiguration', new ConfigError('bad url')],
  ]

  it.each(nonRetryable)('does not retry %s', async (_label, error) => {
    const { mock, attempts } = flakyEndpoint(1, () => error)
    const client = new InterceptingHttpClient(mock, [new RetryInterceptor({ initialDelayMs: 0 })])

    await expect(client.execute(RequestBuilder.get('/once').build())).rejects.toBe(error)
    expect(attempts).toHaveLength(1)
  })

  it('leaves non-idempotent methods alone unless configured', async () => {
    const first = flakyEndpoint(1, unavailable)
    const conservative = new InterceptingHttpClient(first.mock, [new RetryInterceptor({ initialDelayMs: 0 })])

    await expect(conservative.execute(RequestBuilder.post('/orders').body({ id: 1 }).build())).rejects.toBeInstanceOf(HttpError)
    expect(first.attempts).toHaveLength(1)

    const second = flakyEndpoint(1, unavailable)
    const permissive = new InterceptingHttpClient(second.mock, [
      RetryInterceptor.builder().initialDelay(0).retryableMethods('POST').build(),
    ])

    await expect(permissive.execute(RequestBuilder.post<string>('/orders').body({ id: 1 }).build())).resolves.toBe('ok')
    expect(second.attempts).toHaveLength(2)
  })

  it('retries network failures', async () => {
    const { mock, attempts } = flakyEndpoint(1, () => new NetworkError('Network error: ECONNRESET'))
    const client = new InterceptingHttpClient(mock, [new RetryInterceptor({ initialDelayMs: 0 })])

    await expect(client.execute(RequestBuilder.get<string>('/net').build())).resolves.toBe('ok')
    expect(attempts).toHaveLength(2)
  })

  it('stops retrying when the backoff would pass the request deadline', async () => {
    const now = 1_000_000
    const { mock, attempts } = flakyEndpoint(5, unavailable)
    const retry = RetryInterceptor.builder().initialDelay(500).clock(() => now).build()
    const client = new InterceptingHttpClient(mock, [retry])
    const spec = RequestBuilder.get('/slow').deadline(now + 400).build()

    await expect(client.execute(spec)).rejects.toThrow('HTTP 503: attempt 1')
    expect(attempts).toHaveLength(1)
  })

  it('caps the delay at maxDelay', () => {
    const retry = new RetryInterceptor({ initialDelayMs: 1000, backoffMultiplier: 3, maxDelayMs: 5000 })

    expect(retry.delayFor(0)).toBe(1000)
    expect(retry.delayFor(1)).toBe(3000)
    expect(retry.delayFor(2)).toBe(5000)
  })

  it('classifies transient failures', () => {
    expect(isTransientFailure(new NetworkError('timeout'))).toBe(true)
    expect(isTransientFailure(new HttpError('HTTP 502: bad gateway', 502))).toBe(true)
    expect(isTransientFailure(new HttpError('HTTP 429: slow down', 429))).toBe(false)
    expect(isTransientFailure(new Error('plain'))).toBe(false)
  })

  it('rejects invalid settings', () => {
    expect(() => new RetryInterceptor({ maxRetries: -1 })).toThrow(ConfigError)
    expect(() => new RetryInterceptor({ backoffMultiplier: 0.5 })).toThrow('Backoff multiplier must be at least 1')
  })
})

describe('InterceptingHttpClient', () => {
  it('runs beforeRequest by ascending order and afterResponse in reverse', async () => {
    const calls: string[] = []
    const tracer = (name: string, order: number): RequestInterceptor => ({
      order,
      beforeRequest<T>(request: RequestSpec<T>): RequestSpec<T> {
        calls.push(`before:${name}`)
        return request
      },
      afterResponse<T>(response: T): T {
        calls.push(`after:${name}`)
        return response
      },
    })
    const mock = new MockHttpClient().addResponse('GET', '/trace', 'ok')
    const client = new InterceptingHttpClient(mock, [tracer('late', 20), tracer('early', 10)])

    await expect(client.execute(RequestBuilder.get('/trace').build())).resolves.toBe('ok')
    expect(calls).toEqual(['before:early', 'before:late', 'after:late', 'after:early'])
  })

  it('lets the first resolving onError recover the call', async () => {
    const passes: RequestInterceptor = {
      order: 1,
      onError: (error: unknown) => Promise.reject(error),
    }
    const fallback = new MockHttpClient().addResponder('*', /.*/, spec => `fallback for ${spec.endpoint}`)
    const recovers: RequestInterceptor = {
      order: 2,
      onError: <T>(_error: unknown, request: RequestSpec<T>) => fallback.execute(request),
    }
    const mock = new MockHttpClient().addFailure('GET', '/down', new HttpError('HTTP 500: down', 500))
    const client = new InterceptingHttpClient(mock, [recovers, passes])

    await expect(client.execute(RequestBuilder.get<string>('/down').build())).resolves.toBe('fallback for /down')
  })

  it('passes a replaced failure on to the next interceptor', async () => {
    const seen: string[] = []
    const wraps: RequestInterceptor = {
      order: 1,
      onError: () => Promise.reject(new NetworkError('wrapped')),
    }
    const records: RequestInterceptor = {
      order: 2,
      onError: (error: unknown) => {
        seen.push(error instanceof Error ? error.message : String(error))
        return Promise.reject(error)
      },
    }
    const mock = new MockHttpClient().addFailure('GET', '/down', new HttpError('HTTP 500: down', 500))
    const client = new InterceptingHttpClient(mock, [records, wraps])

    await expect(client.execute(RequestBuilder.get('/down').build())).rejects.toThrow('wrapped')
    expect(seen).toEqual(['wrapped'])
  })

  it('enforces the global retry ceiling across interceptors', async () => {
    const { mock, attempts } = flakyEndpoint(10, unavailable)
    const client = new InterceptingHttpClient(mock, [
      new RetryInterceptor({ maxRetries: 5, initialDelayMs: 0 }),
      new RetryInterceptor({ maxRetries: 5, initialDelayMs: 0 }),
    ], 2)

    await expect(client.execute(RequestBuilder.get('/flaky').build())).rejects.toThrow('HTTP 503: attempt 3')
    expect(attempts).toHaveLength(3)
  })

  it('applies static headers on every attempt', async () => {
    const seen: Array<Readonly<Record<string, string>>> = []
    let calls = 0
    const mock = new MockHttpClient().addResponder('GET', '/tagged', (spec) => {
      seen.push(spec.headers)
      calls++
      if (calls === 1) throw new NetworkError('Network error: ECONNRESET')
      return 'ok'
    })
    const client = new InterceptingHttpClient(mock, [
      new HeaderInterceptor({ 'X-Client': 'httpward' }),
      new RetryInterceptor({ initialDelayMs: 0 }),
    ])

    await client.execute(RequestBuilder.get('/tagged').header('x-client', 'caller').build())

    expect(seen).toHaveLength(2)
    for (const headers of seen) {
      expect(headers).toEqual({
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'X-Client': 'httpward',
      })
    }
  })
})

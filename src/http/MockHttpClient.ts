import type { Executor, HttpMethod, RequestSpec } from './types'
import { HttpError } from '../utils/TransportError'

export type MockResponder = (spec: RequestSpec<unknown>) => unknown

interface MockRule {
  method: HttpMethod | '*'
  endpoint: string | RegExp
  respond: MockResponder
}

/**
 * In-process executor for tests and examples
 * Rules match in registration order; unmatched requests fail with a 404 HttpError.
 *
 * @example
 * const mock = new MockHttpClient()
 *   .addResponse('GET', '/users/1', { id: 1, name: 'Ada' })
 *   .addFailure('POST', /^\/users/, () => new HttpError('HTTP 500: boom', 500))
 */
export class MockHttpClient implements Executor {
  private rules: MockRule[] = []
  private readonly invocations = new Map<string, number>()
  private latencyMs = 0

  addResponse(method: HttpMethod | '*', endpoint: string | RegExp, response: unknown): this {
    this.rules.push({ method, endpoint, respond: () => response })
    return this
  }

  /**
   * Answer with whatever `respond` returns (or resolves to); a throw becomes the failure
   */
  addResponder(method: HttpMethod | '*', endpoint: string | RegExp, respond: MockResponder): this {
    this.rules.push({ method, endpoint, respond })
    return this
  }

  addFailure(method: HttpMethod | '*', endpoint: string | RegExp, failure: Error | (() => Error)): this {
    this.rules.push({
      method,
      endpoint,
      respond: () => {
        throw failure instanceof Error ? failure : failure()
      },
    })
    return this
  }

  withLatency(ms: number): this {
    this.latencyMs = ms
    return this
  }

  async execute<T>(spec: RequestSpec<T>): Promise<T> {
    const key = `${spec.method} ${spec.endpoint}`
    this.invocations.set(key, (this.invocations.get(key) ?? 0) + 1)

    if (this.latencyMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.latencyMs))
    }

    const rule = this.rules.find(candidate => matches(candidate, spec))
    if (!rule) {
      throw new HttpError(`No mock response for ${key}`, 404)
    }

    const raw = await rule.respond(spec)
    if (spec.parse) {
      return spec.parse(raw)
    }
    // Fixture values are typed by the caller
    return raw as T
  }

  getInvocationCount(method: HttpMethod, endpoint: string): number {
    return this.invocations.get(`${method} ${endpoint}`) ?? 0
  }

  getTotalInvocations(): number {
    let total = 0
    for (const count of this.invocations.values()) {
      total += count
    }
    return total
  }

  /**
   * Forget every rule and invocation count
   */
  reset(): void {
    this.rules = []
    this.invocations.clear()
    this.latencyMs = 0
  }
}

function matches(rule: MockRule, spec: RequestSpec<unknown>): boolean {
  if (rule.method !== '*' && rule.method !== spec.method) {
    return false
  }
  return typeof rule.endpoint === 'string'
    ? rule.endpoint === spec.endpoint
    : spec.endpoint.search(rule.endpoint) !== -1
}

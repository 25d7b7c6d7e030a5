type ResultState<T, E> =
  | { readonly tag: 'success'; readonly value: T }
  | { readonly tag: 'failure'; readonly error: E }

/**
 * Either a success value or a typed error.
 * Reading the value of a failure (or the error of a success) throws.
 *
 * @example
 * const result = await client.fluent().get<User>('/users/1')
 * result.match(
 *   user => logger.info('Found user', { id: user.id }),
 *   error => logger.warn('Lookup failed', { status: error.statusCode }),
 * )
 */
export class Result<T, E> {
  private constructor(private readonly state: ResultState<T, E>) {}

  static success<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ tag: 'success', value })
  }

  static failure<E, T = never>(error: E): Result<T, E> {
    return new Result<T, E>({ tag: 'failure', error })
  }

  isSuccess(): boolean {
    return this.state.tag === 'success'
  }

  isFailure(): boolean {
    return this.state.tag === 'failure'
  }

  getValue(): T {
    if (this.state.tag !== 'success') {
      throw new Error('Cannot get value from a failure Result')
    }
    return this.state.value
  }

  getError(): E {
    if (this.state.tag !== 'failure') {
      throw new Error('Cannot get error from a success Result')
    }
    return this.state.error
  }

  getOrElse(defaultValue: T): T {
    return this.state.tag === 'success' ? this.state.value : defaultValue
  }

  getOrElseGet(supplier: (error: E) => T): T {
    return this.state.tag === 'success' ? this.state.value : supplier(this.state.error)
  }

  getOrElseThrow(toError: (error: E) => Error): T {
    if (this.state.tag === 'success') {
      return this.state.value
    }
    throw toError(this.state.error)
  }

  unwrap(): T {
    if (this.state.tag === 'success') {
      return this.state.value
    }
    throw new Error(`Unwrapped a failure Result: ${String(this.state.error)}`)
  }

  map<U>(mapper: (value: T) => U): Result<U, E> {
    if (this.state.tag === 'success') {
      return Result.success<U, E>(mapper(this.state.value))
    }
    return Result.failure<E, U>(this.state.error)
  }

  mapError<F>(mapper: (error: E) => F): Result<T, F> {
    if (this.state.tag === 'success') {
      return Result.success<T, F>(this.state.value)
    }
    return Result.failure<F, T>(mapper(this.state.error))
  }

  flatMap<U>(mapper: (value: T) => Result<U, E>): Result<U, E> {
    if (this.state.tag === 'success') {
      return mapper(this.state.value)
    }
    return Result.failure<E, U>(this.state.error)
  }

  ifSuccess(consumer: (value: T) => void): this {
    if (this.state.tag === 'success') {
      consumer(this.state.value)
    }
    return this
  }

  ifFailure(consumer: (error: E) => void): this {
    if (this.state.tag === 'failure') {
      consumer(this.state.error)
    }
    return this
  }

  match(onSuccess: (value: T) => void, onFailure: (error: E) => void): this {
    if (this.state.tag === 'success') {
      onSuccess(this.state.value)
    } else {
      onFailure(this.state.error)
    }
    return this
  }

  fold<U>(onSuccess: (value: T) => U, onFailure: (error: E) => U): U {
    return this.state.tag === 'success' ? onSuccess(this.state.value) : onFailure(this.state.error)
  }

  toString(): string {
    return this.state.tag === 'success'
      ? `Success[${String(this.state.value)}]`
      : `Failure[${String(this.state.error)}]`
  }
}

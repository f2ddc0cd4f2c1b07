/**
 * A successful {@link Result} carrying a value.
 */
export class Ok<T, E> {
  constructor(private readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<T, E> {
    return false;
  }

  ok(): T {
    return this.value;
  }

  err(): undefined {
    return undefined;
  }

  /**
   * Returns the contained value.
   */
  unsafeUnwrap(): T {
    return this.value;
  }

  /**
   * Throws, since there is no error to return.
   */
  unsafeUnwrapErr(): never {
    throw new Error('Expected an error, got a value');
  }
}

/**
 * A failed {@link Result} carrying an error.
 */
export class Err<T, E> {
  constructor(private readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }

  ok(): undefined {
    return undefined;
  }

  err(): E {
    return this.error;
  }

  /**
   * Throws the contained error, wrapped in an `Error` if it isn't one.
   */
  unsafeUnwrap(): never {
    if (this.error instanceof Error) {
      throw this.error;
    }
    throw new Error(`Unwrapped an error result: ${JSON.stringify(this.error)}`);
  }

  unsafeUnwrapErr(): E {
    return this.error;
  }
}

/**
 * The outcome of an operation that can fail in an expected way. Unexpected
 * failures should still throw.
 */
export type Result<T, E> = Ok<T, E> | Err<T, E>;

/**
 * Builds a successful result.
 */
export function ok<E = never>(): Ok<void, E>;
export function ok<T, E = never>(value: T): Ok<T, E>;
export function ok<T, E>(value?: T): Ok<T | undefined, E> {
  return new Ok(value);
}

/**
 * Builds a failed result.
 */
export function err<E, T = never>(error: E): Err<T, E> {
  return new Err(error);
}

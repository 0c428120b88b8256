/**
 * Result<T, E> type for functional error handling
 * Used at the parser boundary, where a rejected pattern is an expected outcome
 */

export type Result<T, E> = Ok<T> | Err<E>;

/**
 * Success variant of Result<T, E>
 */
export class Ok<T> {
  readonly _tag = 'Ok' as const;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T> {
    return true;
  }

  isErr(): this is never {
    return false;
  }

  /**
   * Transform the success value using the provided function
   */
  map<U>(fn: (value: T) => U): Ok<U> {
    return new Ok(fn(this.value));
  }

  /**
   * Get the value or throw an error
   * Use sparingly - prefer pattern matching with isOk/isErr
   */
  unwrap(): T {
    return this.value;
  }
}

/**
 * Error variant of Result<T, E>
 */
export class Err<E> {
  readonly _tag = 'Err' as const;

  constructor(public readonly error: E) {}

  isOk(): this is never {
    return false;
  }

  isErr(): this is Err<E> {
    return true;
  }

  /**
   * Map over the success value (no-op for Err)
   */
  map(_fn: (_value: never) => unknown): Err<E> {
    return this;
  }

  /**
   * Throws the carried error when it is an Error, otherwise wraps it
   */
  unwrap(): never {
    if (this.error instanceof Error) throw this.error;
    throw new Error(`Called unwrap on an Err value: ${String(this.error)}`);
  }
}

/**
 * Helper function to create a success Result
 */
export function ok<T>(value: T): Ok<T> {
  return new Ok(value);
}

/**
 * Helper function to create an error Result
 */
export function err<E>(error: E): Err<E> {
  return new Err(error);
}

/**
 * Type guards for Result variants
 */
export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.isOk();
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.isErr();
}

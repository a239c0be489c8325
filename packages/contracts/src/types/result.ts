type ResultState<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * A Result type for explicit, type-safe error handling.
 *
 * @example
 * ```typescript
 * const config = buildMazeConfig(input).match(
 *   (resolved) => resolved,
 *   (error) => fallbackConfig(error.code),
 * );
 * ```
 */
export class Result<T, E> {
  private constructor(private readonly state: ResultState<T, E>) {}

  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ ok: true, value });
  }

  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error });
  }

  /**
   * Create a Result from a function that might throw. `onError` may
   * rethrow errors it does not recognize.
   */
  static fromThrowable<T, E>(
    fn: () => T,
    onError: (e: unknown) => E,
  ): Result<T, E> {
    try {
      return Result.ok(fn());
    } catch (e) {
      return Result.err(onError(e));
    }
  }

  getOrThrow(): T {
    if (this.state.ok) {
      return this.state.value;
    }
    throw this.state.error;
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    return this.state.ok ? onOk(this.state.value) : onErr(this.state.error);
  }
}

export const Ok = Result.ok;
export const Err = Result.err;

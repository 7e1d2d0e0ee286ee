/**
 * Typed result for operations that can fail.
 *
 * Role in system:
 * - Services return `Result` instead of throwing so the command layer decides
 *   how a failure ends the run.
 *
 * Contract:
 * - Check `isErr()` / `isOk()` before `unwrap()`. On `Err`, `unwrap()` throws the
 *   contained error; commands only call it after a guard.
 *
 * Example:
 * ```ts
 * const res = await analysisService.run(input, write);
 * if (res.isErr()) return reportFailure(log, res.error);
 * const summary = res.unwrap();
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  constructor(public readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<T, E> {
    return false;
  }

  unwrap(): T {
    return this.value;
  }
}

export class Err<T, E> {
  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }

  /**
   * There is no value to return, so the contained error is thrown.
   */
  unwrap(): T {
    throw this.error;
  }
}

/** Builds a successful result. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok(value);

/** Builds a failed result. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err(error);

/** Normalizes anything caught into an `Error`. */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

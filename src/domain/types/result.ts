/**
 * Result Pattern
 * Discriminated union for operations whose failure is an expected branch
 * (a sync attempt, a tunnel start) rather than an exception.
 */

export type Result<T, E = string> = { ok: true; value: T } | { ok: false; error: E };

export const Success = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const Failure = <E = string>(error: E): Result<never, E> => ({ ok: false, error });

export const isOk = <T, E>(result: Result<T, E>): result is { ok: true; value: T } => result.ok;

export const isFail = <T, E>(result: Result<T, E>): result is { ok: false; error: E } =>
  !result.ok;

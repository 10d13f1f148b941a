/**
 * Result type for explicit error handling without exceptions.
 * Every port in the application returns one of these instead of throwing.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export const Result = {
  ok: <T>(value: T): Result<T, never> => ({ ok: true, value }),
  err: <E>(error: E): Result<never, E> => ({ ok: false, error }),

  map: <T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> =>
    result.ok ? Result.ok(fn(result.value)) : result,

  unwrapOr: <T, E>(result: Result<T, E>, defaultValue: T): T =>
    result.ok ? result.value : defaultValue,
}

/**
 * Base class for domain errors
 */
export abstract class DomainError extends Error {
  abstract readonly code: string

  constructor(message: string) {
    super(message)
    this.name = this.constructor.name
  }
}

/**
 * Extract a printable message from anything caught in a `catch` clause
 */
export function describeError(error: unknown, fallback: string): string {
  if (error instanceof Error) return error.message
  if (typeof error === "string" && error.length > 0) return error
  return fallback
}

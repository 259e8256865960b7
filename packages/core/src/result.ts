/**
 * Result type for expected failures at package boundaries.
 * Code inside a pipeline may throw typed errors; the boundary converts them once.
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function Ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function Err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}

/**
 * Outcome of one extraction path. The orchestrator decides what a failure
 * degrades to; paths never throw for provider or parse failures.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

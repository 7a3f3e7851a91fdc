/**
 * Tagged result used across service boundaries instead of thrown exceptions.
 * Errors carry a discriminating `kind` so callers switch on it rather than
 * matching message text.
 */
export type Ok<T> = { readonly ok: true; readonly value: T; };
export type Err<E> = { readonly ok: false; readonly error: E; };
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/**
 * Unwraps a result, throwing the error produced by `toError` on failure.
 * Used at the edges where a failure has to become an exception again
 * (pipeline stages, CLI commands).
 */
export function unwrapOr<T, E>(result: Result<T, E>, toError: (error: E) => Error): T {
    if (result.ok) return result.value;
    throw toError(result.error);
}

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const fail = <E = Error>(error: E): Result<never, E> => ({ ok: false, error });

export const toError = (err: unknown): Error => (err instanceof Error ? err : new Error(String(err)));

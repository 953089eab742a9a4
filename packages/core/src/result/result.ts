import type { ForceGateError } from "./errors";

/** Discriminated union representing either success or failure */
export type Result<T, E = ForceGateError> = { ok: true; value: T } | { ok: false; error: E };

/** Create a successful Result */
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

/** Create a failed Result */
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

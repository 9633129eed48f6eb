/**
 * Core types for the cluster configuration engine
 */

/**
 * Result type - simple discriminated union for error handling
 */
export type Result<T, E = string> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Create a success result
 */
export const Success = <T>(value: T): Result<T, never> => ({ ok: true, value });

/**
 * Create a failure result
 */
export const Failure = <E = string>(error: E): Result<never, E> => ({ ok: false, error });

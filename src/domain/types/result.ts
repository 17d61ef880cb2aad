/**
 * Simplified Result Pattern
 * Basic discriminated union for error handling without complex monadic utilities
 */

/**
 * Result type - simple discriminated union, string errors unless stated otherwise
 */
export type Result<T, E = string> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Create a success result
 */
export const Success = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

/**
 * Create a failure result
 */
export const Failure = <E = string>(error: E): { ok: false; error: E } => ({ ok: false, error });


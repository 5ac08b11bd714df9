/**
 * @fileoverview Result type for explicit error handling
 *
 * Store calls in session memory return Results instead of throwing so that a
 * failing tier becomes a value the caller has to look at.
 */

import { toError } from '../utils/errors.js';

// ============================================================================
// CORE RESULT TYPE
// ============================================================================

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============================================================================
// RESULT HELPERS
// ============================================================================

/**
 * Wrap an async function in a Result
 */
export async function safeAsync<T>(
  fn: () => Promise<T>
): Promise<Result<T, Error>> {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(toError(e));
  }
}


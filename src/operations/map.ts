/**
 * Value transforms that keep the error set.
 */

import type { Result } from "../types/common.js";
import { success } from "../core/result.js";

/**
 * Maps over a successful Result, passing failures through unchanged.
 *
 * @param result - The Result to map over
 * @param fn - The function to apply to the success value
 * @returns A new Result over the same error set
 */
export const mapResult = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => U,
): Result<U, E> =>
  result.success ? success(result.errorSet, fn(result.data)) : result;

/**
 * Chains Result-returning operations over the same error set,
 * short-circuiting on the first failure.
 *
 * @param result - The Result to chain from
 * @param fn - The function that returns a new Result
 * @returns The chained Result or the original failure
 */
export const flatMapResult = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => Result<U, E>,
): Result<U, E> => (result.success ? fn(result.data) : result);

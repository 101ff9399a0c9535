/**
 * Result type for operations that declare their expected errors.
 * Holds either a value or a non-empty list of errors from a closed set.
 */

import type { ErrorSet } from "./error-set.js";

/** A successful Result. */
export interface SuccessResult<T, E> {
  readonly success: true;
  readonly data: T;
  readonly errorSet: ErrorSet<E>;
}

/** A failed Result. Its errors are all members of `errorSet`. */
export interface FailureResult<E> {
  readonly success: false;
  readonly errors: readonly [E, ...E[]];
  readonly errorSet: ErrorSet<E>;
}

export type Result<T, E> = SuccessResult<T, E> | FailureResult<E>;

/** A pending Result. Purely a naming convention. */
export type AsyncResult<T, E> = Promise<Result<T, E>>;

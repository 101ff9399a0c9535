/**
 * Result constructors. Every failure is checked against its error set
 * when it is built, not when it is read.
 */

import type { Result } from "../types/common.js";
import type { ErrorSet } from "../types/error-set.js";
import { InvariantViolation, reportViolation } from "../validation/errors.js";
import { formatErrors } from "../utils/format.js";

/**
 * Throws unless every error is a member of the set. Each error is checked
 * once.
 * @internal
 */
export function assertMembers<E>(
  errorSet: ErrorSet<E>,
  errors: readonly unknown[],
  prefix: string,
): asserts errors is readonly E[] {
  const unexpected = errors.filter((error) => !errorSet.isMember(error));
  if (unexpected.length > 0) {
    throw reportViolation(
      errorSet,
      new InvariantViolation(
        "unexpected-error",
        `${prefix} ${errorSet.name}: ${formatErrors(unexpected)}`,
        { errors: unexpected, errorSet: errorSet.name },
      ),
    );
  }
}

const isNonEmpty = <T>(items: readonly T[]): items is readonly [T, ...T[]] =>
  items.length > 0;

/**
 * Builds a failed Result from errors already known to be members.
 * @internal
 */
export const freezeFailure = <T, E>(
  errorSet: ErrorSet<E>,
  errors: readonly E[],
): Result<T, E> => {
  if (!isNonEmpty(errors)) {
    throw reportViolation(
      errorSet,
      new InvariantViolation(
        "empty-failure",
        `A failed result over ${errorSet.name} needs at least one error`,
        { errorSet: errorSet.name },
      ),
    );
  }

  return Object.freeze({
    success: false as const,
    errors: Object.freeze<[E, ...E[]]>([...errors]),
    errorSet,
  });
};

/** Creates a successful Result over the given error set. */
export const success = <T, E>(errorSet: ErrorSet<E>, data: T): Result<T, E> =>
  Object.freeze({ success: true as const, data, errorSet });

/**
 * Creates a failed Result from a non-empty list of errors, keeping their
 * order.
 *
 * @param errorSet - The declared error set
 * @param errors - Errors that must all be members of `errorSet`
 * @throws {InvariantViolation} When `errors` is empty or holds a non-member
 *
 * @example
 * ```ts
 * const result = failures(HttpErrors, body.errors.map(parseValidationError));
 * ```
 */
export const failures = <T = never, E = never>(
  errorSet: ErrorSet<E>,
  errors: readonly E[],
): Result<T, E> => {
  assertMembers(errorSet, errors, "Unexpected errors for");
  return freezeFailure(errorSet, errors);
};

/**
 * Creates a failed Result holding a single error.
 *
 * @throws {InvariantViolation} When `error` is not a member of `errorSet`
 */
export const failure = <T = never, E = never>(
  errorSet: ErrorSet<E>,
  error: E,
): Result<T, E> => failures<T, E>(errorSet, [error]);

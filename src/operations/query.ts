/**
 * Read-only queries over a Result.
 *
 * Variant arguments may be any descriptor, declared in the result's error
 * set or not; an undeclared variant simply matches nothing.
 */

import type { FailureResult, Result, SuccessResult } from "../types/common.js";
import type { ErrorVariant, InferVariant } from "../types/error-set.js";
import { matchesVariant } from "../core/variant.js";
import { InvariantViolation, reportViolation } from "../validation/errors.js";
import { formatErrors } from "../utils/format.js";

/** Returns true if the operation succeeded. */
export const isSuccessful = <T, E>(
  result: Result<T, E>,
): result is SuccessResult<T, E> => result.success;

/** Returns true if the operation failed. */
export const isFailed = <T, E>(
  result: Result<T, E>,
): result is FailureResult<E> => !result.success;

/** The errors of a failed result, or an empty list for a successful one. */
export const getErrors = <E>(result: Result<unknown, E>): readonly E[] =>
  result.success ? [] : result.errors;

/**
 * Returns all errors of the given variant, in their original order.
 *
 * @example
 * ```ts
 * for (const fieldError of findErrors(result, InvalidFormField)) {
 *   form.setError(fieldError.fieldName, fieldError.message);
 * }
 * ```
 */
export const findErrors = <E, V extends ErrorVariant>(
  result: Result<unknown, E>,
  variant: V,
): InferVariant<V>[] => {
  const found: InferVariant<V>[] = [];
  for (const error of getErrors(result)) {
    if (matchesVariant(variant, error)) found.push(error);
  }
  return found;
};

/** Returns the first error of the given variant, or `undefined`. */
export const findError = <E, V extends ErrorVariant>(
  result: Result<unknown, E>,
  variant: V,
): InferVariant<V> | undefined => {
  for (const error of getErrors(result)) {
    if (matchesVariant(variant, error)) return error;
  }
  return undefined;
};

/** Returns true if the operation failed with at least one error of the variant. */
export const hasError = <E, V extends ErrorVariant>(
  result: Result<unknown, E>,
  variant: V,
): boolean => findErrors(result, variant).length > 0;

/**
 * Returns true if the operation failed with exactly one error, and that
 * error is of the given variant. A second error of any variant makes it
 * false.
 */
export const hasSingleError = <E, V extends ErrorVariant>(
  result: Result<unknown, E>,
  variant: V,
): boolean => {
  const errors = getErrors(result);
  return errors.length === 1 && matchesVariant(variant, errors[0]);
};

const unhandledErrors = <E>(result: FailureResult<E>): InvariantViolation =>
  reportViolation(
    result.errorSet,
    new InvariantViolation(
      "unhandled-errors",
      `Unhandled expected errors: ${formatErrors(result.errors)}`,
      { errors: result.errors, errorSet: result.errorSet.name },
    ),
  );

/**
 * Throws unless the result is successful.
 *
 * @throws {InvariantViolation} Listing every error of a failed result
 */
export const ensureSuccess = <E>(result: Result<unknown, E>): void => {
  if (!result.success) throw unhandledErrors(result);
};

/**
 * Returns the value of a successful result.
 *
 * Check for the declared errors first; reading the value of a failed
 * result is a programming error.
 *
 * @throws {InvariantViolation} Listing every error of a failed result
 *
 * @example
 * ```ts
 * const loginResult = await login("user@example.com", "test-password");
 * if (hasError(loginResult, InvalidCredentials)) return showFailure();
 * if (hasError(loginResult, EmailNotConfirmed)) return redirectToConfirmation();
 * storeToken(getValue(loginResult));
 * ```
 */
export const getValue = <T, E>(result: Result<T, E>): T => {
  if (!result.success) throw unhandledErrors(result);
  return result.data;
};

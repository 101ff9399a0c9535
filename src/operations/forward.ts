/**
 * Forwarding: re-declares a Result under a different error set.
 *
 * A function that calls a lower layer uses this to translate the lower
 * layer's errors into its own. The destination set is checked on every
 * forward, so it bounds what the function can fail with.
 */

import type { Result } from "../types/common.js";
import type { ErrorSet } from "../types/error-set.js";
import { assertMembers, freezeFailure, success } from "../core/result.js";
import { InvariantViolation, reportViolation } from "../validation/errors.js";

/** Callbacks for {@link forward}. At least one is required. */
export interface ForwardCallbacks<T, U, E, F> {
  /** Transforms the value of a successful result. */
  readonly success?: ((data: T) => U) | undefined;
  /**
   * Called once per error of a failed result. Returning the error itself
   * is allowed; it must then already be a member of the destination set.
   */
  readonly failure?: ((error: E) => F | E) | undefined;
}

const isWellFormed = <T, E>(result: Result<T, E>): boolean => {
  if (result.success === true) return !("errors" in result);
  if (result.success === false) {
    return (
      Array.isArray(result.errors) &&
      result.errors.length > 0 &&
      !("data" in result)
    );
  }
  return false;
};

/**
 * Forwards a Result into another error set.
 *
 * A successful result is passed through `success`; the failure callback is
 * not called. A failed result has `failure` applied to each error in
 * order, and every mapped error must belong to `errorSet`.
 *
 * @param result - The Result to forward
 * @param errorSet - The destination error set
 * @param callbacks - Value and error transforms
 * @throws {InvariantViolation} When no callback is given, the callback the
 *   result needs is missing, the result is malformed, or a mapped error is
 *   not a member of `errorSet`
 *
 * @example
 * ```ts
 * const login = async (
 *   email: string,
 *   password: string,
 * ): AsyncResult<AuthToken, InvalidCredentials | EmailNotConfirmed> => {
 *   const response = await httpPost("/auth/login", { email, password });
 *   return forward(response, LoginErrors, {
 *     success: (r) => parseAuthToken(r.data),
 *     failure: (e) => {
 *       if (e instanceof Unauthorized) return new InvalidCredentials();
 *       if (isValidationError(e) && e.code === "email-not-confirmed") {
 *         return new EmailNotConfirmed();
 *       }
 *       return e;
 *     },
 *   });
 * };
 * ```
 */
export const forward = <T, U, E, F>(
  result: Result<T, E>,
  errorSet: ErrorSet<F>,
  callbacks: ForwardCallbacks<T, U, E, F>,
): Result<U, F> => {
  const { success: onSuccess, failure: onFailure } = callbacks;

  if (!onSuccess && !onFailure) {
    throw reportViolation(
      errorSet,
      new InvariantViolation(
        "missing-callback",
        "Either a success or a failure callback must be provided",
        { errorSet: errorSet.name },
      ),
    );
  }

  if (!isWellFormed(result)) {
    throw reportViolation(
      errorSet,
      new InvariantViolation(
        "malformed-result",
        "Result is in an incorrect state: it must hold either data or a non-empty error list",
        { errorSet: errorSet.name },
      ),
    );
  }

  if (result.success) {
    if (!onSuccess) {
      throw reportViolation(
        errorSet,
        new InvariantViolation(
          "missing-callback",
          "Cannot forward a successful result without a success callback",
          { errorSet: errorSet.name },
        ),
      );
    }
    return success(errorSet, onSuccess(result.data));
  }

  if (!onFailure) {
    throw reportViolation(
      errorSet,
      new InvariantViolation(
        "missing-callback",
        "Cannot forward a failed result without a failure callback",
        { errors: result.errors, errorSet: errorSet.name },
      ),
    );
  }

  const mapped: readonly unknown[] = result.errors.map((error) =>
    onFailure(error),
  );
  assertMembers(errorSet, mapped, "Cannot forward unexpected errors into");

  return freezeFailure(errorSet, mapped);
};

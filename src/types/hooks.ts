/**
 * Hook types for error sets.
 */

import type { InvariantViolation } from "../validation/errors.js";

/**
 * Hooks attached to an error set.
 *
 * The library never logs. Hooks are where an application attaches its own
 * logger or crash reporter to contract violations before they are thrown.
 * Throwing from a hook aborts with the hook's error instead of the
 * violation.
 *
 * @example
 * ```ts
 * const LoginErrors = defineErrorSet({
 *   name: "LoginErrors",
 *   variants: [InvalidCredentials, EmailNotConfirmed],
 *   hooks: {
 *     onViolation: (violation) => logger.error(violation.message),
 *   },
 * });
 * ```
 */
export interface ErrorSetHooks {
  /**
   * Called synchronously right before an {@link InvariantViolation}
   * concerning this set is thrown: building a failure over the set,
   * forwarding into it, or reading the value of a failed result over it.
   */
  onViolation?(violation: InvariantViolation): void;
}

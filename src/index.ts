/**
 * expected-errors: results that declare the closed set of errors they may
 * fail with.
 *
 * An operation returns a Result over an error set. Callers branch on which
 * declared error occurred. Errors outside the declared set, and misuse of
 * a Result, are programming errors and throw an `InvariantViolation`.
 *
 * @example
 * ```ts
 * import { defineErrorSet, failure, success, hasError, getValue, type Result } from "expected-errors";
 *
 * class InvalidCredentials {}
 * class EmailNotConfirmed {}
 *
 * const LoginErrors = defineErrorSet({
 *   name: "LoginErrors",
 *   variants: [InvalidCredentials, EmailNotConfirmed],
 * });
 *
 * const login = (email: string): Result<string, InvalidCredentials | EmailNotConfirmed> =>
 *   email.endsWith("@example.com")
 *     ? success(LoginErrors, "token")
 *     : failure(LoginErrors, new InvalidCredentials());
 *
 * const result = login("alice@example.com");
 * if (!hasError(result, InvalidCredentials)) console.log(getValue(result));
 * ```
 */

// Error sets and variants
export { defineErrorSet } from "./core/define-error-set.js";
export { defineVariant, describeVariant, matchesVariant } from "./core/variant.js";
export type {
  ErrorSet,
  ErrorSet1,
  ErrorSet2,
  ErrorSet3,
  ErrorSet4,
  ErrorSet5,
  ErrorSet6,
  ErrorSetConfig,
  ErrorVariant,
  ErrorVariants,
  InferVariant,
  VariantClass,
  VariantGuard,
} from "./types/error-set.js";
export type { ErrorSetHooks } from "./types/hooks.js";

// Result type and constructors
export type { Result, AsyncResult, SuccessResult, FailureResult } from "./types/common.js";
export { success, failure, failures } from "./core/result.js";

// Queries
export {
  isSuccessful,
  isFailed,
  getErrors,
  findError,
  findErrors,
  hasError,
  hasSingleError,
  getValue,
  ensureSuccess,
} from "./operations/query.js";

// Transforms
export { mapResult, flatMapResult } from "./operations/map.js";
export { forward, type ForwardCallbacks } from "./operations/forward.js";

// Contract violations
export { InvariantViolation, type ViolationKind } from "./validation/errors.js";
export { formatError, formatErrors } from "./utils/format.js";

// Standard Schema types (re-exported for convenience)
export type { StandardSchemaV1 } from "./standard-schema/types.js";

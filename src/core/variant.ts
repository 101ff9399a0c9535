/**
 * Error variant descriptors and the membership test behind every error set.
 */

import type { StandardSchemaV1 } from "../standard-schema/types.js";
import type {
  ErrorVariant,
  InferVariant,
  VariantClass,
  VariantGuard,
} from "../types/error-set.js";
import { InvariantViolation } from "../validation/errors.js";

/**
 * Defines a variant from a type guard. Useful for tagged plain-object
 * errors that have no class of their own.
 *
 * @param name - Shown in diagnostics
 * @param is - Returns true for values of the variant
 * @returns A frozen {@link VariantGuard}
 *
 * @example
 * ```ts
 * type RateLimited = { readonly kind: "rate-limited"; readonly retryAfter: number };
 *
 * const RateLimited = defineVariant(
 *   "RateLimited",
 *   (value): value is RateLimited =>
 *     typeof value === "object" && value !== null &&
 *     "kind" in value && value.kind === "rate-limited",
 * );
 * ```
 */
export const defineVariant = <E>(
  name: string,
  is: (value: unknown) => value is E,
): VariantGuard<E> => Object.freeze({ name, is });

// Checked before the class test: some validator libraries build schemas
// that are callable functions.
const isStandardSchema = (
  variant: ErrorVariant,
): variant is StandardSchemaV1 =>
  (typeof variant === "object" || typeof variant === "function") &&
  variant !== null &&
  "~standard" in variant;

const isVariantClass = (
  variant: VariantClass | VariantGuard<unknown>,
): variant is VariantClass => typeof variant === "function";

const isThenable = (value: object): value is PromiseLike<unknown> =>
  "then" in value && typeof value.then === "function";

/** Name of a variant as it appears in diagnostics. */
export const describeVariant = (variant: ErrorVariant): string => {
  if (isStandardSchema(variant)) return `${variant["~standard"].vendor} schema`;
  if (isVariantClass(variant)) return variant.name || "<anonymous class>";
  return variant.name;
};

/**
 * Tests whether a value belongs to a variant.
 *
 * Standard Schemas must validate synchronously; a schema that returns a
 * Promise or any other thenable throws an {@link InvariantViolation}.
 */
export const matchesVariant = <V extends ErrorVariant>(
  variant: V,
  value: unknown,
): value is InferVariant<V> => {
  const descriptor: ErrorVariant = variant;

  if (!isStandardSchema(descriptor)) {
    if (isVariantClass(descriptor)) return value instanceof descriptor;
    return descriptor.is(value);
  }

  const result = descriptor["~standard"].validate(value);
  if (isThenable(result)) {
    throw new InvariantViolation(
      "async-variant",
      `Error variant ${describeVariant(descriptor)} validates asynchronously; membership checks must be synchronous`,
    );
  }
  return result.issues === undefined;
};

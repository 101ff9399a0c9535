/**
 * Factory function for creating immutable error set definitions.
 */

import type {
  ErrorSet,
  ErrorSetConfig,
  ErrorVariants,
  InferVariant,
} from "../types/error-set.js";
import { InvariantViolation } from "../validation/errors.js";
import { describeVariant, matchesVariant } from "./variant.js";

const MAX_VARIANTS = 6;

/**
 * Declares the closed set of expected errors an operation may fail with.
 *
 * Accepts one to six distinct variant descriptors. Listing the same
 * descriptor twice, or a count outside that range, throws an
 * {@link InvariantViolation}. Overlapping descriptors (a class and its
 * subclass) are allowed.
 *
 * @param config - The error set configuration
 * @returns A frozen {@link ErrorSet} over the union of the variant types
 *
 * @example
 * ```ts
 * class Unauthorized {}
 * const ValidationError = z.object({ code: z.string(), message: z.string() });
 *
 * const HttpErrors = defineErrorSet({
 *   name: "HttpErrors",
 *   variants: [Unauthorized, ValidationError],
 * });
 * ```
 */
export const defineErrorSet = <const V extends ErrorVariants>(
  config: ErrorSetConfig<V>,
): ErrorSet<InferVariant<V[number]>> => {
  const variants: readonly V[number][] = [...config.variants];

  if (variants.length < 1 || variants.length > MAX_VARIANTS) {
    throw new InvariantViolation(
      "invalid-error-set",
      `An error set declares between 1 and ${MAX_VARIANTS} variants, got ${variants.length}`,
      { errorSet: config.name },
    );
  }

  const duplicate = variants.find((v, i) => variants.indexOf(v) !== i);
  if (duplicate !== undefined) {
    throw new InvariantViolation(
      "invalid-error-set",
      `Error set declares variant ${describeVariant(duplicate)} more than once`,
      { errorSet: config.name },
    );
  }

  const isMember = (value: unknown): value is InferVariant<V[number]> =>
    variants.some((variant) => matchesVariant(variant, value));

  return Object.freeze({
    name:
      config.name ?? `ErrorSet<${variants.map(describeVariant).join(" | ")}>`,
    variants: Object.freeze(variants),
    hooks: config.hooks,
    isMember,
  });
};

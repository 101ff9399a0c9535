/**
 * Error variant and error set types.
 */

import type { StandardSchemaV1 } from "../standard-schema/types.js";
import type { ErrorSetHooks } from "./hooks.js";

/** A class whose instances form an error variant, matched with `instanceof`. */
export type VariantClass<E extends object = object> = abstract new (
  ...args: never[]
) => E;

/**
 * A predicate-based variant, for plain-object errors that carry a
 * discriminating tag. Build one with `defineVariant`.
 */
export interface VariantGuard<E> {
  readonly name: string;
  readonly is: (value: unknown) => value is E;
}

/**
 * Anything that can describe one error variant: a class, a synchronous
 * Standard Schema, or a {@link VariantGuard}.
 */
export type ErrorVariant =
  | VariantClass
  | StandardSchemaV1
  | VariantGuard<unknown>;

/** The error type admitted by a variant descriptor. */
export type InferVariant<V> = V extends StandardSchemaV1
  ? StandardSchemaV1.InferOutput<V>
  : V extends VariantGuard<infer E>
    ? E
    : V extends abstract new (...args: never[]) => infer E
      ? E
      : never;

/** A declaration of one to six error variants. */
export type ErrorVariants =
  | readonly [ErrorVariant]
  | readonly [ErrorVariant, ErrorVariant]
  | readonly [ErrorVariant, ErrorVariant, ErrorVariant]
  | readonly [ErrorVariant, ErrorVariant, ErrorVariant, ErrorVariant]
  | readonly [
      ErrorVariant,
      ErrorVariant,
      ErrorVariant,
      ErrorVariant,
      ErrorVariant,
    ]
  | readonly [
      ErrorVariant,
      ErrorVariant,
      ErrorVariant,
      ErrorVariant,
      ErrorVariant,
      ErrorVariant,
    ];

/** Configuration accepted by `defineErrorSet`. */
export interface ErrorSetConfig<V extends ErrorVariants> {
  readonly variants: V;
  /** Used in diagnostics. Default: `ErrorSet<A | B>` from the variant names. */
  readonly name?: string | undefined;
  readonly hooks?: ErrorSetHooks | undefined;
}

/**
 * A closed set of expected error variants.
 *
 * Carries no data: it only answers whether a value is one of the declared
 * variants. `E` is the union of the declared error types.
 */
export interface ErrorSet<E = unknown> {
  readonly name: string;
  readonly variants: readonly ErrorVariant[];
  readonly hooks: ErrorSetHooks | undefined;
  readonly isMember: (value: unknown) => value is E;
}

// Arity-indexed aliases. They name the same generic set.
export type ErrorSet1<E1> = ErrorSet<E1>;
export type ErrorSet2<E1, E2> = ErrorSet<E1 | E2>;
export type ErrorSet3<E1, E2, E3> = ErrorSet<E1 | E2 | E3>;
export type ErrorSet4<E1, E2, E3, E4> = ErrorSet<E1 | E2 | E3 | E4>;
export type ErrorSet5<E1, E2, E3, E4, E5> = ErrorSet<E1 | E2 | E3 | E4 | E5>;
export type ErrorSet6<E1, E2, E3, E4, E5, E6> = ErrorSet<
  E1 | E2 | E3 | E4 | E5 | E6
>;

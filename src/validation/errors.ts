/**
 * Contract violation errors.
 *
 * Expected errors travel inside a Result. Everything here is the other
 * tier: programmer mistakes, thrown and never recovered by the library.
 */

import type { ErrorSet } from "../types/error-set.js";

/** What kind of contract was broken. */
export type ViolationKind =
  | "invalid-error-set"
  | "empty-failure"
  | "unexpected-error"
  | "unhandled-errors"
  | "missing-callback"
  | "malformed-result"
  | "async-variant";

/** Thrown when declared and actual error or result shapes do not match. */
export class InvariantViolation extends Error {
  readonly kind: ViolationKind;
  /** The offending errors, in their original order. Empty when none apply. */
  readonly errors: readonly unknown[];
  /** Name of the error set involved, if any. */
  readonly errorSet: string | undefined;

  constructor(
    kind: ViolationKind,
    message: string,
    options?: {
      readonly errors?: readonly unknown[] | undefined;
      readonly errorSet?: string | undefined;
    },
  ) {
    super(message);
    this.name = "InvariantViolation";
    this.kind = kind;
    this.errors = Object.freeze([...(options?.errors ?? [])]);
    this.errorSet = options?.errorSet;
  }
}

/**
 * Runs the set's `onViolation` hook and hands the violation back for the
 * caller to throw.
 *
 * @example
 * ```ts
 * throw reportViolation(errorSet, new InvariantViolation("empty-failure", message));
 * ```
 */
export const reportViolation = (
  errorSet: ErrorSet<unknown> | undefined,
  violation: InvariantViolation,
): InvariantViolation => {
  errorSet?.hooks?.onViolation?.(violation);
  return violation;
};

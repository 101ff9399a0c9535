/**
 * Shared test fixtures used across all test files.
 */

import { z } from "zod";
import { defineErrorSet } from "../core/define-error-set.js";
import { defineVariant } from "../core/variant.js";

// ---------------------------------------------------------------------------
// Class variants
// ---------------------------------------------------------------------------

export class Unauthorized {
  readonly kind = "unauthorized" as const;
}

export class InvalidCredentials {
  readonly kind = "invalid-credentials" as const;
}

export class EmailNotConfirmed {
  readonly kind = "email-not-confirmed" as const;
}

// NotFound, Conflict and Undeclared share a shape, so the compiler accepts
// one for another and only the runtime membership check tells them apart.
export class NotFound {
  constructor(readonly resource: string) {}
}

export class Conflict {
  constructor(readonly resource: string) {}
}

export class Undeclared {
  constructor(readonly resource: string) {}
}

// ---------------------------------------------------------------------------
// Schema and guard variants
// ---------------------------------------------------------------------------

export const ValidationError = z.object({
  code: z.string(),
  field: z.string(),
  message: z.string(),
});

export type ValidationError = z.output<typeof ValidationError>;

export interface RateLimited {
  readonly kind: "rate-limited";
  readonly retryAfterSeconds: number;
}

export const RateLimited = defineVariant(
  "RateLimited",
  (value): value is RateLimited =>
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "rate-limited",
);

// ---------------------------------------------------------------------------
// Error sets
// ---------------------------------------------------------------------------

export const HttpErrors = defineErrorSet({
  name: "HttpErrors",
  variants: [Unauthorized, ValidationError],
});

export const LoginErrors = defineErrorSet({
  name: "LoginErrors",
  variants: [InvalidCredentials, EmailNotConfirmed],
});

/** Unnamed on purpose: diagnostics fall back to the variant names. */
export const ResourceErrors = defineErrorSet({
  variants: [NotFound, Conflict],
});

export const invalidEmail: ValidationError = {
  code: "incorrect-value",
  field: "email",
  message: "Email is not valid",
};

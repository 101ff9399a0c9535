/**
 * Renders error values for contract violation messages.
 */

const typeLabel = (value: object): string => {
  const name =
    typeof value.constructor === "function" ? value.constructor.name : "";
  return name === "Object" ? "" : name;
};

const formatField = (value: unknown): string => {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "function") return `[Function ${value.name}]`;
  if (Array.isArray(value)) return `Array(${value.length})`;
  if (typeof value === "object" && value !== null) {
    return `${typeLabel(value) || "Object"} {…}`;
  }
  return String(value);
};

/**
 * Formats a single error value.
 *
 * @example
 * ```ts
 * formatError(new TypeError("bad"));                 // "TypeError: bad"
 * formatError(new InvalidFormField("email", "..."));  // 'InvalidFormField { fieldName: "email", message: "..." }'
 * formatError({ kind: "rate-limited" });             // '{ kind: "rate-limited" }'
 * ```
 */
export const formatError = (error: unknown): string => {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  if (typeof error !== "object" || error === null) return formatField(error);

  const label = typeLabel(error);
  const fields = Object.entries(error).map(
    ([key, value]) => `${key}: ${formatField(value)}`,
  );
  const body = fields.length > 0 ? `{ ${fields.join(", ")} }` : "{}";
  return label ? `${label} ${body}` : body;
};

/** Formats a list of errors as `[a, b, ...]`. */
export const formatErrors = (errors: readonly unknown[]): string =>
  `[${errors.map(formatError).join(", ")}]`;

/**
 * @module errors
 * @description Error taxonomy for canonkey. Every failure is fail-fast and
 * propagates to the caller; only {@link NotFoundError} is an expected,
 * caller-handled outcome.
 */

export type ErrorCode =
  | "validation"
  | "illegal-mutation"
  | "not-found"
  | "usage"
  | "unhashable";

export class CanonkeyError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "CanonkeyError";
  }
}

/** Wrong type or malformed input to a constructor, coercer or call binding. */
export class ValidationError extends CanonkeyError {
  constructor(message: string, details?: unknown) {
    super(message, "validation", details);
    this.name = "ValidationError";
  }
}

/** Write to an immutable value or to a cached attribute. */
export class IllegalMutationError extends CanonkeyError {
  constructor(message: string, details?: unknown) {
    super(message, "illegal-mutation", details);
    this.name = "IllegalMutationError";
  }
}

export class NotFoundError extends CanonkeyError {
  constructor(message: string, public readonly key?: unknown) {
    super(message, "not-found", key);
    this.name = "NotFoundError";
  }
}

/** Programmer error: bad cache declaration, missing or wrong type parameters. */
export class UsageError extends CanonkeyError {
  constructor(message: string, details?: unknown) {
    super(message, "usage", details);
    this.name = "UsageError";
  }
}

export class UnhashableValueError extends CanonkeyError {
  constructor(message: string, public readonly value?: unknown) {
    super(message, "unhashable", value);
    this.name = "UnhashableValueError";
  }
}

/**
 * Short human-readable description of a value's kind, used in error messages.
 */
export function describeKind(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) {
    return Object.isFrozen(value) ? "frozen array" : "array";
  }
  if (typeof value === "object") {
    const ctor = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === "function" && ctor.name ? ctor.name : "object";
  }
  return typeof value;
}

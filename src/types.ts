/* ------------------------------------------------------------------
 * types.ts  •  Centralised TypeScript types for canonkey
 * ------------------------------------------------------------------ */

/** Hash algorithm choices (extendable) */
export type HashAlgo = "blake3" | "sha256";

export type LogLevel = "error" | "warn" | "info" | "verbose" | "debug" | "silly";

/** Library options, merged from defaults, rc file, environment and code */
export interface CanonkeyInit {
  /** Algorithm used for every digest (default: 'blake3') */
  hashAlgo: HashAlgo;

  /** Winston log level (default: 'info') */
  logLevel: LogLevel;

  /** Record cache hit/miss counters (default: true) */
  metrics: boolean;
}

/* ------------------------------------------------------------------
 * Hashing
 * ------------------------------------------------------------------ */

/**
 * Fixed-length digest bytes. Totally ordered by byte value, see
 * `compareDigests`.
 */
export type Digest = Buffer;

/** Method key under which a value exposes its own canonical digest. */
export const customDigest: unique symbol = Symbol("canonkey.digest");

/**
 * Opt-in capability for user types: the returned bytes are used verbatim
 * as the value's digest, bypassing kind dispatch.
 */
export interface Digestible {
  [customDigest](): Uint8Array;
}

export function isDigestible(value: object): value is Digestible {
  return typeof Reflect.get(value, customDigest) === "function";
}

/** Iterable objects; strings are primitives and deliberately excluded. */
export function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, Symbol.iterator) === "function"
  );
}

/** Object literals and `Object.create(null)` records, nothing class-built. */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/* ------------------------------------------------------------------
 * Coercion
 * ------------------------------------------------------------------ */

/** Validates and converts a value to an exact type, throwing on failure. */
export type Coercer<T> = (value: unknown) => T;

/** A type that knows its own strict constructor (e.g. `Complex`). */
export interface StrictType<T> {
  readonly name: string;
  strict(value: unknown): T;
}

/** Anything usable as a type parameter of `strict.of` / `tuple.of`. */
export type TypeParam<T> = StrictType<T> | Coercer<T>;

/** Kinds understood by the canonical hash. */
export type KindName =
  | "none"
  | "bool"
  | "int"
  | "float"
  | "complex"
  | "str"
  | "bytes"
  | "tuple"
  | "frozenset";

/**
 * A built-in kind used as a value: hashable (distinct from every instance
 * of the kind) and usable as a type parameter.
 */
export class TypeToken<T> implements StrictType<T> {
  constructor(
    readonly name: KindName,
    private readonly coerce: Coercer<T>
  ) {
    Object.freeze(this);
  }

  strict(value: unknown): T {
    return this.coerce(value);
  }

  toString(): string {
    return this.name;
  }
}

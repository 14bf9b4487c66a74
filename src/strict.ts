/**
 * @module strict
 * @description Coercion-and-validation wrappers that normalise heterogeneous
 * inputs into exact kinds before they are hashed. A failed coercion is a
 * {@link ValidationError}, never a silent truncation.
 */

import { UsageError, ValidationError, describeKind } from "./errors";
import { isIterable } from "./types";
import type { Coercer, StrictType, TypeParam } from "./types";

/**
 * Accepts `bigint` and integral `number`s that are exactly representable.
 *
 * @example
 * ```typescript
 * strictint(1)   // 1n
 * strictint(1n)  // 1n
 * strictint(1.5) // throws ValidationError
 * ```
 */
export function strictint(value: unknown): bigint {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isInteger(value)) {
    return BigInt(value);
  }
  throw new ValidationError(
    `expected an integer, got ${describeKind(value)}${formatValue(value)}`,
    value
  );
}

export function strictfloat(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  throw new ValidationError(
    `expected a real number, got ${describeKind(value)}${formatValue(value)}`,
    value
  );
}

export function strictstr(value: unknown): string {
  if (typeof value === "string") return value;
  throw new ValidationError(
    `expected a string, got ${describeKind(value)}${formatValue(value)}`,
    value
  );
}

export function strictbool(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  throw new ValidationError(
    `expected a boolean, got ${describeKind(value)}${formatValue(value)}`,
    value
  );
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return ` ${JSON.stringify(value)}`;
  if (typeof value === "bigint") return ` ${value}n`;
  if (typeof value === "number" || typeof value === "boolean") return ` ${value}`;
  return "";
}

/* ------------------------------------------------------------------
 * Type parameters
 * ------------------------------------------------------------------ */

/** Display name of a type parameter, used for diagnostics and naming. */
export function typeName(type: TypeParam<unknown>): string {
  return type.name || "<anonymous>";
}

function named<F extends Function>(fn: F, name: string): F {
  Object.defineProperty(fn, "name", { value: name, configurable: true });
  return fn;
}

/** Resolves a type parameter to its strict constructor. */
export function strictOf<T>(type: TypeParam<T>): Coercer<T> {
  if ("strict" in type) {
    const strictType: StrictType<T> = type;
    return named((value: unknown) => strictType.strict(value), typeName(type));
  }
  if (typeof type !== "function") {
    throw new UsageError(`not a type parameter: ${describeKind(type)}`);
  }
  return type;
}

/**
 * Generic strict coercer. `strict.of(T)(v)` is T's own strict constructor;
 * calling `strict(v)` directly is a usage error.
 *
 * @example
 * ```typescript
 * strict.of(kinds.int)(1)   // 1n
 * strict.of(kinds.int)("1") // throws ValidationError
 * strict(1)                 // throws UsageError
 * ```
 */
export const strict = Object.assign(
  function strict(_value: unknown): never {
    throw new UsageError("strict requires a type parameter: use strict.of(T)");
  },
  { of: strictOf }
);

function toTuple<T>(value: unknown, item: Coercer<T>): readonly T[] {
  if (!isIterable(value)) {
    throw new ValidationError(
      `expected an iterable, got ${describeKind(value)}`,
      value
    );
  }
  const out: T[] = [];
  for (const element of value) {
    out.push(item(element));
  }
  return Object.freeze(out);
}

function tupleOf<T>(type: TypeParam<T>): Coercer<readonly T[]> {
  const item = strictOf(type);
  return named(
    (value: unknown) => toTuple(value, item),
    `tuple[${typeName(type)}]`
  );
}

/**
 * Immutable ordered sequence. `tuple(v)` converts any iterable object into
 * a frozen array; `tuple.of(T)` also applies T's strict
 * constructor to every element in order.
 *
 * @example
 * ```typescript
 * tuple(new Set([1, 2]))            // frozen [1, 2]
 * tuple.of(strictint)([1, 2])       // frozen [1n, 2n]
 * tuple.of(strictint).name          // "tuple[strictint]"
 * ```
 */
export const tuple = Object.assign(
  function tuple(value: unknown): readonly unknown[] {
    return toTuple(value, (element) => element);
  },
  { of: tupleOf }
);

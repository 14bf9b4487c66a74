import { Complex } from "./complex";
import { ValidationError, describeKind } from "./errors";
import { FrozenSet } from "./frozen-set";
import { strictbool, strictfloat, strictint, strictstr, tuple } from "./strict";
import { TypeToken } from "./types";

function strictnone(value: unknown): null {
  if (value === null) return value;
  throw new ValidationError(`expected null, got ${describeKind(value)}`, value);
}

function strictbytes(value: unknown): Uint8Array {
  if (value instanceof Uint8Array) return value;
  throw new ValidationError(`expected bytes, got ${describeKind(value)}`, value);
}

/**
 * The built-in kinds as values. Each token hashes to a constant of its own
 * (never equal to any instance of the kind) and carries the kind's strict
 * constructor, so it doubles as a type parameter:
 *
 * ```typescript
 * strict.of(kinds.int)(1)               // 1n
 * FrozenMapping.of(kinds.str, kinds.float)
 * canonicalHash(kinds.int)              // != canonicalHash(1n)
 * ```
 */
export const kinds = Object.freeze({
  none: new TypeToken("none", strictnone),
  bool: new TypeToken("bool", strictbool),
  int: new TypeToken("int", strictint),
  float: new TypeToken("float", strictfloat),
  complex: new TypeToken("complex", Complex.strict),
  str: new TypeToken("str", strictstr),
  bytes: new TypeToken("bytes", strictbytes),
  tuple: new TypeToken("tuple", tuple),
  frozenset: new TypeToken("frozenset", FrozenSet.strict),
});

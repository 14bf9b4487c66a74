/* ------------------------------------------------------------------
 * codec.ts  •  Durable JSON envelope for hashable values
 * ------------------------------------------------------------------
 *  ▸ serialize(v)   – stable (key-sorted) JSON text
 *  ▸ deserialize(s) – zod-validated restore to an equal value
 *
 *  Notes
 *  -----
 *  • JSON scalars (null, boolean, string, finite number) pass through;
 *    every other kind is a single-key `$tag` object.
 *  • Unordered containers are written in key-digest order, so equal
 *    values serialize to identical text.
 * ------------------------------------------------------------------ */

import stringify from "json-stable-stringify";
import { z } from "zod";

import { Complex } from "./complex";
import { ValidationError, describeKind } from "./errors";
import { FrozenMapping } from "./frozen-mapping";
import { FrozenSet } from "./frozen-set";
import { digestHex } from "./hash";
import { kinds } from "./kinds";
import { TypeToken, isPlainRecord } from "./types";
import type { KindName } from "./types";

export const CODEC_VERSION = 1;

type SpecialFloat = "NaN" | "Infinity" | "-Infinity" | "-0";
type EncodedFloat = number | { $float: SpecialFloat };

export type Encoded =
  | null
  | boolean
  | string
  | EncodedFloat
  | Encoded[]
  | { $undefined: true }
  | { $int: string }
  | { $complex: [EncodedFloat, EncodedFloat] }
  | { $bytes: string }
  | { $kind: KindName }
  | { $tuple: Encoded[] }
  | { $frozenset: Encoded[] }
  | { $frozenmapping: [Encoded, Encoded][] }
  | { $record: { [key: string]: Encoded } };

/* ---------- 1. Schema --------------------------------------------- */

const FloatSchema: z.ZodType<EncodedFloat> = z.union([
  z.number(),
  z.object({ $float: z.enum(["NaN", "Infinity", "-Infinity", "-0"]) }).strict(),
]);

const KindSchema = z.enum([
  "none",
  "bool",
  "int",
  "float",
  "complex",
  "str",
  "bytes",
  "tuple",
  "frozenset",
]);

const EncodedSchema: z.ZodType<Encoded> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.string(),
    FloatSchema,
    z.array(EncodedSchema),
    z.object({ $undefined: z.literal(true) }).strict(),
    z.object({ $int: z.string().regex(/^-?\d+$/) }).strict(),
    z.object({ $complex: z.tuple([FloatSchema, FloatSchema]) }).strict(),
    z.object({ $bytes: z.string() }).strict(),
    z.object({ $kind: KindSchema }).strict(),
    z.object({ $tuple: z.array(EncodedSchema) }).strict(),
    z.object({ $frozenset: z.array(EncodedSchema) }).strict(),
    z
      .object({ $frozenmapping: z.array(z.tuple([EncodedSchema, EncodedSchema])) })
      .strict(),
    z.object({ $record: z.record(EncodedSchema) }).strict(),
  ])
);

const EnvelopeSchema = z.object({
  canonkey: z.literal(CODEC_VERSION),
  value: EncodedSchema,
});

/* ---------- 2. Encode --------------------------------------------- */

function encodeFloat(n: number): EncodedFloat {
  if (Number.isNaN(n)) return { $float: "NaN" };
  if (n === Infinity) return { $float: "Infinity" };
  if (n === -Infinity) return { $float: "-Infinity" };
  if (Object.is(n, -0)) return { $float: "-0" };
  return n;
}

function byDigest<T>(items: Iterable<T>, keyOf: (item: T) => unknown): T[] {
  return [...items]
    .map((item) => ({ item, hex: digestHex(keyOf(item)) }))
    .sort((a, b) => (a.hex < b.hex ? -1 : a.hex > b.hex ? 1 : 0))
    .map(({ item }) => item);
}

export function encode(value: unknown): Encoded {
  if (value === null || typeof value === "boolean" || typeof value === "string") {
    return value;
  }
  if (value === undefined) return { $undefined: true };
  if (typeof value === "number") return encodeFloat(value);
  if (typeof value === "bigint") return { $int: value.toString() };
  if (value instanceof Complex) {
    return { $complex: [encodeFloat(value.re), encodeFloat(value.im)] };
  }
  if (value instanceof Uint8Array) {
    return { $bytes: Buffer.from(value).toString("base64") };
  }
  if (value instanceof TypeToken) return { $kind: value.name };
  if (value instanceof FrozenMapping) {
    return {
      $frozenmapping: byDigest(value.entries(), ([key]) => key).map(
        ([k, v]): [Encoded, Encoded] => [encode(k), encode(v)]
      ),
    };
  }
  if (value instanceof FrozenSet) {
    return { $frozenset: byDigest(value, (item) => item).map(encode) };
  }
  if (Array.isArray(value)) {
    const items = value.map((item: unknown) => encode(item));
    return Object.isFrozen(value) ? { $tuple: items } : items;
  }
  if (isPlainRecord(value)) {
    const record: { [key: string]: Encoded } = {};
    for (const [key, item] of Object.entries(value)) record[key] = encode(item);
    return { $record: record };
  }
  throw new ValidationError(`cannot serialize value of kind ${describeKind(value)}`, value);
}

/* ---------- 3. Decode --------------------------------------------- */

function decodeFloat(node: EncodedFloat): number {
  if (typeof node === "number") return node;
  return node.$float === "-0" ? -0 : Number(node.$float);
}

export function decode(node: Encoded): unknown {
  if (node === null || typeof node !== "object") return node;
  if (Array.isArray(node)) return node.map(decode);
  if ("$float" in node) return decodeFloat(node);
  if ("$undefined" in node) return undefined;
  if ("$int" in node) return BigInt(node.$int);
  if ("$complex" in node) {
    return new Complex(decodeFloat(node.$complex[0]), decodeFloat(node.$complex[1]));
  }
  if ("$bytes" in node) return new Uint8Array(Buffer.from(node.$bytes, "base64"));
  if ("$kind" in node) return kinds[node.$kind];
  if ("$tuple" in node) return Object.freeze(node.$tuple.map(decode));
  if ("$frozenset" in node) return new FrozenSet(node.$frozenset.map(decode));
  if ("$frozenmapping" in node) {
    return new FrozenMapping(
      node.$frozenmapping.map(([k, v]) => [decode(k), decode(v)] as const)
    );
  }
  const record: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(node.$record)) record[key] = decode(item);
  return record;
}

/* ---------- 4. Public API ----------------------------------------- */

/**
 * @example
 * ```typescript
 * serialize(FrozenMapping.from({ spam: 1n }))
 * // '{"canonkey":1,"value":{"$frozenmapping":[["spam",{"$int":"1"}]]}}'
 * ```
 * @throws {ValidationError} for values outside the hashable kinds, plain
 *   arrays and plain records
 */
export function serialize(value: unknown): string {
  const text = stringify({ canonkey: CODEC_VERSION, value: encode(value) });
  if (text === undefined) {
    throw new ValidationError(`cannot serialize value of kind ${describeKind(value)}`, value);
  }
  return text;
}

/** @throws {ValidationError} on malformed text or an unknown envelope */
export function deserialize(text: string): unknown {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`malformed envelope: ${reason}`, text);
  }
  const parsed = EnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(
      `invalid envelope: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
      parsed.error.issues
    );
  }
  return decode(parsed.data.value);
}

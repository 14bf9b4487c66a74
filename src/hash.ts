/* ------------------------------------------------------------------
 * hash.ts  •  Canonical, kind-tagged digests for canonkey
 * ------------------------------------------------------------------
 *  ▸ canonicalBytes(v)   – namespace + kind tag + payload preimage
 *  ▸ canonicalHash(v)    – digest of the preimage (or a Digestible's own)
 *  ▸ digest(bytes)       – BLAKE3 (default) or SHA-256
 *  ▸ orderedDigest / unorderedDigest – container composition
 *
 *  Notes
 *  -----
 *  • Every preimage starts with `canonkey.v1/<tag>\0`. Tags never contain
 *    NUL, so no two kinds share an encoding prefix.
 *  • The encoding is persisted-key material: changing it requires a new
 *    namespace version.
 *  • SHA-256 path uses Node's built-in crypto for FIPS compliance
 * ------------------------------------------------------------------ */

import { createHash as createNodeHash } from "node:crypto";
import { blake3 } from "@napi-rs/blake-hash";

import { Complex } from "./complex";
import { ConfigManager } from "./config";
import { UnhashableValueError, UsageError, describeKind } from "./errors";
import { TypeToken, customDigest, isDigestible } from "./types";
import type { Digest } from "./types";

export const NAMESPACE = "canonkey.v1";

/* ---------- 1. Digest helper -------------------------------------- *
 * Chooses algorithm per runtime config. Both produce 32 bytes.
 * ------------------------------------------------------------------ */
export function digest(payload: Uint8Array): Digest {
  if (ConfigManager.hashAlgo() === "blake3") {
    return blake3(Buffer.from(payload));
  }
  return createNodeHash("sha256").update(payload).digest();
}

export function compareDigests(a: Digest, b: Digest): number {
  return Buffer.compare(a, b);
}

/* ---------- 2. Encoding primitives -------------------------------- */

export function header(tag: string): Buffer {
  return Buffer.from(`${NAMESPACE}/${tag}\0`, "utf8");
}

function u32(n: number): Buffer {
  const out = Buffer.alloc(4);
  out.writeUInt32BE(n);
  return out;
}

function float64(n: number): Buffer {
  const out = Buffer.alloc(8);
  out.writeDoubleBE(n);
  return out;
}

/** Big-endian, minimal length; zero has no magnitude bytes. */
function magnitude(n: bigint): Buffer {
  if (n === 0n) return Buffer.alloc(0);
  const hex = n.toString(16);
  return Buffer.from(hex.length % 2 ? `0${hex}` : hex, "hex");
}

function lengthPrefixed(tag: string, bytes: Uint8Array): Buffer {
  return Buffer.concat([header(tag), u32(bytes.length), bytes]);
}

/* ---------- 3. Container composition ------------------------------ *
 * Child digests are length-prefixed: a Digestible may return bytes of
 * any length, and element boundaries must survive concatenation.
 * ------------------------------------------------------------------ */

function indexed(digests: readonly Digest[]): Buffer[] {
  const parts: Buffer[] = [u32(digests.length)];
  digests.forEach((d, i) => parts.push(u32(i), u32(d.length), d));
  return parts;
}

/** Position-sensitive: swapping two unequal elements changes the result. */
export function orderedDigest(tag: string, digests: readonly Digest[]): Digest {
  return digest(Buffer.concat([header(tag), ...indexed(digests)]));
}

/** Membership-only: element digests are sorted before combination. */
export function unorderedDigest(tag: string, digests: readonly Digest[]): Digest {
  const sorted = [...digests].sort(compareDigests);
  const parts: Buffer[] = [header(tag), u32(sorted.length)];
  for (const d of sorted) parts.push(u32(d.length), d);
  return digest(Buffer.concat(parts));
}

/* ---------- 4. Kind dispatch -------------------------------------- */

function unhashable(value: unknown, hint = ""): UnhashableValueError {
  return new UnhashableValueError(
    `unhashable value of kind ${describeKind(value)}${hint}`,
    value
  );
}

/**
 * Canonical preimage of a value: namespace, kind tag and payload. Tuples
 * embed the digests of their elements.
 *
 * @throws {UnhashableValueError} for values without a stable encoding
 * @throws {UsageError} for Digestible values, which have no preimage
 */
export function canonicalBytes(value: unknown): Buffer {
  if (value === null) return header("none");
  if (value === undefined) return header("undefined");

  switch (typeof value) {
    case "boolean":
      return Buffer.concat([header("bool"), Buffer.of(value ? 1 : 0)]);
    case "bigint":
      return Buffer.concat([
        header("int"),
        Buffer.of(value < 0n ? 1 : 0),
        magnitude(value < 0n ? -value : value),
      ]);
    case "number":
      return Buffer.concat([header("float"), float64(value)]);
    case "string":
      return lengthPrefixed("str", Buffer.from(value, "utf8"));
    case "object":
      return objectBytes(value);
    default:
      throw unhashable(value);
  }
}

function objectBytes(value: object): Buffer {
  if (isDigestible(value)) {
    throw new UsageError(
      `${describeKind(value)} supplies its own digest and has no canonical preimage`
    );
  }
  if (value instanceof Complex) {
    return Buffer.concat([header("complex"), float64(value.re), float64(value.im)]);
  }
  if (value instanceof Uint8Array) return lengthPrefixed("bytes", value);
  if (value instanceof TypeToken) {
    return Buffer.concat([header("type"), Buffer.from(value.name, "utf8")]);
  }
  if (Array.isArray(value)) {
    if (!Object.isFrozen(value)) {
      throw unhashable(value, "; freeze it or convert it with tuple()");
    }
    const children = value.map((item: unknown) => canonicalHash(item));
    return Buffer.concat([header("tuple"), ...indexed(children)]);
  }
  throw unhashable(value);
}

/**
 * Computes the canonical digest of a value. Deterministic across calls and
 * process restarts for a given `hashAlgo`.
 *
 * @example
 * ```typescript
 * canonicalHash(1n).equals(canonicalHash(1)) // false: int vs float
 * canonicalHash(Object.freeze(["spam", 1n])) // tuple digest
 * canonicalHash([])                          // throws UnhashableValueError
 * ```
 */
export function canonicalHash(value: unknown): Digest {
  if (typeof value === "object" && value !== null && isDigestible(value)) {
    return Buffer.from(value[customDigest]());
  }
  return digest(canonicalBytes(value));
}

/** Hex form of {@link canonicalHash}, convenient as a Map or storage key. */
export function digestHex(value: unknown): string {
  return canonicalHash(value).toString("hex");
}

/**
 * @module frozen-mapping
 * @description Immutable, order-insensitive mapping usable as a hashable
 * value and as a cache-key component.
 *
 * Keys are identified by their canonical digest, so structurally equal keys
 * (two frozen arrays with the same items, two equal FrozenMappings) address
 * the same entry. Insertion order is not meaningful; iteration order is
 * unspecified.
 */

import { NotFoundError, UsageError, ValidationError, describeKind } from "./errors";
import { canonicalHash, digestHex, orderedDigest, unorderedDigest } from "./hash";
import { strictOf, typeName } from "./strict";
import { customDigest, isIterable, isPlainRecord } from "./types";
import type { Coercer, Digest, Digestible, TypeParam } from "./types";
import { immutable } from "./utils/immutable";

type Entry<K, V> = readonly [K, V];

interface MappingState<K, V> {
  /** Swapped for an equal instance's store by `equals`; never mutated. */
  store: ReadonlyMap<string, Entry<K, V>>;
  digest?: Digest;
}

function isPair(value: unknown): boolean {
  return Array.isArray(value) && value.length === 2;
}

function formatKey(key: unknown): string {
  if (typeof key === "string") return JSON.stringify(key);
  if (typeof key === "bigint") return `${key}n`;
  if (typeof key === "number" || typeof key === "boolean") return String(key);
  return describeKind(key);
}

function malformed(value: unknown): ValidationError {
  return new ValidationError(
    `FrozenMapping expects key/value pairs, got ${describeKind(value)}`,
    value
  );
}

/**
 * Untyped pair extraction for the coercing entry points: FrozenMappings,
 * Maps and other iterables of pairs, and plain-object records.
 */
function* rawPairs(source: unknown): Generator<Entry<unknown, unknown>> {
  if (isIterable(source)) {
    for (const pair of source) {
      if (!Array.isArray(pair) || pair.length !== 2) throw malformed(pair);
      yield [pair[0], pair[1]];
    }
    return;
  }
  if (isPlainRecord(source)) {
    yield* Object.entries(source);
    return;
  }
  throw malformed(source);
}

function sameValue(a: unknown, b: unknown): boolean {
  return Object.is(a, b) || digestHex(a) === digestHex(b);
}

/**
 * @example
 * ```typescript
 * const frozen = FrozenMapping.from({ spam: 1, eggs: 2.3 });
 * frozen.get("spam")         // 1
 * frozen.get("foo")          // throws NotFoundError
 * frozen.has("eggs")         // true
 * Reflect.set(frozen, "eggs", 3) // throws IllegalMutationError
 * ```
 */
export class FrozenMapping<K, V> implements Digestible, Iterable<[K, V]> {
  private readonly state: MappingState<K, V>;

  /**
   * @param source - a Map, another FrozenMapping, an `entries()` view or any
   *   iterable of `[key, value]` pairs
   * @throws {ValidationError} if an element is not a pair
   * @throws {UnhashableValueError} if a key has no canonical digest
   */
  constructor(source: Iterable<readonly [K, V]> = []) {
    if (source instanceof FrozenMapping) {
      this.state = { store: source.state.store };
    } else {
      if (!isIterable(source)) throw malformed(source);
      const store = new Map<string, Entry<K, V>>();
      for (const pair of source) {
        if (!isPair(pair)) throw malformed(pair);
        const [key, value] = pair;
        store.set(digestHex(key), Object.freeze([key, value] as const));
      }
      this.state = { store };
    }
    return immutable(this, "FrozenMapping");
  }

  /**
   * Builds a FrozenMapping from a plain-object record or any source the
   * constructor accepts.
   */
  static from<V>(record: Readonly<Record<string, V>>): FrozenMapping<string, V>;
  static from<K, V>(source: Iterable<readonly [K, V]>): FrozenMapping<K, V>;
  static from(source: unknown): FrozenMapping<unknown, unknown> {
    return new FrozenMapping(rawPairs(source));
  }

  /** Strict constructor used when `FrozenMapping` is a type parameter. */
  static strict(value: unknown): FrozenMapping<unknown, unknown> {
    if (value instanceof FrozenMapping) return value;
    return new FrozenMapping(rawPairs(value));
  }

  /**
   * Parametrised form: every key passes through `strict.of(K)` and every
   * value through `strict.of(V)`.
   *
   * @example
   * ```typescript
   * const Weights = FrozenMapping.of(kinds.str, kinds.float);
   * Weights({ spam: 2n }).get("spam") // 2
   * Weights.name                      // "FrozenMapping[str,float]"
   * FrozenMapping.of(kinds.str)       // throws UsageError
   * ```
   */
  static of<K, V>(
    keyType: TypeParam<K>,
    valueType: TypeParam<V>
  ): Coercer<FrozenMapping<K, V>>;
  static of(...types: TypeParam<unknown>[]): Coercer<FrozenMapping<unknown, unknown>>;
  static of(...types: TypeParam<unknown>[]): Coercer<FrozenMapping<unknown, unknown>> {
    if (types.length !== 2) {
      throw new UsageError(
        `FrozenMapping takes exactly two type parameters, got ${types.length}`
      );
    }
    const [keyType, valueType] = types;
    const key = strictOf(keyType);
    const value = strictOf(valueType);
    const coerce = (source: unknown) => {
      const pairs: Entry<unknown, unknown>[] = [];
      for (const [k, v] of rawPairs(source)) pairs.push([key(k), value(v)]);
      return new FrozenMapping(pairs);
    };
    Object.defineProperty(coerce, "name", {
      value: `FrozenMapping[${typeName(keyType)},${typeName(valueType)}]`,
    });
    return coerce;
  }

  get size(): number {
    return this.state.store.size;
  }

  has(key: unknown): boolean {
    return this.state.store.has(digestHex(key));
  }

  /** @throws {NotFoundError} if the key is absent */
  get(key: unknown): V {
    const entry = this.state.store.get(digestHex(key));
    if (!entry) throw new NotFoundError(`key not found: ${formatKey(key)}`, key);
    return entry[1];
  }

  find(key: unknown): V | undefined {
    return this.state.store.get(digestHex(key))?.[1];
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.state.store.values()) yield key;
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.state.store.values()) yield value;
  }

  *entries(): IterableIterator<[K, V]> {
    for (const [key, value] of this.state.store.values()) yield [key, value];
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  /** Snapshot as an ordinary mutable Map with equal contents. */
  copy(): Map<K, V> {
    return new Map(this.entries());
  }

  /**
   * Structural equality, irrespective of insertion order. Only another
   * FrozenMapping can be equal. On success this instance adopts the other's
   * backing store.
   */
  equals(other: unknown): boolean {
    if (other === this) return true;
    if (!(other instanceof FrozenMapping)) return false;

    const mine = this.state.store;
    const theirs: ReadonlyMap<string, Entry<unknown, unknown>> = other.state.store;
    if (mine === theirs) return true;
    if (mine.size !== theirs.size) return false;

    for (const [hex, [, value]] of mine) {
      const match = theirs.get(hex);
      if (!match || !sameValue(value, match[1])) return false;
    }
    this.state.store = other.state.store;
    return true;
  }

  [customDigest](): Digest {
    this.state.digest ??= unorderedDigest(
      "frozenmapping",
      [...this.state.store].map(([hex, [, value]]) =>
        orderedDigest("pair", [Buffer.from(hex, "hex"), canonicalHash(value)])
      )
    );
    return this.state.digest;
  }

  toString(): string {
    const body = [...this.state.store.values()]
      .map(([key, value]) => `${formatKey(key)}: ${formatKey(value)}`)
      .join(", ");
    return `FrozenMapping({${body}})`;
  }
}

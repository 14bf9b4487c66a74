import { ValidationError, describeKind } from "./errors";
import { digestHex, unorderedDigest } from "./hash";
import { customDigest, isIterable } from "./types";
import type { Digest, Digestible } from "./types";
import { immutable } from "./utils/immutable";

/**
 * Immutable set with structural membership: elements are identified by
 * their canonical digest, so `Object.freeze([1n])` and another frozen `[1n]`
 * are the same member. Hashes by the order-insensitive set rule.
 */
export class FrozenSet<T> implements Digestible, Iterable<T> {
  private readonly state: { items: ReadonlyMap<string, T>; digest?: Digest };

  constructor(items: Iterable<T> = []) {
    if (!isIterable(items)) {
      throw new ValidationError(
        `FrozenSet expects an iterable, got ${describeKind(items)}`,
        items
      );
    }
    const store = new Map<string, T>();
    for (const item of items) {
      store.set(digestHex(item), item);
    }
    this.state = { items: store };
    return immutable(this, "FrozenSet");
  }

  /** Strict constructor used when `FrozenSet` is a type parameter. */
  static strict(value: unknown): FrozenSet<unknown> {
    if (value instanceof FrozenSet) return value;
    if (!isIterable(value)) {
      throw new ValidationError(
        `expected an iterable, got ${describeKind(value)}`,
        value
      );
    }
    return new FrozenSet(value);
  }

  get size(): number {
    return this.state.items.size;
  }

  has(value: unknown): boolean {
    return this.state.items.has(digestHex(value));
  }

  values(): IterableIterator<T> {
    return this.state.items.values();
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }

  equals(other: unknown): boolean {
    if (other === this) return true;
    if (!(other instanceof FrozenSet) || other.size !== this.size) return false;
    for (const key of this.state.items.keys()) {
      if (!other.state.items.has(key)) return false;
    }
    return true;
  }

  [customDigest](): Digest {
    this.state.digest ??= unorderedDigest(
      "frozenset",
      [...this.state.items.keys()].map((hex) => Buffer.from(hex, "hex"))
    );
    return this.state.digest;
  }

  toString(): string {
    return `FrozenSet(${this.size})`;
  }
}

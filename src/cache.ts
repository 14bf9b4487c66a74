/* ------------------------------------------------------------------
 * cache.ts  •  Per-instance memoisation of getters and methods
 * ------------------------------------------------------------------
 *  ▸ withCache(Class, names) – compute-once getters, memoised methods
 *  ▸ cacheStats(instance)    – populated slots per cached attribute
 *
 *  Notes
 *  -----
 *  • Slots live in a WeakMap side table keyed by instance, one slot per
 *    (declaring class, attribute). A subclass that redeclares a cached
 *    attribute never shares the base class's slot.
 *  • Method results are keyed by the canonical digest of the normalised
 *    call, so positional and keyword spellings of one call share a result.
 *  • Instances are proxied; cached classes must keep their state in
 *    ordinary (or TypeScript `private`) fields, not `#private` ones.
 * ------------------------------------------------------------------ */

import { Signature, unwrapAnnotated } from "./annotations";
import { ConfigManager } from "./config";
import { IllegalMutationError, UsageError, describeKind } from "./errors";
import { digestHex } from "./hash";
import { cacheHits, cacheMisses } from "./metrics";
import { log } from "./utils/logger";

type AbstractClass = abstract new (...args: never[]) => object;
type Callable = (...args: never[]) => unknown;

interface SlotKey {
  readonly owner: AbstractClass;
  readonly name: string | symbol;
  readonly label: string;
}

interface InstanceSlots {
  values: Map<SlotKey, unknown>;
  calls: Map<SlotKey, Map<string, unknown>>;
}

type Plan =
  | { kind: "property"; key: SlotKey; getter: () => unknown; enumerable: boolean }
  | { kind: "method"; key: SlotKey; method: Callable; enumerable: boolean };

const slotTable = new WeakMap<object, InstanceSlots>();
/** Guard proxy → the instance it wraps. */
const guardedInstances = new WeakMap<object, object>();
/** Getters and methods installed by withCache. */
const cachedMembers = new WeakSet<object>();

function isCallable(value: unknown): value is Callable {
  return typeof value === "function";
}

function usage(message: string): UsageError {
  log.warn(message);
  return new UsageError(message);
}

function slotsOf(self: object): InstanceSlots {
  const instance = guardedInstances.get(self) ?? self;
  let slots = slotTable.get(instance);
  if (!slots) {
    slots = { values: new Map(), calls: new Map() };
    slotTable.set(instance, slots);
  }
  return slots;
}

function record(hit: boolean, key: SlotKey): void {
  if (!hit) log.debug("cache miss", { attribute: key.label });
  if (!ConfigManager.cfg.metrics) return;
  (hit ? cacheHits : cacheMisses).inc({ attribute: key.label });
}

/* ---------- 1. Instance guard ------------------------------------- */

function isCached(target: object, key: string | symbol): boolean {
  for (let o: object | null = target; o !== null; o = Object.getPrototypeOf(o)) {
    const descriptor = Object.getOwnPropertyDescriptor(o, key);
    if (descriptor) {
      const member: unknown = descriptor.get ?? descriptor.value;
      return isCallable(member) && cachedMembers.has(member);
    }
  }
  return false;
}

function rejectMutation(target: object, action: string, key: string | symbol): never {
  throw new IllegalMutationError(
    `cannot ${action} cached attribute ${String(key)} of ${describeKind(target)}`,
    key
  );
}

const guardHandler: ProxyHandler<object> = {
  set(target, key, value, receiver) {
    if (isCached(target, key)) rejectMutation(target, "assign", key);
    return Reflect.set(target, key, value, receiver);
  },
  deleteProperty(target, key) {
    if (isCached(target, key)) rejectMutation(target, "delete", key);
    return Reflect.deleteProperty(target, key);
  },
  defineProperty(target, key, descriptor) {
    if (isCached(target, key)) rejectMutation(target, "redefine", key);
    return Reflect.defineProperty(target, key, descriptor);
  },
};

function guard(instance: object): object {
  if (guardedInstances.has(instance)) return instance;
  const proxy = new Proxy(instance, guardHandler);
  guardedInstances.set(proxy, instance);
  return proxy;
}

/* ---------- 2. Declaration ---------------------------------------- */

function plan(Class: AbstractClass, proto: object, name: string | symbol): Plan {
  const descriptor = Object.getOwnPropertyDescriptor(proto, name);
  if (!descriptor) {
    throw usage(`Attribute listed in cache is undefined: ${String(name)}`);
  }
  const member: unknown = descriptor.get ?? descriptor.value;
  if (isCallable(member) && cachedMembers.has(member)) {
    throw usage(`Attribute ${String(name)} of ${Class.name} is already cached`);
  }

  const key: SlotKey = Object.freeze({
    owner: Class,
    name,
    label: `${Class.name || "<anonymous>"}.${String(name)}`,
  });
  const enumerable = descriptor.enumerable ?? false;
  const getter = descriptor.get;
  if (getter) return { kind: "property", key, getter, enumerable };

  const method: unknown = descriptor.value;
  if (isCallable(method)) return { kind: "method", key, method, enumerable };
  throw usage(`Don't know how to cache attribute ${String(name)}: ${describeKind(method)}`);
}

function installProperty(
  proto: object,
  { key, getter, enumerable }: Extract<Plan, { kind: "property" }>
): void {
  const get = function (this: object): unknown {
    const { values } = slotsOf(this);
    if (values.has(key)) {
      record(true, key);
      return values.get(key);
    }
    record(false, key);
    const value: unknown = Reflect.apply(getter, this, []);
    values.set(key, value);
    return value;
  };
  cachedMembers.add(get);
  Object.defineProperty(proto, key.name, {
    get,
    set(this: object) {
      rejectMutation(this, "assign", key.name);
    },
    enumerable,
    configurable: false,
  });
}

function installMethod(
  proto: object,
  { key, method, enumerable }: Extract<Plan, { kind: "method" }>
): void {
  const signature = Signature.of(method);
  const target = unwrapAnnotated(method);

  const cached = function (this: object, ...args: unknown[]): unknown {
    const bound = signature.bind(args).coerce();
    const hex = digestHex(bound.key());

    const { calls } = slotsOf(this);
    let results = calls.get(key);
    if (!results) {
      results = new Map();
      calls.set(key, results);
    }
    if (results.has(hex)) {
      record(true, key);
      return results.get(hex);
    }
    record(false, key);
    const result: unknown = Reflect.apply(target, this, bound.callArgs());
    results.set(hex, result);
    return result;
  };
  Object.defineProperty(cached, "name", { value: method.name });
  cachedMembers.add(cached);
  Object.defineProperty(proto, key.name, {
    value: cached,
    writable: false,
    enumerable,
    configurable: false,
  });
}

/**
 * Turns the listed getters of `Class` into compute-once properties and the
 * listed methods into per-instance memoised methods. Every name must be a
 * getter or method declared by `Class` itself.
 *
 * Instances of the returned class (and of its subclasses) reject
 * assignment, deletion and redefinition of cached attributes with
 * {@link IllegalMutationError}.
 *
 * @example
 * ```typescript
 * const Grid = withCache(
 *   class Grid {
 *     constructor(readonly size: number) {}
 *     get cells() { return expensiveCells(this.size); }
 *     neighbours(index: number) { return expensiveNeighbours(this, index); }
 *   },
 *   ["cells", "neighbours"]
 * );
 * ```
 *
 * @throws {UsageError} for a name the class does not declare, or one that
 *   is neither a getter nor a method
 */
export function withCache<C extends AbstractClass>(
  Class: C,
  names: readonly (string | symbol)[]
): C {
  const proto: object = Class.prototype;
  const plans = names.map((name) => plan(Class, proto, name));

  for (const p of plans) {
    if (p.kind === "property") installProperty(proto, p);
    else installMethod(proto, p);
  }
  log.verbose("cached attributes installed", {
    class: Class.name,
    attributes: plans.map((p) => p.key.label),
  });

  return new Proxy(Class, {
    construct(target, args, newTarget) {
      const instance: object = Reflect.construct(target, args, newTarget);
      return guard(instance);
    },
  });
}

/**
 * Populated slots per cached attribute of `instance`: 1 for a computed
 * property, the number of distinct calls for a method.
 */
export function cacheStats(instance: object): Record<string, number> {
  const slots = slotsOf(instance);
  const stats: Record<string, number> = {};
  for (const key of slots.values.keys()) stats[key.label] = 1;
  for (const [key, results] of slots.calls) stats[key.label] = results.size;
  return stats;
}

import { afterEach, describe, expect, it } from "vitest";

import { applyAnnotations, kwargs, withSignature } from "../../src/annotations";
import { cacheStats, withCache } from "../../src/cache";
import { ConfigManager, configure } from "../../src/config";
import { IllegalMutationError, UsageError, ValidationError } from "../../src/errors";
import { cacheHits, cacheMisses } from "../../src/metrics";

async function counterValue(
  counter: typeof cacheHits,
  attribute: string
): Promise<number | undefined> {
  const { values } = await counter.get();
  return values.find((v) => v.labels.attribute === attribute)?.value;
}

describe("cache.ts", () => {
  afterEach(() => {
    ConfigManager.reset();
  });

  describe("cached properties", () => {
    it("should compute once per instance", () => {
      let ncalls = 0;
      const T = withCache(
        class T {
          get x(): number {
            ncalls += 1;
            return 1;
          }
        },
        ["x"]
      );

      const t = new T();
      expect(ncalls).toBe(0);
      expect(t.x).toBe(1);
      expect(ncalls).toBe(1);
      expect(t.x).toBe(1);
      expect(ncalls).toBe(1);

      expect(new T().x).toBe(1);
      expect(ncalls).toBe(2);
    });

    it("should work on frozen instances", () => {
      let ncalls = 0;
      const T = withCache(
        class T {
          constructor(readonly base: number) {
            Object.freeze(this);
          }
          get x(): number {
            ncalls += 1;
            return this.base * 2;
          }
        },
        ["x"]
      );

      const t = new T(21);
      expect(Object.isFrozen(t)).toBe(true);
      expect(t.x).toBe(42);
      expect(t.x).toBe(42);
      expect(ncalls).toBe(1);
    });

    it("should reject assignment", () => {
      const T = withCache(
        class T {
          get x(): number {
            return 1;
          }
        },
        ["x"]
      );
      const t = new T();
      expect(() => Reflect.set(t, "x", 2)).toThrow(IllegalMutationError);
      expect(() => Reflect.set(t, "x", 2)).toThrow("cannot assign cached attribute x of T");
      expect(t.x).toBe(1);
    });

    it("should reject deletion and redefinition", () => {
      const T = withCache(
        class T {
          get x(): number {
            return 1;
          }
        },
        ["x"]
      );
      const t = new T();
      expect(() => Reflect.deleteProperty(t, "x")).toThrow(
        "cannot delete cached attribute x of T"
      );
      expect(() => Object.defineProperty(t, "x", { value: 2 })).toThrow(IllegalMutationError);
      expect(t.x).toBe(1);
    });

    it("should leave other attributes writable", () => {
      const T = withCache(
        class T {
          label = "a";
          get x(): number {
            return 1;
          }
        },
        ["x"]
      );
      const t = new T();
      t.label = "b";
      expect(t.label).toBe("b");
    });

    it("should not cache errors", () => {
      let ncalls = 0;
      let fail = true;
      const T = withCache(
        class T {
          get x(): number {
            ncalls += 1;
            if (fail) throw new Error("not ready");
            return 1;
          }
        },
        ["x"]
      );

      const t = new T();
      expect(() => t.x).toThrow("not ready");
      fail = false;
      expect(t.x).toBe(1);
      expect(t.x).toBe(1);
      expect(ncalls).toBe(2);
    });

    it("should support symbol-named attributes", () => {
      let ncalls = 0;
      const secret = Symbol("x");
      const T = withCache(
        class T {
          get [secret](): number {
            ncalls += 1;
            return 1;
          }
          get y(): number {
            return this[secret];
          }
        },
        [secret]
      );

      const t = new T();
      expect(ncalls).toBe(0);
      expect(t.y).toBe(1);
      expect(ncalls).toBe(1);
      expect(t.y).toBe(1);
      expect(ncalls).toBe(1);
    });
  });

  describe("cached methods", () => {
    it("should cache a method without arguments", () => {
      let ncalls = 0;
      const T = withCache(
        class T {
          x(): number {
            ncalls += 1;
            return 1;
          }
        },
        ["x"]
      );

      const t = new T();
      expect(ncalls).toBe(0);
      expect(t.x()).toBe(1);
      expect(ncalls).toBe(1);
      expect(t.x()).toBe(1);
      expect(ncalls).toBe(1);
    });

    it("should share results between positional and keyword calls", () => {
      let ncalls = 0;
      const T = withCache(
        class T {
          x(a: unknown, b?: unknown): number {
            ncalls += 1;
            return Number(a) + Number(b);
          }
        },
        ["x"]
      );

      const t = new T();
      expect(ncalls).toBe(0);
      expect(t.x(1, 2)).toBe(3);
      expect(ncalls).toBe(1);
      expect(t.x(kwargs({ a: 1, b: 2 }))).toBe(3);
      expect(ncalls).toBe(1);
      expect(t.x(2, 2)).toBe(4);
      expect(ncalls).toBe(2);
      expect(t.x(kwargs({ a: 2, b: 2 }))).toBe(4);
      expect(ncalls).toBe(2);
      expect(t.x(1, 2)).toBe(3);
      expect(ncalls).toBe(2);
    });

    it("should key on coerced arguments of annotated methods", () => {
      let ncalls = 0;
      class Base {
        x(a: unknown, b?: unknown): number {
          ncalls += 1;
          return Number(a) + Number(b);
        }
      }
      Base.prototype.x = applyAnnotations(Base.prototype.x, { a: Number, b: Number });
      const T = withCache(Base, ["x"]);

      const t = new T();
      expect(t.x(1, 2)).toBe(3);
      expect(ncalls).toBe(1);
      expect(t.x(kwargs({ a: "1", b: "2" }))).toBe(3);
      expect(ncalls).toBe(1);
      expect(t.x("2", "2")).toBe(4);
      expect(ncalls).toBe(2);
      expect(t.x(kwargs({ a: 2, b: 2 }))).toBe(4);
      expect(ncalls).toBe(2);
      expect(t.x("1", 2)).toBe(3);
      expect(ncalls).toBe(2);
    });

    it("should key var-keyword arguments by name", () => {
      let ncalls = 0;
      class Base {
        x(a: unknown, rest?: unknown): number {
          ncalls += 1;
          const extra = Object.values(Object(rest)).map(Number);
          return extra.reduce((sum, v) => sum + v, Number(a));
        }
      }
      withSignature(Base.prototype.x, [
        { name: "a" },
        { name: "rest", kind: "var-keyword" },
      ]);
      const T = withCache(Base, ["x"]);

      const t = new T();
      expect(t.x(1, kwargs({ b: 2 }))).toBe(3);
      expect(ncalls).toBe(1);
      expect(t.x(kwargs({ a: 1, b: 2 }))).toBe(3);
      expect(ncalls).toBe(1);
      expect(t.x(1, kwargs({ b: 2, c: 3 }))).toBe(6);
      expect(ncalls).toBe(2);
      expect(t.x(kwargs({ a: 1, b: 2, c: 3 }))).toBe(6);
      expect(ncalls).toBe(2);
    });

    it("should propagate binding and coercion errors without caching", () => {
      let ncalls = 0;
      class Base {
        x(a: unknown): unknown {
          ncalls += 1;
          return a;
        }
      }
      Base.prototype.x = applyAnnotations(Base.prototype.x, { a: Number });
      const T = withCache(Base, ["x"]);

      const t = new T();
      expect(() => Reflect.apply(t.x, t, [1, 2])).toThrow(ValidationError);
      expect(() => t.x(kwargs({ b: 1 }))).toThrow("x() got an unexpected keyword argument 'b'");
      expect(ncalls).toBe(0);
    });

    it("should keep instances independent", () => {
      let ncalls = 0;
      const T = withCache(
        class T {
          x(a: unknown): unknown {
            ncalls += 1;
            return a;
          }
        },
        ["x"]
      );

      new T().x(1);
      new T().x(1);
      expect(ncalls).toBe(2);
    });

    it("should reject reassignment of cached methods", () => {
      const T = withCache(
        class T {
          x(): number {
            return 1;
          }
        },
        ["x"]
      );
      const t = new T();
      expect(() => Reflect.set(t, "x", () => 2)).toThrow(
        "cannot assign cached attribute x of T"
      );
      expect(t.x()).toBe(1);
    });
  });

  describe("subclasses", () => {
    it("should keep base and subclass slots apart", () => {
      let baseCalls = 0;
      const T = withCache(
        class T {
          get x(): number {
            baseCalls += 1;
            return 1;
          }
        },
        ["x"]
      );
      const U = withCache(
        class U extends T {
          get x(): number {
            return super.x + 1;
          }
          get y(): number {
            return super.x;
          }
        },
        ["x"]
      );

      const u1 = new U();
      expect(u1.x).toBe(2);
      expect(u1.y).toBe(1);
      expect(baseCalls).toBe(1);

      const u2 = new U();
      expect(u2.y).toBe(1);
      expect(u2.x).toBe(2);
      expect(baseCalls).toBe(2);
    });

    it("should guard instances of plain subclasses", () => {
      const T = withCache(
        class T {
          get x(): number {
            return 1;
          }
        },
        ["x"]
      );
      class V extends T {}

      const v = new V();
      expect(v.x).toBe(1);
      expect(() => Reflect.deleteProperty(v, "x")).toThrow(IllegalMutationError);
    });
  });

  describe("declaration errors", () => {
    it("should reject names the class does not declare", () => {
      expect(() => withCache(class T {}, ["x"])).toThrow(UsageError);
      expect(() => withCache(class T {}, ["x"])).toThrow(
        "Attribute listed in cache is undefined: x"
      );
    });

    it("should reject inherited names", () => {
      class T {
        get x(): number {
          return 1;
        }
      }
      class U extends T {}
      expect(() => withCache(U, ["x"])).toThrow("Attribute listed in cache is undefined: x");
    });

    it("should reject attributes that are neither getters nor methods", () => {
      class T {}
      Object.defineProperty(T.prototype, "x", { value: null });
      expect(() => withCache(T, ["x"])).toThrow("Don't know how to cache attribute x: null");
    });

    it("should reject caching an attribute twice", () => {
      class T {
        get x(): number {
          return 1;
        }
      }
      withCache(T, ["x"]);
      expect(() => withCache(T, ["x"])).toThrow("Attribute x of T is already cached");
    });
  });

  describe("cacheStats", () => {
    it("should count populated slots per attribute", () => {
      const T = withCache(
        class Stats {
          get p(): number {
            return 1;
          }
          m(a: unknown): unknown {
            return a;
          }
        },
        ["p", "m"]
      );

      const t = new T();
      expect(cacheStats(t)).toEqual({});
      void t.p;
      t.m(1);
      t.m(2);
      t.m(kwargs({ a: 1 }));
      expect(cacheStats(t)).toEqual({ "Stats.p": 1, "Stats.m": 2 });
    });
  });

  describe("metrics", () => {
    it("should count hits and misses when enabled", async () => {
      configure({ metrics: true });
      const T = withCache(
        class MeteredGrid {
          get area(): number {
            return 4;
          }
        },
        ["area"]
      );

      const t = new T();
      void t.area;
      void t.area;
      void t.area;
      expect(await counterValue(cacheMisses, "MeteredGrid.area")).toBe(1);
      expect(await counterValue(cacheHits, "MeteredGrid.area")).toBe(2);
    });

    it("should record nothing when disabled", async () => {
      configure({ metrics: false });
      const T = withCache(
        class SilentGrid {
          get area(): number {
            return 4;
          }
        },
        ["area"]
      );

      void new T().area;
      expect(await counterValue(cacheMisses, "SilentGrid.area")).toBeUndefined();
    });
  });
});

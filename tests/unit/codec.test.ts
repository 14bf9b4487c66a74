import { describe, expect, it } from "vitest";

import { deserialize, serialize } from "../../src/codec";
import { Complex } from "../../src/complex";
import { ValidationError } from "../../src/errors";
import { FrozenMapping } from "../../src/frozen-mapping";
import { FrozenSet } from "../../src/frozen-set";
import { digestHex } from "../../src/hash";
import { kinds } from "../../src/kinds";

describe("codec.ts", () => {
  describe("serialize", () => {
    it("should write JSON scalars as they are", () => {
      expect(serialize(Object.freeze([1, "a", null, true]))).toBe(
        '{"canonkey":1,"value":{"$tuple":[1,"a",null,true]}}'
      );
    });

    it("should tag integers and mappings", () => {
      expect(serialize(FrozenMapping.from({ spam: 1n }))).toBe(
        '{"canonkey":1,"value":{"$frozenmapping":[["spam",{"$int":"1"}]]}}'
      );
    });

    it("should tag floats JSON cannot carry", () => {
      expect(serialize(NaN)).toBe('{"canonkey":1,"value":{"$float":"NaN"}}');
      expect(serialize(-0)).toBe('{"canonkey":1,"value":{"$float":"-0"}}');
      expect(serialize(-Infinity)).toBe('{"canonkey":1,"value":{"$float":"-Infinity"}}');
    });

    it("should write equal unordered values to identical text", () => {
      expect(serialize(FrozenMapping.from({ spam: 1n, eggs: 2n }))).toBe(
        serialize(FrozenMapping.from({ eggs: 2n, spam: 1n }))
      );
      expect(serialize(new FrozenSet(["spam", "eggs"]))).toBe(
        serialize(new FrozenSet(["eggs", "spam"]))
      );
    });

    it("should reject values it cannot restore", () => {
      expect(() => serialize(new Map())).toThrow(ValidationError);
      expect(() => serialize(new Map())).toThrow("cannot serialize value of kind Map");
    });
  });

  describe("deserialize", () => {
    it("should restore special floats", () => {
      expect(deserialize(serialize(NaN))).toBeNaN();
      expect(Object.is(deserialize(serialize(-0)), -0)).toBe(true);
    });

    it("should restore nested hashable values", () => {
      const entries: Array<[unknown, unknown]> = [
        ["nested", FrozenMapping.from({ a: 1n })],
        [Object.freeze([1n, 2n]), new FrozenSet(["x", new Complex(1, -2)])],
        ["raw", new Uint8Array([1, 2, 3])],
        ["kind", kinds.int],
        ["missing", undefined],
      ];
      const value = new FrozenMapping(entries);

      const restored = deserialize(serialize(value));
      expect(restored).toBeInstanceOf(FrozenMapping);
      expect(value.equals(restored)).toBe(true);
      expect(digestHex(restored)).toBe(digestHex(value));
    });

    it("should restore plain arrays and records", () => {
      const text = serialize({ b: "x", a: [1, 2] });
      expect(text).toBe('{"canonkey":1,"value":{"$record":{"a":[1,2],"b":"x"}}}');
      expect(deserialize(text)).toEqual({ a: [1, 2], b: "x" });
    });

    it("should reject malformed text", () => {
      expect(() => deserialize("not json")).toThrow(ValidationError);
      expect(() => deserialize("not json")).toThrow(/^malformed envelope: /);
    });

    it("should reject unknown envelopes", () => {
      expect(() => deserialize('{"canonkey":2,"value":null}')).toThrow(
        /^invalid envelope: /
      );
      expect(() => deserialize('{"canonkey":1,"value":{"$int":"1.5"}}')).toThrow(
        ValidationError
      );
      expect(() => deserialize('{"canonkey":1}')).toThrow(ValidationError);
    });
  });
});

import { describe, expect, it } from "vitest";
import { isDynamicMap, isPlainObject, safeStringify, stableStringify } from "../json.ts";

describe("json helpers", () => {
  describe("isPlainObject", () => {
    it("accepts object literals and null-prototype objects", () => {
      expect(isPlainObject({})).toBe(true);
      expect(isPlainObject(Object.create(null))).toBe(true);
    });

    it("rejects arrays, class instances and null", () => {
      expect(isPlainObject([])).toBe(false);
      expect(isPlainObject(new Date())).toBe(false);
      expect(isPlainObject(null)).toBe(false);
    });
  });

  describe("isDynamicMap", () => {
    it("accepts only maps", () => {
      expect(isDynamicMap({ a: 1 })).toBe(true);
      expect(isDynamicMap([1])).toBe(false);
      expect(isDynamicMap(null)).toBe(false);
      expect(isDynamicMap(undefined)).toBe(false);
    });
  });

  describe("safeStringify", () => {
    it("renders values for messages", () => {
      expect(safeStringify("a")).toBe('"a"');
      expect(safeStringify(undefined)).toBe("undefined");
      expect(safeStringify(new Map([["k", 1]]))).toBe('{"k":1}');
      expect(safeStringify(function named() {})).toBe("[function named]");
    });

    it("marks circular references", () => {
      const value: { self?: unknown } = {};
      value.self = value;
      expect(safeStringify(value)).toBe('{"self":"[Circular]"}');
    });
  });

  describe("stableStringify", () => {
    it("sorts keys and drops undefined entries", () => {
      expect(stableStringify({ b: 1, a: [true, null], c: undefined })).toBe(
        '{"a":[true,null],"b":1}',
      );
    });
  });
});

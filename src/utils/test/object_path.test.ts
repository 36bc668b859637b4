import { describe, expect, it } from "vitest";
import {
  getAtPath,
  MISSING,
  parseObjectPath,
  setAtPath,
} from "../object_path.ts";
import type { DynamicValue } from "../../schemas/json.ts";

describe("object paths", () => {
  describe("parseObjectPath", () => {
    it("parses dotted keys, indices and quoted keys", () => {
      expect(parseObjectPath('a.b[0]["c.d"]')).toEqual(["a", "b", 0, "c.d"]);
    });

    it("parses single-quoted keys and negative indices", () => {
      expect(parseObjectPath("items[-1]['x y']")).toEqual(["items", -1, "x y"]);
    });

    it("rejects a leading dot", () => {
      expect(() => parseObjectPath(".a")).toThrow(
        "Invalid object path '.a' at offset 0",
      );
    });

    it("rejects an unquoted bracket key", () => {
      expect(() => parseObjectPath("a[x]")).toThrow(
        "Invalid object path 'a[x]' at offset 1",
      );
    });

    it("rejects an empty path", () => {
      expect(() => parseObjectPath("")).toThrow("Object path must not be empty");
    });
  });

  describe("getAtPath", () => {
    const data = { a: { b: [1, 2, 3] }, n: null };

    it("follows keys and indices", () => {
      expect(getAtPath(data, ["a", "b", 1])).toBe(2);
    });

    it("counts negative indices from the end", () => {
      expect(getAtPath(data, ["a", "b", -1])).toBe(3);
    });

    it("returns present nulls", () => {
      expect(getAtPath(data, ["n"])).toBeNull();
    });

    it("returns MISSING for absent steps", () => {
      expect(getAtPath(data, ["a", "c"])).toBe(MISSING);
      expect(getAtPath(data, ["a", "b", 5])).toBe(MISSING);
      expect(getAtPath(data, ["a", "b", "length"])).toBe(MISSING);
      expect(getAtPath({ a: 1 }, ["a", "b"])).toBe(MISSING);
    });
  });

  describe("setAtPath", () => {
    const container = (index: boolean): DynamicValue => (index ? [] : {});

    it("creates intermediate maps and sequences", () => {
      const target: { [key: string]: DynamicValue } = {};
      setAtPath(target, ["a", 0, "b"], 1, container);
      expect(target).toEqual({ a: [{ b: 1 }] });
    });

    it("writes __proto__ segments as own keys", () => {
      const target: { [key: string]: DynamicValue } = {};
      setAtPath(target, ["__proto__", "a"], 1, container);
      expect(Object.keys(target)).toEqual(["__proto__"]);
      expect(Object.getPrototypeOf(target)).toBe(Object.prototype);
      expect(Object.hasOwn(Object.prototype, "a")).toBe(false);
    });

    it("writes into existing containers", () => {
      const target: { [key: string]: DynamicValue } = { a: { keep: true } };
      setAtPath(target, ["a", "b"], "x", container);
      expect(target).toEqual({ a: { keep: true, b: "x" } });
    });
  });
});

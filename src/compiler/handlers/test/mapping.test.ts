import { describe, expect, it } from "vitest";
import { dump, load } from "../../../marshal.ts";
import { defineRecord } from "../../../schemas/complex/record_type.ts";
import { keyToString } from "../mapping.ts";

const Scores = defineRecord({
  name: "Scores",
  fields: [
    { name: "byId", type: { type: "map", keys: "int", values: "float" } },
    { name: "labels", type: { type: "dict", values: "string" } },
  ],
});

const Grid = defineRecord({
  name: "Grid",
  fields: [{
    name: "cells",
    type: {
      type: "map",
      keys: { type: "tuple", items: ["int", "int"] },
      values: "string",
    },
  }],
});

function ownKeys(value: unknown): string[] {
  return typeof value === "object" && value !== null ? Object.keys(value) : [];
}

describe("mapping handler", () => {
  it("loads maps with typed keys and dicts as objects", () => {
    const loaded = load(Scores, { byId: { "1": "2.5" }, labels: { a: 1 } });
    expect(loaded.byId).toEqual(new Map([[1, 2.5]]));
    expect(loaded.labels).toEqual({ a: "1" });
  });

  it("dumps keys in their canonical string form", () => {
    expect(dump(Scores, { byId: new Map([[1, 2.5]]), labels: {} })).toEqual({
      byId: { "1": 2.5 },
      labels: {},
    });
  });

  it("locates failing values by key", () => {
    expect(() => load(Scores, { byId: { "1": "x" }, labels: {} })).toThrow(
      'Expected float (at Scores.byId["1"]); value: "x"',
    );
  });

  it("round-trips structured keys through their JSON form", () => {
    const dumped = dump(Grid, { cells: new Map([[[1, 2], "a"]]) });
    expect(dumped).toEqual({ cells: { "[1,2]": "a" } });
    expect(load(Grid, dumped).cells).toEqual(new Map([[[1, 2], "a"]]));
  });

  it("reports structured keys that are not JSON", () => {
    expect(() => load(Grid, { cells: { "1,2": "a" } })).toThrow(
      'Expected JSON key (not valid JSON) (at Grid.cells["1,2"]); value: "1,2"',
    );
  });

  it("keeps a __proto__ key as an own entry", () => {
    const loaded = load(
      Scores,
      JSON.parse('{"byId":{},"labels":{"__proto__":"p","a":"b"}}'),
    );
    expect(ownKeys(loaded.labels)).toEqual(["__proto__", "a"]);
    expect(Object.getPrototypeOf(loaded.labels)).toBe(Object.prototype);
    const dumped = dump(Scores, loaded);
    expect(ownKeys(dumped.labels)).toEqual(["__proto__", "a"]);
  });

  describe("keyToString", () => {
    it("keeps strings and serializes everything else", () => {
      expect(keyToString("a")).toBe("a");
      expect(keyToString(1)).toBe("1");
      expect(keyToString(true)).toBe("true");
      expect(keyToString([1, 2])).toBe("[1,2]");
    });
  });
});

import { describe, expect, it } from "vitest";
import { dump, load } from "../../../marshal.ts";
import { defineRecord } from "../../../schemas/complex/record_type.ts";

const Color = { Red: "red", Green: "green" } as const;

const Paint = defineRecord({
  name: "Paint",
  fields: [
    { name: "color", type: { type: "enum", name: "Color", values: Color } },
    { name: "finish", type: { type: "literal", values: ["matte", "gloss"] } },
  ],
});

describe("enumeration handlers", () => {
  it("loads and dumps members by value", () => {
    expect(load(Paint, { color: "red", finish: "matte" })).toEqual({
      color: "red",
      finish: "matte",
    });
    expect(dump(Paint, { color: "green", finish: "gloss" })).toEqual({
      color: "green",
      finish: "gloss",
    });
  });

  it("loads and dumps members by name when configured", () => {
    expect(load(Paint, { color: "Red", finish: "matte" }, { enumByName: true })).toEqual({
      color: "red",
      finish: "matte",
    });
    expect(dump(Paint, { color: "red", finish: "matte" }, { enumByName: true })).toEqual({
      color: "Red",
      finish: "matte",
    });
  });

  it("matches case-sensitively", () => {
    expect(() => load(Paint, { color: "RED", finish: "matte" })).toThrow(
      'Expected one of "red", "green" (at Paint.color); value: "RED"',
    );
  });

  it("rejects values outside a literal", () => {
    expect(() => load(Paint, { color: "red", finish: "satin" })).toThrow(
      'Expected one of "matte", "gloss" (at Paint.finish); value: "satin"',
    );
  });
});

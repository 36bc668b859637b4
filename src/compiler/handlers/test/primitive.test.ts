import { describe, expect, it } from "vitest";
import { dump, load } from "../../../marshal.ts";
import { defineRecord } from "../../../schemas/complex/record_type.ts";
import { matchesExactly } from "../primitive.ts";

const Scalars = defineRecord({
  name: "Scalars",
  fields: [
    { name: "label", type: "string" },
    { name: "count", type: "int" },
    { name: "ratio", type: "float" },
    { name: "enabled", type: "bool" },
    { name: "blob", type: "bytes" },
    { name: "extra", type: "any" },
  ],
});

describe("primitive handler", () => {
  it("coerces scalars on load", () => {
    const loaded = load(Scalars, {
      label: 12,
      count: "4",
      ratio: "0.5",
      enabled: "Y",
      blob: "aGk=",
      extra: { nested: [1] },
    });
    expect(loaded.label).toBe("12");
    expect(loaded.count).toBe(4);
    expect(loaded.ratio).toBe(0.5);
    expect(loaded.enabled).toBe(true);
    expect(loaded.blob).toEqual(Uint8Array.of(104, 105));
    expect(loaded.extra).toEqual({ nested: [1] });
  });

  it("dumps interchange-safe values", () => {
    expect(dump(Scalars, {
      label: "a",
      count: 2,
      ratio: 1.5,
      enabled: false,
      blob: Uint8Array.of(104, 105),
      extra: new Set([1, 2]),
    })).toEqual({
      label: "a",
      count: 2,
      ratio: 1.5,
      enabled: false,
      blob: "aGk=",
      extra: [1, 2],
    });
  });

  it("refuses to dump non-finite floats", () => {
    const Reading = defineRecord({ name: "Reading", fields: [{ name: "f", type: "float" }] });
    expect(() => dump(Reading, { f: Number.NaN })).toThrow(
      "Expected finite number (at Reading.f); value: NaN",
    );
    expect(dump(Reading, { f: 0.25 })).toEqual({ f: 0.25 });
  });

  it("refuses ints that a number cannot hold exactly", () => {
    const Counter = defineRecord({ name: "Counter", fields: [{ name: "n", type: "int" }] });
    expect(() => load(Counter, { n: "9007199254740993" })).toThrow(
      'Expected int (outside the safe integer range) (at Counter.n); value: "9007199254740993"',
    );
  });

  it("rounds or rejects fractional ints as configured", () => {
    const Counter = defineRecord({ name: "Counter", fields: [{ name: "n", type: "int" }] });
    expect(load(Counter, { n: 2.5 })).toEqual({ n: 3 });
    expect(() => load(Counter, { n: 2.5 }, { intFraction: "reject" })).toThrow(
      "Expected int (fractional part not allowed) (at Counter.n); value: 2.5",
    );
  });

  it("treats 0 and off as false", () => {
    const Toggle = defineRecord({ name: "Toggle", fields: [{ name: "on", type: "bool" }] });
    expect(load(Toggle, { on: 0 })).toEqual({ on: false });
    expect(load(Toggle, { on: "off" })).toEqual({ on: false });
  });

  describe("matchesExactly", () => {
    it("checks the value's own shape", () => {
      expect(matchesExactly("int", 3)).toBe(true);
      expect(matchesExactly("int", 3.5)).toBe(false);
      expect(matchesExactly("float", 3)).toBe(true);
      expect(matchesExactly("string", 3)).toBe(false);
    });

    it("never matches any or bytes", () => {
      expect(matchesExactly("any", 3)).toBe(false);
      expect(matchesExactly("bytes", Uint8Array.of(1))).toBe(false);
    });
  });
});

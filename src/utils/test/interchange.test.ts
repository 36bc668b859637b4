import { describe, expect, it } from "vitest";
import { isDynamicMap } from "../../schemas/json.ts";
import { toInterchange } from "../interchange.ts";

describe("toInterchange", () => {
  it("passes scalars through and maps undefined to null", () => {
    expect(toInterchange("x")).toBe("x");
    expect(toInterchange(3)).toBe(3);
    expect(toInterchange(undefined)).toBeNull();
  });

  it("renders dates and bytes as text", () => {
    expect(toInterchange(new Date(Date.UTC(2024, 0, 2)))).toBe(
      "2024-01-02T00:00:00.000Z",
    );
    expect(toInterchange(Uint8Array.of(104, 105))).toBe("aGk=");
  });

  it("converts maps, sets and nested objects", () => {
    const value = {
      tags: new Set(["a", "b"]),
      counts: new Map<unknown, number>([["x", 1], [2, 3]]),
    };
    expect(toInterchange(value)).toEqual({
      tags: ["a", "b"],
      counts: { x: 1, "2": 3 },
    });
  });

  it("keeps a __proto__ key as an own entry", () => {
    const out = toInterchange(new Map([["__proto__", 1]]));
    expect(isDynamicMap(out) && Object.hasOwn(out, "__proto__")).toBe(true);
    expect(Object.getPrototypeOf(out)).toBe(Object.prototype);
  });

  it("keeps bigints within the safe range as numbers", () => {
    expect(toInterchange(10n)).toBe(10);
    expect(toInterchange(2n ** 64n)).toBe("18446744073709551616");
  });

  it("allows shared references that are not cycles", () => {
    const shared = { v: 1 };
    expect(toInterchange([shared, shared])).toEqual([{ v: 1 }, { v: 1 }]);
  });

  it("rejects cycles and non-finite numbers", () => {
    const cyclic: { self?: unknown } = {};
    cyclic.self = cyclic;
    expect(() => toInterchange(cyclic)).toThrow("circular reference");
    expect(() => toInterchange(Number.NaN)).toThrow("Expected finite number");
  });
});

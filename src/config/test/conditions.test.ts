import { describe, expect, it } from "vitest";
import {
  eq,
  evaluateCondition,
  falsy,
  ge,
  gt,
  is,
  isNot,
  le,
  lt,
  ne,
  truthy,
} from "../conditions.ts";

describe("conditions", () => {
  describe("truthiness", () => {
    it("treats empty collections as falsy", () => {
      expect(evaluateCondition(falsy(), [])).toBe(true);
      expect(evaluateCondition(falsy(), {})).toBe(true);
      expect(evaluateCondition(falsy(), new Map())).toBe(true);
      expect(evaluateCondition(falsy(), "")).toBe(true);
      expect(evaluateCondition(falsy(), 0)).toBe(true);
    });

    it("treats populated values as truthy", () => {
      expect(evaluateCondition(truthy(), [0])).toBe(true);
      expect(evaluateCondition(truthy(), new Set(["a"]))).toBe(true);
      expect(evaluateCondition(truthy(), new Date(0))).toBe(true);
    });
  });

  describe("equality", () => {
    it("compares structurally", () => {
      expect(evaluateCondition(eq("a"), "a")).toBe(true);
      expect(evaluateCondition(eq(1), "1")).toBe(false);
      expect(evaluateCondition(ne(null), null)).toBe(false);
    });

    it("compares identity with Object.is", () => {
      expect(evaluateCondition(is(null), null)).toBe(true);
      expect(evaluateCondition(isNot(0), -0)).toBe(true);
    });
  });

  describe("ordering", () => {
    it("orders numbers and strings", () => {
      expect(evaluateCondition(gt(3), 5)).toBe(true);
      expect(evaluateCondition(ge(5), 5)).toBe(true);
      expect(evaluateCondition(lt(3), 5)).toBe(false);
      expect(evaluateCondition(le("b"), "a")).toBe(true);
    });

    it("is false across types", () => {
      expect(evaluateCondition(gt(3), "5")).toBe(false);
      expect(evaluateCondition(lt("b"), null)).toBe(false);
    });
  });
});

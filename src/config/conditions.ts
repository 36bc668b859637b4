import { isDeepStrictEqual } from "node:util";
import type { DynamicScalar } from "../schemas/json.ts";

/**
 * Comparison operators that take an operand.
 */
export type ComparisonOp = "eq" | "ne" | "lt" | "le" | "gt" | "ge" | "is" | "isNot";

/**
 * Description of a predicate evaluated against a field value on dump.
 *
 * Conditions are plain data rather than functions so that they take part in
 * the configuration fingerprint.
 */
export type Condition =
  | { readonly op: ComparisonOp; readonly value: DynamicScalar }
  | { readonly op: "truthy" | "falsy" };

/** Skip when the value equals `value`. */
export const eq = (value: DynamicScalar): Condition => ({ op: "eq", value });
/** Skip when the value differs from `value`. */
export const ne = (value: DynamicScalar): Condition => ({ op: "ne", value });
/** Skip when the value is less than `value`. */
export const lt = (value: DynamicScalar): Condition => ({ op: "lt", value });
/** Skip when the value is at most `value`. */
export const le = (value: DynamicScalar): Condition => ({ op: "le", value });
/** Skip when the value is greater than `value`. */
export const gt = (value: DynamicScalar): Condition => ({ op: "gt", value });
/** Skip when the value is at least `value`. */
export const ge = (value: DynamicScalar): Condition => ({ op: "ge", value });
/** Skip when the value is identical to `value` (`Object.is`). */
export const is = (value: DynamicScalar): Condition => ({ op: "is", value });
/** Skip unless the value is identical to `value`. */
export const isNot = (value: DynamicScalar): Condition => ({ op: "isNot", value });
/** Skip truthy values. */
export const truthy = (): Condition => ({ op: "truthy" });
/** Skip falsy values, including empty sequences and maps. */
export const falsy = (): Condition => ({ op: "falsy" });

function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (value instanceof Map || value instanceof Set) return value.size > 0;
  if (typeof value === "object" && value !== null && !(value instanceof Date)) {
    return Object.keys(value).length > 0;
  }
  return Boolean(value);
}

function compare(
  value: unknown,
  operand: DynamicScalar,
  test: (order: number) => boolean,
): boolean {
  if (typeof value === "number" && typeof operand === "number") {
    return test(value - operand);
  }
  if (typeof value === "string" && typeof operand === "string") {
    return test(value < operand ? -1 : value > operand ? 1 : 0);
  }
  return false;
}

/**
 * Evaluates a condition against an in-memory field value.
 */
export function evaluateCondition(condition: Condition, value: unknown): boolean {
  switch (condition.op) {
    case "truthy":
      return isTruthy(value);
    case "falsy":
      return !isTruthy(value);
    case "eq":
      return isDeepStrictEqual(value, condition.value);
    case "ne":
      return !isDeepStrictEqual(value, condition.value);
    case "is":
      return Object.is(value, condition.value);
    case "isNot":
      return !Object.is(value, condition.value);
    case "lt":
      return compare(value, condition.value, (order) => order < 0);
    case "le":
      return compare(value, condition.value, (order) => order <= 0);
    case "gt":
      return compare(value, condition.value, (order) => order > 0);
    case "ge":
      return compare(value, condition.value, (order) => order >= 0);
  }
}

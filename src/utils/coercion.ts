import { TypeMismatchError } from "../schemas/error.ts";

/**
 * Lower-cased strings that load as `true`. Every other string loads as
 * `false`.
 */
export const TRUTHY_VALUES: ReadonlySet<string> = new Set([
  "true",
  "t",
  "yes",
  "y",
  "on",
  "1",
]);

/**
 * How integer coercion treats a number with a fractional part.
 */
export type IntFractionPolicy = "round" | "reject";

/**
 * Loads a boolean: strings are matched case-insensitively against
 * {@link TRUTHY_VALUES}; any other value is true only when it equals 1 or
 * is `true` itself.
 */
export function asBool(value: unknown): boolean {
  if (typeof value === "string") {
    return TRUTHY_VALUES.has(value.toLowerCase());
  }
  return value === true || value === 1;
}

/**
 * Loads an integer from a number or a numeric string.
 */
export function asInt(
  value: unknown,
  fraction: IntFractionPolicy = "round",
): number {
  let numeric: number;
  if (typeof value === "number") {
    numeric = value;
  } else if (typeof value === "string" && value.trim() !== "") {
    numeric = Number(value.trim());
  } else if (typeof value === "bigint") {
    numeric = Number(value);
  } else {
    throw new TypeMismatchError("int", value);
  }
  if (Number.isNaN(numeric)) {
    throw new TypeMismatchError("int", value, "not a number");
  }
  if (!Number.isFinite(numeric)) {
    throw new TypeMismatchError("int", value, "not a finite number");
  }
  let result = numeric;
  if (!Number.isInteger(numeric)) {
    if (fraction === "reject") {
      throw new TypeMismatchError("int", value, "fractional part not allowed");
    }
    result = Math.round(numeric);
  }
  if (!Number.isSafeInteger(result)) {
    throw new TypeMismatchError("int", value, "outside the safe integer range");
  }
  return result;
}

/**
 * Loads a float from a number or a numeric string.
 */
export function asFloat(value: unknown): number {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const numeric = Number(value.trim());
    if (!Number.isNaN(numeric)) {
      return numeric;
    }
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  throw new TypeMismatchError("float", value);
}

/**
 * Dumps a float, which must be finite to survive interchange.
 */
export function finiteFloat(value: unknown): number {
  const numeric = asFloat(value);
  if (!Number.isFinite(numeric)) {
    throw new TypeMismatchError("finite number", value);
  }
  return numeric;
}

/**
 * Loads a string; scalars are stringified and `null` becomes `""`.
 */
export function asStr(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (
    typeof value === "number" || typeof value === "boolean" ||
    typeof value === "bigint"
  ) {
    return String(value);
  }
  if (value === null || value === undefined) {
    return "";
  }
  throw new TypeMismatchError("string", value);
}

/**
 * Loads bytes from base64 text or a sequence of octets.
 */
export function asBytes(value: unknown): Uint8Array {
  if (value instanceof Uint8Array) {
    return value;
  }
  if (typeof value === "string") {
    return new Uint8Array(Buffer.from(value, "base64"));
  }
  if (
    Array.isArray(value) &&
    value.every((octet) =>
      typeof octet === "number" && Number.isInteger(octet) && octet >= 0 &&
      octet <= 255
    )
  ) {
    return Uint8Array.from(value);
  }
  throw new TypeMismatchError("bytes", value);
}

/**
 * Dumps bytes as base64 text.
 */
export function bytesToBase64(value: Uint8Array): string {
  return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
    .toString("base64");
}

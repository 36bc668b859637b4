import { TypeMismatchError } from "../schemas/error.ts";
import { type DynamicMap, type DynamicValue, setOwn } from "../schemas/json.ts";
import { bytesToBase64 } from "./coercion.ts";

/**
 * Converts an arbitrary in-memory value into interchange-safe data, for
 * fields declared as `any`.
 *
 * Dates become ISO 8601 strings, bytes become base64, maps become objects
 * with stringified keys, sets become arrays and other objects contribute
 * their own enumerable properties.
 */
export function toInterchange(value: unknown, seen: Set<object> = new Set()): DynamicValue {
  if (value === null || value === undefined) {
    return null;
  }
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      if (!Number.isFinite(value)) {
        throw new TypeMismatchError("finite number", value);
      }
      return value;
    case "bigint":
      return Number.isSafeInteger(Number(value)) ? Number(value) : String(value);
  }
  if (typeof value !== "object") {
    throw new TypeMismatchError("interchange value", value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return bytesToBase64(value);
  }
  if (seen.has(value)) {
    throw new TypeMismatchError("acyclic value", value, "circular reference");
  }
  seen.add(value);
  try {
    if (Array.isArray(value) || value instanceof Set) {
      return Array.from(value, (item: unknown) => toInterchange(item, seen));
    }
    const out: DynamicMap = {};
    const entries: Iterable<[unknown, unknown]> = value instanceof Map
      ? value.entries()
      : Object.entries(value);
    for (const [key, item] of entries) {
      setOwn(
        out,
        typeof key === "string" ? key : JSON.stringify(toInterchange(key, seen)),
        toInterchange(item, seen),
      );
    }
    return out;
  } finally {
    seen.delete(value);
  }
}

/**
 * Scalar leaves of a dynamic value tree.
 */
export type DynamicScalar = string | number | boolean | null;

/**
 * The generic map/sequence/scalar tree exchanged with format adapters.
 */
export type DynamicValue =
  | DynamicScalar
  | DynamicValue[]
  | { [key: string]: DynamicValue };

/**
 * A dynamic value known to be a map.
 */
export type DynamicMap = { [key: string]: DynamicValue };

/**
 * Returns true for plain (non-array, non-null) objects.
 */
export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Adds an own enumerable property. Unlike assignment, a `"__proto__"` key
 * becomes a property of its own and leaves the prototype alone.
 */
export function setOwn(target: object, key: PropertyKey, value: unknown): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Returns true for dynamic values that are maps.
 */
export function isDynamicMap(value: DynamicValue | undefined): value is DynamicMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** @internal */
export function _safeJSONStringify(obj: unknown, indent = 2): string {
  const cache: unknown[] = [];
  const retVal = JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === "bigint") return String(value);
    if (value instanceof Map) return Object.fromEntries(value);
    if (value instanceof Set) return Array.from(value);
    if (typeof value === "object" && value !== null) {
      if (cache.includes(value)) return "[Circular]";
      cache.push(value);
    }
    return value;
  }, indent);
  cache.length = 0;
  return retVal;
}

/**
 * Renders any value for inclusion in an error message.
 */
export function safeStringify(value: unknown): string {
  if (
    typeof value === "string" || typeof value === "bigint" ||
    typeof value === "number" || typeof value === "boolean" || value === null ||
    typeof value === "undefined"
  ) {
    return typeof value === "string" ? JSON.stringify(value) : String(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }
  if (typeof value === "function") {
    return value.name ? `[function ${value.name}]` : "[function]";
  }
  const jsonStr = _safeJSONStringify(value, 0);
  if (jsonStr === undefined) {
    return String(value);
  }
  return jsonStr;
}

/**
 * Serializes plain data with object keys sorted, so that two structurally
 * equal values always produce the same string.
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(",")}]`;
  }
  if (isPlainObject(value)) {
    const entries = Object.keys(value)
      .filter((key) => value[key] !== undefined)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`);
    return `{${entries.join(",")}}`;
  }
  if (value === undefined) {
    return "null";
  }
  return JSON.stringify(value) ?? "null";
}

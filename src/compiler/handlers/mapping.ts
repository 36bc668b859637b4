import type { MappingDescriptor, TypeDescriptor } from "../../descriptors/descriptor.ts";
import { toMarshalError, TypeMismatchError } from "../../schemas/error.ts";
import {
  type DynamicMap,
  type DynamicValue,
  isPlainObject,
  setOwn,
} from "../../schemas/json.ts";
import type { KindHandler } from "../context.ts";

function entriesOf(value: unknown, expected: string): [unknown, unknown][] {
  if (value instanceof Map) {
    return Array.from(value.entries());
  }
  if (isPlainObject(value)) {
    return Object.entries(value);
  }
  throw new TypeMismatchError(expected, value);
}

/**
 * Canonical string form of a dumped map key.
 */
export function keyToString(key: DynamicValue): string {
  return typeof key === "string" ? key : JSON.stringify(key);
}

/**
 * Kinds whose dumped form is a map or a sequence; their keys are written as
 * JSON text.
 */
const STRUCTURED_KEY_KINDS: ReadonlySet<TypeDescriptor["kind"]> = new Set([
  "collection",
  "tuple",
  "mapping",
  "record",
]);

function parseStructuredKey(key: unknown): unknown {
  if (typeof key !== "string") {
    return key;
  }
  try {
    const parsed: unknown = JSON.parse(key);
    return parsed;
  } catch (error) {
    throw new TypeMismatchError("JSON key", key, "not valid JSON", error);
  }
}

/**
 * `map` (loaded as a `Map` with typed keys) and `dict` (loaded as a plain
 * object). Keys of either dump through their canonical string form.
 */
export const mappingHandler: KindHandler<MappingDescriptor> = {
  emitLoad(descriptor, ctx) {
    const [keyDescriptor, valueDescriptor] = descriptor.args;
    const loadKey = ctx.loadOf(keyDescriptor);
    const structuredKeys = STRUCTURED_KEY_KINDS.has(keyDescriptor.kind);
    const loadValue = ctx.loadOf(valueDescriptor);
    const { origin } = descriptor;
    return (value) => {
      const entries = entriesOf(value, origin);
      const out = origin === "map" ? new Map<unknown, unknown>() : undefined;
      const dict: Record<string, unknown> = {};
      for (const [key, item] of entries) {
        const segment = String(key);
        let loadedKey: unknown;
        let loadedValue: unknown;
        try {
          loadedKey = loadKey(structuredKeys ? parseStructuredKey(key) : key);
        } catch (error) {
          throw toMarshalError(error, `key of ${origin}`, key).prependPath(segment);
        }
        try {
          loadedValue = loadValue(item);
        } catch (error) {
          throw toMarshalError(error, `value of ${origin}`, item).prependPath(segment);
        }
        if (out) {
          out.set(loadedKey, loadedValue);
        } else {
          setOwn(dict, String(loadedKey), loadedValue);
        }
      }
      return out ?? dict;
    };
  },

  emitDump(descriptor, ctx) {
    const [keyDescriptor, valueDescriptor] = descriptor.args;
    const dumpKey = ctx.dumpOf(keyDescriptor);
    const dumpValue = ctx.dumpOf(valueDescriptor);
    const { origin } = descriptor;
    return (value) => {
      const out: DynamicMap = {};
      for (const [key, item] of entriesOf(value, origin)) {
        let name: string;
        try {
          name = keyToString(dumpKey(key));
        } catch (error) {
          throw toMarshalError(error, `key of ${origin}`, key);
        }
        try {
          setOwn(out, name, dumpValue(item));
        } catch (error) {
          throw toMarshalError(error, `value of ${origin}`, item).prependPath(name);
        }
      }
      return out;
    };
  },

  emitGuard(descriptor) {
    return descriptor.origin === "map"
      ? (value) => value instanceof Map
      : isPlainObject;
  },
};

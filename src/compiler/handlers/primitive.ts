import type { PrimitiveDescriptor } from "../../descriptors/descriptor.ts";
import type { PrimitiveName } from "../../schemas/declared.ts";
import { TypeMismatchError } from "../../schemas/error.ts";
import {
  asBool,
  asBytes,
  asFloat,
  asInt,
  asStr,
  bytesToBase64,
  finiteFloat,
} from "../../utils/coercion.ts";
import { toInterchange } from "../../utils/interchange.ts";
import type { Guard, KindHandler } from "../context.ts";

function loadNull(value: unknown): null {
  if (value === null || value === undefined) {
    return null;
  }
  throw new TypeMismatchError("null", value);
}

const GUARDS: Record<PrimitiveName, Guard> = {
  string: (value) => typeof value === "string",
  int: (value) => Number.isInteger(value),
  float: (value) => typeof value === "number",
  bool: (value) => typeof value === "boolean",
  bytes: (value) => value instanceof Uint8Array,
  null: (value) => value === null,
  any: () => true,
};

/**
 * Returns true when a dynamic value already has the exact shape of a
 * primitive, so that no coercion is needed to load it.
 */
export function matchesExactly(origin: PrimitiveName, value: unknown): boolean {
  return origin !== "any" && origin !== "bytes" && GUARDS[origin](value);
}

/**
 * Strings, numbers, booleans, bytes, `null` and `any`.
 */
export const primitiveHandler: KindHandler<PrimitiveDescriptor> = {
  emitLoad(descriptor, ctx) {
    switch (descriptor.origin) {
      case "string":
        return asStr;
      case "int": {
        const { intFraction } = ctx.config;
        return (value) => asInt(value, intFraction);
      }
      case "float":
        return asFloat;
      case "bool":
        return asBool;
      case "bytes":
        return asBytes;
      case "null":
        return loadNull;
      case "any":
        return (value) => value;
    }
  },

  emitDump(descriptor, ctx) {
    switch (descriptor.origin) {
      case "string":
        return asStr;
      case "int": {
        const { intFraction } = ctx.config;
        return (value) => asInt(value, intFraction);
      }
      case "float":
        return finiteFloat;
      case "bool":
        return (value) => typeof value === "boolean" ? value : asBool(value);
      case "bytes":
        return (value) => {
          if (!(value instanceof Uint8Array)) {
            throw new TypeMismatchError("bytes", value);
          }
          return bytesToBase64(value);
        };
      case "null":
        return loadNull;
      case "any":
        return (value) => toInterchange(value);
    }
  },

  emitGuard(descriptor) {
    return GUARDS[descriptor.origin];
  },
};

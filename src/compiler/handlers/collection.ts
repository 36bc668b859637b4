import type {
  CollectionDescriptor,
  TupleDescriptor,
} from "../../descriptors/descriptor.ts";
import {
  MissingFieldError,
  toMarshalError,
  TypeMismatchError,
} from "../../schemas/error.ts";
import { type DynamicMap, type DynamicValue, isPlainObject } from "../../schemas/json.ts";
import type { DumpFragment, KindHandler, LoadFragment } from "../context.ts";

function toSequence(value: unknown, expected: string): unknown[] {
  if (Array.isArray(value)) return value;
  if (value instanceof Set) return Array.from(value);
  throw new TypeMismatchError(expected, value);
}

function mapItems<R>(
  items: readonly unknown[],
  fragment: (value: unknown) => R,
  expected: string,
): R[] {
  const out = new Array<R>(items.length);
  for (let i = 0; i < items.length; i++) {
    try {
      out[i] = fragment(items[i]);
    } catch (error) {
      throw toMarshalError(error, expected, items[i]).prependPath(i);
    }
  }
  return out;
}

/**
 * Lists and sets. Either loads from any sequence; sets dump as sequences.
 */
export const collectionHandler: KindHandler<CollectionDescriptor> = {
  emitLoad(descriptor, ctx) {
    const item = ctx.loadOf(descriptor.args[0]);
    const { origin } = descriptor;
    return (value) => {
      const items = mapItems(toSequence(value, origin), item, origin);
      return origin === "set" ? new Set(items) : items;
    };
  },

  emitDump(descriptor, ctx) {
    const item = ctx.dumpOf(descriptor.args[0]);
    const { origin } = descriptor;
    return (value) => mapItems(toSequence(value, origin), item, origin);
  },

  emitGuard(descriptor) {
    return descriptor.origin === "set"
      ? (value) => value instanceof Set
      : (value) => Array.isArray(value);
  },
};

function expectedTuple(descriptor: TupleDescriptor): string {
  if (descriptor.variadic) return "tuple";
  return `${descriptor.name ?? "tuple"} of ${descriptor.args.length}`;
}

function checkArity(descriptor: TupleDescriptor, items: readonly unknown[]): void {
  if (!descriptor.variadic && items.length !== descriptor.args.length) {
    throw new TypeMismatchError(
      expectedTuple(descriptor),
      items,
      `length mismatch: got ${items.length}`,
    );
  }
}

function positional<R>(
  descriptor: TupleDescriptor,
  fragments: readonly ((value: unknown) => R)[],
  items: readonly unknown[],
): R[] {
  checkArity(descriptor, items);
  if (descriptor.variadic) {
    return mapItems(items, fragments[0], "tuple");
  }
  const out = new Array<R>(items.length);
  for (let i = 0; i < items.length; i++) {
    try {
      out[i] = fragments[i](items[i]);
    } catch (error) {
      throw toMarshalError(error, expectedTuple(descriptor), items[i]).prependPath(
        descriptor.names?.[i] ?? i,
      );
    }
  }
  return out;
}

/**
 * Fixed, variadic and named tuples.
 *
 * Named tuples load from a sequence or a map keyed by position name, live
 * in memory as objects keyed by position name, and dump as a sequence
 * unless `namedTupleAsMap` is set.
 */
export const tupleHandler: KindHandler<TupleDescriptor> = {
  emitLoad(descriptor, ctx) {
    const fragments: LoadFragment[] = descriptor.args.map((arg) => ctx.loadOf(arg));
    const { names } = descriptor;
    if (!names) {
      return (value) => {
        if (!Array.isArray(value)) {
          throw new TypeMismatchError(expectedTuple(descriptor), value);
        }
        return positional(descriptor, fragments, value);
      };
    }
    return (value) => {
      let items: unknown[];
      if (Array.isArray(value)) {
        items = value;
      } else if (isPlainObject(value)) {
        const source: Record<string, unknown> = value;
        items = names.map((name) => {
          if (!Object.hasOwn(source, name)) {
            throw new MissingFieldError(name, [name]).prependPath(name);
          }
          return source[name];
        });
      } else {
        throw new TypeMismatchError(expectedTuple(descriptor), value);
      }
      const loaded = positional(descriptor, fragments, items);
      const out: Record<string, unknown> = {};
      names.forEach((name, i) => {
        out[name] = loaded[i];
      });
      return out;
    };
  },

  emitDump(descriptor, ctx) {
    const fragments: DumpFragment[] = descriptor.args.map((arg) => ctx.dumpOf(arg));
    const { names } = descriptor;
    if (!names) {
      return (value) => {
        if (!Array.isArray(value)) {
          throw new TypeMismatchError(expectedTuple(descriptor), value);
        }
        return positional(descriptor, fragments, value);
      };
    }
    const asMap = ctx.config.namedTupleAsMap;
    return (value) => {
      if (typeof value !== "object" || value === null) {
        throw new TypeMismatchError(expectedTuple(descriptor), value);
      }
      const source: object = value;
      const items: unknown[] = Array.isArray(source)
        ? source
        : names.map((name): unknown => Reflect.get(source, name));
      const dumped: DynamicValue[] = positional(descriptor, fragments, items);
      if (!asMap) {
        return dumped;
      }
      const out: DynamicMap = {};
      names.forEach((name, i) => {
        out[name] = dumped[i];
      });
      return out;
    };
  },

  emitGuard(descriptor) {
    const { names } = descriptor;
    if (names) {
      return (value) => {
        if (typeof value !== "object" || value === null || Array.isArray(value)) {
          return false;
        }
        const target: object = value;
        return names.every((name) => name in target);
      };
    }
    return (value) =>
      Array.isArray(value) &&
      (descriptor.variadic || value.length === descriptor.args.length);
  },
};

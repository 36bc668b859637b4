import type { EffectiveConfig, RecordMeta } from "./config/meta.ts";
import { parseRecordMeta } from "./config/meta.ts";
import { mergeConfig } from "./config/resolve_config.ts";
import type { CompiledRoutine } from "./compiler/context.ts";
import { clearRoutineCache, compileRoutine } from "./compiler/compile_record.ts";
import type { TypeDescriptor } from "./descriptors/descriptor.ts";
import { resolveFieldType } from "./descriptors/resolve_descriptor.ts";
import { globalTypeRegistry } from "./extensions/type_registry.ts";
import type { RecordField, RecordType } from "./schemas/complex/record_type.ts";
import {
  AggregateMarshalError,
  DescriptorResolutionError,
  MarshalError,
  toMarshalError,
  UnsupportedTypeError,
} from "./schemas/error.ts";
import type { DynamicMap } from "./schemas/json.ts";

export { clearRoutineCache };

const inheritedByOptions = new WeakMap<RecordMeta, EffectiveConfig>();

function inheritedFrom(options: RecordMeta | undefined): EffectiveConfig | undefined {
  if (options === undefined) {
    return undefined;
  }
  let config = inheritedByOptions.get(options);
  if (!config) {
    config = mergeConfig(parseRecordMeta("call options", options));
    inheritedByOptions.set(options, config);
  }
  return config;
}

/**
 * Compiles (or fetches from the cache) the routines of `record`.
 *
 * `options` act as configuration inherited by the record: the record's own
 * options still take precedence.
 */
export function compile<T>(record: RecordType<T>, options?: RecordMeta): CompiledRoutine {
  return compileRoutine(record, inheritedFrom(options));
}

/**
 * Converts a dynamic value into an instance of `record`.
 *
 * @throws MarshalError (or a subclass) describing the first problem, or an
 * AggregateMarshalError when `collectErrors` is on.
 */
export function load<T>(record: RecordType<T>, data: unknown, options?: RecordMeta): T {
  const fields = compile(record, options).load(data);
  try {
    return record.construct(fields);
  } catch (error) {
    throw toMarshalError(error, record.getName(), data).attributeTo(record.getName());
  }
}

/**
 * Converts an instance of `record` into interchange-safe dynamic data.
 */
export function dump<T>(record: RecordType<T>, value: T, options?: RecordMeta): DynamicMap {
  return compile(record, options).dump(value);
}

/**
 * Loads `data` collecting every error instead of stopping at the first.
 * Returns the errors found; an empty list means `data` loads cleanly.
 */
export function validate<T>(
  record: RecordType<T>,
  data: unknown,
  options?: RecordMeta,
): MarshalError[] {
  try {
    load(record, data, { ...options, collectErrors: true });
    return [];
  } catch (error) {
    if (error instanceof AggregateMarshalError) {
      return error.errors;
    }
    if (error instanceof MarshalError) {
      return [error];
    }
    throw error;
  }
}

function nestedRecords(descriptor: TypeDescriptor, out: RecordType<unknown>[]): void {
  if (descriptor.kind === "record") {
    out.push(descriptor.record);
  }
  for (const arg of descriptor.args) {
    nestedRecords(arg, out);
  }
}

/**
 * Resolves the declared type of every field reachable from `record`
 * without compiling anything, and returns every problem found. A field
 * that fails does not stop its siblings from being checked.
 */
export function validateSchema(record: RecordType<unknown>): MarshalError[] {
  const errors: MarshalError[] = [];
  const visited = new Set<RecordType<unknown>>();
  const queue: RecordType<unknown>[] = [record];

  for (let current = queue.shift(); current; current = queue.shift()) {
    if (visited.has(current)) continue;
    visited.add(current);
    const owner = current;
    let fields: ReadonlyArray<RecordField>;
    try {
      fields = owner.getFields();
    } catch (error) {
      errors.push(
        new MarshalError(error instanceof Error ? error.message : String(error), {
          cause: error,
        }).attributeTo(owner.getName()),
      );
      continue;
    }
    fields.forEach((field, ordinal) => {
      try {
        const { descriptor } = resolveFieldType(field, { record: owner, ordinal });
        const stack = [descriptor];
        for (let next = stack.pop(); next; next = stack.pop()) {
          if (next.kind === "custom" && !globalTypeRegistry.has(next.ctor)) {
            throw new UnsupportedTypeError(
              next.origin,
              `field '${field.getName()}' needs hooks registered with registerType()`,
            );
          }
          stack.push(...next.args);
        }
        if (
          field.isCatchAll() &&
          !(descriptor.kind === "mapping" && descriptor.origin === "dict")
        ) {
          throw new DescriptorResolutionError(
            field.getName(),
            descriptor.origin,
            "catch-all fields must be declared as dict",
          );
        }
        nestedRecords(descriptor, queue);
      } catch (error) {
        if (!(error instanceof MarshalError)) throw error;
        errors.push(error.attributeTo(owner.getName()));
      }
    });
  }
  return errors;
}

import type { RecordDescriptor } from "../../descriptors/descriptor.ts";
import type { RecordType } from "../../schemas/complex/record_type.ts";
import { toMarshalError } from "../../schemas/error.ts";
import type { CompileContext, Guard, KindHandler, RoutineRef } from "../context.ts";

/**
 * Recognizes instances of a record: through its declared instance test,
 * else by the presence of every field name.
 */
export function recordGuard(record: RecordType<unknown>): Guard {
  if (record.hasInstanceGuard()) {
    return (value) => record.isInstance(value);
  }
  const names = record.getFields().map((field) => field.getName());
  return (value) => {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      return false;
    }
    const target: object = value;
    return names.every((name) => name in target);
  };
}

function routineOf(descriptor: RecordDescriptor, ctx: CompileContext): RoutineRef {
  return descriptor.recursive
    ? ctx.deferredRoutineFor(descriptor.record)
    : ctx.routineFor(descriptor.record);
}

/**
 * Nested records call into the nested record's own routines.
 */
export const recordHandler: KindHandler<RecordDescriptor> = {
  emitLoad(descriptor, ctx) {
    const { record } = descriptor;
    const routine = routineOf(descriptor, ctx);
    return (value) => {
      const fields = routine.load(value);
      try {
        return record.construct(fields);
      } catch (error) {
        throw toMarshalError(error, record.getName(), value);
      }
    };
  },

  emitDump(descriptor, ctx) {
    const routine = routineOf(descriptor, ctx);
    return (value) => routine.dump(value);
  },

  emitGuard(descriptor) {
    return recordGuard(descriptor.record);
  },
};

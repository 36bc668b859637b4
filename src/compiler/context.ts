import type { EffectiveConfig } from "../config/meta.ts";
import type { TypeDescriptor } from "../descriptors/descriptor.ts";
import type { TypeRegistry } from "../extensions/type_registry.ts";
import type { FieldValues, RecordType } from "../schemas/complex/record_type.ts";
import type { DynamicMap, DynamicValue } from "../schemas/json.ts";

/**
 * Converts one dynamic value to its in-memory form.
 */
export type LoadFragment = (value: unknown) => unknown;

/**
 * Converts one in-memory value to its dynamic form.
 */
export type DumpFragment = (value: unknown) => DynamicValue;

/**
 * Tells whether an in-memory value belongs to a type. Used to pick the
 * alternative of a sum type when dumping.
 */
export type Guard = (value: unknown) => boolean;

/**
 * The pair of routines compiled for one record under one configuration.
 *
 * `load` yields field values; {@link RecordType.construct} turns them into
 * an instance.
 */
export interface RoutineRef {
  load(value: unknown): FieldValues;
  dump(value: unknown): DynamicMap;
}

/**
 * A published routine pair together with the symbol table it was built from.
 */
export interface CompiledRoutine extends RoutineRef {
  readonly record: RecordType<unknown>;
  readonly config: EffectiveConfig;
  /** Every fragment bound while assembling, by binding name. */
  readonly symbols: ReadonlyMap<string, unknown>;
}

/**
 * What a handler sees while emitting fragments for one field.
 *
 * Handlers reach other handlers only through `loadOf`, `dumpOf` and
 * `guardOf`, never by importing the dispatch table.
 */
export interface CompileContext {
  /** The record whose routines are being assembled. */
  readonly record: RecordType<unknown>;
  /** Effective configuration of that record. */
  readonly config: EffectiveConfig;
  /** Name of the field being compiled. */
  readonly field: string;
  /** Extension registry consulted for custom types. */
  readonly types: TypeRegistry;
  loadOf(descriptor: TypeDescriptor): LoadFragment;
  dumpOf(descriptor: TypeDescriptor): DumpFragment;
  guardOf(descriptor: TypeDescriptor): Guard;
  /**
   * Routines for a nested record, compiled on demand; late-bound when the
   * record is already being compiled.
   */
  routineFor(record: RecordType<unknown>): RoutineRef;
  /**
   * Routines for a record reached through a recursive reference, looked up
   * (and compiled if still missing) on their first call.
   */
  deferredRoutineFor(record: RecordType<unknown>): RoutineRef;
}

/**
 * Emits the fragments for one descriptor kind.
 */
export interface KindHandler<D extends TypeDescriptor> {
  emitLoad(descriptor: D, ctx: CompileContext): LoadFragment;
  emitDump(descriptor: D, ctx: CompileContext): DumpFragment;
  emitGuard(descriptor: D, ctx: CompileContext): Guard;
}

import type { TypeDescriptor } from "../descriptors/descriptor.ts";
import type { RoutineAssembler } from "./assembler.ts";
import type {
  CompileContext,
  DumpFragment,
  Guard,
  KindHandler,
  LoadFragment,
} from "./context.ts";
import { collectionHandler, tupleHandler } from "./handlers/collection.ts";
import { enumHandler, literalHandler } from "./handlers/enumeration.ts";
import { extensionHandler } from "./handlers/extension.ts";
import { mappingHandler } from "./handlers/mapping.ts";
import { primitiveHandler } from "./handlers/primitive.ts";
import { recordHandler } from "./handlers/record.ts";
import { sumHandler } from "./handlers/sum.ts";
import { temporalHandler } from "./handlers/temporal.ts";

type Emit<R> = <D extends TypeDescriptor>(handler: KindHandler<D>, descriptor: D) => R;

function withHandler<R>(descriptor: TypeDescriptor, emit: Emit<R>): R {
  switch (descriptor.kind) {
    case "primitive":
      return emit(primitiveHandler, descriptor);
    case "collection":
      return emit(collectionHandler, descriptor);
    case "tuple":
      return emit(tupleHandler, descriptor);
    case "mapping":
      return emit(mappingHandler, descriptor);
    case "sum":
      return emit(sumHandler, descriptor);
    case "enum":
      return emit(enumHandler, descriptor);
    case "literal":
      return emit(literalHandler, descriptor);
    case "temporal":
      return emit(temporalHandler, descriptor);
    case "record":
      return emit(recordHandler, descriptor);
    case "custom":
      return emit(extensionHandler, descriptor);
  }
}

/**
 * Name under which a descriptor's fragment is bound. The ordinal and index
 * make it unique across the record.
 */
export function symbolName(direction: string, descriptor: TypeDescriptor): string {
  return `${direction}_${descriptor.origin}_${descriptor.ordinal}_${descriptor.index}`;
}

/**
 * Emits the load fragment of a descriptor and binds it in the assembler.
 * Optional descriptors pass `null` (and missing values) through as `null`.
 */
export function emitLoad(
  descriptor: TypeDescriptor,
  ctx: CompileContext,
  assembler: RoutineAssembler,
): LoadFragment {
  const inner = withHandler<LoadFragment>(
    descriptor,
    (handler, d) => handler.emitLoad(d, ctx),
  );
  const fragment: LoadFragment = descriptor.inOptional
    ? (value) => (value === null || value === undefined ? null : inner(value))
    : inner;
  assembler.bind(symbolName("load", descriptor), { direction: "load", fragment });
  return fragment;
}

/**
 * Emits the dump fragment of a descriptor and binds it in the assembler.
 */
export function emitDump(
  descriptor: TypeDescriptor,
  ctx: CompileContext,
  assembler: RoutineAssembler,
): DumpFragment {
  const inner = withHandler<DumpFragment>(
    descriptor,
    (handler, d) => handler.emitDump(d, ctx),
  );
  const fragment: DumpFragment = descriptor.inOptional
    ? (value) => (value === null || value === undefined ? null : inner(value))
    : inner;
  assembler.bind(symbolName("dump", descriptor), { direction: "dump", fragment });
  return fragment;
}

/**
 * Emits the guard of a descriptor and binds it in the assembler.
 */
export function emitGuard(
  descriptor: TypeDescriptor,
  ctx: CompileContext,
  assembler: RoutineAssembler,
): Guard {
  const inner = withHandler<Guard>(
    descriptor,
    (handler, d) => handler.emitGuard(d, ctx),
  );
  const fragment: Guard = descriptor.inOptional
    ? (value) => value === null || inner(value)
    : inner;
  assembler.bind(symbolName("guard", descriptor), { direction: "guard", fragment });
  return fragment;
}

import type { EffectiveConfig } from "../config/meta.ts";
import { configForNested, resolveConfig } from "../config/resolve_config.ts";
import { describeDescriptor, type TypeDescriptor } from "../descriptors/descriptor.ts";
import { resolveFieldType } from "../descriptors/resolve_descriptor.ts";
import { globalTypeRegistry, type TypeRegistry } from "../extensions/type_registry.ts";
import type { RecordType } from "../schemas/complex/record_type.ts";
import { DescriptorResolutionError, MarshalError } from "../schemas/error.ts";
import { getLogger } from "../utils/log.ts";
import { RoutineAssembler } from "./assembler.ts";
import type {
  CompileContext,
  CompiledRoutine,
  DumpFragment,
  Guard,
  LoadFragment,
  RoutineRef,
} from "./context.ts";
import { emitDump, emitGuard, emitLoad, symbolName } from "./dispatch.ts";
import { resolveKeys } from "./key_resolver.ts";
import { CompileSession, LateBoundRoutine, RoutineCache } from "./routine_cache.ts";

/**
 * How often a record may be nested inside itself under changing
 * configurations before compilation gives up.
 */
export const MAX_CONFIG_DEPTH = 8;

/**
 * The cache shared by every entry point.
 */
export const routineCache = new RoutineCache();

let activeSession: CompileSession | undefined;

class FieldCompileContext implements CompileContext {
  readonly record: RecordType<unknown>;
  readonly config: EffectiveConfig;
  readonly field: string;
  readonly types: TypeRegistry;
  readonly #assembler: RoutineAssembler;
  readonly #session: CompileSession;
  readonly #loads = new Map<TypeDescriptor, LoadFragment>();
  readonly #dumps = new Map<TypeDescriptor, DumpFragment>();
  readonly #guards = new Map<TypeDescriptor, Guard>();

  constructor(
    record: RecordType<unknown>,
    config: EffectiveConfig,
    field: string,
    types: TypeRegistry,
    assembler: RoutineAssembler,
    session: CompileSession,
  ) {
    this.record = record;
    this.config = config;
    this.field = field;
    this.types = types;
    this.#assembler = assembler;
    this.#session = session;
  }

  loadOf(descriptor: TypeDescriptor): LoadFragment {
    let fragment = this.#loads.get(descriptor);
    if (!fragment) {
      fragment = emitLoad(descriptor, this, this.#assembler);
      this.#loads.set(descriptor, fragment);
    }
    return fragment;
  }

  dumpOf(descriptor: TypeDescriptor): DumpFragment {
    let fragment = this.#dumps.get(descriptor);
    if (!fragment) {
      fragment = emitDump(descriptor, this, this.#assembler);
      this.#dumps.set(descriptor, fragment);
    }
    return fragment;
  }

  guardOf(descriptor: TypeDescriptor): Guard {
    let guard = this.#guards.get(descriptor);
    if (!guard) {
      guard = emitGuard(descriptor, this, this.#assembler);
      this.#guards.set(descriptor, guard);
    }
    return guard;
  }

  routineFor(record: RecordType<unknown>): RoutineRef {
    return requireRoutine(
      this.#session,
      record,
      resolveConfig(record, configForNested(this.config)),
      this.types,
    );
  }

  deferredRoutineFor(record: RecordType<unknown>): RoutineRef {
    const inherited = configForNested(this.config);
    const { types } = this;
    const impl: [RoutineRef | null] = [null];
    const resolve = (): RoutineRef => {
      const bound = impl[0] ?? compileRoutine(record, inherited, types);
      impl[0] = bound;
      return bound;
    };
    return {
      load: (value) => resolve().load(value),
      dump: (value) => resolve().dump(value),
    };
  }
}

function requireRoutine(
  session: CompileSession,
  record: RecordType<unknown>,
  config: EffectiveConfig,
  types: TypeRegistry,
): RoutineRef {
  const { fingerprint } = config;
  const published = routineCache.get(record, fingerprint);
  if (published) {
    return published;
  }
  if (session.isCompiling(record, fingerprint)) {
    return new LateBoundRoutine(record, fingerprint, routineCache);
  }
  const pending = session.getPending(record, fingerprint);
  if (pending) {
    return pending;
  }
  if (session.depthOf(record) >= MAX_CONFIG_DEPTH) {
    throw new MarshalError(
      `Configuration of ${record.getName()} does not settle when nested in itself ${MAX_CONFIG_DEPTH} times`,
    );
  }
  return compileRecord(session, record, config, types);
}

function compileRecord(
  session: CompileSession,
  record: RecordType<unknown>,
  config: EffectiveConfig,
  types: TypeRegistry,
): CompiledRoutine {
  const name = record.getName();
  session.enter(record, config.fingerprint);
  try {
    const assembler = new RoutineAssembler(record, config);
    if (record.getMeta().tag !== undefined || config.autoAssignTags) {
      assembler.acceptTagKey();
    }
    const ancestors = session.ancestors();
    const fields = record.getFields();

    fields.forEach((field, ordinal) => {
      const fieldName = field.getName();
      const { descriptor, annotations } = resolveFieldType(field, {
        record,
        ordinal,
        ancestors,
        patterns: Object.hasOwn(config.customPatterns, fieldName)
          ? config.customPatterns[fieldName]
          : undefined,
        types,
      });
      const catchAll = field.isCatchAll();
      if (catchAll && !(descriptor.kind === "mapping" && descriptor.origin === "dict")) {
        throw new DescriptorResolutionError(
          fieldName,
          describeDescriptor(descriptor),
          "catch-all fields must be declared as dict",
        );
      }

      const ctx = new FieldCompileContext(record, config, fieldName, types, assembler, session);
      ctx.loadOf(descriptor);
      ctx.dumpOf(descriptor);
      assembler.addField({
        name: fieldName,
        typeName: describeDescriptor(descriptor),
        keys: catchAll ? { load: [], dump: [] } : resolveKeys(field, annotations, config),
        loadSymbol: symbolName("load", descriptor),
        dumpSymbol: symbolName("dump", descriptor),
        optional: descriptor.inOptional,
        hasDefault: field.hasDefault(),
        getDefault: () => field.getDefault(),
        skipIf: annotations.skipIf ?? field.getSkipIf(),
        catchAll,
      });
    });

    const { load, dump } = assembler.assemble();
    const routine: CompiledRoutine = {
      record,
      config,
      symbols: new Map(assembler.getSymbols()),
      load,
      dump,
    };
    session.addPending(routine);
    getLogger().debug(`Compiled routines for ${name} (${fields.length} fields)`);
    return routine;
  } catch (error) {
    if (error instanceof MarshalError && error.record === undefined) {
      error.attributeTo(name);
    }
    throw error;
  } finally {
    session.leave();
  }
}

/**
 * Returns the published routines for `record` under the configuration it
 * inherits, compiling them (and any nested record they need) on first use.
 */
export function compileRoutine(
  record: RecordType<unknown>,
  inherited?: EffectiveConfig,
  types: TypeRegistry = globalTypeRegistry,
): CompiledRoutine {
  const config = resolveConfig(record, inherited);
  const cached = routineCache.get(record, config.fingerprint);
  if (cached) {
    return cached;
  }
  if (activeSession) {
    throw new Error(
      `Cannot compile ${record.getName()} while another compilation is running; use the compile context's routineFor() from hooks`,
    );
  }
  const session = new CompileSession();
  activeSession = session;
  try {
    const compiled = compileRecord(session, record, config, types);
    session.publishTo(routineCache);
    return routineCache.get(record, config.fingerprint) ?? compiled;
  } finally {
    activeSession = undefined;
  }
}

/**
 * Drops every compiled routine; the next use recompiles.
 */
export function clearRoutineCache(): void {
  routineCache.clear();
}

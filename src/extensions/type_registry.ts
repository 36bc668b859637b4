import type {
  CompileContext,
  DumpFragment,
  LoadFragment,
} from "../compiler/context.ts";
import type { CustomDescriptor } from "../descriptors/descriptor.ts";
import type { Constructor } from "../schemas/declared.ts";
import { TypeMismatchError, UnsupportedTypeError } from "../schemas/error.ts";
import type { DynamicValue } from "../schemas/json.ts";

/**
 * A hook that builds a fragment once, at compile time, from the descriptor
 * and the compile context.
 */
export interface CompileHook<F> {
  compile(descriptor: CustomDescriptor, ctx: CompileContext): F;
}

/**
 * Load and dump hooks for a class. Each is either a plain value transform
 * or a {@link CompileHook}.
 */
export interface TypeHooks<T> {
  load?: ((value: unknown) => T) | CompileHook<LoadFragment>;
  dump?: ((value: T) => DynamicValue) | CompileHook<DumpFragment>;
}

interface RegisteredHooks {
  readonly name: string;
  readonly load: CompileHook<LoadFragment>;
  readonly dump: CompileHook<DumpFragment>;
}

function unsupported(
  name: string,
  direction: string,
): CompileHook<(value: unknown) => never> {
  return {
    compile: () => () => {
      throw new UnsupportedTypeError(name, `no ${direction} hook registered`);
    },
  };
}

/**
 * Maps classes to user-supplied load and dump hooks.
 *
 * The compiler reads this table while dispatching descriptors; routines
 * already compiled keep the hooks they were built with.
 */
export class TypeRegistry {
  readonly #entries = new Map<Constructor, RegisteredHooks>();

  /**
   * Registers hooks for `ctor`, replacing any earlier registration.
   *
   * A plain dump transform is only called with instances of `ctor`; any
   * other value is a type mismatch.
   */
  public register<T>(ctor: Constructor<T>, hooks: TypeHooks<T>): void {
    if (typeof ctor !== "function") {
      throw new TypeError("Only classes can be registered.");
    }
    const name = ctor.name || "anonymous class";
    const { load, dump } = hooks;

    let loadHook: CompileHook<LoadFragment>;
    if (load === undefined) {
      loadHook = unsupported(name, "load");
    } else if (typeof load === "function") {
      loadHook = { compile: () => load };
    } else {
      loadHook = load;
    }

    let dumpHook: CompileHook<DumpFragment>;
    if (dump === undefined) {
      dumpHook = unsupported(name, "dump");
    } else if (typeof dump === "function") {
      dumpHook = {
        compile: () => (value) => {
          if (!(value instanceof ctor)) {
            throw new TypeMismatchError(name, value);
          }
          return dump(value);
        },
      };
    } else {
      dumpHook = dump;
    }

    this.#entries.set(ctor, { name, load: loadHook, dump: dumpHook });
  }

  /**
   * Removes the registration of `ctor`, if any.
   */
  public unregister(ctor: Constructor): boolean {
    return this.#entries.delete(ctor);
  }

  public has(ctor: Constructor): boolean {
    return this.#entries.has(ctor);
  }

  /**
   * Builds the load fragment for a custom descriptor.
   * @throws UnsupportedTypeError if the class is not registered.
   */
  public compileLoad(
    descriptor: CustomDescriptor,
    ctx: CompileContext,
  ): LoadFragment {
    return this.#require(descriptor).load.compile(descriptor, ctx);
  }

  /**
   * Builds the dump fragment for a custom descriptor.
   * @throws UnsupportedTypeError if the class is not registered.
   */
  public compileDump(
    descriptor: CustomDescriptor,
    ctx: CompileContext,
  ): DumpFragment {
    return this.#require(descriptor).dump.compile(descriptor, ctx);
  }

  #require(descriptor: CustomDescriptor): RegisteredHooks {
    const entry = this.#entries.get(descriptor.ctor);
    if (!entry) {
      throw new UnsupportedTypeError(
        descriptor.origin,
        "register load/dump hooks for it with registerType()",
      );
    }
    return entry;
  }
}

/**
 * The process-wide registry used by every compiled routine.
 */
export const globalTypeRegistry = new TypeRegistry();

/**
 * Registers hooks for `ctor` in {@link globalTypeRegistry}.
 *
 * @example
 * ```ts
 * registerType(URL, { load: (v) => new URL(String(v)), dump: (u) => u.href });
 * ```
 */
export function registerType<T>(ctor: Constructor<T>, hooks: TypeHooks<T>): void {
  globalTypeRegistry.register(ctor, hooks);
}

import type { FieldValues, RecordType } from "../schemas/complex/record_type.ts";
import type { DynamicMap } from "../schemas/json.ts";
import type { CompiledRoutine, RoutineRef } from "./context.ts";

/**
 * Process-wide store of published routines, keyed by record identity and
 * configuration fingerprint. Entries are never evicted.
 */
export class RoutineCache {
  #entries = new WeakMap<RecordType<unknown>, Map<string, CompiledRoutine>>();

  /**
   * Gets the routine published for a record under a configuration.
   */
  public get(
    record: RecordType<unknown>,
    fingerprint: string,
  ): CompiledRoutine | undefined {
    return this.#entries.get(record)?.get(fingerprint);
  }

  /**
   * Publishes a routine unless one is already published for its key, and
   * returns whichever routine the cache now holds.
   */
  public publish(routine: CompiledRoutine): CompiledRoutine {
    let byConfig = this.#entries.get(routine.record);
    if (!byConfig) {
      byConfig = new Map();
      this.#entries.set(routine.record, byConfig);
    }
    const existing = byConfig.get(routine.config.fingerprint);
    if (existing) {
      return existing;
    }
    byConfig.set(routine.config.fingerprint, routine);
    return routine;
  }

  /**
   * Drops every published routine.
   */
  public clear(): void {
    this.#entries = new WeakMap();
  }
}

/**
 * Stands in for a routine that is still being compiled.
 *
 * Calls are forwarded to the cache entry for the record, looked up on the
 * first call; by then the outermost compilation has published it.
 */
export class LateBoundRoutine implements RoutineRef {
  readonly #record: RecordType<unknown>;
  readonly #fingerprint: string;
  readonly #cache: RoutineCache;
  readonly #impl: [RoutineRef | null] = [null];

  constructor(record: RecordType<unknown>, fingerprint: string, cache: RoutineCache) {
    this.#record = record;
    this.#fingerprint = fingerprint;
    this.#cache = cache;
  }

  public load(value: unknown): FieldValues {
    return this.#resolve().load(value);
  }

  public dump(value: unknown): DynamicMap {
    return this.#resolve().dump(value);
  }

  #resolve(): RoutineRef {
    const bound = this.#impl[0] ?? this.#cache.get(this.#record, this.#fingerprint);
    if (!bound) {
      throw new Error(
        `Routine for ${this.#record.getName()} was called before its compilation finished`,
      );
    }
    this.#impl[0] = bound;
    return bound;
  }
}

interface StackEntry {
  readonly record: RecordType<unknown>;
  readonly fingerprint: string;
}

/**
 * State of one outermost compilation: the records being compiled, and the
 * routines finished but not yet published.
 */
export class CompileSession {
  readonly #stack: StackEntry[] = [];
  readonly #pending: CompiledRoutine[] = [];

  /**
   * Records on the compile stack, outermost first.
   */
  public ancestors(): RecordType<unknown>[] {
    return this.#stack.map((entry) => entry.record);
  }

  public isCompiling(record: RecordType<unknown>, fingerprint: string): boolean {
    return this.#stack.some((entry) =>
      entry.record === record && entry.fingerprint === fingerprint
    );
  }

  /**
   * How many times a record is on the stack, under any configuration.
   */
  public depthOf(record: RecordType<unknown>): number {
    return this.#stack.filter((entry) => entry.record === record).length;
  }

  public enter(record: RecordType<unknown>, fingerprint: string): void {
    this.#stack.push({ record, fingerprint });
  }

  public leave(): void {
    this.#stack.pop();
  }

  public addPending(routine: CompiledRoutine): void {
    this.#pending.push(routine);
  }

  public getPending(
    record: RecordType<unknown>,
    fingerprint: string,
  ): CompiledRoutine | undefined {
    return this.#pending.find((routine) =>
      routine.record === record && routine.config.fingerprint === fingerprint
    );
  }

  /**
   * Publishes every finished routine to `cache`.
   */
  public publishTo(cache: RoutineCache): void {
    for (const routine of this.#pending.splice(0)) {
      cache.publish(routine);
    }
  }
}

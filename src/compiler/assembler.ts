import { isDeepStrictEqual } from "node:util";
import { type Condition, evaluateCondition } from "../config/conditions.ts";
import type { EffectiveConfig } from "../config/meta.ts";
import type { FieldValues, RecordType } from "../schemas/complex/record_type.ts";
import {
  AggregateMarshalError,
  MarshalError,
  MissingFieldError,
  toMarshalError,
  TypeMismatchError,
  UnknownKeyError,
} from "../schemas/error.ts";
import {
  type DynamicMap,
  type DynamicValue,
  isDynamicMap,
  isPlainObject,
  setOwn,
} from "../schemas/json.ts";
import { getLogger } from "../utils/log.ts";
import { getAtPath, MISSING, setAtPath } from "../utils/object_path.ts";
import type { DumpFragment, Guard, LoadFragment, RoutineRef } from "./context.ts";
import { describeKey, type KeyPlan } from "./key_resolver.ts";

/**
 * An entry of the symbol table: a fragment and the direction it serves.
 */
export type BoundSymbol =
  | { readonly direction: "load"; readonly fragment: LoadFragment }
  | { readonly direction: "dump"; readonly fragment: DumpFragment }
  | { readonly direction: "guard"; readonly fragment: Guard };

/**
 * Everything the assembled routines need to know about one field.
 */
export interface FieldPlan {
  readonly name: string;
  /** Type expression used when wrapping errors. */
  readonly typeName: string;
  readonly keys: KeyPlan;
  /** Symbol holding the field's load fragment. */
  readonly loadSymbol: string;
  /** Symbol holding the field's dump fragment. */
  readonly dumpSymbol: string;
  /** A missing key loads as `null`. */
  readonly optional: boolean;
  readonly hasDefault: boolean;
  readonly getDefault: () => unknown;
  readonly skipIf: Condition | undefined;
  /** Receives every unrecognized input key. */
  readonly catchAll: boolean;
}

/**
 * Accumulates the fields of one record and produces its load and dump
 * routines, bound to the symbol table built while compiling them.
 */
export class RoutineAssembler {
  readonly #record: RecordType<unknown>;
  readonly #config: EffectiveConfig;
  readonly #symbols = new Map<string, BoundSymbol>();
  readonly #fields: FieldPlan[] = [];
  #acceptsTagKey = false;

  constructor(record: RecordType<unknown>, config: EffectiveConfig) {
    this.#record = record;
    this.#config = config;
  }

  /**
   * Binds a fragment under a unique name.
   * @throws Error if the name is already bound.
   */
  public bind(name: string, symbol: BoundSymbol): string {
    if (this.#symbols.has(name)) {
      throw new Error(`Symbol ${name} is already bound in ${this.#record.getName()}`);
    }
    this.#symbols.set(name, symbol);
    return name;
  }

  /**
   * Adds a field, in declaration order.
   */
  public addField(plan: FieldPlan): void {
    this.#fields.push(plan);
  }

  /**
   * Lets the tag key through the unknown-key check, for records that are
   * dispatched by tag.
   */
  public acceptTagKey(): void {
    this.#acceptsTagKey = true;
  }

  /**
   * The symbol table, as bound so far.
   */
  public getSymbols(): ReadonlyMap<string, BoundSymbol> {
    return this.#symbols;
  }

  /**
   * Produces the load and dump routines.
   */
  public assemble(): RoutineRef {
    return {
      load: this.#assembleLoad(),
      dump: this.#assembleDump(),
    };
  }

  #loadFragment(name: string): LoadFragment {
    const symbol = this.#symbols.get(name);
    if (symbol?.direction !== "load") {
      throw new Error(`No load fragment bound as ${name}`);
    }
    return symbol.fragment;
  }

  #dumpFragment(name: string): DumpFragment {
    const symbol = this.#symbols.get(name);
    if (symbol?.direction !== "dump") {
      throw new Error(`No dump fragment bound as ${name}`);
    }
    return symbol.fragment;
  }

  #assembleLoad(): (value: unknown) => FieldValues {
    const recordName = this.#record.getName();
    const preLoad = this.#record.getPreLoad();
    const { onUnknownKey, collectErrors, tagKey } = this.#config;
    const fields = this.#fields.filter((plan) => !plan.catchAll);
    const loaders = fields.map((plan) => this.#loadFragment(plan.loadSymbol));
    const candidateLabels = fields.map((plan) => plan.keys.load.map(describeKey));
    const catchAll = this.#fields.find((plan) => plan.catchAll);
    const catchAllLoader = catchAll && this.#loadFragment(catchAll.loadSymbol);
    const fieldNames = this.#fields.map((plan) => plan.name);

    const known = new Set<string>();
    for (const plan of fields) {
      for (const candidate of plan.keys.load) {
        known.add(String(candidate[0]));
      }
    }
    if (this.#acceptsTagKey) {
      known.add(tagKey);
    }

    const loadFields = (input: Record<string, unknown>): FieldValues => {
      const out: FieldValues = {};
      const errors: MarshalError[] = [];
      const fail = (error: MarshalError): void => {
        if (!collectErrors) throw error;
        if (error instanceof AggregateMarshalError) {
          errors.push(...error.errors);
        } else {
          errors.push(error);
        }
      };

      for (let i = 0; i < fields.length; i++) {
        const plan = fields[i];
        let raw: unknown = MISSING;
        for (const candidate of plan.keys.load) {
          raw = getAtPath(input, candidate);
          if (raw !== MISSING) break;
        }
        if (raw === MISSING) {
          if (plan.hasDefault) {
            setOwn(out, plan.name, plan.getDefault());
          } else if (plan.optional) {
            setOwn(out, plan.name, null);
          } else {
            fail(
              new MissingFieldError(plan.name, candidateLabels[i]).prependPath(plan.name),
            );
          }
          continue;
        }
        try {
          setOwn(out, plan.name, loaders[i](raw));
        } catch (error) {
          fail(toMarshalError(error, plan.typeName, raw).prependPath(plan.name));
        }
      }

      const unknown = Object.keys(input).filter((key) => !known.has(key));
      if (catchAll && catchAllLoader) {
        const extra: Record<string, unknown> = {};
        for (const key of unknown) {
          setOwn(extra, key, input[key]);
        }
        try {
          out[catchAll.name] = catchAllLoader(extra);
        } catch (error) {
          fail(toMarshalError(error, catchAll.typeName, extra).prependPath(catchAll.name));
        }
      } else if (unknown.length > 0 && onUnknownKey !== "ignore") {
        if (onUnknownKey === "raise") {
          fail(new UnknownKeyError(unknown, fieldNames));
        } else {
          getLogger().warn(
            `Unknown key${unknown.length === 1 ? "" : "s"} ${
              unknown.map((key) => JSON.stringify(key)).join(", ")
            } in input for ${recordName} (fields: ${fieldNames.join(", ")})`,
          );
        }
      }

      if (errors.length > 0) {
        throw new AggregateMarshalError(errors);
      }
      return out;
    };

    return (value) => {
      try {
        if (!isPlainObject(value)) {
          throw new TypeMismatchError(`map for ${recordName}`, value);
        }
        let input = value;
        if (preLoad) {
          try {
            input = preLoad({ ...value });
          } catch (error) {
            throw toMarshalError(error, recordName, value);
          }
        }
        return loadFields(input);
      } catch (error) {
        if (error instanceof MarshalError) {
          error.attributeTo(recordName);
        }
        throw error;
      }
    };
  }

  #assembleDump(): (value: unknown) => DynamicMap {
    const recordName = this.#record.getName();
    const postDump = this.#record.getPostDump();
    const { skipDefaults, skipFieldIf } = this.#config;
    const plans = this.#fields;
    const dumpers = plans.map((plan) => this.#dumpFragment(plan.dumpSymbol));

    const container = (index: boolean): DynamicValue => (index ? [] : {});

    const dumpFields = (instance: object): DynamicMap => {
      const out: DynamicMap = {};
      let extra: DynamicValue | undefined;
      for (let i = 0; i < plans.length; i++) {
        const plan = plans[i];
        let current: unknown = Reflect.get(instance, plan.name);
        if (current === undefined) {
          if (plan.optional) {
            current = null;
          } else if (plan.hasDefault) {
            current = plan.getDefault();
          }
        }
        if (
          skipDefaults && plan.hasDefault &&
          isDeepStrictEqual(current, plan.getDefault())
        ) {
          continue;
        }
        const condition = plan.skipIf ?? skipFieldIf;
        if (condition && evaluateCondition(condition, current)) {
          continue;
        }
        let dumped: DynamicValue;
        try {
          if (current === undefined) {
            throw new TypeMismatchError(plan.typeName, current, "field is not set");
          }
          dumped = dumpers[i](current);
        } catch (error) {
          throw toMarshalError(error, plan.typeName, current).prependPath(plan.name);
        }
        if (plan.catchAll) {
          extra = dumped;
        } else {
          setAtPath(out, plan.keys.dump, dumped, container);
        }
      }
      if (isDynamicMap(extra)) {
        for (const [key, entry] of Object.entries(extra)) {
          if (!Object.hasOwn(out, key)) {
            setOwn(out, key, entry);
          }
        }
      }
      return out;
    };

    return (value) => {
      try {
        if (typeof value !== "object" || value === null || Array.isArray(value)) {
          throw new TypeMismatchError(recordName, value);
        }
        const out = dumpFields(value);
        if (!postDump) {
          return out;
        }
        try {
          return postDump(out);
        } catch (error) {
          throw toMarshalError(error, recordName, out);
        }
      } catch (error) {
        if (error instanceof MarshalError) {
          error.attributeTo(recordName);
        }
        throw error;
      }
    };
  }
}

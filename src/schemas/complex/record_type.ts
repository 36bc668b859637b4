import type { RecordMeta } from "../../config/meta.ts";
import { parseRecordMeta } from "../../config/meta.ts";
import type { DynamicMap } from "../json.ts";
import { RecordField, type RecordFieldParams } from "./record_field.ts";
import { isValidName, RecordRegistry } from "./resolve_names.ts";

export { RecordField, type RecordFieldParams } from "./record_field.ts";

/**
 * Field values handed to a record's constructor, keyed by field name.
 */
export type FieldValues = Record<string, unknown>;

/**
 * Parameters for creating a RecordType.
 */
export interface RecordTypeParams<T> {
  /** Record name; used in error paths, as the auto-assigned tag, and for lookups by name. */
  name: string;
  /**
   * Fields can be provided eagerly as an array or lazily via a thunk (a
   * parameterless function returning the array). The lazy form lets a
   * record's fields refer to the record itself.
   */
  fields: readonly RecordFieldParams[] | (() => readonly RecordFieldParams[]);
  /** Marshalling options declared by this record. */
  meta?: RecordMeta;
  /** Namespace in which string type names are looked up. */
  registry?: RecordRegistry;
  /** Builds an instance from loaded field values. Defaults to a plain object. */
  create?: (init: FieldValues) => T;
  /** Recognizes instances when dumping unions. */
  isInstance?: (value: unknown) => boolean;
  /** Transforms the input map before any field is read. */
  preLoad?: (value: Record<string, unknown>) => Record<string, unknown>;
  /** Transforms the output map after every field is written. */
  postDump?: (value: DynamicMap) => DynamicMap;
}

/**
 * A named, ordered set of typed fields.
 *
 * A RecordType only describes a record; conversion routines are compiled
 * from it on first use and cached per effective configuration.
 */
export class RecordType<T = FieldValues> {
  #name: string;
  #meta: RecordMeta;
  #registry: RecordRegistry | undefined;
  #fields: RecordField[];
  #fieldNameToIndex: Map<string, number>;
  #fieldsThunk?: () => readonly RecordFieldParams[];
  #create: (init: FieldValues) => T;
  #isInstance?: (value: unknown) => boolean;
  #preLoad?: (value: Record<string, unknown>) => Record<string, unknown>;
  #postDump?: (value: DynamicMap) => DynamicMap;

  /**
   * Prefer {@link defineRecord}, which also picks the instance type.
   */
  constructor(params: RecordTypeParams<T> & { create: (init: FieldValues) => T }) {
    const { name, fields } = params;
    if (typeof name !== "string" || !isValidName(name)) {
      throw new Error(`Invalid record name: ${String(name)}`);
    }
    this.#name = name;
    this.#meta = parseRecordMeta(name, params.meta);
    this.#registry = params.registry;
    this.#create = params.create;
    this.#isInstance = params.isInstance;
    this.#preLoad = params.preLoad;
    this.#postDump = params.postDump;
    this.#fields = [];
    this.#fieldNameToIndex = new Map();

    if (typeof fields === "function") {
      this.#fieldsThunk = fields;
    } else {
      this.#setFields(fields);
    }
    this.#registry?.register(this);
  }

  public getName(): string {
    return this.#name;
  }

  /**
   * Gets the options declared by this record, as validated.
   */
  public getMeta(): RecordMeta {
    return this.#meta;
  }

  public getRegistry(): RecordRegistry | undefined {
    return this.#registry;
  }

  /**
   * Gets the fields of the record, building them first when they were
   * declared lazily.
   */
  public getFields(): ReadonlyArray<RecordField> {
    this.#ensureFields();
    return this.#fields;
  }

  /**
   * Gets a field by name.
   */
  public getField(name: string): RecordField | undefined {
    this.#ensureFields();
    const index = this.#fieldNameToIndex.get(name);
    return index === undefined ? undefined : this.#fields[index];
  }

  /**
   * Builds an instance from loaded field values.
   */
  public construct(init: FieldValues): T {
    return this.#create(init);
  }

  /**
   * Returns true when the record declares its own instance test.
   */
  public hasInstanceGuard(): boolean {
    return this.#isInstance !== undefined;
  }

  /**
   * Applies the declared instance test; false when none is declared.
   */
  public isInstance(value: unknown): boolean {
    return this.#isInstance ? this.#isInstance(value) : false;
  }

  public getPreLoad():
    | ((value: Record<string, unknown>) => Record<string, unknown>)
    | undefined {
    return this.#preLoad;
  }

  public getPostDump(): ((value: DynamicMap) => DynamicMap) | undefined {
    return this.#postDump;
  }

  public toString(): string {
    return `RecordType(${this.#name})`;
  }

  #ensureFields(): void {
    if (this.#fieldsThunk) {
      const builder = this.#fieldsThunk;
      this.#fieldsThunk = undefined;
      this.#setFields(builder());
    }
  }

  #setFields(candidate: readonly RecordFieldParams[]): void {
    if (!Array.isArray(candidate)) {
      throw new Error(`RecordType ${this.#name} requires a fields array.`);
    }
    this.#fields = [];
    this.#fieldNameToIndex.clear();

    let catchAll: string | undefined;
    candidate.forEach((fieldParams) => {
      const field = new RecordField(fieldParams);
      const name = field.getName();
      if (this.#fieldNameToIndex.has(name)) {
        throw new Error(`Duplicate record field name: ${name}`);
      }
      if (field.isCatchAll()) {
        if (catchAll !== undefined) {
          throw new Error(
            `Record ${this.#name} declares two catch-all fields: ${catchAll}, ${name}`,
          );
        }
        catchAll = name;
      }
      this.#fieldNameToIndex.set(name, this.#fields.length);
      this.#fields.push(field);
    });
  }
}

/**
 * Declares a record type.
 *
 * Without `create`, loaded values are plain objects keyed by field name.
 *
 * @example
 * ```ts
 * const Point = defineRecord({
 *   name: "Point",
 *   fields: [{ name: "x", type: "int" }, { name: "y", type: "int" }],
 * });
 * ```
 */
export function defineRecord<T>(
  params: RecordTypeParams<T> & { create: (init: FieldValues) => T },
): RecordType<T>;
export function defineRecord(
  params: RecordTypeParams<FieldValues>,
): RecordType<FieldValues>;
export function defineRecord(
  params: RecordTypeParams<FieldValues>,
): RecordType<FieldValues> {
  return new RecordType<FieldValues>({
    ...params,
    create: params.create ?? ((init) => init),
  });
}

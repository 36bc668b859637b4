import type { Condition } from "../../config/conditions.ts";
import type { AliasSpec } from "../../config/meta.ts";
import type { TypeDecl } from "../declared.ts";
import type { PathSegment } from "../error.ts";

/**
 * Parameters for defining a record field.
 */
export interface RecordFieldParams {
  /** The name of the field. */
  name: string;
  /** The declared type of the field. */
  type: TypeDecl;
  /** Extra load keys or paths, tried before the name-derived key. */
  aliases?: readonly AliasSpec[];
  /** Key or path emitted on dump, overriding every other rule. */
  dumpAlias?: AliasSpec;
  /** Nested path used in both directions. */
  path?: readonly PathSegment[] | string;
  /** Value used when the input carries no key for the field. */
  default?: unknown;
  /** Produces a fresh default for every load. */
  defaultFactory?: () => unknown;
  /** Skip the field on dump when its value satisfies this condition. */
  skipIf?: Condition;
  /** Date/time patterns tried after the ISO form. */
  patterns?: readonly string[];
  /**
   * Collect every unrecognized input key into this field. The field must be
   * declared as a `dict`.
   */
  catchAll?: boolean;
}

/**
 * Represents a field in a record type.
 */
export class RecordField {
  #name: string;
  #type: TypeDecl;
  #aliases: readonly AliasSpec[];
  #dumpAlias?: AliasSpec;
  #path?: readonly PathSegment[] | string;
  #hasDefault: boolean;
  #defaultValue?: unknown;
  #defaultFactory?: () => unknown;
  #skipIf?: Condition;
  #patterns: readonly string[];
  #catchAll: boolean;

  /**
   * Constructs a new RecordField instance.
   */
  constructor(params: RecordFieldParams) {
    const { name, type, aliases = [], patterns = [], catchAll = false } =
      params;

    if (typeof name !== "string" || name.length === 0) {
      throw new Error(`Invalid record field name: ${String(name)}`);
    }
    if (type === undefined || type === null) {
      throw new Error(`Missing type for field ${name}`);
    }

    const hasValue = Object.hasOwn(params, "default");
    if (hasValue && params.defaultFactory !== undefined) {
      throw new Error(
        `Field '${name}' cannot declare both default and defaultFactory.`,
      );
    }
    if (catchAll && (aliases.length > 0 || params.path !== undefined)) {
      throw new Error(`Catch-all field '${name}' cannot declare aliases or a path.`);
    }

    this.#name = name;
    this.#type = type;
    this.#aliases = aliases.slice();
    this.#dumpAlias = params.dumpAlias;
    this.#path = params.path;
    this.#hasDefault = hasValue || params.defaultFactory !== undefined;
    this.#defaultValue = params.default;
    this.#defaultFactory = params.defaultFactory;
    this.#skipIf = params.skipIf;
    this.#patterns = patterns.slice();
    this.#catchAll = catchAll;
  }

  /**
   * Gets the name of the field.
   */
  public getName(): string {
    return this.#name;
  }

  /**
   * Gets the declared type of the field.
   */
  public getType(): TypeDecl {
    return this.#type;
  }

  /**
   * Gets the explicit aliases of the field.
   */
  public getAliases(): readonly AliasSpec[] {
    return this.#aliases;
  }

  public getDumpAlias(): AliasSpec | undefined {
    return this.#dumpAlias;
  }

  public getPath(): readonly PathSegment[] | string | undefined {
    return this.#path;
  }

  public getSkipIf(): Condition | undefined {
    return this.#skipIf;
  }

  public getPatterns(): readonly string[] {
    return this.#patterns;
  }

  public isCatchAll(): boolean {
    return this.#catchAll;
  }

  /**
   * Returns true if the field has a default value or factory.
   */
  public hasDefault(): boolean {
    return this.#hasDefault;
  }

  /**
   * Gets the default value for the field, calling the factory if one was
   * given.
   * @throws Error if the field has no default.
   */
  public getDefault(): unknown {
    if (!this.#hasDefault) {
      throw new Error(`Field '${this.#name}' has no default.`);
    }
    return this.#defaultFactory ? this.#defaultFactory() : this.#defaultValue;
  }
}

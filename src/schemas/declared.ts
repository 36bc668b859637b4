import type { Condition } from "../config/conditions.ts";
import type { AliasSpec } from "../config/meta.ts";
import type { PathSegment } from "./error.ts";
import type { RecordType } from "./complex/record_type.ts";

/**
 * Names of the scalar types with built-in handlers.
 */
export type PrimitiveName =
  | "string"
  | "int"
  | "float"
  | "bool"
  | "bytes"
  | "null"
  | "any";

/**
 * Names of the well-known structured scalars.
 */
export type TemporalName = "datetime" | "date";

/**
 * Every built-in type name.
 */
export type BuiltinName = PrimitiveName | TemporalName;

/**
 * Values a literal type may admit.
 */
export type LiteralValue = string | number | boolean | null;

/**
 * A TypeScript `enum` object, or any object shaped like one.
 */
export type EnumLike = Readonly<Record<string, string | number>>;

/**
 * Any class; registered classes are handled by the extension registry.
 */
export type Constructor<T = unknown> = abstract new (...args: never[]) => T;

/**
 * Structural metadata carried by an `annotated` wrapper. Everything except
 * `patterns` is lifted into the field's configuration.
 */
export interface FieldAnnotations {
  /** Extra load keys or paths, tried before the name-derived key. */
  readonly aliases?: readonly AliasSpec[];
  /** Key or path emitted on dump. */
  readonly dumpAlias?: AliasSpec;
  /** Nested path used in both directions. */
  readonly path?: readonly PathSegment[] | string;
  /** Date/time patterns tried after the ISO form. */
  readonly patterns?: readonly string[];
  /** Skip the field on dump when its value satisfies this condition. */
  readonly skipIf?: Condition;
}

/** Ordered sequence, loaded as an array. */
export interface ListDecl {
  readonly type: "list";
  readonly items: TypeDecl;
}

/** Unordered unique collection, loaded as a `Set`. */
export interface SetDecl {
  readonly type: "set";
  readonly items: TypeDecl;
}

/** Fixed-arity heterogeneous tuple. */
export interface TupleDecl {
  readonly type: "tuple";
  readonly items: readonly TypeDecl[];
}

/** Homogeneous tuple of any length. */
export interface VariadicTupleDecl {
  readonly type: "tuple";
  readonly items: TypeDecl;
  readonly variadic: true;
}

/** Fixed tuple whose positions carry names. */
export interface NamedTupleDecl {
  readonly type: "namedTuple";
  readonly name?: string;
  readonly fields: readonly { readonly name: string; readonly type: TypeDecl }[];
}

/** Mapping with typed keys, loaded as a `Map`. */
export interface MapDecl {
  readonly type: "map";
  readonly keys: TypeDecl;
  readonly values: TypeDecl;
}

/** Mapping with string keys, loaded as a plain object. */
export interface DictDecl {
  readonly type: "dict";
  readonly values: TypeDecl;
}

/** Admits `null` in addition to the wrapped type. */
export interface OptionalDecl {
  readonly type: "optional";
  readonly of: TypeDecl;
}

/** Exactly one of several alternatives. */
export interface UnionDecl {
  readonly type: "union";
  readonly of: readonly TypeDecl[];
}

/** Members of an enum object. */
export interface EnumDecl {
  readonly type: "enum";
  readonly values: EnumLike;
  readonly name?: string;
}

/** One of a fixed set of scalar values. */
export interface LiteralDecl {
  readonly type: "literal";
  readonly values: readonly LiteralValue[];
}

/** A base type with structural metadata attached. */
export interface AnnotatedDecl extends FieldAnnotations {
  readonly type: "annotated";
  readonly base: TypeDecl;
}

/** A type that is resolved only when first needed. */
export interface RefDecl {
  readonly type: "ref";
  readonly get: () => TypeDecl;
}

/**
 * Structured type declarations.
 */
export type TypeNode =
  | ListDecl
  | SetDecl
  | TupleDecl
  | VariadicTupleDecl
  | NamedTupleDecl
  | MapDecl
  | DictDecl
  | OptionalDecl
  | UnionDecl
  | EnumDecl
  | LiteralDecl
  | AnnotatedDecl
  | RefDecl;

/**
 * A declared field type.
 *
 * A string is either a built-in name or the name of a record in the
 * enclosing record's registry (a forward reference).
 */
export type TypeDecl =
  | BuiltinName
  | string
  | TypeNode
  | RecordType<unknown>
  | Constructor;

const PRIMITIVE_NAMES: ReadonlySet<string> = new Set<PrimitiveName>([
  "string",
  "int",
  "float",
  "bool",
  "bytes",
  "null",
  "any",
]);

const TEMPORAL_NAMES: ReadonlySet<string> = new Set<TemporalName>([
  "datetime",
  "date",
]);

/**
 * Returns true for the names of built-in scalar handlers.
 */
export function isPrimitiveName(name: string): name is PrimitiveName {
  return PRIMITIVE_NAMES.has(name);
}

/**
 * Returns true for the names of the well-known structured scalars.
 */
export function isTemporalName(name: string): name is TemporalName {
  return TEMPORAL_NAMES.has(name);
}

/**
 * Returns true for names that cannot be used for records.
 */
export function isReservedName(name: string): boolean {
  return isPrimitiveName(name) || isTemporalName(name);
}

/**
 * Returns true when `decl` is one of the structured declaration nodes.
 */
export function isTypeNode(decl: unknown): decl is TypeNode {
  return typeof decl === "object" && decl !== null && "type" in decl &&
    typeof decl.type === "string";
}

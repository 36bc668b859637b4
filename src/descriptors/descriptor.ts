import type {
  Constructor,
  LiteralValue,
  PrimitiveName,
  TemporalName,
} from "../schemas/declared.ts";
import type { RecordType } from "../schemas/complex/record_type.ts";

/**
 * Categories of descriptors; each kind has one handler.
 */
export type DescriptorKind =
  | "primitive"
  | "collection"
  | "tuple"
  | "mapping"
  | "sum"
  | "enum"
  | "literal"
  | "temporal"
  | "record"
  | "custom";

interface DescriptorBase {
  /** Type arguments, in declaration order. */
  readonly args: readonly TypeDescriptor[];
  /** Position of this descriptor within its field's expansion. */
  readonly index: number;
  /** Position of the owning field within its record. */
  readonly ordinal: number;
  /** The declared type admits `null`. */
  readonly inOptional: boolean;
}

export interface PrimitiveDescriptor extends DescriptorBase {
  readonly kind: "primitive";
  readonly origin: PrimitiveName;
}

/** Lists and sets; `args` holds the element descriptor. */
export interface CollectionDescriptor extends DescriptorBase {
  readonly kind: "collection";
  readonly origin: "list" | "set";
}

/**
 * Fixed, variadic and named tuples. A variadic tuple has a single element
 * descriptor; a fixed tuple has one per position.
 */
export interface TupleDescriptor extends DescriptorBase {
  readonly kind: "tuple";
  readonly origin: "tuple" | "namedTuple";
  readonly variadic: boolean;
  /** Position names, for named tuples. */
  readonly names: readonly string[] | undefined;
  /** Display name of a named tuple. */
  readonly name: string | undefined;
}

/** `args` holds the key and value descriptors. */
export interface MappingDescriptor extends DescriptorBase {
  readonly kind: "mapping";
  readonly origin: "map" | "dict";
}

/** `args` holds the alternatives, in declaration order. */
export interface SumDescriptor extends DescriptorBase {
  readonly kind: "sum";
  readonly origin: "union";
}

/**
 * One member of an enumeration.
 */
export interface EnumMember {
  readonly name: string;
  readonly value: string | number;
}

export interface EnumDescriptor extends DescriptorBase {
  readonly kind: "enum";
  readonly origin: "enum";
  readonly name: string | undefined;
  readonly members: readonly EnumMember[];
}

export interface LiteralDescriptor extends DescriptorBase {
  readonly kind: "literal";
  readonly origin: "literal";
  readonly values: readonly LiteralValue[];
}

export interface TemporalDescriptor extends DescriptorBase {
  readonly kind: "temporal";
  readonly origin: TemporalName;
  /** Custom patterns, tried in order after the ISO 8601 form. */
  readonly patterns: readonly string[];
}

export interface RecordDescriptor extends DescriptorBase {
  readonly kind: "record";
  /** The record's name. */
  readonly origin: string;
  readonly record: RecordType<unknown>;
  /**
   * The record is the declaring record or one being compiled around it; its
   * routines are looked up on first use instead of while compiling.
   */
  readonly recursive: boolean;
}

/** A class handled by the extension registry. */
export interface CustomDescriptor extends DescriptorBase {
  readonly kind: "custom";
  /** The class name. */
  readonly origin: string;
  readonly ctor: Constructor;
}

/**
 * Canonical, immutable representation of a declared type.
 */
export type TypeDescriptor =
  | PrimitiveDescriptor
  | CollectionDescriptor
  | TupleDescriptor
  | MappingDescriptor
  | SumDescriptor
  | EnumDescriptor
  | LiteralDescriptor
  | TemporalDescriptor
  | RecordDescriptor
  | CustomDescriptor;

/**
 * Renders a descriptor as a short type expression, e.g. `list[int]`.
 */
export function describeDescriptor(descriptor: TypeDescriptor): string {
  const inner = (): string => {
    switch (descriptor.kind) {
      case "primitive":
      case "temporal":
        return descriptor.origin;
      case "record":
      case "custom":
        return descriptor.origin;
      case "enum":
        return descriptor.name ?? "enum";
      case "literal":
        return `literal[${
          descriptor.values.map((value) => JSON.stringify(value)).join(", ")
        }]`;
      case "tuple":
        if (descriptor.origin === "namedTuple") {
          return descriptor.name ?? "namedTuple";
        }
        return descriptor.variadic
          ? `tuple[${describeDescriptor(descriptor.args[0])}, ...]`
          : `tuple[${descriptor.args.map(describeDescriptor).join(", ")}]`;
      case "sum":
        return descriptor.args.map(describeDescriptor).join(" | ");
      case "collection":
      case "mapping":
        return `${descriptor.origin}[${
          descriptor.args.map(describeDescriptor).join(", ")
        }]`;
    }
  };
  const text = inner();
  return descriptor.inOptional ? `${text} | null` : text;
}

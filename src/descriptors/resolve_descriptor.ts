import type { TypeRegistry } from "../extensions/type_registry.ts";
import { globalTypeRegistry } from "../extensions/type_registry.ts";
import type { RecordField } from "../schemas/complex/record_field.ts";
import { RecordType } from "../schemas/complex/record_type.ts";
import {
  type AnnotatedDecl,
  type FieldAnnotations,
  isPrimitiveName,
  isTemporalName,
  isTypeNode,
  type TypeDecl,
} from "../schemas/declared.ts";
import { DescriptorResolutionError } from "../schemas/error.ts";
import type {
  EnumMember,
  RecordDescriptor,
  TypeDescriptor,
} from "./descriptor.ts";

/**
 * Where a field's type is being resolved.
 */
export interface ResolveOptions {
  /** The record declaring the field; its registry resolves names. */
  record: RecordType<unknown>;
  /** Position of the field within the record. */
  ordinal: number;
  /** Records currently being compiled, outermost first. */
  ancestors?: readonly RecordType<unknown>[];
  /** Date/time patterns configured for the field. */
  patterns?: readonly string[];
  /** Registry that may claim classes, `Date` included. */
  types?: TypeRegistry;
}

/**
 * A field's descriptor plus the structural metadata lifted off its type.
 */
export interface ResolvedField {
  descriptor: TypeDescriptor;
  annotations: FieldAnnotations;
}

const MAX_REF_DEPTH = 32;

interface DescriptorPosition {
  index: number;
  ordinal: number;
  inOptional: boolean;
}

function describeDecl(decl: unknown): string {
  if (typeof decl === "string") return decl;
  if (decl instanceof RecordType) return decl.getName();
  if (typeof decl === "function") return decl.name || "anonymous class";
  if (isTypeNode(decl)) return decl.type;
  return String(decl);
}

function hasStructuralMetadata(decl: AnnotatedDecl): boolean {
  return decl.aliases !== undefined || decl.dumpAlias !== undefined ||
    decl.path !== undefined || decl.skipIf !== undefined;
}

function enumMembers(values: Readonly<Record<string, string | number>>): EnumMember[] {
  // Numeric enums carry a reverse mapping under each numeric key.
  return Object.keys(values)
    .filter((name) => Number.isNaN(Number(name)))
    .map((name) => ({ name, value: values[name] }));
}

class FieldTypeResolver {
  readonly #field: string;
  readonly #options: ResolveOptions;
  readonly #types: TypeRegistry;
  #index = 0;
  #refDepth = 0;

  constructor(field: string, options: ResolveOptions) {
    this.#field = field;
    this.#options = options;
    this.#types = options.types ?? globalTypeRegistry;
  }

  resolveField(decl: TypeDecl): ResolvedField {
    let annotations: FieldAnnotations = {};
    let inOptional = false;
    let current = decl;
    for (;;) {
      if (!isTypeNode(current)) break;
      if (current.type === "optional") {
        inOptional = true;
        current = current.of;
      } else if (current.type === "annotated") {
        // Outer annotations win over inner ones.
        annotations = {
          aliases: annotations.aliases ?? current.aliases,
          dumpAlias: annotations.dumpAlias ?? current.dumpAlias,
          path: annotations.path ?? current.path,
          patterns: annotations.patterns ?? current.patterns,
          skipIf: annotations.skipIf ?? current.skipIf,
        };
        current = current.base;
      } else if (current.type === "ref") {
        current = this.#deref(current.get);
      } else {
        break;
      }
    }
    const descriptor = this.resolve(
      current,
      inOptional,
      annotations.patterns ?? this.#options.patterns ?? [],
    );
    return { descriptor, annotations };
  }

  resolve(
    decl: TypeDecl,
    inOptional: boolean,
    patterns: readonly string[],
  ): TypeDescriptor {
    if (typeof decl === "string") {
      if (isPrimitiveName(decl)) {
        return { ...this.#base(inOptional), kind: "primitive", origin: decl, args: [] };
      }
      if (isTemporalName(decl)) {
        return {
          ...this.#base(inOptional),
          kind: "temporal",
          origin: decl,
          args: [],
          patterns,
        };
      }
      return this.#recordDescriptor(this.#lookup(decl), inOptional);
    }

    if (decl instanceof RecordType) {
      return this.#recordDescriptor(decl, inOptional);
    }

    if (typeof decl === "function") {
      if (decl === Date && !this.#types.has(Date)) {
        return {
          ...this.#base(inOptional),
          kind: "temporal",
          origin: "datetime",
          args: [],
          patterns,
        };
      }
      return {
        ...this.#base(inOptional),
        kind: "custom",
        origin: decl.name || "anonymous class",
        ctor: decl,
        args: [],
      };
    }

    if (!isTypeNode(decl)) {
      throw this.#error(decl, "not a type declaration");
    }

    switch (decl.type) {
      case "list":
      case "set":
        return {
          ...this.#base(inOptional),
          kind: "collection",
          origin: decl.type,
          args: [this.resolve(decl.items, false, patterns)],
        };
      case "tuple":
        if ("variadic" in decl) {
          return {
            ...this.#base(inOptional),
            kind: "tuple",
            origin: "tuple",
            variadic: true,
            names: undefined,
            name: undefined,
            args: [this.resolve(decl.items, false, patterns)],
          };
        }
        return {
          ...this.#base(inOptional),
          kind: "tuple",
          origin: "tuple",
          variadic: false,
          names: undefined,
          name: undefined,
          args: decl.items.map((item) => this.resolve(item, false, patterns)),
        };
      case "namedTuple": {
        const names = decl.fields.map((field) => field.name);
        if (new Set(names).size !== names.length) {
          throw this.#error(decl, "named tuple has duplicate position names");
        }
        return {
          ...this.#base(inOptional),
          kind: "tuple",
          origin: "namedTuple",
          variadic: false,
          names,
          name: decl.name,
          args: decl.fields.map((field) =>
            this.resolve(field.type, false, patterns)
          ),
        };
      }
      case "map":
        return {
          ...this.#base(inOptional),
          kind: "mapping",
          origin: "map",
          args: [
            this.resolve(decl.keys, false, patterns),
            this.resolve(decl.values, false, patterns),
          ],
        };
      case "dict":
        return {
          ...this.#base(inOptional),
          kind: "mapping",
          origin: "dict",
          args: [
            this.resolve("string", false, patterns),
            this.resolve(decl.values, false, patterns),
          ],
        };
      case "optional":
        return this.resolve(decl.of, true, patterns);
      case "union":
        return this.#resolveUnion(decl.of, patterns, this.#base(inOptional));
      case "enum": {
        const members = enumMembers(decl.values);
        if (members.length === 0) {
          throw this.#error(decl, "enumeration has no members");
        }
        return {
          ...this.#base(inOptional),
          kind: "enum",
          origin: "enum",
          name: decl.name,
          members,
          args: [],
        };
      }
      case "literal":
        if (decl.values.length === 0) {
          throw this.#error(decl, "literal admits no values");
        }
        return {
          ...this.#base(inOptional),
          kind: "literal",
          origin: "literal",
          values: decl.values,
          args: [],
        };
      case "annotated":
        if (hasStructuralMetadata(decl)) {
          throw this.#error(
            decl,
            "aliases, paths and skip conditions are only allowed on the field's own type",
          );
        }
        return this.resolve(decl.base, inOptional, decl.patterns ?? patterns);
      case "ref":
        return this.resolve(this.#deref(decl.get), inOptional, patterns);
    }
  }

  #base(inOptional: boolean): DescriptorPosition {
    return { index: this.#index++, ordinal: this.#options.ordinal, inOptional };
  }

  #resolveUnion(
    alternatives: readonly TypeDecl[],
    patterns: readonly string[],
    base: DescriptorPosition,
  ): TypeDescriptor {
    const resolved: TypeDescriptor[] = [];
    let nullable = base.inOptional;
    for (const alternative of alternatives) {
      const descriptor = this.resolve(alternative, false, patterns);
      if (descriptor.kind === "primitive" && descriptor.origin === "null") {
        nullable = true;
      } else if (descriptor.kind === "sum") {
        nullable ||= descriptor.inOptional;
        resolved.push(...descriptor.args);
      } else {
        // The union carries the optionality of its alternatives.
        nullable ||= descriptor.inOptional;
        resolved.push({ ...descriptor, inOptional: false });
      }
    }
    if (resolved.length === 0) {
      return { ...base, kind: "primitive", origin: "null", args: [], inOptional: false };
    }
    if (resolved.length === 1) {
      return { ...resolved[0], inOptional: nullable };
    }
    return { ...base, kind: "sum", origin: "union", args: resolved, inOptional: nullable };
  }

  #recordDescriptor(
    record: RecordType<unknown>,
    inOptional: boolean,
  ): RecordDescriptor {
    const ancestors = this.#options.ancestors ?? [];
    return {
      ...this.#base(inOptional),
      kind: "record",
      origin: record.getName(),
      record,
      recursive: record === this.#options.record || ancestors.includes(record),
      args: [],
    };
  }

  #lookup(name: string): RecordType<unknown> {
    const registry = this.#options.record.getRegistry();
    if (!registry) {
      throw this.#error(
        name,
        `forward reference cannot be resolved: ${this.#options.record.getName()} has no registry`,
      );
    }
    const record = registry.get(name);
    if (!(record instanceof RecordType)) {
      throw this.#error(name, "no record with this name is registered");
    }
    return record;
  }

  #deref(get: () => TypeDecl): TypeDecl {
    if (++this.#refDepth > MAX_REF_DEPTH) {
      throw this.#error("ref", "reference chain does not terminate");
    }
    try {
      return get();
    } catch (error) {
      throw this.#error(
        "ref",
        `reference could not be evaluated: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }

  #error(fragment: unknown, detail: string): DescriptorResolutionError {
    return new DescriptorResolutionError(this.#field, describeDecl(fragment), detail);
  }
}

/**
 * Resolves the declared type of a field into a descriptor, lifting
 * `optional` and `annotated` wrappers off the top of the declaration.
 *
 * @throws DescriptorResolutionError naming the field and the fragment that
 * could not be resolved.
 */
export function resolveFieldType(
  field: RecordField,
  options: ResolveOptions,
): ResolvedField {
  const patterns = field.getPatterns();
  return new FieldTypeResolver(field.getName(), {
    ...options,
    patterns: patterns.length > 0 ? patterns : options.patterns,
  }).resolveField(field.getType());
}

/**
 * Resolves a bare type declaration, as if it were the type of a field
 * named `field`.
 */
export function resolveDescriptor(
  decl: TypeDecl,
  field: string,
  options: ResolveOptions,
): TypeDescriptor {
  return new FieldTypeResolver(field, options).resolveField(decl).descriptor;
}

import { safeStringify } from "./json.ts";

/**
 * One step into a dynamic value: a field or map key, or a sequence index.
 */
export type PathSegment = string | number;

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Renders a path as `record.field[2].inner`.
 */
export function renderPath(path: readonly PathSegment[], root?: string): string {
  let result = root ?? "";
  for (const segment of path) {
    if (typeof segment === "number") {
      result += `[${segment}]`;
    } else if (IDENTIFIER.test(segment)) {
      result += result.length > 0 ? `.${segment}` : segment;
    } else {
      result += `[${JSON.stringify(segment)}]`;
    }
  }
  return result;
}

/**
 * Options shared by every marshalling error.
 */
export interface MarshalErrorOptions {
  /** Path from the record root to the failing value. */
  path?: PathSegment[];
  /** The raw value that could not be converted, when useful. */
  value?: unknown;
  /** Underlying error, when one was caught and wrapped. */
  cause?: unknown;
}

/**
 * Base class for all failures raised while compiling or running a routine.
 *
 * The path grows as the error propagates out of nested routines, and the
 * message is re-rendered each time so it always names the full location.
 */
export class MarshalError extends Error {
  /** Path to the failing value, outermost segment first. */
  public readonly path: PathSegment[];
  /** Name of the outermost record the error passed through. */
  public record: string | undefined;
  /** Whether a raw value was attached. */
  public readonly hasValue: boolean;
  /** The offending raw value, when attached. */
  public readonly value: unknown;
  readonly #reason: string;

  constructor(reason: string, options: MarshalErrorOptions = {}) {
    super(reason, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "MarshalError";
    this.#reason = reason;
    this.path = options.path ? options.path.slice() : [];
    this.hasValue = Object.hasOwn(options, "value");
    this.value = options.value;
    this.record = undefined;
    this.message = this.#render();
  }

  /**
   * The message without location information.
   */
  public get reason(): string {
    return this.#reason;
  }

  /**
   * Prepends a path segment, as seen from the enclosing routine.
   */
  public prependPath(...segments: PathSegment[]): this {
    this.path.unshift(...segments);
    this.message = this.#render();
    return this;
  }

  /**
   * Records the enclosing record name; outer records overwrite inner ones.
   */
  public attributeTo(record: string): this {
    this.record = record;
    this.message = this.#render();
    return this;
  }

  #render(): string {
    let message = this.#reason;
    if (this.path.length > 0 || this.record !== undefined) {
      message += ` (at ${renderPath(this.path, this.record)})`;
    }
    if (this.hasValue) {
      message += `; value: ${safeStringify(this.value)}`;
    }
    return message;
  }
}

/**
 * A declared type could not be turned into a descriptor.
 */
export class DescriptorResolutionError extends MarshalError {
  /** The field whose type failed to resolve. */
  public readonly field: string;
  /** The part of the declared type that could not be resolved. */
  public readonly fragment: string;

  constructor(field: string, fragment: string, detail?: string) {
    super(
      `Cannot resolve type ${fragment} of field '${field}'${
        detail ? `: ${detail}` : ""
      }`,
    );
    this.name = "DescriptorResolutionError";
    this.field = field;
    this.fragment = fragment;
  }
}

/**
 * A required field was absent under every candidate key and has no default.
 */
export class MissingFieldError extends MarshalError {
  /** Name of the missing field. */
  public readonly field: string;
  /** Every key or path that was tried. */
  public readonly candidates: string[];

  constructor(field: string, candidates: string[]) {
    super(
      `Missing required field '${field}' (tried: ${candidates.join(", ")})`,
    );
    this.name = "MissingFieldError";
    this.field = field;
    this.candidates = candidates;
  }
}

/**
 * Input map carried keys that no field maps to.
 */
export class UnknownKeyError extends MarshalError {
  /** The unrecognized keys. */
  public readonly keys: string[];
  /** The record's field names. */
  public readonly knownFields: string[];

  constructor(keys: string[], knownFields: string[]) {
    super(
      `Unknown key${keys.length === 1 ? "" : "s"} ${
        keys.map((key) => JSON.stringify(key)).join(", ")
      } not mapped to any field (known fields: ${
        knownFields.map((field) => JSON.stringify(field)).join(", ")
      })`,
    );
    this.name = "UnknownKeyError";
    this.keys = keys;
    this.knownFields = knownFields;
  }
}

/**
 * A value does not coerce to the expected primitive or shape.
 */
export class TypeMismatchError extends MarshalError {
  /** Description of the expected type. */
  public readonly expected: string;

  constructor(
    expected: string,
    value: unknown,
    detail?: string,
    cause?: unknown,
  ) {
    super(
      `Expected ${expected}${detail ? ` (${detail})` : ""}`,
      { value, cause },
    );
    this.name = "TypeMismatchError";
    this.expected = expected;
  }
}

/**
 * No alternative of a sum type matched, or a tag value was unknown.
 */
export class TagDispatchError extends MarshalError {
  /** The tag read from the input, if any. */
  public readonly tag: string | undefined;
  /** Tags the sum type knows about. */
  public readonly knownTags: string[];
  /** Why each tried alternative rejected the value. */
  public readonly failures: unknown[];

  constructor(
    reason: string,
    value: unknown,
    tag: string | undefined,
    knownTags: string[],
    failures: unknown[] = [],
  ) {
    super(reason, value === undefined ? {} : { value });
    this.name = "TagDispatchError";
    this.tag = tag;
    this.knownTags = knownTags;
    this.failures = failures;
  }
}

/**
 * A date/time string matched neither the canonical form nor any pattern.
 */
export class PatternParseError extends MarshalError {
  /** Every format that was tried, canonical form first. */
  public readonly patterns: string[];

  constructor(value: unknown, patterns: string[]) {
    super(
      `Cannot parse date/time, tried: ${patterns.join(", ")}`,
      { value },
    );
    this.name = "PatternParseError";
    this.patterns = patterns;
  }
}

/**
 * No handler and no extension registry entry exists for a type.
 */
export class UnsupportedTypeError extends MarshalError {
  /** Name of the unsupported type. */
  public readonly typeName: string;

  constructor(typeName: string, detail?: string) {
    super(`Unsupported type: ${typeName}${detail ? ` (${detail})` : ""}`);
    this.name = "UnsupportedTypeError";
    this.typeName = typeName;
  }
}

/**
 * Marshalling configuration failed validation.
 */
export class ConfigError extends MarshalError {
  /** One entry per invalid option. */
  public readonly issues: string[];

  constructor(owner: string, issues: string[]) {
    super(`Invalid configuration for ${owner}: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Every error found while running in collect-all mode.
 */
export class AggregateMarshalError extends MarshalError {
  /** The collected errors, in the order they were found. */
  public readonly errors: MarshalError[];

  constructor(errors: MarshalError[]) {
    super(`${errors.length} error${errors.length === 1 ? "" : "s"}`);
    this.name = "AggregateMarshalError";
    this.errors = errors;
    this.message = AggregateMarshalError.#summarize(errors);
  }

  public override prependPath(...segments: PathSegment[]): this {
    for (const error of this.errors) {
      error.prependPath(...segments);
    }
    this.message = AggregateMarshalError.#summarize(this.errors);
    return this;
  }

  public override attributeTo(record: string): this {
    for (const error of this.errors) {
      error.attributeTo(record);
    }
    this.message = AggregateMarshalError.#summarize(this.errors);
    return this;
  }

  static #summarize(errors: MarshalError[]): string {
    const lines = errors.map((error) => `  - ${error.message}`);
    return `${errors.length} error${errors.length === 1 ? "" : "s"}:\n${
      lines.join("\n")
    }`;
  }
}

/**
 * Wraps anything thrown by user code so it carries a path like our own errors.
 */
export function toMarshalError(error: unknown, expected: string, value: unknown): MarshalError {
  if (error instanceof MarshalError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new TypeMismatchError(expected, value, detail, error);
}

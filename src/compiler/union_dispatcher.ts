import {
  describeDescriptor,
  type SumDescriptor,
  type TypeDescriptor,
} from "../descriptors/descriptor.ts";
import { TagDispatchError } from "../schemas/error.ts";
import {
  type DynamicValue,
  isDynamicMap,
  isPlainObject,
  safeStringify,
} from "../schemas/json.ts";
import type { CompileContext, DumpFragment, Guard, LoadFragment } from "./context.ts";
import { matchesExactly } from "./handlers/primitive.ts";

interface Alternative {
  readonly descriptor: TypeDescriptor;
  readonly label: string;
  /** Tag of a record alternative, declared or auto-assigned. */
  readonly tag: string | undefined;
}

function tagOf(descriptor: TypeDescriptor, autoAssign: boolean): string | undefined {
  if (descriptor.kind !== "record") {
    return undefined;
  }
  return descriptor.record.getMeta().tag ??
    (autoAssign ? descriptor.record.getName() : undefined);
}

function describeFailure(label: string, error: unknown): string {
  return `${label}: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Chooses the alternative of a sum type that a value binds to.
 *
 * Loading a map that carries the tag key dispatches on the tag. Anything
 * else is tried against the alternatives in three passes: primitives and
 * literals the value already matches exactly, then structured alternatives
 * by trial, then primitives that coerce. The first alternative that
 * accepts the value wins, so overlapping alternatives resolve by
 * declaration order; tag them to make the choice explicit.
 *
 * Dumping picks the first alternative whose guard accepts the value and
 * writes the tag into tagged record output.
 */
export class UnionDispatcher {
  readonly #descriptor: SumDescriptor;
  readonly #ctx: CompileContext;
  readonly #alternatives: Alternative[];
  readonly #tagKey: string;
  readonly #knownTags: string[];

  constructor(descriptor: SumDescriptor, ctx: CompileContext) {
    this.#descriptor = descriptor;
    this.#ctx = ctx;
    this.#tagKey = ctx.config.tagKey;
    const autoAssign = ctx.config.autoAssignTags;
    this.#alternatives = descriptor.args.map((alternative) => ({
      descriptor: alternative,
      label: describeDescriptor(alternative),
      tag: tagOf(alternative, autoAssign),
    }));

    const seen = new Map<string, string>();
    for (const { tag, label } of this.#alternatives) {
      if (tag === undefined) continue;
      const previous = seen.get(tag);
      if (previous !== undefined) {
        throw new TagDispatchError(
          `Alternatives ${previous} and ${label} share the tag ${JSON.stringify(tag)}`,
          undefined,
          tag,
          Array.from(seen.keys()),
        );
      }
      seen.set(tag, label);
    }
    this.#knownTags = Array.from(seen.keys());
  }

  /**
   * Tags of the tagged alternatives, in declaration order.
   */
  public getKnownTags(): string[] {
    return this.#knownTags.slice();
  }

  /**
   * Builds the load fragment of the sum type.
   */
  public loader(): LoadFragment {
    const ctx = this.#ctx;
    const tagKey = this.#tagKey;
    const knownTags = this.#knownTags;
    const description = describeDescriptor({ ...this.#descriptor, inOptional: false });

    const byTag = new Map<string, LoadFragment>();
    const exact: { test: Guard; load: LoadFragment }[] = [];
    const structural: { label: string; load: LoadFragment }[] = [];
    const coercing: { label: string; load: LoadFragment }[] = [];
    const fallback: { label: string; load: LoadFragment }[] = [];
    let firstRecord: LoadFragment | undefined;

    for (const { descriptor, label, tag } of this.#alternatives) {
      const load = ctx.loadOf(descriptor);
      if (tag !== undefined) {
        byTag.set(tag, load);
      }
      if (descriptor.kind === "record") {
        firstRecord ??= load;
      }
      if (descriptor.kind === "primitive") {
        const { origin } = descriptor;
        if (origin === "any") {
          fallback.push({ label, load });
          continue;
        }
        if (origin !== "bytes") {
          exact.push({ test: (value) => matchesExactly(origin, value), load });
        }
        coercing.push({ label, load });
      } else if (descriptor.kind === "literal") {
        exact.push({ test: ctx.guardOf(descriptor), load });
      } else {
        structural.push({ label, load });
      }
    }
    const unsafe = ctx.config.unsafeUnionDispatch;

    const dispatchTag = (value: Record<string, unknown>): unknown => {
      const tag = value[tagKey];
      const load = typeof tag === "string" ? byTag.get(tag) : undefined;
      if (!load) {
        throw new TagDispatchError(
          `Unknown tag ${safeStringify(tag)} under "${tagKey}" (known tags: ${
            knownTags.map((known) => JSON.stringify(known)).join(", ")
          })`,
          value,
          typeof tag === "string" ? tag : safeStringify(tag),
          knownTags.slice(),
        );
      }
      const rest: Record<string, unknown> = { ...value };
      delete rest[tagKey];
      return load(rest);
    };

    return (value) => {
      if (byTag.size > 0 && isPlainObject(value) && Object.hasOwn(value, tagKey)) {
        return dispatchTag(value);
      }
      if (unsafe && firstRecord && isPlainObject(value)) {
        return firstRecord(value);
      }
      for (const candidate of exact) {
        if (candidate.test(value)) {
          return candidate.load(value);
        }
      }
      const failures: unknown[] = [];
      for (const pass of [structural, coercing, fallback]) {
        for (const candidate of pass) {
          try {
            return candidate.load(value);
          } catch (error) {
            failures.push(error);
          }
        }
      }
      const tried = [...structural, ...coercing, ...fallback];
      throw new TagDispatchError(
        `Value matches no alternative of ${description}${
          failures.length > 0
            ? ` (${
              failures.map((error, i) => describeFailure(tried[i].label, error)).join("; ")
            })`
            : ""
        }`,
        value,
        undefined,
        knownTags.slice(),
        failures,
      );
    };
  }

  /**
   * Builds the dump fragment of the sum type.
   */
  public dumper(): DumpFragment {
    const ctx = this.#ctx;
    const tagKey = this.#tagKey;
    const knownTags = this.#knownTags;
    const description = describeDescriptor({ ...this.#descriptor, inOptional: false });
    const candidates = this.#alternatives.map(({ descriptor, tag }) => ({
      guard: ctx.guardOf(descriptor),
      dump: ctx.dumpOf(descriptor),
      tag,
    }));

    return (value) => {
      for (const { guard, dump, tag } of candidates) {
        if (!guard(value)) continue;
        const out: DynamicValue = dump(value);
        if (tag !== undefined && isDynamicMap(out)) {
          return { [tagKey]: tag, ...out };
        }
        return out;
      }
      throw new TagDispatchError(
        `No alternative of ${description} accepts the value`,
        value,
        undefined,
        knownTags.slice(),
      );
    };
  }

  /**
   * Builds the guard of the sum type: any alternative accepts the value.
   */
  public guard(): Guard {
    const guards = this.#alternatives.map(({ descriptor }) => this.#ctx.guardOf(descriptor));
    return (value) => guards.some((guard) => guard(value));
  }
}

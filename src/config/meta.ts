import { z } from "zod";
import type { KeyCasing, LoadKeyCasing } from "../utils/casing.ts";
import type { IntFractionPolicy } from "../utils/coercion.ts";
import type { PathSegment } from "../schemas/error.ts";
import { ConfigError } from "../schemas/error.ts";
import type { Condition } from "./conditions.ts";

/**
 * A single source/target for a field: a flat key, or a nested path given as
 * segments or as a path string such as `"a.b[0]"`.
 */
export type AliasSpec = string | { readonly path: readonly PathSegment[] | string };

/**
 * Alias configuration for one field.
 *
 * A single spec or a list applies to both directions (the first entry is
 * the dump target); the object form separates load candidates from the dump
 * target.
 */
export type FieldAliasConfig =
  | AliasSpec
  | readonly AliasSpec[]
  | { readonly load?: AliasSpec | readonly AliasSpec[]; readonly dump?: AliasSpec };

/**
 * What to do with input keys that map to no field.
 */
export type UnknownKeyPolicy = "ignore" | "warn" | "raise";

/**
 * How date/time values are dumped.
 */
export type DateTimeOutputForm = "iso" | "timestamp";

/**
 * Marshalling options attached to a record, or passed to an entry point as
 * the configuration inherited by the root record.
 */
export interface RecordMeta {
  /** Casing applied to field names when looking up input keys. */
  readonly keyCasingLoad?: LoadKeyCasing;
  /** Casing applied to field names when emitting keys. */
  readonly keyCasingDump?: KeyCasing;
  /** Field name to alias overrides. Applies only to the declaring record. */
  readonly fieldAliases?: Readonly<Record<string, FieldAliasConfig>>;
  /** Key holding the discriminator of a tagged union alternative. */
  readonly tagKey?: string;
  /** Tag identifying this record inside unions. Never inherited. */
  readonly tag?: string;
  /** Use each record alternative's name as its tag unless it declares one. */
  readonly autoAssignTags?: boolean;
  /** Take the first record alternative of an untagged union without trying it. */
  readonly unsafeUnionDispatch?: boolean;
  /** Policy for input keys that no field maps to. */
  readonly onUnknownKey?: UnknownKeyPolicy;
  /** Skip a field on dump when its value satisfies this condition. */
  readonly skipFieldIf?: Condition;
  /** Skip a field on dump when its value equals the field default. */
  readonly skipDefaults?: boolean;
  /**
   * Pass the effective configuration down to nested records. Applies only
   * to the declaring record.
   */
  readonly recursive?: boolean;
  /** Output form for date/time values. */
  readonly dateTimeOutputForm?: DateTimeOutputForm;
  /** Field name to date/time patterns tried after the ISO form. */
  readonly customPatterns?: Readonly<Record<string, readonly string[]>>;
  /** Dump named tuples as maps instead of sequences. */
  readonly namedTupleAsMap?: boolean;
  /** Load and dump enumerations by member name instead of value. */
  readonly enumByName?: boolean;
  /** Whether integer coercion rounds or rejects fractional numbers. */
  readonly intFraction?: IntFractionPolicy;
  /** Report every load error at once instead of stopping at the first. */
  readonly collectErrors?: boolean;
}

/**
 * Fully resolved configuration for one record under one enclosing context.
 */
export interface EffectiveConfig {
  readonly keyCasingLoad: LoadKeyCasing;
  readonly keyCasingDump: KeyCasing;
  readonly fieldAliases: Readonly<Record<string, FieldAliasConfig>>;
  readonly tagKey: string;
  readonly tag: string | undefined;
  readonly autoAssignTags: boolean;
  readonly unsafeUnionDispatch: boolean;
  readonly onUnknownKey: UnknownKeyPolicy;
  readonly skipFieldIf: Condition | undefined;
  readonly skipDefaults: boolean;
  readonly recursive: boolean;
  readonly dateTimeOutputForm: DateTimeOutputForm;
  readonly customPatterns: Readonly<Record<string, readonly string[]>>;
  readonly namedTupleAsMap: boolean;
  readonly enumByName: boolean;
  readonly intFraction: IntFractionPolicy;
  readonly collectErrors: boolean;
  /** Stable serialization of every option above. */
  readonly fingerprint: string;
}

/**
 * Default tag key, used when no configuration names one.
 */
export const DEFAULT_TAG_KEY = "__tag__";

/**
 * Values used for options set nowhere in the configuration chain.
 */
export const DEFAULT_OPTIONS: Omit<EffectiveConfig, "fingerprint"> = {
  keyCasingLoad: "none",
  keyCasingDump: "none",
  fieldAliases: {},
  tagKey: DEFAULT_TAG_KEY,
  tag: undefined,
  autoAssignTags: false,
  unsafeUnionDispatch: false,
  onUnknownKey: "ignore",
  skipFieldIf: undefined,
  skipDefaults: false,
  recursive: true,
  dateTimeOutputForm: "iso",
  customPatterns: {},
  namedTupleAsMap: false,
  enumByName: false,
  intFraction: "round",
  collectErrors: false,
};

/**
 * Options that apply only to the record that declares them.
 */
export const NON_INHERITED_OPTIONS = [
  "recursive",
  "fieldAliases",
  "tag",
] as const;

const CasingSchema = z.enum(["none", "camel", "pascal", "kebab", "snake"]);
const PathSegmentSchema = z.union([z.string(), z.number().int()]);
const AliasSpecSchema = z.union([
  z.string().min(1),
  z.object({
    path: z.union([z.string().min(1), z.array(PathSegmentSchema).min(1)]),
  }).strict(),
]);
const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const ConditionSchema = z.union([
  z.object({
    op: z.enum(["eq", "ne", "lt", "le", "gt", "ge", "is", "isNot"]),
    value: ScalarSchema,
  }).strict(),
  z.object({ op: z.enum(["truthy", "falsy"]) }).strict(),
]);

/**
 * Schema for {@link RecordMeta}; unknown options are rejected.
 */
export const RecordMetaSchema = z.object({
  keyCasingLoad: z.union([CasingSchema, z.literal("auto")]).optional(),
  keyCasingDump: CasingSchema.optional(),
  fieldAliases: z.record(
    z.union([
      AliasSpecSchema,
      z.array(AliasSpecSchema).min(1),
      z.object({
        load: z.union([AliasSpecSchema, z.array(AliasSpecSchema).min(1)])
          .optional(),
        dump: AliasSpecSchema.optional(),
      }).strict(),
    ]),
  ).optional(),
  tagKey: z.string().min(1).optional(),
  tag: z.string().min(1).optional(),
  autoAssignTags: z.boolean().optional(),
  unsafeUnionDispatch: z.boolean().optional(),
  onUnknownKey: z.enum(["ignore", "warn", "raise"]).optional(),
  skipFieldIf: ConditionSchema.optional(),
  skipDefaults: z.boolean().optional(),
  recursive: z.boolean().optional(),
  dateTimeOutputForm: z.enum(["iso", "timestamp"]).optional(),
  customPatterns: z.record(z.array(z.string().min(1)).min(1)).optional(),
  namedTupleAsMap: z.boolean().optional(),
  enumByName: z.boolean().optional(),
  intFraction: z.enum(["round", "reject"]).optional(),
  collectErrors: z.boolean().optional(),
}).strict();

/**
 * Validates user-supplied options, raising a {@link ConfigError} that lists
 * every problem.
 */
export function parseRecordMeta(owner: string, meta: unknown): RecordMeta {
  const parsed = RecordMetaSchema.safeParse(meta ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      owner,
      parsed.error.issues.map((issue) =>
        `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
      ),
    );
  }
  return parsed.data;
}

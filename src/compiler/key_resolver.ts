import type { AliasSpec, EffectiveConfig, FieldAliasConfig } from "../config/meta.ts";
import type { RecordField } from "../schemas/complex/record_field.ts";
import type { FieldAnnotations } from "../schemas/declared.ts";
import type { PathSegment } from "../schemas/error.ts";
import { renderPath } from "../schemas/error.ts";
import { AUTO_CASING_ORDER, applyCasing, type KeyCasing } from "../utils/casing.ts";
import { parseObjectPath } from "../utils/object_path.ts";

/**
 * Where a field is read from and written to.
 */
export interface KeyPlan {
  /** Candidate keys or paths tried in order on load; the first hit wins. */
  readonly load: readonly (readonly PathSegment[])[];
  /** The single key or path written on dump. */
  readonly dump: readonly PathSegment[];
}

function toSegments(spec: AliasSpec | readonly PathSegment[] | string): readonly PathSegment[] {
  if (typeof spec === "string") {
    return [spec];
  }
  if ("path" in spec) {
    return typeof spec.path === "string" ? parseObjectPath(spec.path) : spec.path;
  }
  return spec;
}

function isSplitConfig(
  config: FieldAliasConfig,
): config is { readonly load?: AliasSpec | readonly AliasSpec[]; readonly dump?: AliasSpec } {
  return typeof config === "object" && !Array.isArray(config) && !("path" in config);
}

function isAliasList(
  spec: AliasSpec | readonly AliasSpec[],
): spec is readonly AliasSpec[] {
  return Array.isArray(spec);
}

function asList(spec: AliasSpec | readonly AliasSpec[]): readonly AliasSpec[] {
  return isAliasList(spec) ? spec : [spec];
}

function pathKey(path: readonly PathSegment[]): string {
  return JSON.stringify(path);
}

/**
 * Renders a key or path for messages: flat keys as written, paths as
 * `a.b[0]`.
 */
export function describeKey(path: readonly PathSegment[]): string {
  return path.length === 1 && typeof path[0] === "string"
    ? path[0]
    : renderPath(path);
}

/**
 * Computes the load candidates and the dump target of a field.
 *
 * Load tries, in order: the field's path, its explicit aliases, the field
 * name under the load casing (every casing when it is `auto`), and lastly
 * the dump target. Dump writes to the explicit dump alias, else the path,
 * else the first explicit alias, else the field name under the dump casing.
 * Aliases configured for the field in `fieldAliases` replace the declared
 * ones.
 */
export function resolveKeys(
  field: RecordField,
  annotations: FieldAnnotations,
  config: EffectiveConfig,
): KeyPlan {
  const name = field.getName();
  const override = Object.hasOwn(config.fieldAliases, name)
    ? config.fieldAliases[name]
    : undefined;

  let aliases: readonly AliasSpec[] = [
    ...field.getAliases(),
    ...(annotations.aliases ?? []),
  ];
  let dumpAlias = field.getDumpAlias() ?? annotations.dumpAlias;
  if (override !== undefined) {
    if (isSplitConfig(override)) {
      if (override.load !== undefined) aliases = asList(override.load);
      if (override.dump !== undefined) dumpAlias = override.dump;
    } else {
      aliases = asList(override);
      dumpAlias = undefined;
    }
  }

  const path = field.getPath() ?? annotations.path;
  const explicit: (readonly PathSegment[])[] = [];
  if (path !== undefined) {
    explicit.push(toSegments(path));
  }
  for (const alias of aliases) {
    explicit.push(toSegments(alias));
  }

  const casings: readonly KeyCasing[] = config.keyCasingLoad === "auto"
    ? AUTO_CASING_ORDER
    : [config.keyCasingLoad];
  const derived = casings.map((casing) => [applyCasing(casing, name)]);

  const dump = dumpAlias !== undefined
    ? toSegments(dumpAlias)
    : explicit.length > 0
    ? explicit[0]
    : [applyCasing(config.keyCasingDump, name)];

  const seen = new Set<string>();
  const load: (readonly PathSegment[])[] = [];
  for (const candidate of [...explicit, ...derived, dump]) {
    const key = pathKey(candidate);
    if (!seen.has(key)) {
      seen.add(key);
      load.push(candidate);
    }
  }
  return { load, dump };
}

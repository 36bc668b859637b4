import { stableStringify } from "../schemas/json.ts";
import {
  DEFAULT_OPTIONS,
  type EffectiveConfig,
  NON_INHERITED_OPTIONS,
  type RecordMeta,
} from "./meta.ts";

/**
 * Anything that carries record-level marshalling options.
 */
export interface ConfigSource {
  getMeta(): RecordMeta;
}

type Options = Omit<EffectiveConfig, "fingerprint">;

const ROOT_KEY = "";

const resolved = new WeakMap<ConfigSource, Map<string, EffectiveConfig>>();

const NON_INHERITED: ReadonlySet<string> = new Set(NON_INHERITED_OPTIONS);

function isNonInherited(key: keyof Options): boolean {
  return NON_INHERITED.has(key);
}

function pick<K extends keyof Options>(
  key: K,
  own: RecordMeta,
  inherited: EffectiveConfig | undefined,
): Options[K] {
  const explicit: Partial<Options> = own;
  const ownValue = explicit[key];
  if (ownValue !== undefined) {
    return ownValue;
  }
  if (inherited !== undefined && !isNonInherited(key)) {
    return inherited[key];
  }
  return DEFAULT_OPTIONS[key];
}

/**
 * Builds a frozen effective configuration from explicit options layered
 * over an inherited configuration.
 */
export function mergeConfig(
  own: RecordMeta,
  inherited?: EffectiveConfig,
): EffectiveConfig {
  const options: Options = {
    keyCasingLoad: pick("keyCasingLoad", own, inherited),
    keyCasingDump: pick("keyCasingDump", own, inherited),
    fieldAliases: pick("fieldAliases", own, inherited),
    tagKey: pick("tagKey", own, inherited),
    tag: pick("tag", own, inherited),
    autoAssignTags: pick("autoAssignTags", own, inherited),
    unsafeUnionDispatch: pick("unsafeUnionDispatch", own, inherited),
    onUnknownKey: pick("onUnknownKey", own, inherited),
    skipFieldIf: pick("skipFieldIf", own, inherited),
    skipDefaults: pick("skipDefaults", own, inherited),
    recursive: pick("recursive", own, inherited),
    dateTimeOutputForm: pick("dateTimeOutputForm", own, inherited),
    customPatterns: pick("customPatterns", own, inherited),
    namedTupleAsMap: pick("namedTupleAsMap", own, inherited),
    enumByName: pick("enumByName", own, inherited),
    intFraction: pick("intFraction", own, inherited),
    collectErrors: pick("collectErrors", own, inherited),
  };
  // Structured clone detaches the result from caller-owned objects, so later
  // mutation of a meta object cannot reach a compiled routine.
  const detached: Options = structuredClone(options);
  return Object.freeze({ ...detached, fingerprint: stableStringify(detached) });
}

/**
 * Resolves the effective configuration of `source` when reached from a
 * context whose configuration is `inherited` (none for a root record).
 *
 * Results are memoized per (record, inherited fingerprint).
 */
export function resolveConfig(
  source: ConfigSource,
  inherited?: EffectiveConfig,
): EffectiveConfig {
  let bySource = resolved.get(source);
  if (!bySource) {
    bySource = new Map();
    resolved.set(source, bySource);
  }
  const key = inherited?.fingerprint ?? ROOT_KEY;
  const cached = bySource.get(key);
  if (cached) {
    return cached;
  }
  const config = mergeConfig(source.getMeta(), inherited);
  bySource.set(key, config);
  return config;
}

/**
 * The configuration a record hands to the records nested in it.
 */
export function configForNested(config: EffectiveConfig): EffectiveConfig | undefined {
  return config.recursive ? config : undefined;
}

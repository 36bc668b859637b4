import { describe, expect, it } from "vitest";
import type { RecordMeta } from "../meta.ts";
import { DEFAULT_TAG_KEY } from "../meta.ts";
import { configForNested, mergeConfig, resolveConfig } from "../resolve_config.ts";

const source = (meta: RecordMeta) => ({ getMeta: () => meta });

describe("resolve_config", () => {
  describe("mergeConfig", () => {
    it("fills unset options with defaults", () => {
      const config = mergeConfig({});
      expect(config.tagKey).toBe(DEFAULT_TAG_KEY);
      expect(config.onUnknownKey).toBe("ignore");
      expect(config.recursive).toBe(true);
      expect(Object.isFrozen(config)).toBe(true);
    });

    it("prefers own options over inherited ones", () => {
      const parent = mergeConfig({ keyCasingLoad: "snake", tagKey: "kind" });
      const child = mergeConfig({ tagKey: "type" }, parent);
      expect(child.keyCasingLoad).toBe("snake");
      expect(child.tagKey).toBe("type");
    });

    it("does not inherit record-local options", () => {
      const parent = mergeConfig({
        recursive: false,
        tag: "P",
        fieldAliases: { a: "b" },
      });
      const child = mergeConfig({}, parent);
      expect(child.recursive).toBe(true);
      expect(child.tag).toBeUndefined();
      expect(child.fieldAliases).toEqual({});
    });

    it("fingerprints equal configurations identically", () => {
      const viaInheritance = mergeConfig({}, mergeConfig({ skipDefaults: true }));
      const direct = mergeConfig({ skipDefaults: true });
      expect(viaInheritance.fingerprint).toBe(direct.fingerprint);
      expect(mergeConfig({}).fingerprint).not.toBe(direct.fingerprint);
    });

    it("detaches the result from the caller's objects", () => {
      const aliases: Record<string, string> = { a: "b" };
      const config = mergeConfig({ fieldAliases: aliases });
      aliases.a = "c";
      expect(config.fieldAliases).toEqual({ a: "b" });
    });
  });

  describe("resolveConfig", () => {
    it("memoizes per source and inherited fingerprint", () => {
      const record = source({ keyCasingDump: "kebab" });
      const parent = mergeConfig({ skipDefaults: true });
      expect(resolveConfig(record)).toBe(resolveConfig(record));
      expect(resolveConfig(record, parent)).toBe(resolveConfig(record, parent));
      expect(resolveConfig(record, parent)).not.toBe(resolveConfig(record));
      expect(resolveConfig(record, parent).skipDefaults).toBe(true);
    });
  });

  describe("configForNested", () => {
    it("passes the configuration on only when recursive", () => {
      const recursive = mergeConfig({});
      expect(configForNested(recursive)).toBe(recursive);
      expect(configForNested(mergeConfig({ recursive: false }))).toBeUndefined();
    });
  });
});

import { describe, expect, it } from "vitest";
import { isValidName, RecordRegistry } from "../resolve_names.ts";

const named = (name: string) => ({ getName: () => name });

describe("resolve_names", () => {
  describe("isValidName", () => {
    it("accepts identifiers", () => {
      expect(isValidName("Point")).toBe(true);
      expect(isValidName("_inner$2")).toBe(true);
    });

    it("rejects names that are not identifiers", () => {
      expect(isValidName("2d")).toBe(false);
      expect(isValidName("a.b")).toBe(false);
      expect(isValidName("")).toBe(false);
    });
  });

  describe("RecordRegistry", () => {
    it("looks entries up by name", () => {
      const registry = new RecordRegistry();
      const entry = named("Node");
      registry.register(entry);
      expect(registry.get("Node")).toBe(entry);
      expect(registry.get("Other")).toBeUndefined();
      expect(registry.names()).toEqual(["Node"]);
    });

    it("allows registering the same entry twice", () => {
      const registry = new RecordRegistry();
      const entry = named("Node");
      registry.register(entry);
      expect(() => registry.register(entry)).not.toThrow();
    });

    it("rejects a second entry under a taken name", () => {
      const registry = new RecordRegistry();
      registry.register(named("Node"));
      expect(() => registry.register(named("Node"))).toThrow(
        "Duplicate record name: Node",
      );
    });

    it("rejects built-in type names", () => {
      const registry = new RecordRegistry();
      expect(() => registry.register(named("int"))).toThrow(
        "Cannot register a record under built-in name: int",
      );
    });
  });
});

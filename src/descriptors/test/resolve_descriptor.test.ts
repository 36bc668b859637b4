import { describe, expect, it } from "vitest";
import { resolveDescriptor, resolveFieldType } from "../resolve_descriptor.ts";
import { describeDescriptor } from "../descriptor.ts";
import { defineRecord, RecordField, type RecordType } from "../../schemas/complex/record_type.ts";
import { RecordRegistry } from "../../schemas/complex/resolve_names.ts";
import type { TypeDecl } from "../../schemas/declared.ts";
import { DescriptorResolutionError } from "../../schemas/error.ts";

class Widget {}

const Owner = defineRecord({ name: "Owner", fields: [] });

const resolve = (decl: TypeDecl) =>
  resolveDescriptor(decl, "f", { record: Owner, ordinal: 0 });

describe("resolveDescriptor", () => {
  describe("scalars", () => {
    it("resolves primitive names", () => {
      expect(resolveDescriptor("int", "f", { record: Owner, ordinal: 3 })).toEqual({
        kind: "primitive",
        origin: "int",
        args: [],
        index: 0,
        ordinal: 3,
        inOptional: false,
      });
    });

    it("resolves Date as a datetime", () => {
      const descriptor = resolve(Date);
      expect(descriptor.kind).toBe("temporal");
      expect(descriptor.origin).toBe("datetime");
    });

    it("resolves other classes as custom types", () => {
      const descriptor = resolve(Widget);
      expect(descriptor.kind).toBe("custom");
      expect(descriptor.origin).toBe("Widget");
    });
  });

  describe("containers", () => {
    it("numbers nested descriptors in expansion order", () => {
      const descriptor = resolve({
        type: "list",
        items: { type: "optional", of: "string" },
      });
      expect(descriptor.kind).toBe("collection");
      expect(descriptor.index).toBe(0);
      expect(descriptor.args[0]).toMatchObject({
        kind: "primitive",
        origin: "string",
        index: 1,
        inOptional: true,
      });
      expect(describeDescriptor(descriptor)).toBe("list[string | null]");
    });

    it("gives dicts a string key", () => {
      const descriptor = resolve({ type: "dict", values: "float" });
      expect(describeDescriptor(descriptor)).toBe("dict[string, float]");
    });

    it("keeps named tuple position names", () => {
      const descriptor = resolve({
        type: "namedTuple",
        name: "Coord",
        fields: [{ name: "lat", type: "float" }, { name: "lon", type: "float" }],
      });
      expect(descriptor).toMatchObject({ kind: "tuple", names: ["lat", "lon"] });
      expect(describeDescriptor(descriptor)).toBe("Coord");
    });

    it("rejects duplicate named tuple positions", () => {
      expect(() =>
        resolve({
          type: "namedTuple",
          fields: [{ name: "a", type: "int" }, { name: "a", type: "int" }],
        })
      ).toThrow("named tuple has duplicate position names");
    });
  });

  describe("unions", () => {
    it("turns a null alternative into optionality", () => {
      const descriptor = resolve({ type: "union", of: ["string", "null"] });
      expect(descriptor).toMatchObject({
        kind: "primitive",
        origin: "string",
        inOptional: true,
      });
    });

    it("flattens nested unions", () => {
      const descriptor = resolve({
        type: "union",
        of: ["int", { type: "union", of: ["string", "null"] }],
      });
      expect(descriptor.kind).toBe("sum");
      expect(descriptor.inOptional).toBe(true);
      expect(descriptor.args.map((arg) => arg.origin)).toEqual(["int", "string"]);
      expect(describeDescriptor(descriptor)).toBe("int | string | null");
    });
  });

  describe("enumerations", () => {
    it("drops the reverse mapping of numeric enums", () => {
      const descriptor = resolve({
        type: "enum",
        name: "Level",
        values: { Low: 1, High: 2, "1": "Low", "2": "High" },
      });
      expect(descriptor).toMatchObject({
        kind: "enum",
        members: [{ name: "Low", value: 1 }, { name: "High", value: 2 }],
      });
    });

    it("rejects empty enumerations", () => {
      expect(() => resolve({ type: "enum", values: {} })).toThrow(
        "enumeration has no members",
      );
    });
  });

  describe("records", () => {
    it("marks the owning record as recursive", () => {
      expect(resolve(Owner)).toMatchObject({
        kind: "record",
        origin: "Owner",
        recursive: true,
      });
    });

    it("resolves names through the owner's registry", () => {
      const registry = new RecordRegistry();
      const Tree: RecordType = defineRecord({
        name: "Tree",
        registry,
        fields: [{ name: "children", type: { type: "list", items: "Tree" } }],
      });
      const descriptor = resolveDescriptor(
        { type: "list", items: "Tree" },
        "children",
        { record: Tree, ordinal: 0 },
      );
      expect(descriptor.args[0]).toMatchObject({ kind: "record", recursive: true });
    });

    it("reports names that cannot be looked up", () => {
      expect(() => resolve("Missing")).toThrow(
        "Cannot resolve type Missing of field 'f': forward reference cannot be resolved: Owner has no registry",
      );
      const registry = new RecordRegistry();
      const Rooted = defineRecord({ name: "Rooted", registry, fields: [] });
      expect(() =>
        resolveDescriptor("Missing", "f", { record: Rooted, ordinal: 0 })
      ).toThrow(DescriptorResolutionError);
    });
  });

  describe("references", () => {
    it("resolves the referenced type", () => {
      expect(resolve({ type: "ref", get: () => "int" })).toMatchObject({
        kind: "primitive",
        origin: "int",
        index: 0,
      });
    });

    it("rejects references that never terminate", () => {
      const loop: TypeDecl = { type: "ref", get: () => loop };
      expect(() => resolve(loop)).toThrow(
        "Cannot resolve type ref of field 'f': reference chain does not terminate",
      );
    });
  });

  describe("annotations", () => {
    it("rejects structural metadata below the top level", () => {
      expect(() =>
        resolve({
          type: "list",
          items: { type: "annotated", base: "int", aliases: ["x"] },
        })
      ).toThrow(
        "Cannot resolve type annotated of field 'f': aliases, paths and skip conditions are only allowed on the field's own type",
      );
    });

    it("applies nested patterns to nested dates", () => {
      const descriptor = resolve({
        type: "list",
        items: { type: "annotated", base: "date", patterns: ["dd.MM.yyyy"] },
      });
      expect(descriptor.args[0]).toMatchObject({
        kind: "temporal",
        patterns: ["dd.MM.yyyy"],
      });
    });
  });
});

describe("resolveFieldType", () => {
  it("lifts top-level annotations off the declared type", () => {
    const field = new RecordField({
      name: "when",
      type: {
        type: "annotated",
        base: { type: "optional", of: "datetime" },
        aliases: ["at"],
        patterns: ["yyyy"],
      },
    });
    const { descriptor, annotations } = resolveFieldType(field, {
      record: Owner,
      ordinal: 0,
    });
    expect(annotations.aliases).toEqual(["at"]);
    expect(descriptor).toMatchObject({
      kind: "temporal",
      inOptional: true,
      patterns: ["yyyy"],
    });
  });

  it("lets outer annotations win", () => {
    const field = new RecordField({
      name: "n",
      type: {
        type: "annotated",
        dumpAlias: "outer",
        base: { type: "annotated", dumpAlias: "inner", path: "a.b", base: "int" },
      },
    });
    const { annotations } = resolveFieldType(field, { record: Owner, ordinal: 0 });
    expect(annotations.dumpAlias).toBe("outer");
    expect(annotations.path).toBe("a.b");
  });

  it("prefers field patterns over configured ones", () => {
    const field = new RecordField({ name: "d", type: "date", patterns: ["MM/dd"] });
    const { descriptor } = resolveFieldType(field, {
      record: Owner,
      ordinal: 0,
      patterns: ["dd.MM"],
    });
    expect(descriptor).toMatchObject({ patterns: ["MM/dd"] });
  });
});

import { describe, expect, it } from "vitest";
import { TypeRegistry } from "../type_registry.ts";
import type { CompileContext } from "../../compiler/context.ts";
import { mergeConfig } from "../../config/resolve_config.ts";
import type { CustomDescriptor } from "../../descriptors/descriptor.ts";
import { defineRecord } from "../../schemas/complex/record_type.ts";
import { TypeMismatchError, UnsupportedTypeError } from "../../schemas/error.ts";
import { asInt } from "../../utils/coercion.ts";

class Money {
  constructor(readonly cents: number) {}
}

class Unregistered {}

function customDescriptor(ctor: CustomDescriptor["ctor"], origin: string): CustomDescriptor {
  return { kind: "custom", origin, ctor, args: [], index: 0, ordinal: 0, inOptional: false };
}

function contextFor(types: TypeRegistry): CompileContext {
  const unused = (): never => {
    throw new Error("not used by these hooks");
  };
  return {
    record: defineRecord({ name: "Holder", fields: [] }),
    config: mergeConfig({}),
    field: "amount",
    types,
    loadOf: unused,
    dumpOf: unused,
    guardOf: unused,
    routineFor: unused,
    deferredRoutineFor: unused,
  };
}

describe("TypeRegistry", () => {
  describe("plain hooks", () => {
    const registry = new TypeRegistry();
    registry.register(Money, {
      load: (value) => new Money(asInt(value)),
      dump: (money) => money.cents,
    });
    const descriptor = customDescriptor(Money, "Money");
    const ctx = contextFor(registry);

    it("loads through the load transform", () => {
      const loaded = registry.compileLoad(descriptor, ctx)("250");
      expect(loaded).toBeInstanceOf(Money);
      expect(loaded).toEqual(new Money(250));
    });

    it("dumps instances through the dump transform", () => {
      expect(registry.compileDump(descriptor, ctx)(new Money(99))).toBe(99);
    });

    it("rejects values that are not instances on dump", () => {
      expect(() => registry.compileDump(descriptor, ctx)({ cents: 1 })).toThrow(
        TypeMismatchError,
      );
    });
  });

  describe("compile hooks", () => {
    it("builds fragments once from the context", () => {
      const registry = new TypeRegistry();
      let compiled = 0;
      registry.register(Money, {
        load: {
          compile: (_descriptor, ctx) => {
            compiled++;
            const field = ctx.field;
            return (value) => `${field}:${String(value)}`;
          },
        },
      });
      const load = registry.compileLoad(customDescriptor(Money, "Money"), contextFor(registry));
      expect(load(1)).toBe("amount:1");
      expect(load(2)).toBe("amount:2");
      expect(compiled).toBe(1);
    });
  });

  describe("missing hooks", () => {
    it("fails when a direction has no hook", () => {
      const registry = new TypeRegistry();
      registry.register(Money, { load: (value) => new Money(asInt(value)) });
      const dump = registry.compileDump(customDescriptor(Money, "Money"), contextFor(registry));
      expect(() => dump(new Money(1))).toThrow(
        "Unsupported type: Money (no dump hook registered)",
      );
    });

    it("fails at compile time for unregistered classes", () => {
      const registry = new TypeRegistry();
      expect(() =>
        registry.compileLoad(
          customDescriptor(Unregistered, "Unregistered"),
          contextFor(registry),
        )
      ).toThrow(UnsupportedTypeError);
    });

    it("forgets unregistered classes", () => {
      const registry = new TypeRegistry();
      registry.register(Money, {});
      expect(registry.has(Money)).toBe(true);
      expect(registry.unregister(Money)).toBe(true);
      expect(registry.has(Money)).toBe(false);
    });
  });
});

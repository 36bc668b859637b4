import type {
  EnumDescriptor,
  EnumMember,
  LiteralDescriptor,
} from "../../descriptors/descriptor.ts";
import type { LiteralValue } from "../../schemas/declared.ts";
import { TypeMismatchError } from "../../schemas/error.ts";
import type { KindHandler } from "../context.ts";

function describeMembers(members: readonly EnumMember[], byName: boolean): string {
  return members
    .map((member) => JSON.stringify(byName ? member.name : member.value))
    .join(", ");
}

/**
 * Enumerations, matched case-sensitively by member value, or by member
 * name when `enumByName` is set. In memory a member is its value.
 */
export const enumHandler: KindHandler<EnumDescriptor> = {
  emitLoad(descriptor, ctx) {
    const { members } = descriptor;
    const byName = ctx.config.enumByName;
    const lookup = new Map<unknown, string | number>(
      members.map((member): [unknown, string | number] => [
        byName ? member.name : member.value,
        member.value,
      ]),
    );
    const expected = `one of ${describeMembers(members, byName)}`;
    return (value) => {
      const member = lookup.get(value);
      if (member === undefined) {
        throw new TypeMismatchError(expected, value);
      }
      return member;
    };
  },

  emitDump(descriptor, ctx) {
    const { members } = descriptor;
    const byName = ctx.config.enumByName;
    const lookup = new Map<unknown, string | number>(
      members.map((member): [unknown, string | number] => [
        member.value,
        byName ? member.name : member.value,
      ]),
    );
    const expected = `one of ${describeMembers(members, false)}`;
    return (value) => {
      const dumped = lookup.get(value);
      if (dumped === undefined) {
        throw new TypeMismatchError(expected, value);
      }
      return dumped;
    };
  },

  emitGuard(descriptor) {
    const values = new Set<unknown>(descriptor.members.map((member) => member.value));
    return (value) => values.has(value);
  },
};

/**
 * Literal types: one of a fixed set of scalar values.
 */
export const literalHandler: KindHandler<LiteralDescriptor> = {
  emitLoad(descriptor) {
    return literalFragment(descriptor.values);
  },

  emitDump(descriptor) {
    return literalFragment(descriptor.values);
  },

  emitGuard(descriptor) {
    const values = new Set<unknown>(descriptor.values);
    return (value) => values.has(value);
  },
};

function literalFragment(values: readonly LiteralValue[]): (value: unknown) => LiteralValue {
  const expected = `one of ${values.map((value) => JSON.stringify(value)).join(", ")}`;
  return (value) => {
    const match = values.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new TypeMismatchError(expected, value);
    }
    return match;
  };
}

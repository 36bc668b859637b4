import type { SumDescriptor } from "../../descriptors/descriptor.ts";
import type { KindHandler } from "../context.ts";
import { UnionDispatcher } from "../union_dispatcher.ts";

/**
 * Sum types, dispatched by {@link UnionDispatcher}.
 */
export const sumHandler: KindHandler<SumDescriptor> = {
  emitLoad(descriptor, ctx) {
    return new UnionDispatcher(descriptor, ctx).loader();
  },

  emitDump(descriptor, ctx) {
    return new UnionDispatcher(descriptor, ctx).dumper();
  },

  emitGuard(descriptor, ctx) {
    return new UnionDispatcher(descriptor, ctx).guard();
  },
};

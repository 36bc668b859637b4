import type { CustomDescriptor } from "../../descriptors/descriptor.ts";
import type { KindHandler } from "../context.ts";

/**
 * Classes handled by hooks from the extension registry.
 */
export const extensionHandler: KindHandler<CustomDescriptor> = {
  emitLoad(descriptor, ctx) {
    return ctx.types.compileLoad(descriptor, ctx);
  },

  emitDump(descriptor, ctx) {
    return ctx.types.compileDump(descriptor, ctx);
  },

  emitGuard(descriptor) {
    const { ctor } = descriptor;
    return (value) => value instanceof ctor;
  },
};

import { FieldVectorArg, OperatorArg } from "./lfric-args.js";
import type { LfricKernelMetadata } from "./lfric-kernel.js";

/**
 * Maps kernel-argument positions to indices into `meta_args`. Position 0 is
 * the mesh height; an operator's cell count precedes its data and is not
 * mapped.
 */
export function argIndexToMetadataIndex(metadata: LfricKernelMetadata): ReadonlyMap<number, number> {
  const out = new Map<number, number>();
  let position = 1;
  metadata.metaArgs.forEach((arg, index) => {
    if (arg instanceof OperatorArg) {
      position++;
      out.set(position++, index);
      return;
    }
    const count = arg instanceof FieldVectorArg ? Number(arg.vectorLength ?? "1") : 1;
    for (let i = 0; i < count; i++) out.set(position++, index);
  });
  return out;
}

import { Reference } from "../ir/data.js";
import type { Loop } from "../ir/statements.js";
import { VariablesAccessInfo } from "./access-info.js";
import type { SingleVariableAccessInfo } from "./access-info.js";

export type ParallelisationResult = {
  readonly ok: boolean;
  readonly messages: readonly string[];
};

/** Dimensions in which an access uses exactly the loop variable. */
function loopVariableDimensions(v: SingleVariableAccessInfo, index: number, loopVariable: string): Set<number> {
  const out = new Set<number>();
  const access = v.accesses[index];
  if (!access?.indices) return out;
  access.indices.forEach((expr, d) => {
    if (expr instanceof Reference && expr.children.length === 0 && expr.name.toLowerCase() === loopVariable) {
      out.add(d);
    }
  });
  return out;
}

/**
 * Decides whether the iterations of `loop` are independent. Every message
 * names a variable that carries a dependency between iterations.
 */
export class DependencyTools {
  canLoopBeParallelised(loop: Loop): ParallelisationResult {
    const loopVariable = loop.variable.name.toLowerCase();
    const info = new VariablesAccessInfo(loop.loopBody);
    const messages: string[] = [];

    for (const v of info.variables) {
      if (v.name.toLowerCase() === loopVariable) {
        if (v.isWritten()) messages.push(`The loop variable '${v.name}' is written inside the loop body.`);
        continue;
      }
      if (!v.isWritten()) continue;

      if (v.isArray()) {
        let common: Set<number> | null = null;
        for (let i = 0; i < v.accesses.length; i++) {
          const dims = loopVariableDimensions(v, i, loopVariable);
          common = common === null ? dims : new Set([...common].filter((d: number) => dims.has(d)));
        }
        if (common === null || common.size === 0) {
          messages.push(
            `Variable '${v.name}' is written to and the loop variable '${loop.variable.name}' is not used in the same dimension of every access.`
          );
        }
        continue;
      }

      if (v.firstAccess().accessType !== "write") {
        messages.push(`Variable '${v.name}' is read first, which indicates a reduction.`);
      }
    }
    return { ok: messages.length === 0, messages };
  }
}

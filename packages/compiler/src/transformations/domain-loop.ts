import { TransformationError } from "../errors.js";
import { DomainLoop, KernelMarker } from "../ir/domain.js";
import type { Node } from "../ir/node.js";
import { Container, FileContainer, Routine } from "../ir/scopes.js";
import type { Schedule } from "../ir/scopes.js";
import { Call, CodeBlock, Loop } from "../ir/statements.js";
import { Transformation, takeStatements } from "./transformation.js";

/** NEMO loop-variable names and the grid dimension each one iterates over. */
export const DEFAULT_LOOP_TYPES: Readonly<Record<string, string>> = Object.freeze({
  ji: "lon",
  jj: "lat",
  jk: "levels",
  jt: "tracers",
});

export const UNKNOWN_LOOP_TYPE = "unknown";

export type DomainLoopOptions = {
  readonly loopTypes?: Readonly<Record<string, string>>;
};

/** A loop body that is a single kernel: straight-line code with no loops, calls or unparsed code. */
function isBareKernelRegion(body: Schedule): boolean {
  const statements = body.statements;
  if (statements.length === 0) return false;
  if (statements.some((s) => s instanceof KernelMarker || s instanceof Loop || s instanceof CodeBlock || s instanceof Call)) {
    return false;
  }
  return body.walk(Loop).length === 0 && body.walk(CodeBlock).length === 0 && body.walk(Call).length === 0;
}

function markerNames(loop: Node): { name: string; moduleName: string } {
  const routine = loop.ancestor(Routine);
  if (!routine) return { name: "unknown-kernel", moduleName: "unknown-module" };
  const container = routine.ancestor(Container);
  const moduleName = container && !(container instanceof FileContainer) ? container.name : routine.name;
  return { name: routine.name, moduleName };
}

/**
 * Turns every generic loop under the target into a `DomainLoop`, innermost
 * loops first, and marks bare kernel bodies with a `KernelMarker`.
 */
export class DomainLoopTrans extends Transformation<Node, DomainLoopOptions, Node, Readonly<Record<string, string>>> {
  readonly name = "DomainLoopTrans";

  validate(_target: Node, options: DomainLoopOptions = {}): Readonly<Record<string, string>> {
    const loopTypes = options.loopTypes ?? DEFAULT_LOOP_TYPES;
    for (const [variable, loopType] of Object.entries(loopTypes)) {
      if (typeof loopType !== "string" || loopType.length === 0) {
        throw new TransformationError(
          "GW5005",
          `The loop type for variable '${variable}' must be a non-empty string.`
        );
      }
    }
    const out: Record<string, string> = {};
    for (const [variable, loopType] of Object.entries(loopTypes)) out[variable.toLowerCase()] = loopType;
    return out;
  }

  protected transform(target: Node, loopTypes: Readonly<Record<string, string>>): Node {
    const loops = (target instanceof Loop ? [target, ...target.walk(Loop)] : target.walk(Loop)).reverse();
    let root = target;
    for (const loop of loops) {
      if (loop instanceof DomainLoop) continue;
      const loopType = loopTypes[loop.variable.name.toLowerCase()] ?? UNKNOWN_LOOP_TYPE;
      const domain = DomainLoop.fromLoop(loop, loopType);
      if (loop.parent) loop.replaceWith(domain);
      if (loop === target) root = domain;

      const body = domain.loopBody;
      if (isBareKernelRegion(body)) {
        const { name, moduleName } = markerNames(domain);
        body.addChild(KernelMarker.create(name, moduleName, takeStatements(body)));
      }
    }
    return root;
  }
}

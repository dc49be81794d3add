import { VariablesAccessInfo } from "../analysis/access-info.js";
import { TransformationError } from "../errors.js";
import { Statement } from "../ir/node.js";
import type { Node } from "../ir/node.js";
import { Transformation, statementRange } from "./transformation.js";

export type MoveOptions = {
  readonly target: Statement;
  readonly position?: "before" | "after";
};

type MovePlan = {
  readonly node: Statement;
  readonly target: Statement;
  readonly after: boolean;
};

/** The first variable that both nodes access where at least one access is a write. */
function conflict(a: VariablesAccessInfo, b: Node): string | null {
  const other = new VariablesAccessInfo(b);
  for (const v of a.variables) {
    const w = other.get(v.name);
    if (w && (v.isWritten() || w.isWritten())) return v.name;
  }
  return null;
}

/** Moves a statement before or after a sibling, if no statement it passes over depends on it. */
export class MoveTrans extends Transformation<Node, MoveOptions, Statement, MovePlan> {
  readonly name = "MoveTrans";

  validate(node: Node, options?: MoveOptions): MovePlan {
    if (!(node instanceof Statement)) {
      throw new TransformationError("GW5001", `${this.name} can only move a statement, but found '${node.nodeName}'.`);
    }
    if (options === undefined || !(options.target instanceof Statement)) {
      throw new TransformationError("GW5005", `${this.name} needs a 'target' statement to move the node next to.`);
    }
    const position = options.position ?? "before";
    if (position !== "before" && position !== "after") {
      throw new TransformationError("GW5005", `${this.name} option 'position' must be 'before' or 'after', but found '${String(position)}'.`);
    }
    const { target } = options;
    statementRange(this.name, node);
    if (target === node || target.parent !== node.parent) {
      throw new TransformationError("GW5002", `${this.name} can only move a node next to a different statement in the same schedule.`);
    }

    const from = node.position;
    const to = target.position;
    const after = position === "after";
    // Siblings the node passes over on its way to the new position.
    const [lo, hi] = from < to ? [from + 1, after ? to : to - 1] : [after ? to + 1 : to, from - 1];
    const siblings = node.parent?.children ?? [];
    const moved = new VariablesAccessInfo(node);
    for (let i = lo; i <= hi; i++) {
      const s = siblings[i];
      if (s === undefined) continue;
      const name = conflict(moved, s);
      if (name !== null) {
        throw new TransformationError(
          "GW5004",
          `Cannot move the ${node.nodeName} ${position} the target as it would cross a ${s.nodeName} that also accesses '${name}'.`
        );
      }
    }
    return { node, target, after };
  }

  protected transform(_node: Node, plan: MovePlan): Statement {
    const parent = plan.target.parent;
    if (!parent) throw new TransformationError("GW5002", `${this.name} target has no parent.`);
    plan.node.detach();
    parent.addChild(plan.node, plan.target.position + (plan.after ? 1 : 0));
    return plan.node;
  }
}

import { TangentLinearError } from "../errors.js";
import type { Node, Statement } from "../ir/node.js";
import { Routine } from "../ir/scopes.js";
import { Assignment } from "../ir/statements.js";
import type { DataSymbol } from "../symbols/symbols.js";
import { AssignmentTrans } from "./adjoint-assignment.js";
import { Transformation, takeStatements } from "./transformation.js";

type RoutinePlan = {
  readonly routine: Routine;
  readonly assignments: readonly Assignment[];
};

/**
 * Adjoint of a straight-line tangent-linear routine: the statements run in
 * reverse order and each assignment is replaced by its adjoint.
 */
export class AdjointRoutineTrans extends Transformation<Node, Record<string, never>, Routine, RoutinePlan> {
  readonly name = "AdjointRoutineTrans";
  readonly #assignment: AssignmentTrans;

  constructor(active: readonly DataSymbol[]) {
    super();
    this.#assignment = new AssignmentTrans(active);
  }

  get active(): readonly DataSymbol[] {
    return this.#assignment.active;
  }

  validate(node: Node): RoutinePlan {
    if (!(node instanceof Routine)) {
      throw new TangentLinearError("GW5107", `${this.name} expects a Routine, but found '${node.nodeName}'.`);
    }
    const assignments: Assignment[] = [];
    for (const s of node.statements) {
      if (!(s instanceof Assignment)) {
        throw new TangentLinearError(
          "GW5107",
          `${this.name} only supports routines made of assignments, but '${node.name}' contains a ${s.nodeName}.`
        );
      }
      this.#assignment.validate(s);
      assignments.push(s);
    }
    return { routine: node, assignments };
  }

  protected transform(_node: Node, plan: RoutinePlan): Routine {
    const { routine } = plan;
    const reversed: Statement[] = takeStatements(routine).reverse();
    reversed.forEach((s) => routine.addChild(s));
    for (const a of [...plan.assignments].reverse()) this.#assignment.apply(a);
    return routine;
  }
}

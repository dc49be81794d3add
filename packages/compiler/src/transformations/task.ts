import { computeTaskClauses } from "../analysis/task-clauses.js";
import { TransformationError } from "../errors.js";
import { TaskDirective } from "../ir/directives.js";
import type { TaskClauses } from "../ir/directives.js";
import type { Node } from "../ir/node.js";
import { Loop } from "../ir/statements.js";
import { Transformation, statementRange, wrapStatements } from "./transformation.js";

type TaskPlan = {
  readonly loop: Loop;
  readonly clauses: TaskClauses;
};

/**
 * Wraps a loop in an OpenMP task. The data-sharing and depend clauses are
 * worked out in `validate`, before anything moves.
 */
export class TaskTrans extends Transformation<Node, Record<string, never>, TaskDirective, TaskPlan> {
  readonly name = "TaskTrans";

  validate(target: Node): TaskPlan {
    if (!(target instanceof Loop)) {
      throw new TransformationError("GW5001", `${this.name} can only be applied to a Loop, but found '${target.nodeName}'.`);
    }
    statementRange(this.name, target);
    return { loop: target, clauses: computeTaskClauses(target) };
  }

  protected transform(_target: Node, plan: TaskPlan): TaskDirective {
    return wrapStatements([plan.loop], (body) => TaskDirective.create(body, plan.clauses));
  }
}

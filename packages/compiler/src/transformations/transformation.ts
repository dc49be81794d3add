import { TransformationError } from "../errors.js";
import { Node, Statement } from "../ir/node.js";
import { Routine, Schedule } from "../ir/scopes.js";

/**
 * A rewrite of the IR. `validate` runs every check and returns what `apply`
 * needs, so a failed check never leaves a partly rewritten tree behind.
 */
export abstract class Transformation<Target, Options = Record<string, never>, Result = void, Plan = void> {
  abstract readonly name: string;

  abstract validate(target: Target, options?: Options): Plan;

  protected abstract transform(target: Target, plan: Plan, options?: Options): Result;

  apply(target: Target, options?: Options): Result {
    const plan = this.validate(target, options);
    return this.transform(target, plan, options);
  }

  toString(): string {
    return this.name;
  }
}

export type StatementRange = Statement | readonly Statement[];

export type NonEmptyStatements = [Statement, ...Statement[]];

/**
 * Normalises a transformation target to a list of consecutive siblings in one
 * schedule, in schedule order.
 */
export function statementRange(transformation: string, target: StatementRange): NonEmptyStatements {
  const nodes = target instanceof Node ? [target] : [...target];
  const [first] = nodes;
  if (first === undefined) {
    throw new TransformationError("GW5002", `${transformation} needs at least one node to apply to.`);
  }
  const parent = first.parent;
  if (!(parent instanceof Schedule)) {
    throw new TransformationError(
      "GW5002",
      `${transformation} can only be applied to statements inside a schedule, but '${first.nodeName}' has ${parent ? `a '${parent.nodeName}'` : "no"} parent.`
    );
  }
  if (nodes.some((n) => n.parent !== parent)) {
    throw new TransformationError("GW5002", `${transformation} requires every node in the range to have the same parent.`);
  }
  const [head, ...rest] = [...nodes].sort((a, b) => a.position - b.position);
  if (head === undefined) throw new TransformationError("GW5002", `${transformation} needs at least one node to apply to.`);
  rest.forEach((n, i) => {
    if (n.position !== head.position + i + 1) {
      throw new TransformationError("GW5002", `${transformation} requires the nodes in the range to be consecutive siblings.`);
    }
  });
  return [head, ...rest];
}

/** Moves `statements` out of their schedule and puts `wrapper` in their place. */
export function wrapStatements<T extends Statement>(statements: readonly Statement[], build: (body: Statement[]) => T): T {
  const [first] = statements;
  const parent = first?.parent;
  if (first === undefined || !parent) {
    throw new TransformationError("GW5002", "Cannot wrap an empty or detached range of statements.");
  }
  const at = first.position;
  const body = statements.map((s) => s.detach());
  const wrapper = build(body);
  parent.addChild(wrapper, at);
  return wrapper;
}

export function enclosingRoutine(transformation: string, node: Node): Routine {
  const routine = node.ancestor(Routine, { includeSelf: true });
  if (!routine) {
    throw new TransformationError("GW5001", `${transformation} must be applied to nodes inside a routine.`);
  }
  return routine;
}

/** Moves every statement out of `schedule`, leaving it empty. */
export function takeStatements(schedule: Schedule): Statement[] {
  return schedule.popAllChildren().filter((n): n is Statement => n instanceof Statement);
}

import { DependencyTools } from "../analysis/dependency-tools.js";
import { TransformationError } from "../errors.js";
import { ParallelDirective, ParallelLoopDirective, SingleDirective } from "../ir/directives.js";
import type { Node, Statement } from "../ir/node.js";
import { Loop } from "../ir/statements.js";
import { Transformation, statementRange, wrapStatements } from "./transformation.js";
import type { NonEmptyStatements, StatementRange } from "./transformation.js";

function insideParallel(node: Node): boolean {
  return node.ancestor(ParallelDirective) !== null || node.ancestor(ParallelLoopDirective) !== null;
}

function containsParallel(statements: readonly Statement[]): boolean {
  return statements.some(
    (s) =>
      s instanceof ParallelDirective ||
      s instanceof ParallelLoopDirective ||
      s.walk(ParallelDirective).length > 0 ||
      s.walk(ParallelLoopDirective).length > 0
  );
}

/** Wraps consecutive statements in `!$omp parallel`. Parallel regions do not nest. */
export class ParallelTrans extends Transformation<StatementRange, Record<string, never>, ParallelDirective, NonEmptyStatements> {
  readonly name = "ParallelTrans";

  validate(target: StatementRange): NonEmptyStatements {
    const statements = statementRange(this.name, target);
    if (insideParallel(statements[0]) || containsParallel(statements)) {
      throw new TransformationError("GW5001", `${this.name} cannot create a parallel region inside another parallel region.`);
    }
    return statements;
  }

  protected transform(_target: StatementRange, statements: NonEmptyStatements): ParallelDirective {
    return wrapStatements(statements, (body) => ParallelDirective.create(body));
  }
}

export type SingleOptions = {
  readonly nowait?: boolean;
};

/** Wraps consecutive statements of a parallel region in `!$omp single`. */
export class SingleTrans extends Transformation<StatementRange, SingleOptions, SingleDirective, NonEmptyStatements> {
  readonly name = "SingleTrans";

  validate(target: StatementRange, options: SingleOptions = {}): NonEmptyStatements {
    if (options.nowait !== undefined && typeof options.nowait !== "boolean") {
      throw new TransformationError("GW5005", `${this.name} option 'nowait' must be a boolean.`);
    }
    const statements = statementRange(this.name, target);
    const [first] = statements;
    if (first.ancestor(ParallelDirective) === null) {
      throw new TransformationError("GW5001", `${this.name} must be applied to statements inside a parallel region.`);
    }
    if (first.ancestor(SingleDirective) !== null || statements.some((s) => s instanceof SingleDirective || s.walk(SingleDirective).length > 0)) {
      throw new TransformationError("GW5001", `${this.name} cannot create a single region inside another single region.`);
    }
    return statements;
  }

  protected transform(_target: StatementRange, statements: NonEmptyStatements, options: SingleOptions = {}): SingleDirective {
    return wrapStatements(statements, (body) => SingleDirective.create(body, options.nowait ?? false));
  }
}

/**
 * Turns a loop into `!$omp parallel do`. The loop must carry no dependency
 * between iterations.
 */
export class ParallelLoopTrans extends Transformation<Node, Record<string, never>, ParallelLoopDirective, Loop> {
  readonly name = "ParallelLoopTrans";
  readonly #dependencies = new DependencyTools();

  validate(target: Node): Loop {
    if (!(target instanceof Loop)) {
      throw new TransformationError("GW5001", `${this.name} can only be applied to a Loop, but found '${target.nodeName}'.`);
    }
    statementRange(this.name, target);
    if (insideParallel(target)) {
      throw new TransformationError("GW5001", `${this.name} cannot be applied to a loop that is already inside a parallel region.`);
    }
    const result = this.#dependencies.canLoopBeParallelised(target);
    if (!result.ok) {
      throw new TransformationError(
        "GW5003",
        `${this.name} cannot parallelise the loop over '${target.variable.name}': ${result.messages.join(" ")}`
      );
    }
    return target;
  }

  protected transform(_target: Node, loop: Loop): ParallelLoopDirective {
    return wrapStatements([loop], (body) => ParallelLoopDirective.create(body));
  }
}

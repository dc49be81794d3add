import { InternalError } from "../errors.js";
import { Reference } from "./data.js";
import { DataNode, Node, Statement } from "./node.js";
import { Schedule } from "./scopes.js";

export abstract class Clause extends Node {
  abstract readonly clauseName: string;

  get items(): readonly DataNode[] {
    return this.children.filter((c): c is DataNode => c instanceof DataNode);
  }
}

export abstract class ReferenceListClause extends Clause {
  readonly childrenFormat = "[Reference]*";

  protected validChild(_position: number, child: Node): boolean {
    return child instanceof Reference && child.children.length === 0;
  }

  get references(): readonly Reference[] {
    return this.children.filter((c): c is Reference => c instanceof Reference);
  }
}

export class PrivateClause extends ReferenceListClause {
  readonly nodeName: string = "PrivateClause";
  readonly clauseName = "private";

  static create(refs: readonly Reference[]): PrivateClause {
    const c = new PrivateClause();
    c.addChildren(refs);
    return c;
  }

  protected cloneShallow(): PrivateClause {
    return new PrivateClause();
  }
}

export class FirstPrivateClause extends ReferenceListClause {
  readonly nodeName: string = "FirstPrivateClause";
  readonly clauseName = "firstprivate";

  static create(refs: readonly Reference[]): FirstPrivateClause {
    const c = new FirstPrivateClause();
    c.addChildren(refs);
    return c;
  }

  protected cloneShallow(): FirstPrivateClause {
    return new FirstPrivateClause();
  }
}

export class SharedClause extends ReferenceListClause {
  readonly nodeName: string = "SharedClause";
  readonly clauseName = "shared";

  static create(refs: readonly Reference[]): SharedClause {
    const c = new SharedClause();
    c.addChildren(refs);
    return c;
  }

  protected cloneShallow(): SharedClause {
    return new SharedClause();
  }
}

export type DependKind = "in" | "out";

export class DependClause extends Clause {
  readonly nodeName: string = "DependClause";
  readonly childrenFormat = "[Reference]*";
  readonly clauseName = "depend";
  readonly kind: DependKind;

  constructor(kind: DependKind) {
    super();
    this.kind = kind;
  }

  static create(kind: DependKind, refs: readonly Reference[]): DependClause {
    const c = new DependClause(kind);
    c.addChildren(refs);
    return c;
  }

  protected validChild(_position: number, child: Node): boolean {
    return child instanceof Reference;
  }

  protected cloneShallow(): DependClause {
    return new DependClause(this.kind);
  }

  protected override sameAttributes(other: Node): boolean {
    return other instanceof DependClause && other.kind === this.kind;
  }
}

/** A directive whose first child is the body it applies to. */
export abstract class RegionDirective extends Statement {
  get dirBody(): Schedule {
    const c = this.children[0];
    if (!(c instanceof Schedule)) {
      throw new InternalError("GW9002", `'${this.nodeName}' is incomplete: missing its body.`);
    }
    return c;
  }

  get clauses(): readonly Clause[] {
    return this.children.filter((c): c is Clause => c instanceof Clause);
  }

  protected validChild(position: number, child: Node): boolean {
    if (position === 0) return child instanceof Schedule;
    return this.validClause(position, child);
  }

  protected validClause(_position: number, _child: Node): boolean {
    return false;
  }

  protected fill<T extends RegionDirective>(this: T, body: readonly Statement[]): T {
    const schedule = new Schedule();
    for (const s of body) schedule.addChild(s);
    this.addChild(schedule);
    return this;
  }
}

/** `!$omp parallel`; the private list is derived from the body when written. */
export class ParallelDirective extends RegionDirective {
  readonly nodeName: string = "ParallelDirective";
  readonly childrenFormat = "Schedule";

  static create(body: readonly Statement[]): ParallelDirective {
    return new ParallelDirective().fill(body);
  }

  protected cloneShallow(): ParallelDirective {
    return new ParallelDirective();
  }
}

export class SingleDirective extends RegionDirective {
  readonly nodeName: string = "SingleDirective";
  readonly childrenFormat = "Schedule";
  readonly nowait: boolean;

  constructor(nowait = false) {
    super();
    this.nowait = nowait;
  }

  static create(body: readonly Statement[], nowait = false): SingleDirective {
    return new SingleDirective(nowait).fill(body);
  }

  protected cloneShallow(): SingleDirective {
    return new SingleDirective(this.nowait);
  }

  protected override sameAttributes(other: Node): boolean {
    return other instanceof SingleDirective && other.nowait === this.nowait;
  }
}

/** `!$omp parallel do` around a single loop. */
export class ParallelLoopDirective extends RegionDirective {
  readonly nodeName: string = "ParallelLoopDirective";
  readonly childrenFormat = "Schedule";

  static create(body: readonly Statement[]): ParallelLoopDirective {
    return new ParallelLoopDirective().fill(body);
  }

  protected cloneShallow(): ParallelLoopDirective {
    return new ParallelLoopDirective();
  }
}

export type TaskClauses = {
  readonly private: readonly Reference[];
  readonly firstprivate: readonly Reference[];
  readonly shared: readonly Reference[];
  readonly dependIn: readonly Reference[];
  readonly dependOut: readonly Reference[];
};

export class TaskDirective extends RegionDirective {
  readonly nodeName: string = "TaskDirective";
  readonly childrenFormat =
    "Schedule, PrivateClause, FirstPrivateClause, SharedClause, DependClause(in), DependClause(out)";

  static create(body: readonly Statement[], clauses: TaskClauses): TaskDirective {
    const task = new TaskDirective().fill(body);
    task.addChild(PrivateClause.create(clauses.private));
    task.addChild(FirstPrivateClause.create(clauses.firstprivate));
    task.addChild(SharedClause.create(clauses.shared));
    task.addChild(DependClause.create("in", clauses.dependIn));
    task.addChild(DependClause.create("out", clauses.dependOut));
    return task;
  }

  protected override validClause(position: number, child: Node): boolean {
    switch (position) {
      case 1:
        return child instanceof PrivateClause;
      case 2:
        return child instanceof FirstPrivateClause;
      case 3:
        return child instanceof SharedClause;
      case 4:
        return child instanceof DependClause && child.kind === "in";
      case 5:
        return child instanceof DependClause && child.kind === "out";
      default:
        return false;
    }
  }

  #clause<T extends Clause>(position: number, kind: abstract new (...args: never[]) => T): T {
    const c = this.children[position];
    if (!(c instanceof kind)) {
      throw new InternalError("GW9002", `TaskDirective is missing its clause at position ${position}.`);
    }
    return c;
  }

  get privateClause(): PrivateClause {
    return this.#clause(1, PrivateClause);
  }

  get firstPrivateClause(): FirstPrivateClause {
    return this.#clause(2, FirstPrivateClause);
  }

  get sharedClause(): SharedClause {
    return this.#clause(3, SharedClause);
  }

  get dependIn(): DependClause {
    return this.#clause(4, DependClause);
  }

  get dependOut(): DependClause {
    return this.#clause(5, DependClause);
  }

  protected cloneShallow(): TaskDirective {
    return new TaskDirective();
  }
}

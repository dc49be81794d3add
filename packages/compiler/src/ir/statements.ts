import { GenerationError, InternalError } from "../errors.js";
import { DataSymbol, RoutineSymbol } from "../symbols/symbols.js";
import type { AnySymbol } from "../symbols/symbols.js";
import { ArrayReference, Reference } from "./data.js";
import { DataNode, Node, Statement } from "./node.js";
import { Schedule } from "./scopes.js";

function childAt<T extends Node>(node: Node, index: number, kind: abstract new (...args: never[]) => T, what: string): T {
  const c = node.children[index];
  if (!(c instanceof kind)) {
    throw new InternalError("GW9002", `'${node.nodeName}' is incomplete: missing its ${what}.`);
  }
  return c;
}

export class Assignment extends Statement {
  readonly nodeName: string = "Assignment";
  readonly childrenFormat = "DataNode, DataNode";

  static create(lhs: Reference, rhs: DataNode): Assignment {
    const a = new Assignment();
    a.addChild(lhs);
    a.addChild(rhs);
    return a;
  }

  get lhs(): Reference {
    return childAt(this, 0, Reference, "left-hand side");
  }

  get rhs(): DataNode {
    return childAt(this, 1, DataNode, "right-hand side");
  }

  get isArrayAssignment(): boolean {
    const lhs = this.lhs;
    return lhs instanceof ArrayReference && lhs.children.some((_, i) => lhs.isFullRange(i));
  }

  protected validChild(position: number, child: Node): boolean {
    if (position === 0) return child instanceof Reference;
    return position === 1 && child instanceof DataNode;
  }

  protected cloneShallow(): Assignment {
    return new Assignment();
  }

  override copy(): Assignment {
    return this.copyInto(this.cloneShallow());
  }
}

/** Counted `do` loop. */
export class Loop extends Statement {
  readonly nodeName: string = "Loop";
  readonly childrenFormat = "DataNode, DataNode, DataNode, Schedule";
  variable: DataSymbol;

  constructor(variable: DataSymbol) {
    super();
    if (!variable.isScalar && !variable.isDeferred) {
      throw new GenerationError(
        "GW2006",
        `The loop variable '${variable.name}' must be a scalar or of deferred type.`
      );
    }
    this.variable = variable;
  }

  static create(
    variable: DataSymbol,
    start: DataNode,
    stop: DataNode,
    step: DataNode,
    body: readonly Statement[]
  ): Loop {
    return Loop.populate(new Loop(variable), start, stop, step, body);
  }

  protected static populate<T extends Loop>(
    loop: T,
    start: DataNode,
    stop: DataNode,
    step: DataNode,
    body: readonly Statement[]
  ): T {
    loop.addChild(start);
    loop.addChild(stop);
    loop.addChild(step);
    const schedule = new Schedule();
    for (const s of body) schedule.addChild(s);
    loop.addChild(schedule);
    return loop;
  }

  get start(): DataNode {
    return childAt(this, 0, DataNode, "start expression");
  }

  get stop(): DataNode {
    return childAt(this, 1, DataNode, "stop expression");
  }

  get step(): DataNode {
    return childAt(this, 2, DataNode, "step expression");
  }

  get loopBody(): Schedule {
    return childAt(this, 3, Schedule, "body");
  }

  protected validChild(position: number, child: Node): boolean {
    if (position < 3) return child instanceof DataNode;
    return position === 3 && child instanceof Schedule;
  }

  protected cloneShallow(): Loop {
    return new Loop(this.variable);
  }

  override copy(): Loop {
    return this.copyInto(this.cloneShallow());
  }

  override replaceSymbols(mapping: ReadonlyMap<AnySymbol, AnySymbol>): void {
    const next = mapping.get(this.variable);
    if (next instanceof DataSymbol) this.variable = next;
  }

  protected override sameAttributes(other: Node): boolean {
    return other instanceof Loop && other.variable === this.variable;
  }

  override toString(): string {
    return `${this.nodeName}[variable:'${this.variable.name}']`;
  }
}

export class IfBlock extends Statement {
  readonly nodeName: string = "IfBlock";
  readonly childrenFormat = "DataNode, Schedule [, Schedule]";
  /** Set on an `IfBlock` that was written as `else if` in its parent's else branch. */
  wasElseIf = false;

  static create(condition: DataNode, ifBody: readonly Statement[], elseBody?: readonly Statement[]): IfBlock {
    const node = new IfBlock();
    node.addChild(condition);
    const then = new Schedule();
    for (const s of ifBody) then.addChild(s);
    node.addChild(then);
    if (elseBody !== undefined) {
      const other = new Schedule();
      for (const s of elseBody) other.addChild(s);
      node.addChild(other);
    }
    return node;
  }

  get condition(): DataNode {
    return childAt(this, 0, DataNode, "condition");
  }

  get ifBody(): Schedule {
    return childAt(this, 1, Schedule, "if body");
  }

  get elseBody(): Schedule | null {
    const c = this.children[2];
    return c instanceof Schedule ? c : null;
  }

  protected validChild(position: number, child: Node): boolean {
    if (position === 0) return child instanceof DataNode;
    return (position === 1 || position === 2) && child instanceof Schedule;
  }

  protected cloneShallow(): IfBlock {
    const n = new IfBlock();
    n.wasElseIf = this.wasElseIf;
    return n;
  }

  override copy(): IfBlock {
    return this.copyInto(this.cloneShallow());
  }
}

export class Call extends Statement {
  readonly nodeName: string = "Call";
  readonly childrenFormat = "[DataNode]*";
  routine: RoutineSymbol;

  constructor(routine: RoutineSymbol) {
    super();
    this.routine = routine;
  }

  static create(routine: RoutineSymbol, args: readonly DataNode[]): Call {
    const c = new Call(routine);
    for (const a of args) c.addChild(a);
    return c;
  }

  get arguments(): readonly DataNode[] {
    return this.children.map((_, i) => childAt(this, i, DataNode, `argument ${i}`));
  }

  protected validChild(_position: number, child: Node): boolean {
    return child instanceof DataNode;
  }

  protected cloneShallow(): Call {
    return new Call(this.routine);
  }

  override copy(): Call {
    return this.copyInto(this.cloneShallow());
  }

  override replaceSymbols(mapping: ReadonlyMap<AnySymbol, AnySymbol>): void {
    const next = mapping.get(this.routine);
    if (next instanceof RoutineSymbol) this.routine = next;
  }

  protected override sameAttributes(other: Node): boolean {
    return other instanceof Call && other.routine.name.toLowerCase() === this.routine.name.toLowerCase();
  }

  override toString(): string {
    return `Call[name:'${this.routine.name}']`;
  }
}

/** Source the reader could not model; written back verbatim. */
export class CodeBlock extends Statement {
  readonly nodeName: string = "CodeBlock";
  readonly childrenFormat = "<LeafNode>";
  readonly lines: readonly string[];

  constructor(lines: readonly string[]) {
    super();
    this.lines = Object.freeze([...lines]);
  }

  protected validChild(): boolean {
    return false;
  }

  protected cloneShallow(): CodeBlock {
    return new CodeBlock(this.lines);
  }

  override copy(): CodeBlock {
    return this.copyInto(this.cloneShallow());
  }

  protected override sameAttributes(other: Node): boolean {
    return other instanceof CodeBlock && other.lines.join("\n") === this.lines.join("\n");
  }
}

import { InternalError } from "../errors.js";
import type { DataSymbol } from "../symbols/symbols.js";
import { DataNode, Node, Statement } from "./node.js";
import { Schedule } from "./scopes.js";
import { Loop } from "./statements.js";

/** Loop over one dimension of the model grid. */
export class DomainLoop extends Loop {
  override readonly nodeName: string = "DomainLoop";
  loopType: string;

  constructor(variable: DataSymbol, loopType: string) {
    super(variable);
    this.loopType = loopType;
  }

  /** Moves the children of `loop` into a new DomainLoop. `loop` is left empty. */
  static fromLoop(loop: Loop, loopType: string): DomainLoop {
    const out = new DomainLoop(loop.variable, loopType);
    out.addChildren(loop.popAllChildren());
    return out;
  }

  static createDomainLoop(
    variable: DataSymbol,
    loopType: string,
    start: DataNode,
    stop: DataNode,
    step: DataNode,
    body: readonly Statement[]
  ): DomainLoop {
    return DomainLoop.populate(new DomainLoop(variable, loopType), start, stop, step, body);
  }

  protected override cloneShallow(): DomainLoop {
    return new DomainLoop(this.variable, this.loopType);
  }

  override copy(): DomainLoop {
    return this.copyInto(this.cloneShallow());
  }

  protected override sameAttributes(other: Node): boolean {
    return super.sameAttributes(other) && other instanceof DomainLoop && other.loopType === this.loopType;
  }

  override toString(): string {
    return `DomainLoop[variable:'${this.variable.name}', loop_type:'${this.loopType}']`;
  }
}

/** Marks the body of the innermost domain loop as one kernel invocation. */
export class KernelMarker extends Statement {
  readonly nodeName: string = "KernelMarker";
  readonly childrenFormat = "Schedule";
  readonly name: string;
  readonly moduleName: string;

  constructor(name: string, moduleName: string) {
    super();
    this.name = name;
    this.moduleName = moduleName;
  }

  static create(name: string, moduleName: string, body: readonly Statement[]): KernelMarker {
    const k = new KernelMarker(name, moduleName);
    const schedule = new Schedule();
    for (const s of body) schedule.addChild(s);
    k.addChild(schedule);
    return k;
  }

  get body(): Schedule {
    const c = this.children[0];
    if (!(c instanceof Schedule)) {
      throw new InternalError("GW9002", "KernelMarker is incomplete: missing its body.");
    }
    return c;
  }

  protected validChild(position: number, child: Node): boolean {
    return position === 0 && child instanceof Schedule;
  }

  protected cloneShallow(): KernelMarker {
    return new KernelMarker(this.name, this.moduleName);
  }

  protected override sameAttributes(other: Node): boolean {
    return other instanceof KernelMarker && other.name === this.name && other.moduleName === this.moduleName;
  }
}

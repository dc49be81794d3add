import { InternalError } from "../errors.js";
import { DataSymbol } from "../symbols/symbols.js";
import type { AnySymbol } from "../symbols/symbols.js";
import { Node, Statement } from "./node.js";
import { Schedule } from "./scopes.js";

export type RegionName = {
  readonly moduleName: string;
  readonly regionName: string;
};

/**
 * A statement range bracketed by calls into a runtime library (profiling,
 * extraction). The calls go through a module-level `type(...)` variable.
 */
export abstract class DataRegionNode extends Statement {
  readonly childrenFormat = "Schedule";
  readonly moduleName: string;
  readonly regionName: string;
  variable: DataSymbol;

  constructor(name: RegionName, variable: DataSymbol) {
    super();
    this.moduleName = name.moduleName;
    this.regionName = name.regionName;
    this.variable = variable;
  }

  get body(): Schedule {
    const c = this.children[0];
    if (!(c instanceof Schedule)) {
      throw new InternalError("GW9002", `'${this.nodeName}' is incomplete: missing its body.`);
    }
    return c;
  }

  protected validChild(position: number, child: Node): boolean {
    return position === 0 && child instanceof Schedule;
  }

  protected fill<T extends DataRegionNode>(this: T, body: readonly Statement[]): T {
    const schedule = new Schedule();
    for (const s of body) schedule.addChild(s);
    this.addChild(schedule);
    return this;
  }

  override replaceSymbols(mapping: ReadonlyMap<AnySymbol, AnySymbol>): void {
    const next = mapping.get(this.variable);
    if (next instanceof DataSymbol) this.variable = next;
  }

  protected override sameAttributes(other: Node): boolean {
    return (
      other instanceof DataRegionNode &&
      other.moduleName === this.moduleName &&
      other.regionName === this.regionName
    );
  }
}

export class ProfileNode extends DataRegionNode {
  readonly nodeName: string = "ProfileNode";

  static create(name: RegionName, variable: DataSymbol, body: readonly Statement[]): ProfileNode {
    return new ProfileNode(name, variable).fill(body);
  }

  protected cloneShallow(): ProfileNode {
    return new ProfileNode(this, this.variable);
  }
}

export class ExtractNode extends DataRegionNode {
  readonly nodeName: string = "ExtractNode";
  readonly inputs: readonly string[];
  readonly outputs: readonly string[];

  constructor(name: RegionName, variable: DataSymbol, vars: { inputs: readonly string[]; outputs: readonly string[] }) {
    super(name, variable);
    this.inputs = Object.freeze([...vars.inputs]);
    this.outputs = Object.freeze([...vars.outputs]);
  }

  static create(
    name: RegionName,
    variable: DataSymbol,
    vars: { inputs: readonly string[]; outputs: readonly string[] },
    body: readonly Statement[]
  ): ExtractNode {
    return new ExtractNode(name, variable, vars).fill(body);
  }

  protected cloneShallow(): ExtractNode {
    return new ExtractNode(this, this.variable, this);
  }
}

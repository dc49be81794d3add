import { SymbolTable } from "../symbols/symbol-table.js";
import type { AnySymbol } from "../symbols/symbols.js";
import { Node, Statement } from "./node.js";

/**
 * A node that owns a symbol table. The table's parent scope is resolved
 * through the tree, so moving the node re-parents its scope.
 */
export abstract class ScopingNode extends Node {
  readonly symbolTable: SymbolTable;

  constructor(symbolTable?: SymbolTable) {
    super();
    const resolver = (): SymbolTable | null => this.parent?.ancestor(ScopingNode, { includeSelf: true })?.symbolTable ?? null;
    this.symbolTable = symbolTable ?? new SymbolTable(resolver);
    this.symbolTable.setParent(resolver);
  }

  protected abstract cloneWithTable(table: SymbolTable): ScopingNode;

  protected cloneShallow(): ScopingNode {
    return this.cloneWithTable(this.symbolTable.copy().table);
  }

  /** Deep copy whose references point at the copied symbols. */
  override copy(): ScopingNode {
    const { table, mapping } = this.symbolTable.copy();
    return this.relink(this.copyInto(this.cloneWithTable(table)), mapping);
  }

  protected relink<T extends ScopingNode>(node: T, mapping: ReadonlyMap<AnySymbol, AnySymbol>): T {
    node.replaceSymbols(mapping);
    for (const n of node.walk(Node)) n.replaceSymbols(mapping);
    return node;
  }
}

/** Ordered list of statements. */
export class Schedule extends ScopingNode {
  readonly nodeName: string = "Schedule";
  readonly childrenFormat: string = "[Statement]*";

  protected validChild(_position: number, child: Node): boolean {
    return child instanceof Statement;
  }

  protected cloneWithTable(table: SymbolTable): Schedule {
    return new Schedule(table);
  }

  override copy(): Schedule {
    const { table, mapping } = this.symbolTable.copy();
    return this.relink(this.copyInto(this.cloneWithTable(table)), mapping);
  }

  get statements(): readonly Statement[] {
    return this.children.filter((c): c is Statement => c instanceof Statement);
  }
}

/** Specification-part lines kept verbatim, such as intrinsic-module imports and interface blocks. */
export type Preamble = string[];

export class Routine extends Schedule {
  override readonly nodeName: string = "Routine";
  name: string;
  isProgram: boolean;
  preamble: Preamble = [];

  constructor(name: string, options: { symbolTable?: SymbolTable; isProgram?: boolean } = {}) {
    super(options.symbolTable);
    this.name = name;
    this.isProgram = options.isProgram ?? false;
  }

  static create(name: string, symbolTable: SymbolTable, body: readonly Statement[], isProgram = false): Routine {
    const r = new Routine(name, { symbolTable, isProgram });
    for (const s of body) r.addChild(s);
    return r;
  }

  protected override cloneWithTable(table: SymbolTable): Routine {
    const r = new Routine(this.name, { symbolTable: table, isProgram: this.isProgram });
    r.preamble = [...this.preamble];
    return r;
  }

  override copy(): Routine {
    const { table, mapping } = this.symbolTable.copy();
    return this.relink(this.copyInto(this.cloneWithTable(table)), mapping);
  }

  protected override sameAttributes(other: Node): boolean {
    return other instanceof Routine && other.name.toLowerCase() === this.name.toLowerCase() && other.isProgram === this.isProgram;
  }

  override toString(): string {
    return `Routine[name:'${this.name}']`;
  }
}

/** A Fortran module. */
export class Container extends ScopingNode {
  readonly nodeName: string = "Container";
  readonly childrenFormat: string = "[Routine]*";
  name: string;
  preamble: Preamble = [];

  constructor(name: string, symbolTable?: SymbolTable) {
    super(symbolTable);
    this.name = name;
  }

  static create(name: string, symbolTable: SymbolTable, routines: readonly Routine[]): Container {
    const c = new Container(name, symbolTable);
    for (const r of routines) c.addChild(r);
    return c;
  }

  get routines(): readonly Routine[] {
    return this.children.filter((c): c is Routine => c instanceof Routine);
  }

  protected validChild(_position: number, child: Node): boolean {
    return child instanceof Routine;
  }

  protected cloneWithTable(table: SymbolTable): Container {
    const c = new Container(this.name, table);
    c.preamble = [...this.preamble];
    return c;
  }

  protected override sameAttributes(other: Node): boolean {
    return other instanceof Container && other.name.toLowerCase() === this.name.toLowerCase();
  }

  override toString(): string {
    return `${this.nodeName}[name:'${this.name}']`;
  }
}

/** Everything read from one source file. */
export class FileContainer extends Container {
  override readonly nodeName: string = "FileContainer";
  override readonly childrenFormat: string = "[Container | Routine]*";

  protected override validChild(_position: number, child: Node): boolean {
    return child instanceof Container || child instanceof Routine;
  }

  protected override cloneWithTable(table: SymbolTable): FileContainer {
    return new FileContainer(this.name, table);
  }

  get containers(): readonly Container[] {
    return this.children.filter((c): c is Container => c instanceof Container);
  }
}

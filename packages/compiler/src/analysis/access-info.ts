import { InternalError } from "../errors.js";
import {
  ArrayMember,
  ArrayReference,
  BinaryOperation,
  Reference,
  StructureReference,
} from "../ir/data.js";
import { Clause } from "../ir/directives.js";
import { DataNode, Node } from "../ir/node.js";
import { Assignment, Call, IfBlock, Loop } from "../ir/statements.js";
import type { DataSymbol } from "../symbols/symbols.js";

export type AccessType = "read" | "write" | "readwrite";

export class AccessInfo {
  accessType: AccessType;
  readonly node: Node;
  readonly location: number;
  /** Index expressions for an array access, one per dimension. */
  indices: readonly DataNode[] | null = null;

  constructor(accessType: AccessType, location: number, node: Node) {
    this.accessType = accessType;
    this.location = location;
    this.node = node;
  }

  get isWrite(): boolean {
    return this.accessType !== "read";
  }

  get isRead(): boolean {
    return this.accessType !== "write";
  }
}

/** Every access to one variable, in program order. */
export class SingleVariableAccessInfo {
  readonly name: string;
  readonly symbol: DataSymbol | null;
  readonly #accesses: AccessInfo[] = [];

  constructor(name: string, symbol: DataSymbol | null) {
    this.name = name;
    this.symbol = symbol;
  }

  get accesses(): readonly AccessInfo[] {
    return this.#accesses;
  }

  add(access: AccessInfo): AccessInfo {
    this.#accesses.push(access);
    return access;
  }

  firstAccess(): AccessInfo {
    const first = this.#accesses[0];
    if (!first) {
      throw new InternalError("GW9002", `Variable '${this.name}' has no recorded accesses.`);
    }
    return first;
  }

  isWritten(): boolean {
    return this.#accesses.some((a) => a.isWrite);
  }

  isRead(): boolean {
    return this.#accesses.some((a) => a.isRead);
  }

  isReadOnly(): boolean {
    return this.#accesses.every((a) => a.accessType === "read");
  }

  isArray(): boolean {
    return (this.symbol?.isArray ?? false) || this.#accesses.some((a) => a.indices !== null);
  }

  /** Turns the single recorded read into a write; the variable must have been read exactly once. */
  changeReadToWrite(): void {
    const [only, ...rest] = this.#accesses;
    if (!only || rest.length > 0 || only.accessType !== "read") {
      throw new InternalError(
        "GW9002",
        `Variable '${this.name}' must have exactly one read access to change into a write, but found ${this.#accesses.length} accesses.`
      );
    }
    only.accessType = "write";
  }
}

function key(name: string): string {
  return name.toLowerCase();
}

/** Access records of all variables in a region, in order of first access. */
export class VariablesAccessInfo {
  readonly #vars = new Map<string, SingleVariableAccessInfo>();
  #location = 0;

  constructor(nodes?: Node | readonly Node[]) {
    if (nodes === undefined) return;
    const list = nodes instanceof Node ? [nodes] : nodes;
    for (const n of list) referenceAccesses(n, this);
  }

  get location(): number {
    return this.#location;
  }

  nextLocation(): void {
    this.#location++;
  }

  addAccess(name: string, symbol: DataSymbol | null, accessType: AccessType, node: Node): AccessInfo {
    let v = this.#vars.get(key(name));
    if (!v) {
      v = new SingleVariableAccessInfo(name, symbol);
      this.#vars.set(key(name), v);
    }
    return v.add(new AccessInfo(accessType, this.#location, node));
  }

  /** Appends the accesses of `other`, keeping its order, at the current location. */
  merge(other: VariablesAccessInfo): void {
    for (const v of other.#vars.values()) {
      for (const a of v.accesses) {
        const added = this.addAccess(v.name, v.symbol, a.accessType, a.node);
        added.indices = a.indices;
      }
    }
  }

  get names(): readonly string[] {
    return [...this.#vars.values()].map((v) => v.name);
  }

  get variables(): readonly SingleVariableAccessInfo[] {
    return [...this.#vars.values()];
  }

  has(name: string): boolean {
    return this.#vars.has(key(name));
  }

  get(name: string): SingleVariableAccessInfo | undefined {
    return this.#vars.get(key(name));
  }

  isWritten(name: string): boolean {
    return this.get(name)?.isWritten() ?? false;
  }

  isRead(name: string): boolean {
    return this.get(name)?.isRead() ?? false;
  }

  toString(): string {
    return this.variables
      .map((v) => {
        const kind = v.isReadOnly() ? "READ" : v.isRead() ? "READ+WRITE" : "WRITE";
        return `${v.name}: ${kind}`;
      })
      .join(", ");
  }
}

const INQUIRY_OPERATORS: ReadonlySet<string> = new Set(["LBOUND", "UBOUND", "SIZE"]);

function collectReference(ref: Reference, info: VariablesAccessInfo, accessType: AccessType): void {
  const access = info.addAccess(ref.name, ref.symbol, accessType, ref);
  if (ref instanceof StructureReference) {
    for (const m of ref.walk(ArrayMember)) {
      for (const i of m.indices()) referenceAccesses(i, info);
    }
    return;
  }
  if (ref instanceof ArrayReference) {
    const indices = ref.indices();
    for (const i of indices) referenceAccesses(i, info);
    access.indices = indices;
  }
}

/** Records every variable access below `node` into `info`, in evaluation order. */
export function referenceAccesses(node: Node, info: VariablesAccessInfo): void {
  if (node instanceof Clause) return;

  if (node instanceof Reference) {
    collectReference(node, info, "read");
    return;
  }

  if (node instanceof BinaryOperation && INQUIRY_OPERATORS.has(node.operator)) {
    // The array operand is only inspected for its shape.
    const [array, ...rest] = node.children;
    if (array !== undefined && !(array instanceof Reference && array.children.length === 0)) {
      referenceAccesses(array, info);
    }
    for (const c of rest) referenceAccesses(c, info);
    return;
  }

  if (node instanceof Assignment) {
    referenceAccesses(node.rhs, info);
    const lhs = new VariablesAccessInfo();
    referenceAccesses(node.lhs, lhs);
    const target = lhs.get(node.lhs.name);
    if (!target) {
      throw new InternalError("GW9002", `Assignment target '${node.lhs.name}' was not recorded.`);
    }
    const first = target.firstAccess();
    if (target.accesses.length === 1) {
      target.changeReadToWrite();
    } else {
      // The target also appears in its own index expression.
      first.accessType = "write";
    }
    info.merge(lhs);
    info.nextLocation();
    return;
  }

  if (node instanceof Loop) {
    info.addAccess(node.variable.name, node.variable, "write", node);
    info.addAccess(node.variable.name, node.variable, "read", node);
    referenceAccesses(node.start, info);
    referenceAccesses(node.stop, info);
    referenceAccesses(node.step, info);
    info.nextLocation();
    referenceAccesses(node.loopBody, info);
    return;
  }

  if (node instanceof IfBlock) {
    referenceAccesses(node.condition, info);
    info.nextLocation();
    referenceAccesses(node.ifBody, info);
    const other = node.elseBody;
    if (other) referenceAccesses(other, info);
    return;
  }

  if (node instanceof Call) {
    for (const arg of node.arguments) {
      if (arg instanceof Reference) {
        collectReference(arg, info, "readwrite");
      } else {
        referenceAccesses(arg, info);
      }
    }
    info.nextLocation();
    return;
  }

  for (const c of node.children) referenceAccesses(c, info);
}

/** Ordered accesses to one symbol below `node`. */
export function accessesOf(node: Node, symbol: DataSymbol): readonly AccessInfo[] {
  return new VariablesAccessInfo(node).get(symbol.name)?.accesses ?? [];
}

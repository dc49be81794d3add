import { GenerationError, InternalError } from "../errors.js";
import { ScalarType, dataTypesEqual, describeDataType } from "../symbols/datatypes.js";
import { DataSymbol } from "../symbols/symbols.js";
import type { AnySymbol } from "../symbols/symbols.js";
import { DataNode, Node } from "./node.js";

const INTEGER_LITERAL = /^[0-9]+$/;
const REAL_LITERAL = /^(?:[0-9]+\.[0-9]*|\.[0-9]+|[0-9]+)(?:[eEdD][+-]?[0-9]+)?$/;

export class Literal extends DataNode {
  readonly nodeName: string = "Literal";
  readonly childrenFormat = "<LeafNode>";
  readonly value: string;
  readonly datatype: ScalarType;

  constructor(value: string, datatype: ScalarType) {
    super();
    switch (datatype.intrinsic) {
      case "integer":
        if (!INTEGER_LITERAL.test(value)) {
          throw new GenerationError("GW2004", `An integer Literal value must be a non-negative whole number but found '${value}'.`);
        }
        break;
      case "real":
        if (!REAL_LITERAL.test(value)) {
          throw new GenerationError("GW2004", `A real Literal value must be a non-negative number but found '${value}'.`);
        }
        break;
      case "boolean":
        if (value !== "true" && value !== "false") {
          throw new GenerationError("GW2004", `A boolean Literal value must be 'true' or 'false' but found '${value}'.`);
        }
        break;
      case "character":
        break;
    }
    this.value = value;
    this.datatype = datatype;
  }

  protected validChild(): boolean {
    return false;
  }

  protected cloneShallow(): Literal {
    return new Literal(this.value, this.datatype);
  }

  override copy(): Literal {
    return this.copyInto(this.cloneShallow());
  }

  protected override sameAttributes(other: Node): boolean {
    return other instanceof Literal && other.value === this.value && dataTypesEqual(this.datatype, other.datatype);
  }

  override toString(): string {
    return `Literal[value:'${this.value}', ${this.datatype.toString()}]`;
  }
}

export class Reference extends DataNode {
  readonly nodeName: string = "Reference";
  readonly childrenFormat: string = "<LeafNode>";
  symbol: DataSymbol;

  constructor(symbol: DataSymbol) {
    super();
    this.symbol = symbol;
  }

  get name(): string {
    return this.symbol.name;
  }

  protected validChild(_position: number, _child: Node): boolean {
    return false;
  }

  protected cloneShallow(): Reference {
    return new Reference(this.symbol);
  }

  override copy(): Reference {
    return this.copyInto(this.cloneShallow());
  }

  override replaceSymbols(mapping: ReadonlyMap<AnySymbol, AnySymbol>): void {
    const next = mapping.get(this.symbol);
    if (next instanceof DataSymbol) this.symbol = next;
  }

  protected override sameAttributes(other: Node): boolean {
    return other instanceof Reference && other.symbol === this.symbol;
  }

  override toString(): string {
    return `${this.nodeName}[name:'${this.name}']`;
  }
}

export const BINARY_OPERATORS = [
  "ADD",
  "SUB",
  "MUL",
  "DIV",
  "POW",
  "EQ",
  "NE",
  "GT",
  "LT",
  "GE",
  "LE",
  "AND",
  "OR",
  "EQV",
  "NEQV",
  "LBOUND",
  "UBOUND",
  "SIZE",
  "MAX",
  "MIN",
  "MOD",
  "SIGN",
] as const;
export type BinaryOperator = (typeof BINARY_OPERATORS)[number];

export const UNARY_OPERATORS = [
  "MINUS",
  "PLUS",
  "NOT",
  "SQRT",
  "EXP",
  "LOG",
  "LOG10",
  "SIN",
  "COS",
  "TAN",
  "ABS",
  "REAL",
  "INT",
  "SIZE",
] as const;
export type UnaryOperator = (typeof UNARY_OPERATORS)[number];

export class BinaryOperation extends DataNode {
  readonly nodeName: string = "BinaryOperation";
  readonly childrenFormat = "DataNode, DataNode";
  readonly operator: BinaryOperator;

  constructor(operator: BinaryOperator) {
    super();
    this.operator = operator;
  }

  static create(operator: BinaryOperator, lhs: DataNode, rhs: DataNode): BinaryOperation {
    const op = new BinaryOperation(operator);
    op.addChild(lhs);
    op.addChild(rhs);
    return op;
  }

  get lhs(): DataNode {
    return operand(this, 0);
  }

  get rhs(): DataNode {
    return operand(this, 1);
  }

  protected validChild(position: number, child: Node): boolean {
    return position < 2 && child instanceof DataNode;
  }

  protected cloneShallow(): BinaryOperation {
    return new BinaryOperation(this.operator);
  }

  override copy(): BinaryOperation {
    return this.copyInto(this.cloneShallow());
  }

  protected override sameAttributes(other: Node): boolean {
    return other instanceof BinaryOperation && other.operator === this.operator;
  }

  override toString(): string {
    return `BinaryOperation[operator:'${this.operator}']`;
  }
}

export class UnaryOperation extends DataNode {
  readonly nodeName: string = "UnaryOperation";
  readonly childrenFormat = "DataNode";
  readonly operator: UnaryOperator;

  constructor(operator: UnaryOperator) {
    super();
    this.operator = operator;
  }

  static create(operator: UnaryOperator, operandNode: DataNode): UnaryOperation {
    const op = new UnaryOperation(operator);
    op.addChild(operandNode);
    return op;
  }

  get operand(): DataNode {
    return operand(this, 0);
  }

  protected validChild(position: number, child: Node): boolean {
    return position === 0 && child instanceof DataNode;
  }

  protected cloneShallow(): UnaryOperation {
    return new UnaryOperation(this.operator);
  }

  override copy(): UnaryOperation {
    return this.copyInto(this.cloneShallow());
  }

  protected override sameAttributes(other: Node): boolean {
    return other instanceof UnaryOperation && other.operator === this.operator;
  }

  override toString(): string {
    return `UnaryOperation[operator:'${this.operator}']`;
  }
}

function operand(node: Node, index: number): DataNode {
  const c = node.children[index];
  if (!(c instanceof DataNode)) {
    throw new InternalError(
      "GW9002",
      `'${node.nodeName}' is incomplete: expected a DataNode at position ${index}.`
    );
  }
  return c;
}

/** `start:stop:step` within an array access. */
export class Range extends DataNode {
  readonly nodeName: string = "Range";
  readonly childrenFormat = "DataNode, DataNode, DataNode";

  static create(start: DataNode, stop: DataNode, step?: DataNode): Range {
    const r = new Range();
    r.addChild(start);
    r.addChild(stop);
    r.addChild(step ?? new Literal("1", new ScalarType("integer", "undefined")));
    return r;
  }

  get start(): DataNode {
    return operand(this, 0);
  }

  get stop(): DataNode {
    return operand(this, 1);
  }

  get step(): DataNode {
    return operand(this, 2);
  }

  protected validChild(position: number, child: Node): boolean {
    return position < 3 && child instanceof DataNode && !(child instanceof Range);
  }

  protected cloneShallow(): Range {
    return new Range();
  }

  override copy(): Range {
    return this.copyInto(this.cloneShallow());
  }
}

function checkIndexPosition(node: Node, index: number): void {
  if (!Number.isInteger(index) || index < 0) {
    throw new GenerationError(
      "GW2005",
      `The index argument should be a non-negative integer but found '${index}'.`
    );
  }
  if (index >= node.children.length) {
    throw new GenerationError(
      "GW2005",
      `In '${node.nodeName}' the specified index '${index}' must be less than the number of dimensions '${node.children.length}'.`
    );
  }
}

function isBoundQuery(expr: DataNode, operator: "LBOUND" | "UBOUND", arrayName: string, index: number): boolean {
  if (!(expr instanceof BinaryOperation) || expr.operator !== operator) return false;
  const [ref, dim] = expr.children;
  return (
    ref instanceof Reference &&
    !(ref instanceof ArrayReference) &&
    ref.name.toLowerCase() === arrayName.toLowerCase() &&
    dim instanceof Literal &&
    dim.datatype.intrinsic === "integer" &&
    dim.value === String(index + 1)
  );
}

/** Whole-extent range for one dimension: `LBOUND(a, d):UBOUND(a, d):1`. */
export function fullRange(symbol: DataSymbol, index: number): Range {
  const dim = (): Literal => new Literal(String(index + 1), new ScalarType("integer", "undefined"));
  return Range.create(
    BinaryOperation.create("LBOUND", new Reference(symbol), dim()),
    BinaryOperation.create("UBOUND", new Reference(symbol), dim())
  );
}

/** Shared by array references and array members; the children are the indices. */
function indicesOf(node: Node, name: string): readonly DataNode[] {
  if (node.children.length === 0) {
    throw new InternalError(
      "GW9001",
      `${node.nodeName} malformed or incomplete: must have one or more children representing array-index expressions but found none.`
    );
  }
  return node.children.map((c, i) => {
    if (!(c instanceof DataNode)) {
      throw new InternalError(
        "GW9001",
        `${node.nodeName} '${name}' malformed or incomplete: child ${i} must be a DataNode or Range representing an array-index expression but found '${c.nodeName}'.`
      );
    }
    return c;
  });
}

function rangeAt(node: Node, index: number): Range | null {
  checkIndexPosition(node, index);
  const c = node.children[index];
  return c instanceof Range ? c : null;
}

export class ArrayReference extends Reference {
  override readonly nodeName: string = "ArrayReference";
  override readonly childrenFormat: string = "[DataNode | Range]+";

  /**
   * Builds `symbol(indices...)`. The symbol must be an array whose rank
   * matches the number of indices.
   */
  static create(symbol: DataSymbol, indices: readonly DataNode[]): ArrayReference {
    if (!(symbol instanceof DataSymbol)) {
      throw new GenerationError("GW2003", "ArrayReference.create() 'symbol' argument should be a DataSymbol.");
    }
    const t = symbol.arrayType;
    if (t === undefined) {
      throw new GenerationError(
        "GW2003",
        `Symbol '${symbol.name}' passed to ArrayReference.create() must be an array but has type '${describeDataType(symbol.datatype)}'.`
      );
    }
    if (t.rank !== indices.length) {
      throw new GenerationError(
        "GW2003",
        `Symbol '${symbol.name}' of type '${t.toString()}' has ${t.rank} dimensions, so it should be given ${t.rank} indices, but ${indices.length} were provided to ArrayReference.create().`
      );
    }
    const ref = new ArrayReference(symbol);
    for (const i of indices) ref.addChild(i);
    return ref;
  }

  /** Reference to every element: `a(:, :)`. */
  static wholeArray(symbol: DataSymbol): ArrayReference {
    const t = symbol.arrayType;
    if (t === undefined) {
      throw new GenerationError("GW2003", `Symbol '${symbol.name}' is not an array.`);
    }
    return ArrayReference.create(
      symbol,
      t.shape.map((_, i) => fullRange(symbol, i))
    );
  }

  protected override validChild(_position: number, child: Node): boolean {
    return child instanceof DataNode;
  }

  protected override cloneShallow(): ArrayReference {
    return new ArrayReference(this.symbol);
  }

  override copy(): ArrayReference {
    return this.copyInto(this.cloneShallow());
  }

  indices(): readonly DataNode[] {
    return indicesOf(this, this.name);
  }

  get rank(): number {
    return this.children.length;
  }

  isLowerBound(index: number): boolean {
    const r = rangeAt(this, index);
    return r !== null && isBoundQuery(r.start, "LBOUND", this.name, index);
  }

  isUpperBound(index: number): boolean {
    const r = rangeAt(this, index);
    return r !== null && isBoundQuery(r.stop, "UBOUND", this.name, index);
  }

  /** Needs lower bound, upper bound and a literal step of 1. */
  isFullRange(index: number): boolean {
    const r = rangeAt(this, index);
    if (r === null) return false;
    const step = r.step;
    return (
      this.isLowerBound(index) &&
      this.isUpperBound(index) &&
      step instanceof Literal &&
      step.datatype.intrinsic === "integer" &&
      step.value === "1"
    );
  }
}

/** Component access inside a structure reference. */
export class Member extends Node {
  readonly nodeName: string = "Member";
  readonly childrenFormat: string = "<LeafNode>";
  readonly name: string;

  constructor(name: string) {
    super();
    this.name = name;
  }

  protected validChild(_position: number, _child: Node): boolean {
    return false;
  }

  protected cloneShallow(): Member {
    return new Member(this.name);
  }

  override copy(): Member {
    return this.copyInto(this.cloneShallow());
  }

  protected override sameAttributes(other: Node): boolean {
    return other instanceof Member && other.name.toLowerCase() === this.name.toLowerCase();
  }
}

export class ArrayMember extends Member {
  override readonly nodeName: string = "ArrayMember";
  override readonly childrenFormat: string = "[DataNode | Range]+";

  static create(name: string, indices: readonly DataNode[]): ArrayMember {
    const m = new ArrayMember(name);
    for (const i of indices) m.addChild(i);
    return m;
  }

  protected override validChild(_position: number, child: Node): boolean {
    return child instanceof DataNode;
  }

  protected override cloneShallow(): ArrayMember {
    return new ArrayMember(this.name);
  }

  indices(): readonly DataNode[] {
    return indicesOf(this, this.name);
  }
}

export class StructureMember extends Member {
  override readonly nodeName: string = "StructureMember";
  override readonly childrenFormat: string = "Member";

  static create(name: string, inner: Member): StructureMember {
    const m = new StructureMember(name);
    m.addChild(inner);
    return m;
  }

  get member(): Member {
    const c = this.children[0];
    if (!(c instanceof Member)) {
      throw new InternalError("GW9002", `StructureMember '${this.name}' has no inner member.`);
    }
    return c;
  }

  protected override validChild(position: number, child: Node): boolean {
    return position === 0 && child instanceof Member;
  }

  protected override cloneShallow(): StructureMember {
    return new StructureMember(this.name);
  }
}

/** `symbol%member...` */
export class StructureReference extends Reference {
  override readonly nodeName: string = "StructureReference";
  override readonly childrenFormat: string = "Member";

  static create(symbol: DataSymbol, member: Member): StructureReference {
    const ref = new StructureReference(symbol);
    ref.addChild(member);
    return ref;
  }

  get member(): Member {
    const c = this.children[0];
    if (!(c instanceof Member)) {
      throw new InternalError("GW9002", `StructureReference '${this.name}' has no member.`);
    }
    return c;
  }

  protected override validChild(position: number, child: Node): boolean {
    return position === 0 && child instanceof Member;
  }

  protected override cloneShallow(): StructureReference {
    return new StructureReference(this.symbol);
  }

  override copy(): StructureReference {
    return this.copyInto(this.cloneShallow());
  }
}

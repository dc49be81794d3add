import { expect } from "chai";

import { GenerationError, InternalError } from "../errors.js";
import { ArrayType, INTEGER_TYPE, REAL_TYPE } from "../symbols/datatypes.js";
import { SymbolTable } from "../symbols/symbol-table.js";
import { DataSymbol } from "../symbols/symbols.js";
import { ArrayReference, BinaryOperation, Literal, Range, Reference, fullRange } from "./data.js";
import { Routine, Schedule } from "./scopes.js";
import { Assignment, Loop } from "./statements.js";

const one = (): Literal => new Literal("1", INTEGER_TYPE);

describe("@gridweave/compiler ir nodes", () => {
  it("validates children against the node's format", () => {
    const a = new Assignment();
    const s = new Schedule();
    expect(() => a.addChild(s)).to.throw(
      GenerationError,
      "Item 'Schedule' can't be child 0 of 'Assignment'. The valid format is: 'DataNode, DataNode'."
    );
    expect(() => a.addChild(one())).to.throw(GenerationError, "can't be child 0 of 'Assignment'");
  });

  it("refuses to attach a node that already has a parent", () => {
    const x = new DataSymbol("x", REAL_TYPE);
    const ref = new Reference(x);
    Assignment.create(ref, one());
    const other = new Assignment();
    expect(() => other.addChild(ref)).to.throw(
      GenerationError,
      "Item 'Reference' can't be added as child of 'Assignment' because it is not an orphan. It already has a 'Assignment' as a parent. Use detach() to remove it first."
    );
    ref.detach();
    expect(ref.parent).to.equal(null);
    other.addChild(ref);
    expect(ref.parent).to.equal(other);
  });

  it("replaces nodes in place", () => {
    const x = new DataSymbol("x", REAL_TYPE);
    const rhs = one();
    const a = Assignment.create(new Reference(x), rhs);
    const two = new Literal("2", INTEGER_TYPE);
    rhs.replaceWith(two);
    expect(a.rhs).to.equal(two);
    expect(rhs.parent).to.equal(null);
    expect(() => rhs.replaceWith(one())).to.throw(GenerationError, "no parent");
  });

  it("walks, finds ancestors and reports positions", () => {
    const i = new DataSymbol("i", INTEGER_TYPE);
    const x = new DataSymbol("x", REAL_TYPE);
    const inner = Assignment.create(new Reference(x), new Reference(i));
    const loop = Loop.create(i, one(), new Literal("10", INTEGER_TYPE), one(), [inner]);
    const routine = Routine.create("work", new SymbolTable(), [loop]);
    expect(routine.walk(Assignment)).to.deep.equal([inner]);
    expect(routine.walk(Reference).map((r) => r.name)).to.deep.equal(["x", "i"]);
    expect(routine.walk(Reference, Loop)).to.deep.equal([]);
    expect(inner.ancestor(Loop)).to.equal(loop);
    expect(inner.ancestor(Routine)).to.equal(routine);
    expect(inner.root).to.equal(routine);
    expect(loop.loopBody.position).to.equal(3);
    expect(inner.depth).to.equal(3);
  });

  it("copies subtrees deeply and compares them structurally", () => {
    const i = new DataSymbol("i", INTEGER_TYPE);
    const expr = BinaryOperation.create("ADD", new Reference(i), one());
    const c = expr.copy();
    expect(c).to.not.equal(expr);
    expect(c.parent).to.equal(null);
    expect(c.lhs).to.not.equal(expr.lhs);
    expect(c.structurallyEqual(expr)).to.equal(true);
    const different = BinaryOperation.create("SUB", new Reference(i), one());
    expect(different.structurallyEqual(expr)).to.equal(false);
  });

  it("compares references by symbol, not by name", () => {
    const outer = new DataSymbol("x", REAL_TYPE);
    const inner = new DataSymbol("X", REAL_TYPE);
    expect(new Reference(outer).structurallyEqual(new Reference(outer))).to.equal(true);
    expect(new Reference(inner).structurallyEqual(new Reference(outer))).to.equal(false);
    const i = new DataSymbol("i", INTEGER_TYPE);
    const shadow = new DataSymbol("i", INTEGER_TYPE);
    const loop = (v: DataSymbol): Loop => Loop.create(v, one(), one(), one(), []);
    expect(loop(i).structurallyEqual(loop(i))).to.equal(true);
    expect(loop(shadow).structurallyEqual(loop(i))).to.equal(false);
  });

  it("re-points references at the copied symbols when copying a routine", () => {
    const table = new SymbolTable();
    const x = new DataSymbol("x", REAL_TYPE);
    table.add(x);
    const r = Routine.create("r", table, [Assignment.create(new Reference(x), new Literal("1.0", REAL_TYPE))]);
    const c = r.copy();
    const ref = c.walk(Reference)[0];
    expect(ref?.symbol).to.equal(c.symbolTable.lookup("x"));
    expect(ref?.symbol).to.not.equal(x);
  });

  it("resolves nested scopes through the tree", () => {
    const table = new SymbolTable();
    const n = new DataSymbol("n", INTEGER_TYPE);
    table.add(n);
    const body = new Schedule();
    const routine = Routine.create("r", table, []);
    expect(body.symbolTable.has("n")).to.equal(false);
    const loop = Loop.create(new DataSymbol("i", INTEGER_TYPE), one(), one(), one(), []);
    routine.addChild(loop);
    expect(loop.loopBody.symbolTable.lookup("n")).to.equal(n);
  });

  it("validates literal values per intrinsic", () => {
    expect(() => new Literal("-1", INTEGER_TYPE)).to.throw(GenerationError, "'-1'");
    expect(() => new Literal("1.5", INTEGER_TYPE)).to.throw(GenerationError);
    expect(new Literal("1.5e3", REAL_TYPE).value).to.equal("1.5e3");
    expect(() => new Literal("abc", REAL_TYPE)).to.throw(GenerationError);
  });
});

describe("@gridweave/compiler array helpers", () => {
  const a = new DataSymbol("a", new ArrayType(REAL_TYPE, [10, 10]));

  it("recognises full ranges only with both bounds and a unit step", () => {
    const ref = ArrayReference.create(a, [fullRange(a, 0), one()]);
    expect(ref.isLowerBound(0)).to.equal(true);
    expect(ref.isUpperBound(0)).to.equal(true);
    expect(ref.isFullRange(0)).to.equal(true);
    expect(ref.isFullRange(1)).to.equal(false);
  });

  it("requires the dimension literal to match the index", () => {
    const wrongDim = fullRange(a, 1);
    const ref = ArrayReference.create(a, [wrongDim, one()]);
    expect(ref.isLowerBound(0)).to.equal(false);
    expect(ref.isFullRange(0)).to.equal(false);
  });

  it("requires the bound to query the same array", () => {
    const b = new DataSymbol("b", new ArrayType(REAL_TYPE, [10, 10]));
    const ref = ArrayReference.create(a, [fullRange(b, 0), one()]);
    expect(ref.isLowerBound(0)).to.equal(false);
  });

  it("rejects a non-unit step", () => {
    const r = fullRange(a, 0);
    r.setChild(2, new Literal("2", INTEGER_TYPE));
    const ref = ArrayReference.create(a, [r, one()]);
    expect(ref.isLowerBound(0)).to.equal(true);
    expect(ref.isFullRange(0)).to.equal(false);
  });

  it("checks index positions", () => {
    const ref = ArrayReference.create(a, [one(), one()]);
    expect(() => ref.isLowerBound(2)).to.throw(GenerationError, "must be less than the number of dimensions '2'");
  });

  it("reports malformed array references", () => {
    const empty = new ArrayReference(a);
    expect(() => empty.indices()).to.throw(
      InternalError,
      "ArrayReference malformed or incomplete: must have one or more children representing array-index expressions but found none."
    );
  });

  it("validates ArrayReference.create arguments", () => {
    const s = new DataSymbol("s", REAL_TYPE);
    expect(() => ArrayReference.create(s, [one()])).to.throw(GenerationError, "must be an array");
    expect(() => ArrayReference.create(a, [one()])).to.throw(
      GenerationError,
      "has 2 dimensions, so it should be given 2 indices, but 1 were provided"
    );
  });

  it("builds whole-array references", () => {
    const ref = ArrayReference.wholeArray(a);
    expect(ref.indices()).to.have.length(2);
    expect(ref.isFullRange(1)).to.equal(true);
    expect(ref.indices()[0]).to.be.instanceOf(Range);
  });
});

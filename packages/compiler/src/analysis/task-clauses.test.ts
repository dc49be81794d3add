import { expect } from "chai";

import { TransformationError } from "../errors.js";
import { FortranWriter } from "../fortran/writer.js";
import { ArrayReference, BinaryOperation, Literal, Reference } from "../ir/data.js";
import type { DataNode, Statement } from "../ir/node.js";
import { ParallelDirective } from "../ir/directives.js";
import { Assignment, Loop } from "../ir/statements.js";
import { ArrayType, INTEGER_TYPE, REAL_TYPE } from "../symbols/datatypes.js";
import { DataSymbol } from "../symbols/symbols.js";
import { computeTaskClauses, parallelPrivateNames } from "./task-clauses.js";

const writer = new FortranWriter();
const int = (v: string): Literal => new Literal(v, INTEGER_TYPE);
const ref = (s: DataSymbol): Reference => new Reference(s);
const add = (l: DataNode, r: DataNode): BinaryOperation => BinaryOperation.create("ADD", l, r);
const texts = (refs: readonly Reference[]): string[] => refs.map((r) => writer.expression(r));

function fixture() {
  const i = new DataSymbol("i", INTEGER_TYPE);
  const j = new DataSymbol("j", INTEGER_TYPE);
  const k = new DataSymbol("k", REAL_TYPE);
  const a = new DataSymbol("a", new ArrayType(REAL_TYPE, [320, 320]));
  const b = new DataSymbol("b", new ArrayType(REAL_TYPE, [320, 320]));
  /** `do i = 1, 320, <step>` around `do j = 1, 320` holding `body`; returns the inner loop. */
  const nest = (body: Statement[], step = "32"): Loop => {
    const inner = Loop.create(j, int("1"), int("320"), int("1"), body);
    Loop.create(i, int("1"), int("320"), int(step), [inner]);
    return inner;
  };
  const aij = (): ArrayReference => ArrayReference.create(a, [ref(i), ref(j)]);
  const bAt = (index: DataNode): ArrayReference => ArrayReference.create(b, [index, ref(j)]);
  return { i, j, k, a, b, nest, aij, bAt };
}

describe("@gridweave/compiler task clauses", () => {
  it("classifies variables and chunks offsets by the outer loop step", () => {
    const { i, k, nest, aij, bAt } = fixture();
    const loop = nest([
      Assignment.create(aij(), ref(k)),
      Assignment.create(aij(), add(bAt(add(ref(i), int("1"))), ref(k))),
    ]);
    const clauses = computeTaskClauses(loop);
    expect(texts(clauses.private)).to.deep.equal(["j"]);
    expect(texts(clauses.firstprivate)).to.deep.equal(["i"]);
    expect(texts(clauses.shared)).to.deep.equal(["k", "a", "b"]);
    expect(texts(clauses.dependIn)).to.deep.equal(["k", "b(i + 32,:)", "b(i,:)"]);
    expect(texts(clauses.dependOut)).to.deep.equal(["a(i,:)"]);
  });

  it("keeps a literal-first operand order and deduplicates entries", () => {
    const { i, k, nest, aij, bAt } = fixture();
    const lit = (c: string): DataNode => add(int(c), ref(i));
    const loop = nest([
      Assignment.create(aij(), ref(k)),
      Assignment.create(aij(), add(add(bAt(lit("1")), bAt(lit("33"))), bAt(lit("32")))),
    ]);
    const clauses = computeTaskClauses(loop);
    expect(texts(clauses.dependIn)).to.deep.equal(["k", "b(32 + i,:)", "b(i,:)", "b(2 * 32 + i,:)"]);
  });

  it("uses a single entry when the step divides the offset", () => {
    const { i, nest, aij, bAt } = fixture();
    const loop = nest([Assignment.create(aij(), bAt(add(ref(i), int("1"))))], "1");
    expect(texts(computeTaskClauses(loop).dependIn)).to.deep.equal(["b(i + 1,:)"]);
  });

  it("maps a subtracted offset below the base", () => {
    const { i, nest, aij, bAt } = fixture();
    const loop = nest([Assignment.create(aij(), bAt(BinaryOperation.create("SUB", ref(i), int("32"))))]);
    expect(texts(computeTaskClauses(loop).dependIn)).to.deep.equal(["b(i - 32,:)"]);
  });

  it("rejects a shared variable used as an index", () => {
    const { k, nest, aij, b, j } = fixture();
    const n = new DataSymbol("n", INTEGER_TYPE);
    const loop = nest([
      Assignment.create(aij(), ref(k)),
      Assignment.create(aij(), ArrayReference.create(b, [ref(n), ref(j)])),
    ]);
    expect(() => computeTaskClauses(loop)).to.throw(
      TransformationError,
      "Shared variable access used as an index inside a task directive which is not supported. Variable name is n"
    );
  });

  it("rejects multiplication in an index", () => {
    const { i, nest, aij, bAt } = fixture();
    const loop = nest([Assignment.create(aij(), bAt(BinaryOperation.create("MUL", int("2"), ref(i))))]);
    expect(() => computeTaskClauses(loop)).to.throw(
      TransformationError,
      "Binary operator MUL used as an index inside a task directive which is not supported."
    );
  });

  it("rejects an array reference in a loop bound", () => {
    const { j, a, aij, k } = fixture();
    const c = new DataSymbol("c", new ArrayType(INTEGER_TYPE, [4]));
    const loop = Loop.create(j, int("1"), ArrayReference.create(c, [int("1")]), int("1"), [
      Assignment.create(aij(), ref(k)),
    ]);
    expect(a.name).to.equal("a");
    expect(() => computeTaskClauses(loop)).to.throw(
      TransformationError,
      "ArrayReference not supported in the stop variable of a Loop in a task directive."
    );
  });

  it("rejects a loop variable read before its loop assigns it", () => {
    const { nest, aij } = fixture();
    const m = new DataSymbol("m", INTEGER_TYPE);
    const x = new DataSymbol("x", REAL_TYPE);
    const loop = nest([
      Assignment.create(aij(), ref(m)),
      Loop.create(m, int("1"), int("4"), int("1"), [Assignment.create(ref(x), int("0"))]),
    ]);
    expect(() => computeTaskClauses(loop)).to.throw(
      TransformationError,
      "Found shared loop variable which is not allowed in a task directive. Variable name is m"
    );
  });

  it("makes outer-private scalars of a parallel region firstprivate", () => {
    const { i, j, a, b } = fixture();
    const t = new DataSymbol("t", INTEGER_TYPE);
    const inner = Loop.create(j, int("1"), int("320"), int("1"), [
      Assignment.create(ArrayReference.create(a, [ref(t), ref(j)]), ArrayReference.create(b, [ref(t), ref(j)])),
    ]);
    const region = ParallelDirective.create([
      Assignment.create(ref(t), int("3")),
      Loop.create(i, int("1"), int("320"), int("32"), [inner]),
    ]);
    const clauses = computeTaskClauses(inner);
    expect(texts(clauses.firstprivate)).to.deep.equal(["t"]);
    expect(texts(clauses.dependIn)).to.deep.equal(["b(t,:)"]);
    expect(parallelPrivateNames(region.dirBody)).to.deep.equal(["i", "j", "t"]);
  });

  it("rejects a scalar the task updates when it is used as an index", () => {
    const { i, j, a, b } = fixture();
    const ii = new DataSymbol("ii", INTEGER_TYPE);
    const k = new DataSymbol("k", INTEGER_TYPE);
    const jLoop = Loop.create(j, int("1"), int("32"), int("1"), [
      Assignment.create(ref(k), add(ref(k), int("1"))),
      Assignment.create(
        ArrayReference.create(a, [ref(ii), ref(k)]),
        add(ArrayReference.create(b, [ref(ii), ref(j)]), int("1"))
      ),
    ]);
    const task = Loop.create(ii, ref(i), add(ref(i), int("32")), int("1"), [jLoop]);
    Loop.create(i, int("1"), int("320"), int("32"), [Assignment.create(ref(k), int("1")), task]);
    expect(() => computeTaskClauses(task)).to.throw(
      TransformationError,
      "Shared variable access used as an index inside a task directive which is not supported. Variable name is k"
    );
  });
});

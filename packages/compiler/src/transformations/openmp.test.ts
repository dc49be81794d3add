import { expect } from "chai";

import { TransformationError } from "../errors.js";
import { FortranReader } from "../fortran/reader.js";
import { FortranWriter } from "../fortran/writer.js";
import { ArrayReference, Literal, Reference } from "../ir/data.js";
import { ParallelDirective, ParallelLoopDirective, SingleDirective, TaskDirective } from "../ir/directives.js";
import type { Statement } from "../ir/node.js";
import { Routine } from "../ir/scopes.js";
import { Assignment, Loop } from "../ir/statements.js";
import { ArrayType, INTEGER_TYPE, REAL_TYPE } from "../symbols/datatypes.js";
import { DataSymbol } from "../symbols/symbols.js";
import { ParallelLoopTrans, ParallelTrans, SingleTrans } from "./parallel.js";
import { TaskTrans } from "./task.js";

const SOURCE = `
subroutine smooth(a, b, s, n)
  integer :: n
  real, dimension(n) :: a, b
  real :: s
  integer :: ji
  do ji = 1, n
    a(ji) = b(ji) * 2.0
  end do
  do ji = 1, n
    s = s + b(ji)
  end do
end subroutine smooth
`;

const writer = new FortranWriter();

function read(): { routine: Routine; first: Statement; second: Statement } {
  const [routine] = new FortranReader().fromSource(SOURCE).walk(Routine);
  const [first, second] = routine?.statements ?? [];
  if (!routine || !first || !second) throw new Error("fixture is incomplete");
  return { routine, first, second };
}

function text(routine: Routine): string {
  return routine.statements.map((s) => writer.write(s)).join("");
}

describe("@gridweave/compiler openmp transformations", () => {
  it("turns an independent loop into a parallel do", () => {
    const { routine, first } = read();
    const directive = new ParallelLoopTrans().apply(first);
    expect(directive).to.be.instanceOf(ParallelLoopDirective);
    expect(routine.statements[0]).to.equal(directive);
    expect(writer.write(directive)).to.equal(
      [
        "!$omp parallel do default(shared), private(ji)",
        "  do ji = 1, n",
        "    a(ji) = b(ji) * 2.0",
        "  end do",
        "!$omp end parallel do",
        "",
      ].join("\n")
    );
  });

  it("refuses to parallelise a reduction", () => {
    const { second } = read();
    expect(() => new ParallelLoopTrans().apply(second)).to.throw(
      TransformationError,
      "ParallelLoopTrans cannot parallelise the loop over 'ji': Variable 's' is read first, which indicates a reduction."
    );
  });

  it("only parallelises loops outside parallel regions", () => {
    const { routine, first } = read();
    expect(() => new ParallelLoopTrans().apply(routine)).to.throw(
      TransformationError,
      "ParallelLoopTrans can only be applied to a Loop, but found 'Routine'."
    );
    new ParallelTrans().apply(first);
    expect(() => new ParallelLoopTrans().apply(first)).to.throw(
      TransformationError,
      "ParallelLoopTrans cannot be applied to a loop that is already inside a parallel region."
    );
  });

  it("wraps a range in a parallel region with a single inside", () => {
    const { routine, first, second } = read();
    new ParallelTrans().apply([second, first]);
    const single = new SingleTrans().apply(first, { nowait: true });
    expect(single).to.be.instanceOf(SingleDirective);
    expect(single.nowait).to.equal(true);
    expect(text(routine)).to.equal(
      [
        "!$omp parallel default(shared), private(ji)",
        "  !$omp single",
        "    do ji = 1, n",
        "      a(ji) = b(ji) * 2.0",
        "    end do",
        "  !$omp end single nowait",
        "  do ji = 1, n",
        "    s = s + b(ji)",
        "  end do",
        "!$omp end parallel",
        "",
      ].join("\n")
    );
  });

  it("does not nest parallel or single regions", () => {
    const { routine, first, second } = read();
    expect(() => new SingleTrans().apply(first)).to.throw(
      TransformationError,
      "SingleTrans must be applied to statements inside a parallel region."
    );
    const region = new ParallelTrans().apply(first);
    expect(routine.statements[0]).to.be.instanceOf(ParallelDirective);
    expect(() => new ParallelTrans().apply(first)).to.throw(
      TransformationError,
      "ParallelTrans cannot create a parallel region inside another parallel region."
    );
    expect(() => new ParallelTrans().apply([region, second])).to.throw(
      TransformationError,
      "ParallelTrans cannot create a parallel region inside another parallel region."
    );
    new SingleTrans().apply(first);
    expect(() => new SingleTrans().apply(first)).to.throw(
      TransformationError,
      "SingleTrans cannot create a single region inside another single region."
    );
  });

  it("checks the range it is given", () => {
    const { first, second } = read();
    expect(() => new ParallelTrans().apply([])).to.throw(TransformationError, "ParallelTrans needs at least one node to apply to.");
    const [body] = first instanceof Loop ? first.loopBody.statements : [];
    if (!body) throw new Error("fixture loop is empty");
    expect(() => new ParallelTrans().apply([body, second])).to.throw(
      TransformationError,
      "ParallelTrans requires every node in the range to have the same parent."
    );
  });

  it("wraps a loop in a task with its data-sharing clauses", () => {
    const i = new DataSymbol("i", INTEGER_TYPE);
    const j = new DataSymbol("j", INTEGER_TYPE);
    const k = new DataSymbol("k", REAL_TYPE);
    const a = new DataSymbol("a", new ArrayType(REAL_TYPE, [320, 320]));
    const int = (v: string): Literal => new Literal(v, INTEGER_TYPE);
    const inner = Loop.create(j, int("1"), int("320"), int("1"), [
      Assignment.create(ArrayReference.create(a, [new Reference(i), new Reference(j)]), new Reference(k)),
    ]);
    const outer = Loop.create(i, int("1"), int("320"), int("32"), [inner]);

    const task = new TaskTrans().apply(inner);
    expect(task).to.be.instanceOf(TaskDirective);
    expect(outer.loopBody.statements[0]).to.equal(task);
    expect(writer.write(task)).to.equal(
      [
        "!$omp task private(j), firstprivate(i), shared(k,a), depend(in: k), depend(out: a(i,:))",
        "  do j = 1, 320",
        "    a(i,j) = k",
        "  end do",
        "!$omp end task",
        "",
      ].join("\n")
    );
    expect(() => new TaskTrans().apply(task)).to.throw(TransformationError, "TaskTrans can only be applied to a Loop, but found 'TaskDirective'.");
  });
});

import { expect } from "chai";

import { ParseError, SymbolError } from "../errors.js";
import { BinaryOperation, Literal, UnaryOperation } from "../ir/data.js";
import { Container, Routine } from "../ir/scopes.js";
import { CodeBlock } from "../ir/statements.js";
import { DeferredType, describeDataType } from "../symbols/datatypes.js";
import type { SymbolTable } from "../symbols/symbol-table.js";
import { DataSymbol } from "../symbols/symbols.js";
import { FortranReader } from "./reader.js";
import { FortranWriter } from "./writer.js";

const KINDS = `
module kinds_mod
  implicit none
  integer, parameter :: wp = 8
  real(kind=wp) :: total
  double precision :: d
  real*4 :: r4
contains
  subroutine s(a, n)
    integer, intent(in) :: n
    real(wp), dimension(n), intent(inout) :: a
    total = sqrt(abs(a(1))) + max(a(n), 1.0_wp)
    d = 1.5d0 * real(n)
  end subroutine s
end module kinds_mod
`;

function routineOf(source: string): Routine {
  const [routine] = new FortranReader().fromSource(source).walk(Routine);
  if (!routine) throw new Error("source has no routine");
  return routine;
}

function typesOf(table: SymbolTable): string[] {
  return table.symbols.flatMap((s) => (s instanceof DataSymbol ? [`${s.name}: ${describeDataType(s.datatype)}`] : []));
}

function written(routine: Routine): string[] {
  const writer = new FortranWriter();
  return routine.statements.map((s) => writer.write(s));
}

describe("@gridweave/compiler fortran reader", () => {
  it("joins continuation lines and drops trailing comments", () => {
    const routine = routineOf(`
subroutine s(a, b)
  real, intent(inout) :: a
  real, intent(in) :: &
     & b   ! scale
  a = a + &
      b * 2.0
end subroutine s
`);
    expect(typesOf(routine.symbolTable)).to.deep.equal(["a: Scalar<REAL, undefined>", "b: Scalar<REAL, undefined>"]);
    expect(routine.symbolTable.lookup("b")).to.have.property("interface").that.deep.equals({ kind: "argument", access: "read" });
    expect(written(routine)).to.deep.equal(["a = a + b * 2.0\n"]);
  });

  it("rejects source that ends inside a continued statement", () => {
    expect(() => new FortranReader().fromSource("subroutine s()\n  x = 1 + &")).to.throw(
      ParseError,
      "Source ends inside a continued statement starting at line 2."
    );
  });

  it("keeps statements it cannot model as code blocks", () => {
    const routine = routineOf(`
subroutine s(n, x)
  integer, intent(in) :: n
  real, intent(inout) :: x
  print *, x
  do while (x < 1.0)
    x = x * 2.0
  end do
  x = x + 1.0
end subroutine s
`);
    expect(routine.statements.map((s) => s.nodeName)).to.deep.equal(["CodeBlock", "CodeBlock", "Assignment"]);
    expect(routine.walk(CodeBlock).map((c) => c.lines)).to.deep.equal([
      ["print *, x"],
      ["do while (x < 1.0)", "x = x * 2.0", "end do"],
    ]);
  });

  it("fails on an unknown name when no wildcard import could provide it", () => {
    expect(() =>
      routineOf(`
subroutine s(x)
  real, intent(inout) :: x
  x = x + y
end subroutine s
`)
    ).to.throw(
      SymbolError,
      "Could not find 'y' in the symbol table and there is no wildcard import that could provide it."
    );
  });

  it("declares an unknown name as unresolved under a wildcard import", () => {
    const routine = routineOf(`
subroutine s(x)
  use constants_mod
  real, intent(inout) :: x
  x = x + y
end subroutine s
`);
    const y = routine.symbolTable.lookupLocal("y");
    expect(y).to.be.instanceOf(DataSymbol);
    expect(y.isUnresolved).to.equal(true);
    expect(y instanceof DataSymbol && y.datatype instanceof DeferredType).to.equal(true);
    expect(routine.symbolTable.hasWildcardImport()).to.equal(true);
  });

  it("reads kind selectors, kind suffixes and intrinsic calls", () => {
    const file = new FortranReader().fromSource(KINDS);
    const [module] = file.walk(Container);
    const [routine] = file.walk(Routine);
    if (!module || !routine) throw new Error("fixture has no module routine");

    expect(typesOf(module.symbolTable)).to.deep.equal([
      "wp: Scalar<INTEGER, undefined>",
      "total: Scalar<REAL, wp>",
      "d: Scalar<REAL, double>",
      "r4: Scalar<REAL, 4>",
    ]);
    expect(typesOf(routine.symbolTable)).to.deep.equal(["n: Scalar<INTEGER, undefined>", "a: Array<Scalar<REAL, wp>, shape=[n]>"]);
    expect(routine.symbolTable.argumentList.map((a) => a.name)).to.deep.equal(["a", "n"]);

    const literals = routine.walk(Literal);
    expect(literals.map((l) => l.value)).to.deep.equal(["1", "1.0", "1.5d0"]);
    expect(literals[1]?.datatype.precision).to.equal(module.symbolTable.lookup("wp"));
    expect(literals[2]?.datatype.precision).to.equal("double");
    expect(routine.walk(UnaryOperation).map((u) => u.operator)).to.deep.equal(["SQRT", "ABS", "REAL"]);
    expect(routine.walk(BinaryOperation).map((b) => b.operator)).to.deep.equal(["ADD", "MAX", "MUL"]);
    expect(written(routine)).to.deep.equal(["total = SQRT(ABS(a(1))) + MAX(a(n), 1.0_wp)\n", "d = 1.5d0 * REAL(n)\n"]);
  });

  it("rejects functions", () => {
    expect(() => new FortranReader().fromSource("function f(x)\nend function f\n")).to.throw(
      ParseError,
      "Functions are not supported at line 1: function f(x)"
    );
  });
});

import { expect } from "chai";

import { InternalError } from "../errors.js";
import { FortranReader } from "../fortran/reader.js";
import { Routine } from "../ir/scopes.js";
import { Assignment, Loop } from "../ir/statements.js";
import { VariablesAccessInfo, accessesOf } from "./access-info.js";
import type { SingleVariableAccessInfo } from "./access-info.js";

function read(...body: string[]): Routine {
  const source = [
    "subroutine s(a, b, idx, n, x, y)",
    "  integer :: n, i",
    "  integer, dimension(n) :: idx",
    "  real, dimension(n, n) :: a, b",
    "  real :: x, y",
    ...body.map((l) => `  ${l}`),
    "end subroutine s",
  ].join("\n");
  const [routine] = new FortranReader().fromSource(source).walk(Routine);
  if (!routine) throw new Error("fixture has no routine");
  return routine;
}

function variable(info: VariablesAccessInfo, name: string): SingleVariableAccessInfo {
  const v = info.get(name);
  if (!v) throw new Error(`no accesses to ${name}`);
  return v;
}

describe("@gridweave/compiler access info", () => {
  it("records an array access before the accesses in its indices", () => {
    const info = new VariablesAccessInfo(read("x = b(idx(i), 1)"));
    expect(info.names).to.deep.equal(["b", "idx", "i", "x"]);
    expect(variable(info, "b").firstAccess().indices?.map((i) => i.nodeName)).to.deep.equal(["ArrayReference", "Literal"]);
    expect(variable(info, "idx").firstAccess().indices?.map((i) => i.nodeName)).to.deep.equal(["Reference"]);
    expect(variable(info, "i").firstAccess().indices).to.equal(null);
    expect(variable(info, "x").accesses.map((a) => a.accessType)).to.deep.equal(["write"]);
  });

  it("records the right-hand side before the assignment target", () => {
    const info = new VariablesAccessInfo(read("x = x + y", "y = x"));
    const x = variable(info, "x");
    const y = variable(info, "y");
    expect(x.accesses.map((a) => `${a.accessType}@${a.location}`)).to.deep.equal(["read@0", "write@0", "read@1"]);
    expect(y.accesses.map((a) => `${a.accessType}@${a.location}`)).to.deep.equal(["read@0", "write@1"]);
    expect(info.toString()).to.equal("x: READ+WRITE, y: READ+WRITE");
  });

  it("writes only the outer reference when the target indexes itself", () => {
    const routine = read("idx(idx(i)) = 1");
    const [assignment] = routine.walk(Assignment);
    const info = new VariablesAccessInfo(routine);
    const idx = variable(info, "idx");

    expect(info.names).to.deep.equal(["idx", "i"]);
    expect(idx.accesses.map((a) => a.accessType)).to.deep.equal(["write", "read"]);
    expect(idx.firstAccess().node).to.equal(assignment?.lhs);
    expect(() => idx.changeReadToWrite()).to.throw(
      InternalError,
      "Variable 'idx' must have exactly one read access to change into a write, but found 2 accesses."
    );
  });

  it("changes a single read into a write", () => {
    const info = new VariablesAccessInfo(read("x = y"));
    const y = variable(info, "y");
    y.changeReadToWrite();
    expect(y.accesses.map((a) => a.accessType)).to.deep.equal(["write"]);
    expect(() => y.changeReadToWrite()).to.throw(InternalError, "found 1 accesses");
  });

  it("orders the accesses of one symbol through a loop header and body", () => {
    const [loop] = read("do i = 1, n", "  a(i, 1) = a(i, 1) + x", "end do").walk(Loop);
    if (!loop) throw new Error("fixture has no loop");
    const accesses = accessesOf(loop, loop.variable);

    expect(accesses.map((a) => `${a.accessType}@${a.location}`)).to.deep.equal(["write@0", "read@0", "read@1", "read@1"]);
    expect(accesses[0]?.node).to.equal(loop);
    expect(accesses[1]?.node).to.equal(loop);
    expect(new VariablesAccessInfo(loop).names).to.deep.equal(["i", "n", "a", "x"]);
  });

  it("treats call arguments as read-write and skips arrays passed to inquiries", () => {
    const info = new VariablesAccessInfo(read("call update(x, a(i, 1) + y)", "y = size(a, 1)"));
    expect(info.names).to.deep.equal(["x", "a", "i", "y"]);
    expect(variable(info, "x").accesses.map((a) => a.accessType)).to.deep.equal(["readwrite"]);
    expect(variable(info, "a").accesses.map((a) => a.accessType)).to.deep.equal(["read"]);
    expect(variable(info, "y").accesses.map((a) => `${a.accessType}@${a.location}`)).to.deep.equal(["read@0", "write@1"]);
  });
});

import { expect } from "chai";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { runMetadata } from "./metadata.js";

const KERNEL = `
module compute_cu_mod
  implicit none
  type, extends(kernel_type) :: compute_cu
    type(go_arg), dimension(3) :: meta_args = (/ &
      go_arg(GO_WRITE, GO_CU, GO_POINTWISE), &
      go_arg(GO_READ, GO_CT, GO_STENCIL(000,011,000)), &
      go_arg(GO_READ, GO_GRID_AREA_T) /)
    integer :: ITERATES_OVER = GO_ALL_PTS
    integer :: index_offset = GO_OFFSET_SW
  contains
    procedure, nopass :: code => compute_cu_code
  end type compute_cu
end module compute_cu_mod
`;

function withFile(name: string, text: string): string {
  const dir = mkdtempSync(join(tmpdir(), "gridweave-metadata-"));
  writeFileSync(join(dir, name), text, "utf-8");
  return dir;
}

describe("@gridweave/cli metadata", () => {
  it("prints a summary of each kernel-metadata type", () => {
    const dir = withFile("compute_cu_mod.f90", KERNEL);
    const result = runMetadata({ dir, argv: ["compute_cu_mod.f90"] });

    expect(result.exitCode).to.equal(0);
    expect(result.stderr).to.deep.equal([]);
    const lines = result.stdout.split("\n");
    expect(lines.slice(0, 4)).to.deep.equal([
      "compute_cu (gocean)",
      "  iterates_over: GO_ALL_PTS",
      "  index_offset: GO_OFFSET_SW",
      "  code: compute_cu_code",
    ]);
    expect(lines.filter((l) => l.startsWith("  arg "))).to.have.length(3);
    expect(lines[4]?.startsWith("  arg 1: field ")).to.equal(true);
    expect(lines[6]?.startsWith("  arg 3: grid-property ")).to.equal(true);
  });

  it("fails with one line per invalid type", () => {
    const dir = withFile("bad.f90", KERNEL.replace("GO_ALL_PTS", "GO_NOWHERE"));
    const result = runMetadata({ dir, argv: ["bad.f90"] });
    expect(result.exitCode).to.equal(1);
    expect(result.stdout).to.equal("");
    expect(result.stderr).to.deep.equal([
      "compute_cu: GW3003: The value of 'iterates_over' should be one of ['go_all_pts', 'go_internal_pts', 'go_external_pts'], but found 'GO_NOWHERE'.",
    ]);
  });

  it("fails when the file holds no kernel metadata", () => {
    const dir = withFile("plain.f90", "subroutine s()\nend subroutine s\n");
    const result = runMetadata({ dir, argv: ["plain.f90"] });
    expect(result).to.deep.equal({ stdout: "", stderr: ["metadata: no kernel metadata types in plain.f90"], exitCode: 1 });
  });
});

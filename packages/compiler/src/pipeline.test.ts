import { expect } from "chai";

import { GenerationError, SymbolError } from "./errors.js";
import { KernelMetadata } from "./metadata/gocean-kernel.js";
import { CompilationContext, kernelMetadata, runAdjoint, runPipeline } from "./pipeline.js";

const STENCIL = `
module smooth_mod
  implicit none
contains
  subroutine smooth(a, b, n, m)
    integer :: n, m
    real, dimension(n, m) :: a, b
    integer :: ji, jj
    do jj = 1, m
      do ji = 1, n
        a(ji, jj) = b(ji, jj) * 2.0
      end do
    end do
  end subroutine smooth
end module smooth_mod
`;

const REDUCTION = `
subroutine total(b, s, n)
  integer :: n
  real, dimension(n) :: b
  real :: s
  integer :: ji
  do ji = 1, n
    s = s + b(ji)
  end do
end subroutine total
`;

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
  type :: plain_t
    integer :: value
  end type plain_t
end module compute_cu_mod
`;

/** The lines from the first one equal to `first` up to and including `last`. */
function slice(text: string, first: string, last: string): string[] {
  const lines = text.split("\n");
  const from = lines.indexOf(first);
  const to = lines.indexOf(last, from);
  return from < 0 || to < 0 ? [] : lines.slice(from, to + 1);
}

describe("@gridweave/compiler pipeline", () => {
  it("specialises loops, parallelises one loop type and profiles kernels", () => {
    const context = new CompilationContext({ profile: ["kernels"] });
    const result = runPipeline(STENCIL, context, { openmpLoopType: "lat" });
    expect(result.counts).to.deep.equal({ specialisedLoops: 2, directives: 1, profileRegions: 1 });
    expect(result.skipped).to.deep.equal([]);
    expect(
      slice(result.text, '    call ProfileStart("smooth_mod", "smooth", profile_psy_data)', "    call ProfileEnd(profile_psy_data)")
    ).to.deep.equal([
      '    call ProfileStart("smooth_mod", "smooth", profile_psy_data)',
      "    !$omp parallel do default(shared), private(ji,jj)",
      "      do jj = 1, m",
      "        do ji = 1, n",
      "          a(ji,jj) = b(ji,jj) * 2.0",
      "        end do",
      "      end do",
      "    !$omp end parallel do",
      "    call ProfileEnd(profile_psy_data)",
    ]);
    expect(result.text.split("\n")).to.include("    use profile_mod, only: ProfileData, ProfileStart, ProfileEnd");
  });

  it("reports loops the OpenMP pass leaves alone", () => {
    const result = runPipeline(REDUCTION, new CompilationContext(), { openmpLoopType: "lon" });
    expect(result.counts).to.deep.equal({ specialisedLoops: 1, directives: 0, profileRegions: 0 });
    expect(result.skipped).to.deep.equal(["loop over 'ji': Variable 's' is read first, which indicates a reduction."]);
    expect(result.text).to.not.include("!$omp");
  });

  it("can leave loops generic", () => {
    const result = runPipeline(REDUCTION, new CompilationContext(), { specialiseLoops: false });
    expect(result.counts.specialisedLoops).to.equal(0);
    expect(slice(result.text, "  do ji = 1, n", "  end do")).to.deep.equal(["  do ji = 1, n", "    s = s + b(ji)", "  end do"]);
  });

  it("parallelises nothing for a loop type the configuration does not use", () => {
    const context = new CompilationContext({ loopTypes: { ji: "columns" } });
    const result = runPipeline(STENCIL, context, { openmpLoopType: "lat" });
    expect(result.counts).to.deep.equal({ specialisedLoops: 2, directives: 0, profileRegions: 0 });
  });

  it("builds one context per run from plain options", () => {
    const context = new CompilationContext({ profile: ["invokes"], gridProperties: ["GO_GRID_DX_T"] });
    expect(context.profiler.options).to.deep.equal(["invokes"]);
    expect(context.gocean.gridProperties).to.deep.equal(["go_grid_dx_t"]);
    expect(context.loopTypes).to.deep.equal({ ji: "lon", jj: "lat", jk: "levels", jt: "tracers" });
    expect(() => new CompilationContext({ profile: ["loops"] })).to.throw(
      GenerationError,
      "Error in Profiler options: options must be one of 'invokes', 'kernels' but found 'loops' at 0"
    );
  });
});

describe("@gridweave/compiler adjoint driver", () => {
  const TANGENT = `
subroutine tl(a, b, x)
  real :: a, b, x
  a = x * b
end subroutine tl
`;

  it("replaces each routine with its adjoint", () => {
    const text = runAdjoint(TANGENT, ["a", "B"]);
    expect(slice(text, "  b = b + a * x", "  a = 0.0")).to.deep.equal(["  b = b + a * x", "  a = 0.0"]);
  });

  it("rejects active variables no routine declares", () => {
    expect(() => runAdjoint(TANGENT, ["a", "q"])).to.throw(SymbolError, "Active variable 'q' not found in any routine.");
  });
});

describe("@gridweave/compiler metadata driver", () => {
  it("parses every kernel-metadata type in the source", () => {
    const reports = kernelMetadata(KERNEL, new CompilationContext(), "gocean");
    expect(reports.map((r) => [r.typeName, r.api])).to.deep.equal([["compute_cu", "gocean"]]);
    const [report] = reports;
    const md = report && "metadata" in report ? report.metadata : null;
    expect(md).to.be.instanceOf(KernelMetadata);
    if (!(md instanceof KernelMetadata)) return;
    expect(md.name).to.equal("compute_cu");
    expect(md.args.map((a) => a.kind)).to.deep.equal(["field", "field", "grid-property"]);
    expect(md.iteratesOver).to.equal("GO_ALL_PTS");
  });

  it("reports validation errors per type", () => {
    const reports = kernelMetadata(KERNEL.replace("GO_ALL_PTS", "GO_NOWHERE"), new CompilationContext());
    const [report] = reports;
    const error = report && "error" in report ? report.error : null;
    expect(error?.code).to.equal("GW3003");
    expect(error?.message).to.equal(
      "The value of 'iterates_over' should be one of ['go_all_pts', 'go_internal_pts', 'go_external_pts'], but found 'GO_NOWHERE'."
    );
  });

  it("validates grid properties against the configured list", () => {
    const context = new CompilationContext({ gridProperties: ["go_grid_dx_t"] });
    const [report] = kernelMetadata(KERNEL, context);
    const error = report && "error" in report ? report.error : null;
    expect(error?.message).to.equal(
      "The second metadata entry for a grid property argument should be one of ['go_grid_dx_t'], but found 'GO_GRID_AREA_T'."
    );
  });
});

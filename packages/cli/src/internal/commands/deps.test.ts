import { expect } from "chai";
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { runDeps } from "./deps.js";

function moduleSource(name: string, uses: readonly string[]): string {
  return [`module ${name}`, ...uses.map((u) => `  ${u}`), "  implicit none", `end module ${name}`, ""].join("\n");
}

describe("@gridweave/cli deps", () => {
  it("prints dependencies first, then external modules", () => {
    const dir = mkdtempSync(join(tmpdir(), "gridweave-deps-"));
    const src = join(dir, "src");
    mkdirSync(src);
    writeFileSync(join(dir, "gridweave.json"), JSON.stringify({ schema: 1, includePaths: ["src"] }) + "\n", "utf-8");
    writeFileSync(join(src, "top.f90"), moduleSource("top", ["use mid", "use netcdf"]), "utf-8");
    writeFileSync(join(src, "mid.f90"), moduleSource("mid", ["use base, only: x"]), "utf-8");
    writeFileSync(join(src, "base.f90"), moduleSource("base", []), "utf-8");

    expect(runDeps({ dir, argv: ["top"] })).to.deep.equal({
      stdout: "base\nmid\ntop\nnetcdf (external)\n",
      stderr: [],
      exitCode: 0,
    });
  });

  it("searches the working directory when no include paths are configured", () => {
    const dir = mkdtempSync(join(tmpdir(), "gridweave-deps-cwd-"));
    writeFileSync(join(dir, "solo.f90"), moduleSource("solo", []), "utf-8");
    expect(runDeps({ dir, argv: ["SOLO"] }).stdout).to.equal("solo\n");
  });

  it("requires a module name", () => {
    expect(() => runDeps({ dir: "/work", argv: [] })).to.throw("deps: missing required <module>");
  });
});

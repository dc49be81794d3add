import { expect } from "chai";
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { contextOptions, findProjectRoot, loadProjectConfig, loadProjectContext, parseProjectConfig } from "./config.js";

function writeConfig(dir: string, value: unknown): string {
  const path = join(dir, "gridweave.json");
  writeFileSync(path, JSON.stringify(value, null, 2) + "\n", "utf-8");
  return path;
}

describe("@gridweave/cli config", () => {
  it("findProjectRoot picks the nearest project root", () => {
    const root = mkdtempSync(join(tmpdir(), "gridweave-config-root-"));
    const nested = join(root, "models", "ocean");
    const deep = join(nested, "src", "kernels");
    mkdirSync(deep, { recursive: true });
    writeConfig(root, { schema: 1 });
    writeConfig(nested, { schema: 1 });

    expect(findProjectRoot(deep)).to.equal(nested);
  });

  it("falls back to defaults when there is no config file", () => {
    const dir = mkdtempSync(join(tmpdir(), "gridweave-config-none-"));
    const ctx = loadProjectContext(dir);
    expect(ctx.projectRoot).to.equal(null);
    expect(ctx.config).to.deep.equal({ schema: 1, api: "generic", includePaths: [], profile: [] });
  });

  it("loads every field and resolves include paths against the config directory", () => {
    const dir = mkdtempSync(join(tmpdir(), "gridweave-config-full-"));
    const path = writeConfig(dir, {
      schema: 1,
      api: "nemo",
      includePaths: ["src", "/opt/shared"],
      profile: ["kernels"],
      loopTypes: { ji: "lon", jk: "levels" },
      gridProperties: ["go_grid_dx_t"],
      openmp: { loopType: "levels" },
    });

    expect(loadProjectConfig(path)).to.deep.equal({
      schema: 1,
      api: "nemo",
      includePaths: [join(dir, "src"), "/opt/shared"],
      profile: ["kernels"],
      loopTypes: { ji: "lon", jk: "levels" },
      gridProperties: ["go_grid_dx_t"],
      openmp: { loopType: "levels" },
    });
  });

  it("passes only the set options on to the compilation context", () => {
    expect(contextOptions(parseProjectConfig({ schema: 1 }, "/work"))).to.deep.equal({ profile: [] });
    expect(contextOptions(parseProjectConfig({ schema: 1, loopTypes: { ji: "x" } }, "/work"))).to.deep.equal({
      profile: [],
      loopTypes: { ji: "x" },
    });
  });

  it("rejects unknown keys at each level", () => {
    expect(() => parseProjectConfig({ schema: 1, extra: true }, "/work")).to.throw("gridweave.json: unknown key 'extra'.");
    expect(() => parseProjectConfig({ schema: 1, openmp: { loopType: "lat", chunk: 4 } }, "/work")).to.throw(
      "gridweave.json: 'openmp': unknown key 'chunk'."
    );
  });

  it("rejects wrong types with the field name", () => {
    expect(() => parseProjectConfig({ schema: 2 }, "/work")).to.throw("Unsupported gridweave.json schema.");
    expect(() => parseProjectConfig([], "/work")).to.throw("gridweave.json must be a JSON object.");
    expect(() => parseProjectConfig({ schema: 1, profile: "kernels" }, "/work")).to.throw(
      "gridweave.json: 'profile' must be an array of non-empty strings."
    );
    expect(() => parseProjectConfig({ schema: 1, api: "dynamo" }, "/work")).to.throw(
      "gridweave.json: 'api' must be one of 'generic', 'gocean', 'lfric', 'nemo'."
    );
    expect(() => parseProjectConfig({ schema: 1, loopTypes: { ji: 3 } }, "/work")).to.throw(
      "gridweave.json: 'loopTypes.ji' must be a non-empty string."
    );
    expect(() => parseProjectConfig({ schema: 1, openmp: {} }, "/work")).to.throw(
      "gridweave.json: 'openmp.loopType' must be a non-empty string."
    );
  });

  it("reports a file that is not JSON", () => {
    const dir = mkdtempSync(join(tmpdir(), "gridweave-config-bad-"));
    const path = join(dir, "gridweave.json");
    writeFileSync(path, "{ schema: 1 }\n", "utf-8");
    expect(() => loadProjectConfig(path)).to.throw(/^gridweave\.json: invalid JSON/);
  });
});

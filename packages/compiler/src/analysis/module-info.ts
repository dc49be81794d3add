import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { ParseError } from "../errors.js";
import { logicalLines } from "../fortran/lexer.js";

const INTRINSIC_MODULES = new Set(["iso_c_binding", "iso_fortran_env", "ieee_arithmetic", "ieee_exceptions", "ieee_features"]);

const USE_RE = /^use\s*(,\s*(non_)?intrinsic\s*)?(?:::)?\s*([A-Za-z]\w*)\s*(?:,\s*only\s*:\s*(.*))?$/i;

/** One `use`d module and the names imported from it. An empty list imports everything. */
export type UsedModule = {
  readonly module: string;
  readonly symbols: readonly string[];
};

/** A module's name and source file. The text is read on first use and kept. */
export class ModuleInfo {
  readonly name: string;
  readonly file: string;
  #text: string | null = null;
  #used: readonly UsedModule[] | null = null;

  constructor(name: string, file: string) {
    this.name = name.toLowerCase();
    this.file = file;
  }

  get text(): string {
    if (this.#text === null) {
      if (!existsSync(this.file)) {
        throw new ParseError(
          "GW4010",
          `Could not find file '${this.file}' when trying to read source code for module '${this.name}'`
        );
      }
      this.#text = readFileSync(this.file, "utf-8");
    }
    return this.#text;
  }

  /**
   * The modules this file uses, in first-use order. Repeated `use` statements
   * for one module are merged; a wildcard import absorbs any `only` list.
   */
  getUsedModules(): readonly UsedModule[] {
    if (this.#used !== null) return this.#used;
    const merged = new Map<string, string[] | null>();
    for (const line of logicalLines(this.text)) {
      const m = USE_RE.exec(line.text);
      const moduleName = m?.[3]?.toLowerCase();
      if (m === null || moduleName === undefined) continue;
      const nature = m[1] === undefined ? "" : m[2] === undefined ? "intrinsic" : "non_intrinsic";
      if (nature === "intrinsic" || (nature === "" && INTRINSIC_MODULES.has(moduleName))) continue;

      const only = m[4];
      const names =
        only === undefined
          ? null
          : only
              .split(",")
              .map((item) => (item.split("=>").pop() ?? "").trim().toLowerCase())
              .filter((n) => n.length > 0);
      const before = merged.get(moduleName);
      if (before === undefined) {
        merged.set(moduleName, names === null ? null : [...new Set(names)]);
      } else if (before !== null) {
        if (names === null) merged.set(moduleName, null);
        else for (const n of names) if (!before.includes(n)) before.push(n);
      }
    }
    this.#used = Object.freeze(
      [...merged].map(([module, symbols]) => Object.freeze({ module, symbols: Object.freeze(symbols ?? []) }))
    );
    return this.#used;
  }
}

/** Finds module source files on a list of include paths. */
export class ModuleLocator {
  readonly includePaths: readonly string[];
  readonly #found = new Map<string, ModuleInfo>();

  constructor(includePaths: readonly string[]) {
    this.includePaths = Object.freeze([...includePaths]);
  }

  static candidates(module: string): readonly string[] {
    const m = module.toLowerCase();
    return [`${m}.f90`, `${m}.F90`, `${m}_mod.f90`, `${m}_mod.F90`];
  }

  has(module: string): boolean {
    return this.#lookup(module) !== undefined;
  }

  find(module: string): ModuleInfo {
    const info = this.#lookup(module);
    if (info === undefined) {
      const [first = module] = ModuleLocator.candidates(module);
      throw new ParseError(
        "GW4010",
        `Could not find file '${first}' when trying to read source code for module '${module.toLowerCase()}'`
      );
    }
    return info;
  }

  #lookup(module: string): ModuleInfo | undefined {
    const key = module.toLowerCase();
    const cached = this.#found.get(key);
    if (cached) return cached;
    for (const dir of this.includePaths) {
      for (const file of ModuleLocator.candidates(key)) {
        const path = join(dir, file);
        if (existsSync(path)) {
          const info = new ModuleInfo(key, path);
          this.#found.set(key, info);
          return info;
        }
      }
    }
    return undefined;
  }
}

/**
 * The transitive `use` graph of a module. Modules with no source on the
 * include paths are recorded as external leaves.
 */
export class ModuleGraph {
  readonly root: string;
  readonly #edges: ReadonlyMap<string, readonly string[]>;
  readonly #order: readonly string[];
  readonly external: readonly string[];

  private constructor(root: string, edges: Map<string, readonly string[]>, order: string[], external: string[]) {
    this.root = root;
    this.#edges = edges;
    this.#order = Object.freeze(order);
    this.external = Object.freeze(external);
  }

  static build(root: string, locator: ModuleLocator): ModuleGraph {
    const start = root.toLowerCase();
    const edges = new Map<string, readonly string[]>();
    const order: string[] = [];
    const external: string[] = [];
    const done = new Set<string>();
    const stack: string[] = [];

    const visit = (name: string): void => {
      if (done.has(name)) return;
      const at = stack.indexOf(name);
      if (at >= 0) {
        throw new ParseError("GW4011", `Cyclic module dependency: ${[...stack.slice(at), name].join(" -> ")}.`);
      }
      if (name !== start && !locator.has(name)) {
        done.add(name);
        external.push(name);
        return;
      }
      stack.push(name);
      const deps = locator
        .find(name)
        .getUsedModules()
        .map((u) => u.module);
      edges.set(name, Object.freeze(deps));
      for (const dep of deps) visit(dep);
      stack.pop();
      done.add(name);
      order.push(name);
    };

    visit(start);
    return new ModuleGraph(start, edges, order, external);
  }

  /** Modules used directly by `module`, or an empty list for an external one. */
  dependencies(module: string): readonly string[] {
    return this.#edges.get(module.toLowerCase()) ?? [];
  }

  /** Every module with source, each after all the modules it uses. */
  order(): readonly string[] {
    return this.#order;
  }
}

import { ModuleGraph, ModuleLocator } from "@gridweave/compiler";

import { loadProjectContext } from "../config.js";
import { parseFlags, singleFile, type CommandArgs, type CommandResult } from "./common.js";

/**
 * Prints the modules `module` depends on, each after the modules it uses, then
 * the modules found on no include path.
 */
export function runDeps(args: CommandArgs): CommandResult {
  const parsed = parseFlags("deps", args.argv, { values: [], switches: [] });
  const module = singleFile("deps", parsed.positional, "<module>");
  const { config } = loadProjectContext(args.dir);
  const includePaths = config.includePaths.length > 0 ? config.includePaths : [args.dir];

  const graph = ModuleGraph.build(module, new ModuleLocator(includePaths));
  const lines = [...graph.order(), ...graph.external.map((m) => `${m} (external)`)];
  return { stdout: lines.join("\n") + "\n", stderr: [], exitCode: 0 };
}

import { runAdjoint } from "@gridweave/compiler";

import { parseFlags, readSource, singleFile, type CommandArgs, type CommandResult } from "./common.js";

export type AdjointParsed = {
  readonly file: string;
  readonly active: readonly string[];
};

export function parseAdjointArgs(args: CommandArgs): AdjointParsed {
  const parsed = parseFlags("adjoint", args.argv, { values: ["--active"], switches: [] });
  const file = singleFile("adjoint", parsed.positional);
  const raw = parsed.values.get("--active");
  if (raw === undefined) throw new Error("adjoint: missing required --active <name,...>");
  const active = raw
    .split(",")
    .map((n) => n.trim())
    .filter((n) => n.length > 0);
  if (active.length === 0) throw new Error("adjoint: --active needs at least one variable name");
  return { file, active };
}

export function runAdjointCommand(args: CommandArgs): CommandResult {
  const parsed = parseAdjointArgs(args);
  const source = readSource("adjoint", args.dir, parsed.file);
  return { stdout: runAdjoint(source.text, parsed.active, source.path), stderr: [], exitCode: 0 };
}

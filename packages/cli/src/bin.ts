import { argv, cwd, exit } from "node:process";
import { pathToFileURL } from "node:url";

import { CompileError, InternalError } from "@gridweave/compiler";

import { runAdjointCommand } from "./internal/commands/adjoint.js";
import type { CommandResult } from "./internal/commands/common.js";
import { runDeps } from "./internal/commands/deps.js";
import { runMetadata } from "./internal/commands/metadata.js";
import { runTransform } from "./internal/commands/transform.js";

export type Cmd = "transform" | "metadata" | "adjoint" | "deps" | "help";

export function usage(): string {
  return [
    "gridweave v0",
    "",
    "Usage:",
    "  gridweave transform <file> [--verbose]",
    "  gridweave metadata <file>",
    "  gridweave adjoint <file> --active <name,...>",
    "  gridweave deps <module>",
    "  gridweave help",
    "",
  ].join("\n");
}

export function parseCommand(args: readonly string[]): Cmd {
  const [cmd] = args;
  if (!cmd) return "help";
  if (cmd === "transform" || cmd === "metadata" || cmd === "adjoint" || cmd === "deps" || cmd === "help") return cmd;
  return "help";
}

/** One failure line for the console. */
export function formatError(err: unknown): string {
  if (err instanceof InternalError) return `internal error: ${err.code}: ${err.message}`;
  if (err instanceof CompileError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Runs one command line against `dir`. Failures come back as results, never as throws. */
export function dispatch(args: readonly string[], dir: string): CommandResult {
  const cmd = parseCommand(args);
  const rest = { dir, argv: args.slice(1) };
  try {
    switch (cmd) {
      case "transform":
        return runTransform(rest);
      case "metadata":
        return runMetadata(rest);
      case "adjoint":
        return runAdjointCommand(rest);
      case "deps":
        return runDeps(rest);
      default:
        return { stdout: usage(), stderr: [], exitCode: args[0] === "help" ? 0 : 1 };
    }
  } catch (err: unknown) {
    return { stdout: "", stderr: [formatError(err)], exitCode: 1 };
  }
}

function main(): void {
  const result = dispatch(argv.slice(2), cwd());
  if (result.stdout.length > 0) console.log(result.stdout.endsWith("\n") ? result.stdout.slice(0, -1) : result.stdout);
  for (const line of result.stderr) console.error(line);
  exit(result.exitCode);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main();
}

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

export type CommandArgs = {
  readonly dir: string;
  readonly argv: readonly string[];
};

/** What a command prints. The dispatcher owns the console and the exit status. */
export type CommandResult = {
  readonly stdout: string;
  readonly stderr: readonly string[];
  readonly exitCode: 0 | 1;
};

export function readSource(command: string, dir: string, file: string): { readonly path: string; readonly text: string } {
  const path = resolve(dir, file);
  if (!existsSync(path)) {
    throw new Error(`${command}: file not found: ${file}`);
  }
  return { path, text: readFileSync(path, "utf-8") };
}

/** Walks `argv`, handing each flag its value. Bare words go to `positional`. */
export function parseFlags(
  command: string,
  argv: readonly string[],
  flags: {
    readonly values: readonly string[];
    readonly switches: readonly string[];
  }
): { readonly positional: readonly string[]; readonly values: ReadonlyMap<string, string>; readonly switches: ReadonlySet<string> } {
  const positional: string[] = [];
  const values = new Map<string, string>();
  const switches = new Set<string>();

  const it = argv[Symbol.iterator]();
  while (true) {
    const next = it.next();
    if (next.done) break;
    const a = next.value;
    if (flags.switches.includes(a)) {
      switches.add(a);
    } else if (flags.values.includes(a)) {
      const v = it.next();
      if (v.done) throw new Error(`${command}: ${a} requires a value`);
      values.set(a, v.value);
    } else if (a.startsWith("-")) {
      throw new Error(`${command}: unknown arg: ${a}`);
    } else {
      positional.push(a);
    }
  }
  return { positional, values, switches };
}

export function singleFile(command: string, positional: readonly string[], what = "<file>"): string {
  const [file, ...extra] = positional;
  if (file === undefined) throw new Error(`${command}: missing required ${what}`);
  const [unexpected] = extra;
  if (unexpected !== undefined) throw new Error(`${command}: unexpected arg: ${unexpected}`);
  return file;
}

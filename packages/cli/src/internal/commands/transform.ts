import { CompilationContext, runPipeline, type Api } from "@gridweave/compiler";

import { contextOptions, loadProjectContext } from "../config.js";
import { parseFlags, readSource, singleFile, type CommandArgs, type CommandResult } from "./common.js";

export type TransformParsed = {
  readonly file: string;
  readonly verbose: boolean;
};

export function parseTransformArgs(args: CommandArgs): TransformParsed {
  const parsed = parseFlags("transform", args.argv, { values: [], switches: ["--verbose"] });
  return { file: singleFile("transform", parsed.positional), verbose: parsed.switches.has("--verbose") };
}

// GOcean and LFRic sources do not use the NEMO loop variables.
function specialisesLoops(api: Api): boolean {
  return api === "generic" || api === "nemo";
}

export function runTransform(args: CommandArgs): CommandResult {
  const parsed = parseTransformArgs(args);
  const { config } = loadProjectContext(args.dir);
  const source = readSource("transform", args.dir, parsed.file);

  const context = new CompilationContext(contextOptions(config));
  const result = runPipeline(source.text, context, {
    fileName: source.path,
    specialiseLoops: specialisesLoops(config.api),
    ...(config.openmp ? { openmpLoopType: config.openmp.loopType } : {}),
  });

  const stderr = parsed.verbose
    ? [
        `specialised ${result.counts.specialisedLoops} loops`,
        `added ${result.counts.directives} directives`,
        `added ${result.counts.profileRegions} profile regions`,
        ...result.skipped.map((s) => `skipped ${s}`),
      ]
    : [];
  return { stdout: result.text, stderr, exitCode: 0 };
}

import { CompilationContext, KernelMetadata, kernelMetadata, type MetadataReport } from "@gridweave/compiler";

import { contextOptions, loadProjectContext } from "../config.js";
import { parseFlags, readSource, singleFile, type CommandArgs, type CommandResult } from "./common.js";

function summary(report: MetadataReport): string[] {
  if ("error" in report) return [];
  const md = report.metadata;
  const head = `${report.typeName} (${report.api})`;
  if (md instanceof KernelMetadata) {
    return [
      head,
      `  iterates_over: ${md.iteratesOver}`,
      `  index_offset: ${md.indexOffset}`,
      `  code: ${md.code}`,
      ...md.args.map((a, i) => `  arg ${i + 1}: ${a.kind} ${a.text}`),
    ];
  }
  return [
    head,
    `  operates_on: ${md.operatesOn}`,
    `  code: ${md.code}`,
    ...md.metaArgs.map((a, i) => `  arg ${i + 1}: ${a.fortranString()}`),
  ];
}

/** Prints each kernel-metadata type in a file. Any type that fails validation makes the run fail. */
export function runMetadata(args: CommandArgs): CommandResult {
  const parsed = parseFlags("metadata", args.argv, { values: [], switches: [] });
  const file = singleFile("metadata", parsed.positional);
  const { config } = loadProjectContext(args.dir);
  const source = readSource("metadata", args.dir, file);

  const reports = kernelMetadata(source.text, new CompilationContext(contextOptions(config)), config.api);
  if (reports.length === 0) {
    return { stdout: "", stderr: [`metadata: no kernel metadata types in ${file}`], exitCode: 1 };
  }

  const stdout = reports.flatMap(summary);
  const stderr = reports.flatMap((r) => ("error" in r ? [`${r.typeName}: ${r.error.code}: ${r.error.message}`] : []));
  return {
    stdout: stdout.length > 0 ? stdout.join("\n") + "\n" : "",
    stderr,
    exitCode: stderr.length > 0 ? 1 : 0,
  };
}

import { DependencyTools } from "./analysis/dependency-tools.js";
import { CompileError, SymbolError } from "./errors.js";
import { FortranReader } from "./fortran/reader.js";
import { FortranWriter } from "./fortran/writer.js";
import { ParallelLoopDirective } from "./ir/directives.js";
import { DomainLoop } from "./ir/domain.js";
import { Container, FileContainer, Routine } from "./ir/scopes.js";
import type { ScopingNode } from "./ir/scopes.js";
import { Loop } from "./ir/statements.js";
import { KernelMetadata, loadGoceanVocabulary } from "./metadata/gocean-kernel.js";
import type { GoceanVocabulary } from "./metadata/gocean-kernel.js";
import { LfricKernelMetadata } from "./metadata/lfric-kernel.js";
import { NameSpace } from "./names.js";
import { UnknownFortranType } from "./symbols/datatypes.js";
import { createTypeFamilyRegistry } from "./symbols/type-families.js";
import type { TypeFamilyRegistry } from "./symbols/type-families.js";
import { DataSymbol, DataTypeSymbol } from "./symbols/symbols.js";
import { AdjointRoutineTrans } from "./transformations/adjoint-routine.js";
import { DEFAULT_LOOP_TYPES, DomainLoopTrans } from "./transformations/domain-loop.js";
import { ParallelLoopTrans } from "./transformations/parallel.js";
import { Profiler } from "./transformations/profile.js";

export const APIS = ["generic", "gocean", "lfric", "nemo"] as const;
export type Api = (typeof APIS)[number];

export type CompilationContextOptions = {
  readonly profile?: readonly string[];
  readonly loopTypes?: Readonly<Record<string, string>>;
  readonly gridProperties?: readonly string[];
};

/** State shared by every pass of one compilation run. */
export class CompilationContext {
  readonly typeFamilies: TypeFamilyRegistry;
  readonly names: NameSpace;
  readonly profiler: Profiler;
  readonly gocean: GoceanVocabulary;
  readonly loopTypes: Readonly<Record<string, string>>;

  constructor(options: CompilationContextOptions = {}) {
    this.typeFamilies = createTypeFamilyRegistry();
    this.names = new NameSpace();
    this.profiler = new Profiler(options.profile ?? [], this.names);
    this.gocean = loadGoceanVocabulary(options.gridProperties ? { gridProperties: options.gridProperties } : {});
    this.loopTypes = Object.freeze({ ...(options.loopTypes ?? DEFAULT_LOOP_TYPES) });
  }
}

export type PipelineOptions = {
  readonly fileName?: string;
  /** Defaults to true. Always on when `openmpLoopType` is set. */
  readonly specialiseLoops?: boolean;
  /** Adds `!$omp parallel do` around the outermost loops of this type. */
  readonly openmpLoopType?: string;
};

export type PassCounts = {
  readonly specialisedLoops: number;
  readonly directives: number;
  readonly profileRegions: number;
};

export type PipelineResult = {
  readonly text: string;
  readonly counts: PassCounts;
  /** One message per loop the OpenMP pass left alone because of a dependency. */
  readonly skipped: readonly string[];
};

function routinesOf(file: FileContainer): Routine[] {
  return file.walk(Routine);
}

function specialiseLoops(file: FileContainer, context: CompilationContext): number {
  const generic = file.walk(Loop).filter((l) => !(l instanceof DomainLoop)).length;
  new DomainLoopTrans().apply(file, { loopTypes: context.loopTypes });
  return generic;
}

function addParallelLoops(file: FileContainer, loopType: string, skipped: string[]): number {
  const trans = new ParallelLoopTrans();
  const dependencies = new DependencyTools();
  let added = 0;
  for (const loop of file.walk(DomainLoop)) {
    if (loop.loopType !== loopType || loop.ancestor(ParallelLoopDirective) !== null) continue;
    const check = dependencies.canLoopBeParallelised(loop);
    if (!check.ok) {
      skipped.push(`loop over '${loop.variable.name}': ${check.messages.join(" ")}`);
      continue;
    }
    trans.apply(loop);
    added++;
  }
  return added;
}

/** Reads, rewrites and writes one source file with the context's settings. */
export function runPipeline(source: string, context: CompilationContext, options: PipelineOptions = {}): PipelineResult {
  const file = new FortranReader().fromSource(source, options.fileName);
  const skipped: string[] = [];
  const openmp = options.openmpLoopType;

  const specialisedLoops = options.specialiseLoops !== false || openmp !== undefined ? specialiseLoops(file, context) : 0;
  const directives = openmp !== undefined ? addParallelLoops(file, openmp, skipped) : 0;
  let profileRegions = 0;
  for (const routine of routinesOf(file)) profileRegions += context.profiler.addProfileNodes(routine);

  return {
    text: new FortranWriter().write(file),
    counts: { specialisedLoops, directives, profileRegions },
    skipped,
  };
}

/**
 * Replaces every routine in the source with its adjoint. `active` names the
 * active variables; each routine uses the ones it can see.
 */
export function runAdjoint(source: string, active: readonly string[], fileName?: string): string {
  const file = new FortranReader().fromSource(source, fileName);
  const routines = routinesOf(file);
  const seen = new Set<string>();
  for (const routine of routines) {
    const symbols = active
      .map((name) => routine.symbolTable.find(name))
      .filter((s): s is DataSymbol => s instanceof DataSymbol);
    for (const s of symbols) seen.add(s.name.toLowerCase());
    new AdjointRoutineTrans(symbols).apply(routine);
  }
  const missing = active.filter((name) => !seen.has(name.toLowerCase()));
  if (missing.length > 0) {
    throw new SymbolError(
      "GW1102",
      `Active variable${missing.length === 1 ? "" : "s"} ${missing.map((m) => `'${m}'`).join(", ")} not found in any routine.`
    );
  }
  return new FortranWriter().write(file);
}

export type MetadataReport =
  | { readonly typeName: string; readonly api: "gocean" | "lfric"; readonly metadata: KernelMetadata | LfricKernelMetadata }
  | { readonly typeName: string; readonly api: "gocean" | "lfric"; readonly error: CompileError };

function metadataApi(api: Api, declaration: string): "gocean" | "lfric" {
  if (api === "gocean" || api === "lfric") return api;
  return /\boperates_on\b/i.test(declaration) ? "lfric" : "gocean";
}

/**
 * Parses every kernel-metadata type (a derived type with a `meta_args`
 * component) in the source. A type that fails validation is reported with its
 * error instead of aborting the run.
 */
export function kernelMetadata(source: string, context: CompilationContext, api: Api = "generic"): MetadataReport[] {
  const file = new FortranReader().fromSource(source);
  const scopes: ScopingNode[] = [file, ...file.walk(Container), ...file.walk(Routine)];
  const reports: MetadataReport[] = [];
  for (const scope of scopes) {
    for (const symbol of scope.symbolTable.dataTypeSymbols) {
      const t = symbol.datatype;
      if (!(t instanceof UnknownFortranType) || !/\bmeta_args\b/i.test(t.declaration)) continue;
      reports.push(parseMetadata(symbol, t.declaration, metadataApi(api, t.declaration), context));
    }
  }
  return reports;
}

function parseMetadata(symbol: DataTypeSymbol, declaration: string, api: "gocean" | "lfric", context: CompilationContext): MetadataReport {
  try {
    const metadata =
      api === "lfric" ? LfricKernelMetadata.fromDeclaration(declaration) : KernelMetadata.fromSymbol(symbol, context.gocean);
    return { typeName: symbol.name, api, metadata };
  } catch (err) {
    if (!(err instanceof CompileError)) throw err;
    return { typeName: symbol.name, api, error: err };
  }
}

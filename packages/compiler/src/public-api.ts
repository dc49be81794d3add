export {
  CompileError,
  DataTypeError,
  GenerationError,
  InternalError,
  ParseError,
  SymbolError,
  TangentLinearError,
  TransformationError,
} from "./errors.js";
export { COMPILER_DIAGNOSTIC_CODES, compilerDiagnosticDomain, compilerDiagnosticSummary } from "./diagnostics.js";
export type { CompilerDiagnosticCode, CompilerDiagnosticDomain } from "./diagnostics.js";

export { APIS, CompilationContext, kernelMetadata, runAdjoint, runPipeline } from "./pipeline.js";
export type {
  Api,
  CompilationContextOptions,
  MetadataReport,
  PassCounts,
  PipelineOptions,
  PipelineResult,
} from "./pipeline.js";

export { FortranReader } from "./fortran/reader.js";
export { FortranWriter } from "./fortran/writer.js";
export { ModuleGraph, ModuleInfo, ModuleLocator } from "./analysis/module-info.js";
export type { UsedModule } from "./analysis/module-info.js";
export { NameSpace } from "./names.js";

export { DEFAULT_LOOP_TYPES, DomainLoopTrans } from "./transformations/domain-loop.js";
export { TaskTrans } from "./transformations/task.js";
export { ParallelLoopTrans, ParallelTrans, SingleTrans } from "./transformations/parallel.js";
export { PROFILE_OPTIONS, ProfileTrans, Profiler } from "./transformations/profile.js";
export { ExtractTrans } from "./transformations/extract.js";
export { MoveTrans } from "./transformations/move.js";
export { AssignmentTrans } from "./transformations/adjoint-assignment.js";
export { AdjointRoutineTrans } from "./transformations/adjoint-routine.js";

export { KernelMetadata, loadGoceanVocabulary } from "./metadata/gocean-kernel.js";
export { LfricKernelMetadata } from "./metadata/lfric-kernel.js";
export { createTypeFamilyRegistry, TypeFamilyRegistry } from "./symbols/type-families.js";

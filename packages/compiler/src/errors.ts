import { assertCompilerDiagnosticCode } from "./diagnostics.js";

/**
 * Base class for every failure the compiler reports. The code is a registered
 * `GWnnnn` diagnostic.
 */
export class CompileError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    assertCompilerDiagnosticCode(code);
    super(message);
    this.code = code;
    this.name = "CompileError";
  }
}

/** Bad arguments to a type descriptor or symbol constructor. */
export class DataTypeError extends CompileError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "DataTypeError";
  }
}

/** Symbol-table misses and clashes. */
export class SymbolError extends CompileError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "SymbolError";
  }
}

/** A node was built or mutated in violation of its shape contract. */
export class GenerationError extends CompileError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "GenerationError";
  }
}

/** Malformed metadata or source text. */
export class ParseError extends CompileError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "ParseError";
  }
}

export class TransformationError extends CompileError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "TransformationError";
  }
}

/** A tangent-linear assignment does not satisfy the adjoint preconditions. */
export class TangentLinearError extends TransformationError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "TangentLinearError";
  }
}

/**
 * An invariant that correct upstream construction guarantees was broken. This
 * points at a bug in an earlier pass, not at the input.
 */
export class InternalError extends CompileError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "InternalError";
  }
}

export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "Array";
  if (typeof value === "object") return value.constructor?.name ?? "Object";
  return typeof value;
}

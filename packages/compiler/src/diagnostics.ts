export type CompilerDiagnosticDomain =
  | "types"
  | "symbols"
  | "ir"
  | "metadata"
  | "analysis"
  | "transform"
  | "fortran"
  | "internal"
  | "other";

const DIAGNOSTICS = {
  GW1001: "Unknown scalar intrinsic.",
  GW1002: "Invalid scalar precision.",
  GW1003: "Invalid array element type.",
  GW1004: "Invalid array shape.",
  GW1005: "Type family given the wrong number of dimensions.",
  GW1006: "Type family symbol given the wrong attributes.",
  GW1007: "Invalid dimension literal.",
  GW1008: "Invalid symbol construction argument.",
  GW1009: "Invalid structure component.",
  GW1101: "Duplicate symbol in a symbol table.",
  GW1102: "Symbol not found.",
  GW1103: "Symbol is not of the expected kind.",
  GW1104: "Symbol cannot be removed.",
  GW1105: "Invalid routine argument list.",
  GW1106: "Unknown type family.",
  GW2001: "Invalid child for node.",
  GW2002: "Node already has a parent.",
  GW2003: "Invalid array reference creation.",
  GW2004: "Invalid literal value.",
  GW2005: "Array dimension index out of range.",
  GW2006: "Invalid node creation argument.",
  GW2007: "Operation requires an attached node.",
  GW2008: "Invalid profiler option.",
  GW3001: "Malformed derived-type declaration.",
  GW3002: "Wrong number of metadata argument entries.",
  GW3003: "Metadata value outside its allowed set.",
  GW3004: "Malformed stencil entry.",
  GW3005: "Wrong number of stencil entries.",
  GW3006: "Duplicate metadata section.",
  GW3007: "Missing metadata section.",
  GW3008: "Unknown metadata entry.",
  GW3009: "Missing type-bound procedure section.",
  GW3010: "Wrong number of type-bound procedures.",
  GW3011: "Metadata values unset before serialization.",
  GW3012: "Malformed metadata argument.",
  GW3013: "Invalid field vector length.",
  GW4001: "Array reference in a task loop bound.",
  GW4002: "Shared loop variable in a task.",
  GW4003: "Shared variable used as an index in a task.",
  GW4004: "Unsupported operator in a task index.",
  GW4005: "Unsupported operands in a task index.",
  GW4006: "Array reference in a task index.",
  GW4007: "Unsupported task index expression.",
  GW4010: "Module source not found.",
  GW4011: "Cyclic module dependency.",
  GW5001: "Transformation applied to an unsupported node.",
  GW5002: "Invalid node range for a transformation.",
  GW5003: "Loop-carried dependency.",
  GW5004: "Statement move crosses a dependency.",
  GW5005: "Invalid transformation option.",
  GW5101: "Adjoint target is not an assignment.",
  GW5102: "Active right-hand side with a passive target.",
  GW5103: "Term without an active variable.",
  GW5104: "Term with several active variables.",
  GW5105: "Active variable under an unsupported operator.",
  GW5106: "Active variable used as a divisor.",
  GW5107: "Unsupported statement in an adjoint routine.",
  GW6001: "Fortran syntax error.",
  GW6002: "Unterminated Fortran block.",
  GW6004: "Invalid Fortran expression.",
  GW6005: "Node cannot be rendered as Fortran.",
  GW9001: "Malformed array access.",
  GW9002: "Unexpected IR shape.",
  GW9003: "Malformed packaged data table.",
} as const;

export type CompilerDiagnosticCode = keyof typeof DIAGNOSTICS;

export const COMPILER_DIAGNOSTIC_CODES: readonly CompilerDiagnosticCode[] = Object.freeze(
  Object.keys(DIAGNOSTICS).filter(isCompilerDiagnosticCode)
);

export function isCompilerDiagnosticCode(code: string): code is CompilerDiagnosticCode {
  return Object.prototype.hasOwnProperty.call(DIAGNOSTICS, code);
}

export function assertCompilerDiagnosticCode(code: string): asserts code is CompilerDiagnosticCode {
  if (!isCompilerDiagnosticCode(code)) {
    throw new Error(`Unknown compiler diagnostic code '${code}'.`);
  }
}

export function compilerDiagnosticSummary(code: CompilerDiagnosticCode): string {
  return DIAGNOSTICS[code];
}

export function compilerDiagnosticDomain(code: string): CompilerDiagnosticDomain {
  const m = /^GW(\d{4})$/.exec(code);
  if (!m || !isCompilerDiagnosticCode(code)) return "other";
  const n = Number(m[1]);
  if (n >= 1000 && n < 1100) return "types";
  if (n >= 1100 && n < 2000) return "symbols";
  if (n >= 2000 && n < 3000) return "ir";
  if (n >= 3000 && n < 4000) return "metadata";
  if (n >= 4000 && n < 5000) return "analysis";
  if (n >= 5000 && n < 6000) return "transform";
  if (n >= 6000 && n < 7000) return "fortran";
  if (n >= 9000) return "internal";
  return "other";
}

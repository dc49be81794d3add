import { parallelPrivateNames } from "../analysis/task-clauses.js";
import { GenerationError } from "../errors.js";
import {
  ArrayMember,
  ArrayReference,
  BinaryOperation,
  Literal,
  Member,
  Range,
  Reference,
  StructureMember,
  StructureReference,
  UnaryOperation,
} from "../ir/data.js";
import type { BinaryOperator } from "../ir/data.js";
import {
  ParallelDirective,
  ParallelLoopDirective,
  SingleDirective,
  TaskDirective,
} from "../ir/directives.js";
import type { ReferenceListClause } from "../ir/directives.js";
import { KernelMarker } from "../ir/domain.js";
import { DataNode, Node } from "../ir/node.js";
import { ExtractNode, ProfileNode } from "../ir/regions.js";
import { Container, FileContainer, Routine, Schedule } from "../ir/scopes.js";
import type { Preamble } from "../ir/scopes.js";
import { Assignment, Call, CodeBlock, IfBlock, Loop } from "../ir/statements.js";
import { ArrayType, ScalarType, StructureType } from "../symbols/datatypes.js";
import type { Extent } from "../symbols/datatypes.js";
import type { SymbolTable } from "../symbols/symbol-table.js";
import { DataSymbol, DataTypeSymbol } from "../symbols/symbols.js";
import type { ArgumentAccess, SymbolDatatype } from "../symbols/symbols.js";

const INDENT = "  ";

const OPERATOR_TEXT: Readonly<Partial<Record<BinaryOperator, string>>> = {
  ADD: "+",
  SUB: "-",
  MUL: "*",
  DIV: "/",
  POW: "**",
  EQ: "==",
  NE: "/=",
  GT: ">",
  LT: "<",
  GE: ">=",
  LE: "<=",
  AND: ".and.",
  OR: ".or.",
  EQV: ".eqv.",
  NEQV: ".neqv.",
};

const BINARY_PRECEDENCE: Readonly<Partial<Record<BinaryOperator, number>>> = {
  EQV: 1,
  NEQV: 1,
  OR: 2,
  AND: 3,
  EQ: 5,
  NE: 5,
  GT: 5,
  LT: 5,
  GE: 5,
  LE: 5,
  ADD: 6,
  SUB: 6,
  MUL: 8,
  DIV: 8,
  POW: 9,
};

const RELATIONAL_PRECEDENCE = 5;
const INTRINSIC_PRECEDENCE = 10;
const ATOM_PRECEDENCE = 11;

const INTENT_TEXT: Readonly<Record<ArgumentAccess, string | null>> = {
  read: "in",
  write: "out",
  readwrite: "inout",
  unknown: null,
};

function precedence(node: DataNode): number {
  if (node instanceof BinaryOperation) return BINARY_PRECEDENCE[node.operator] ?? INTRINSIC_PRECEDENCE;
  if (node instanceof UnaryOperation) {
    if (node.operator === "NOT") return 4;
    if (node.operator === "MINUS" || node.operator === "PLUS") return 6;
    return INTRINSIC_PRECEDENCE;
  }
  return ATOM_PRECEDENCE;
}

function unrenderable(node: Node): never {
  throw new GenerationError("GW6005", `Cannot write a '${node.nodeName}' as Fortran.`);
}

function extentText(e: Extent): string {
  switch (e.kind) {
    case "literal":
      return String(e.value);
    case "symbol":
      return e.symbol.name;
    case "deferred":
    case "attribute":
      return ":";
  }
}

function scalarText(t: ScalarType): string {
  const word = t.intrinsic === "boolean" ? "logical" : t.intrinsic;
  const p = t.precision;
  if (p instanceof DataSymbol) return `${word}(kind=${p.name})`;
  if (typeof p === "number") return `${word}(kind=${p})`;
  if (p === "double" && t.intrinsic === "real") return "double precision";
  return word;
}

/** Writes IR back to free-form Fortran. */
export class FortranWriter {
  write(node: Node): string {
    if (node instanceof DataNode) return this.expression(node);
    return `${this.#lines(node, "").join("\n")}\n`;
  }

  expression(node: DataNode): string {
    if (node instanceof Literal) return this.#literal(node);
    if (node instanceof ArrayReference) {
      return `${node.name}(${node.indices().map((idx, i) => this.#arrayIndex(node, i, idx)).join(",")})`;
    }
    if (node instanceof StructureReference) return `${node.name}%${this.#member(node.member)}`;
    if (node instanceof Reference) return node.name;
    if (node instanceof Range) return this.#range(node, false, false);
    if (node instanceof BinaryOperation) return this.#binary(node);
    if (node instanceof UnaryOperation) return this.#unary(node);
    return unrenderable(node);
  }

  #literal(node: Literal): string {
    const t = node.datatype;
    const kind = t.precision instanceof DataSymbol ? `_${t.precision.name}` : typeof t.precision === "number" ? `_${t.precision}` : "";
    switch (t.intrinsic) {
      case "boolean":
        return `.${node.value}.`;
      case "character":
        return `'${node.value.replace(/'/g, "''")}'`;
      case "real":
        if (t.precision === "double" && !/[dD]/.test(node.value)) {
          return /[eE]/.test(node.value) ? node.value.replace(/[eE]/, "d") : `${node.value}d0`;
        }
        return `${node.value}${kind}`;
      case "integer":
        return `${node.value}${kind}`;
    }
  }

  #range(r: Range, lowerIsBound: boolean, upperIsBound: boolean): string {
    const lo = lowerIsBound ? "" : this.expression(r.start);
    const hi = upperIsBound ? "" : this.expression(r.stop);
    const step = r.step;
    const unit = step instanceof Literal && step.value === "1";
    return unit ? `${lo}:${hi}` : `${lo}:${hi}:${this.expression(step)}`;
  }

  #arrayIndex(ref: ArrayReference, i: number, idx: DataNode): string {
    if (idx instanceof Range) return this.#range(idx, ref.isLowerBound(i), ref.isUpperBound(i));
    return this.expression(idx);
  }

  #member(m: Member): string {
    if (m instanceof ArrayMember) return `${m.name}(${m.indices().map((i) => this.expression(i)).join(",")})`;
    if (m instanceof StructureMember) return `${m.name}%${this.#member(m.member)}`;
    return m.name;
  }

  #binary(node: BinaryOperation): string {
    const op = OPERATOR_TEXT[node.operator];
    if (op === undefined) {
      return `${node.operator}(${this.expression(node.lhs)}, ${this.expression(node.rhs)})`;
    }
    const p = precedence(node);
    const lp = precedence(node.lhs);
    const rp = precedence(node.rhs);
    const leftParens = lp < p || (lp === p && (node.operator === "POW" || p === RELATIONAL_PRECEDENCE));
    // Two adjacent operators (`a - -b`) are not Fortran.
    const signed = node.rhs instanceof UnaryOperation && (node.rhs.operator === "MINUS" || node.rhs.operator === "PLUS");
    const rightParens = rp <= p || signed;
    const lhs = leftParens ? `(${this.expression(node.lhs)})` : this.expression(node.lhs);
    const rhs = rightParens ? `(${this.expression(node.rhs)})` : this.expression(node.rhs);
    return `${lhs} ${op} ${rhs}`;
  }

  #unary(node: UnaryOperation): string {
    const inner = this.expression(node.operand);
    const p = precedence(node);
    const wrapped = precedence(node.operand) <= p ? `(${inner})` : inner;
    switch (node.operator) {
      case "MINUS":
        return `-${wrapped}`;
      case "PLUS":
        return `+${wrapped}`;
      case "NOT":
        return `.not. ${wrapped}`;
      default:
        return `${node.operator}(${inner})`;
    }
  }

  #lines(node: Node, ind: string): string[] {
    if (node instanceof FileContainer) return this.#file(node);
    if (node instanceof Container) return this.#module(node, ind);
    if (node instanceof Routine) return this.#routine(node, ind);
    if (node instanceof Schedule) return this.#body(node, ind);
    if (node instanceof Assignment) return [`${ind}${this.expression(node.lhs)} = ${this.expression(node.rhs)}`];
    if (node instanceof Loop) return this.#loop(node, ind);
    if (node instanceof IfBlock) return [...this.#ifChain(node, ind, "if"), `${ind}end if`];
    if (node instanceof Call) {
      return [`${ind}call ${node.routine.name}(${node.arguments.map((a) => this.expression(a)).join(", ")})`];
    }
    if (node instanceof CodeBlock) return node.lines.map((l) => `${ind}${l}`);
    if (node instanceof KernelMarker) return this.#body(node.body, ind);
    if (node instanceof TaskDirective) return this.#task(node, ind);
    if (node instanceof ParallelLoopDirective) {
      return this.#directive(ind, `parallel do ${this.#parallelClauses(node.dirBody)}`, node.dirBody, "parallel do");
    }
    if (node instanceof ParallelDirective) {
      return this.#directive(ind, `parallel ${this.#parallelClauses(node.dirBody)}`, node.dirBody, "parallel");
    }
    if (node instanceof SingleDirective) {
      return this.#directive(ind, "single", node.dirBody, node.nowait ? "single nowait" : "single");
    }
    if (node instanceof ProfileNode) {
      const v = node.variable.name;
      return [
        `${ind}call ProfileStart("${node.moduleName}", "${node.regionName}", ${v})`,
        ...this.#body(node.body, ind),
        `${ind}call ProfileEnd(${v})`,
      ];
    }
    if (node instanceof ExtractNode) return this.#extract(node, ind);
    return unrenderable(node);
  }

  #body(schedule: Schedule, ind: string): string[] {
    return schedule.statements.flatMap((s) => this.#lines(s, ind));
  }

  #loop(node: Loop, ind: string): string[] {
    const step = node.step;
    const stepText = step instanceof Literal && step.value === "1" ? "" : `, ${this.expression(step)}`;
    return [
      `${ind}do ${node.variable.name} = ${this.expression(node.start)}, ${this.expression(node.stop)}${stepText}`,
      ...this.#body(node.loopBody, ind + INDENT),
      `${ind}end do`,
    ];
  }

  #ifChain(node: IfBlock, ind: string, keyword: "if" | "else if"): string[] {
    const out = [`${ind}${keyword} (${this.expression(node.condition)}) then`, ...this.#body(node.ifBody, ind + INDENT)];
    const other = node.elseBody;
    if (other === null) return out;
    const [only, ...more] = other.statements;
    if (only instanceof IfBlock && only.wasElseIf && more.length === 0) {
      return [...out, ...this.#ifChain(only, ind, "else if")];
    }
    return [...out, `${ind}else`, ...this.#body(other, ind + INDENT)];
  }

  #directive(ind: string, open: string, body: Schedule, close: string): string[] {
    return [`${ind}!$omp ${open.trimEnd()}`, ...this.#body(body, ind + INDENT), `${ind}!$omp end ${close}`];
  }

  #parallelClauses(body: Schedule): string {
    const names = parallelPrivateNames(body);
    return names.length === 0 ? "default(shared)" : `default(shared), private(${names.join(",")})`;
  }

  #referenceList(clause: ReferenceListClause): string {
    return clause.references.map((r) => this.expression(r)).join(",");
  }

  #task(node: TaskDirective, ind: string): string[] {
    const parts: string[] = [];
    for (const c of [node.privateClause, node.firstPrivateClause, node.sharedClause]) {
      if (c.references.length > 0) parts.push(`${c.clauseName}(${this.#referenceList(c)})`);
    }
    for (const d of [node.dependIn, node.dependOut]) {
      if (d.items.length > 0) parts.push(`depend(${d.kind}: ${d.items.map((r) => this.expression(r)).join(",")})`);
    }
    return this.#directive(ind, `task ${parts.join(", ")}`, node.dirBody, "task");
  }

  #extract(node: ExtractNode, ind: string): string[] {
    const v = node.variable.name;
    const post = (n: string): string => `${n}_post`;
    return [
      `${ind}call ${v}%PreStart("${node.moduleName}", "${node.regionName}", ${node.inputs.length}, ${node.outputs.length})`,
      ...node.inputs.map((n) => `${ind}call ${v}%PreDeclareVariable("${n}", ${n})`),
      ...node.outputs.map((n) => `${ind}call ${v}%PreDeclareVariable("${post(n)}", ${n})`),
      `${ind}call ${v}%PreEndDeclaration`,
      ...node.inputs.map((n) => `${ind}call ${v}%ProvideVariable("${n}", ${n})`),
      `${ind}call ${v}%PreEnd`,
      ...this.#body(node.body, ind),
      `${ind}call ${v}%PostStart`,
      ...node.outputs.map((n) => `${ind}call ${v}%ProvideVariable("${post(n)}", ${n})`),
      `${ind}call ${v}%PostEnd`,
    ];
  }

  #file(node: FileContainer): string[] {
    const out: string[] = [];
    for (const c of node.children) {
      if (out.length > 0) out.push("");
      out.push(...this.#lines(c, ""));
    }
    return out;
  }

  #module(node: Container, ind: string): string[] {
    const inner = ind + INDENT;
    const out = [`${ind}module ${node.name}`, ...this.#declarations(node.symbolTable, node.preamble, inner, true)];
    if (node.routines.length > 0) {
      out.push("", `${inner}contains`);
      for (const r of node.routines) out.push(...this.#routine(r, inner), "");
    }
    out.push(`${ind}end module ${node.name}`);
    return out;
  }

  #routine(node: Routine, ind: string): string[] {
    const kind = node.isProgram ? "program" : "subroutine";
    const args = node.isProgram ? "" : `(${node.symbolTable.argumentList.map((a) => a.name).join(", ")})`;
    const inner = ind + INDENT;
    return [
      `${ind}${kind} ${node.name}${args}`,
      ...this.#declarations(node.symbolTable, node.preamble, inner, false),
      "",
      ...this.#body(node, inner),
      `${ind}end ${kind} ${node.name}`,
    ];
  }

  #declarations(table: SymbolTable, preamble: Preamble, ind: string, isModule: boolean): string[] {
    const out: string[] = [];
    for (const c of table.containerSymbols) {
      const names = table.importsFrom(c).map((s) => s.name);
      if (c.wildcardImport) out.push(`${ind}use ${c.name}`);
      if (names.length > 0 || !c.wildcardImport) out.push(`${ind}use ${c.name}, only: ${names.join(", ")}`.trimEnd());
    }
    const isUse = (l: string): boolean => /^use\b/i.test(l);
    out.push(...preamble.filter(isUse).map((l) => `${ind}${l}`));
    out.push(`${ind}implicit none`);

    const emitted = new Set<string>();
    const verbatim = (text: string): void => {
      if (emitted.has(text)) return;
      emitted.add(text);
      const lines = text.split("\n");
      lines.forEach((l, i) => out.push(i === 0 || i === lines.length - 1 ? `${ind}${l}` : `${ind}${INDENT}${l}`));
    };
    const hasAccessSpec = (text: string): boolean => /^[^\n]*\b(private|public)\b/i.test(text);
    const accessStatements: string[] = [];

    for (const s of table.symbols) {
      const declared = s.isLocal || s.isArgument;
      if (s instanceof DataTypeSymbol && declared) {
        const t = s.datatype;
        if (t.kind === "unknown-fortran") {
          verbatim(t.declaration);
          if (isModule && s.visibility === "private" && !hasAccessSpec(t.declaration)) accessStatements.push(s.name);
        } else if (t instanceof StructureType) {
          const access = isModule && s.visibility === "private" ? ", private" : "";
          out.push(`${ind}type${access} :: ${s.name}`);
          for (const c of t.components) out.push(`${ind}${INDENT}${this.#typeText(c.datatype, c.name)} :: ${c.name}`);
          out.push(`${ind}end type ${s.name}`);
        }
        continue;
      }
      if (s instanceof DataSymbol && declared) {
        const t = s.datatype;
        if (!(t instanceof DataTypeSymbol) && t.kind === "unknown-fortran") {
          verbatim(t.declaration);
          if (isModule && s.visibility === "private" && !hasAccessSpec(t.declaration)) accessStatements.push(s.name);
          continue;
        }
        out.push(`${ind}${this.#declaration(s, isModule)}`);
        continue;
      }
      if (isModule && s.visibility === "private") accessStatements.push(s.name);
    }
    for (const name of accessStatements) out.push(`${ind}private :: ${name}`);
    out.push(...preamble.filter((l) => !isUse(l)).map((l) => `${ind}${l}`));
    return out;
  }

  #typeText(t: SymbolDatatype, name: string): string {
    if (t instanceof DataTypeSymbol) return `type(${t.name})`;
    if (t instanceof ScalarType) return scalarText(t);
    if (t instanceof ArrayType) {
      const element = t.elementType instanceof ScalarType ? scalarText(t.elementType) : `type(${t.elementType.name})`;
      const allocatable = t.shape.some((e) => e.kind === "deferred") ? ", allocatable" : "";
      return `${element}, dimension(${t.shape.map(extentText).join(",")})${allocatable}`;
    }
    throw new GenerationError("GW6005", `Cannot declare '${name}' of type '${t.toString()}'.`);
  }

  #declaration(s: DataSymbol, isModule: boolean): string {
    const attrs: string[] = [this.#typeText(s.datatype, s.name)];
    if (s.interface.kind === "argument") {
      const intent = INTENT_TEXT[s.interface.access];
      if (intent !== null) attrs.push(`intent(${intent})`);
    }
    if (s.isConstant) attrs.push("parameter");
    if (s.isStatic) attrs.push("save");
    if (isModule && s.visibility === "private") attrs.push("private");
    const init = s.initialValue;
    return `${attrs.join(", ")} :: ${s.name}${init ? ` = ${this.expression(init)}` : ""}`;
  }
}

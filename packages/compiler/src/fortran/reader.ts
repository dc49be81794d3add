import { ParseError, SymbolError } from "../errors.js";
import { Literal, Reference } from "../ir/data.js";
import type { DataNode, Statement } from "../ir/node.js";
import { Container, FileContainer, Routine } from "../ir/scopes.js";
import { Assignment, Call, CodeBlock, IfBlock, Loop } from "../ir/statements.js";
import { ArrayType, DeferredType, INTEGER_TYPE, ScalarType, UnknownFortranType } from "../symbols/datatypes.js";
import type { ShapeSpec } from "../symbols/datatypes.js";
import type { SymbolTable } from "../symbols/symbol-table.js";
import {
  ContainerSymbol,
  DataSymbol,
  DataTypeSymbol,
  RoutineSymbol,
  UNRESOLVED_INTERFACE,
  argumentInterface,
  importInterface,
} from "../symbols/symbols.js";
import type { ArgumentAccess, SymbolInterface, Visibility } from "../symbols/symbols.js";
import { ExpressionParser, kindPrecision, parseExpression, resolveDataSymbol } from "./expressions.js";
import { TokenStream, logicalLines, splitTopLevel } from "./lexer.js";
import type { SourceLine } from "./lexer.js";

const INTENTS: ReadonlyMap<string, ArgumentAccess> = new Map<string, ArgumentAccess>([
  ["in", "read"],
  ["out", "write"],
  ["inout", "readwrite"],
]);

const DECLARATION_START = /^(integer|real|logical|character|complex|double\s*precision|type\s*\(|class\s*\()/i;
const TYPE_DEFINITION = /^type\s*(?:,[^:]*)?::\s*\w+\s*$|^type\s+\w+\s*$/i;
const OTHER_SPECIFICATION =
  /^(parameter|data|common|equivalence|namelist|external|intrinsic|save|dimension|include|procedure|import|enum|format)\b/i;
const SUBROUTINE_HEADER = /^subroutine\s+([A-Za-z]\w*)\s*(?:\(([^)]*)\))?\s*$/i;
const CONSTRUCT_LABEL = /^[A-Za-z]\w*\s*:(?!:)\s*/;

/** Index just past the parenthesis that closes the one at `open`, or -1. */
function closingParen(text: string, open: number): number {
  let depth = 0;
  let quote: string | null = null;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === "'" || ch === '"') quote = ch;
    else if (ch === "(") depth++;
    else if (ch === ")" && --depth === 0) return i + 1;
  }
  return -1;
}

/** Text after `keyword (...)`, or null when the statement is not of that form. */
function afterCondition(text: string, keyword: string): string | null {
  const m = new RegExp(`^${keyword}\\s*\\(`, "i").exec(text);
  if (!m) return null;
  const end = closingParen(text, m[0].length - 1);
  return end < 0 ? null : text.slice(end).trim();
}

function isEnd(text: string, kind: string): boolean {
  return new RegExp(`^end\\s*${kind}(?:\\s+\\w+)?$`, "i").test(text);
}

function isUnitEnd(text: string, kind: string): boolean {
  return /^end$/i.test(text) || isEnd(text, kind);
}

type BlockKind = "do" | "if" | "select" | "where" | "forall" | "associate" | "block" | "critical";

/** The block construct a statement opens, if any. Labelled `do` loops are not tracked. */
function opensBlock(text: string): BlockKind | null {
  const t = text.replace(CONSTRUCT_LABEL, "");
  if (/^do(\s+[A-Za-z]|\s*$|\s*,?\s*while\b)/i.test(t)) return "do";
  if (afterCondition(t, "if")?.toLowerCase() === "then") return "if";
  if (/^select\s*(case|type)\s*\(/i.test(t)) return "select";
  if (afterCondition(t, "where") === "") return "where";
  if (afterCondition(t, "forall") === "") return "forall";
  if (/^associate\s*\(/i.test(t)) return "associate";
  if (/^block$/i.test(t)) return "block";
  if (/^critical$/i.test(t)) return "critical";
  return null;
}

function closesBlock(text: string): BlockKind | null {
  const m = /^end\s*(do|if|select|where|forall|associate|block|critical)\b/i.exec(text);
  const kind = m?.[1]?.toLowerCase();
  switch (kind) {
    case "do":
    case "if":
    case "select":
    case "where":
    case "forall":
    case "associate":
    case "block":
    case "critical":
      return kind;
    default:
      return null;
  }
}

const STATEMENT_KEYWORDS: ReadonlySet<string> = new Set([
  "allocate",
  "deallocate",
  "nullify",
  "forall",
  "where",
  "print",
  "write",
  "read",
  "open",
  "close",
  "inquire",
  "return",
  "stop",
  "exit",
  "cycle",
  "continue",
  "goto",
  "go",
  "entry",
]);

/** True when the statement has an `=` outside parentheses, as an assignment does. */
function hasTopLevelAssignment(text: string): boolean {
  let depth = 0;
  let quote: string | null = null;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === "'" || ch === '"') quote = ch;
    else if (ch === "(") depth++;
    else if (ch === ")") depth--;
    else if (ch === "=" && depth === 0) {
      const prev = text[i - 1] ?? "";
      const next = text[i + 1] ?? "";
      if (next !== "=" && next !== ">" && !"=/<>".includes(prev)) return true;
    }
  }
  return false;
}

/** Falls back to verbatim code when the reader cannot model a construct. */
function isUnsupported(err: unknown): boolean {
  return err instanceof ParseError && (err.code === "GW6004" || err.code === "GW6001");
}

/**
 * Reads the supported Fortran subset into the IR. Constructs outside it are
 * kept as `CodeBlock`s; program units outside it are errors.
 */
export class FortranReader {
  fromSource(text: string, name = "source"): FileContainer {
    return new SourceParser(logicalLines(text)).parseFile(name);
  }

  fromExpression(text: string, table: SymbolTable): DataNode {
    return parseExpression(text, table);
  }
}

type VisibilityStatements = {
  defaultVisibility: Visibility;
  readonly explicit: Map<string, Visibility>;
};

class SourceParser {
  readonly #lines: readonly SourceLine[];
  #pos = 0;

  constructor(lines: readonly SourceLine[]) {
    this.#lines = lines;
  }

  #current(): SourceLine | undefined {
    return this.#lines[this.#pos];
  }

  #require(what: string, start: SourceLine): SourceLine {
    const line = this.#current();
    if (!line) {
      throw new ParseError("GW6002", `Unterminated ${what} starting at line ${start.line}: ${start.text}`);
    }
    return line;
  }

  parseFile(name: string): FileContainer {
    const file = new FileContainer(name);
    for (let line = this.#current(); line; line = this.#current()) {
      const module = /^module\s+([A-Za-z]\w*)$/i.exec(line.text);
      const program = /^program\s+([A-Za-z]\w*)$/i.exec(line.text);
      if (module?.[1] !== undefined && module[1].toLowerCase() !== "procedure") {
        this.#parseModule(file, module[1], line);
      } else if (program?.[1] !== undefined) {
        const routine = new Routine(program[1], { isProgram: true });
        file.addChild(routine);
        this.#parseRoutine(routine, [], line, "program");
      } else if (SUBROUTINE_HEADER.test(line.text)) {
        this.#parseSubroutine(file, line);
      } else {
        this.#rejectUnit(line);
      }
    }
    return file;
  }

  #rejectUnit(line: SourceLine): never {
    if (/\bfunction\s+\w+/i.test(line.text)) {
      throw new ParseError("GW6001", `Functions are not supported at line ${line.line}: ${line.text}`);
    }
    if (/\bsubroutine\s+\w+/i.test(line.text)) {
      throw new ParseError("GW6001", `Routine prefixes are not supported at line ${line.line}: ${line.text}`);
    }
    throw new ParseError("GW6001", `Expected a module, program or subroutine at line ${line.line}: ${line.text}`);
  }

  #parseSubroutine(parent: Container, header: SourceLine): Routine {
    const m = SUBROUTINE_HEADER.exec(header.text);
    const name = m?.[1];
    if (name === undefined) this.#rejectUnit(header);
    const args = (m?.[2] ?? "")
      .split(",")
      .map((a) => a.trim())
      .filter((a) => a.length > 0);
    const routine = new Routine(name);
    parent.addChild(routine);
    this.#parseRoutine(routine, args, header, "subroutine");
    return routine;
  }

  #parseModule(file: FileContainer, name: string, header: SourceLine): void {
    const container = new Container(name);
    file.addChild(container);
    this.#pos++;
    const visibility: VisibilityStatements = { defaultVisibility: "public", explicit: new Map() };
    this.#parseSpecification(container.symbolTable, container.preamble, visibility);

    let line = this.#require(`module '${name}'`, header);
    if (/^contains$/i.test(line.text)) {
      this.#pos++;
      this.#declareContainedRoutines(container.symbolTable);
      for (line = this.#require(`module '${name}'`, header); !isUnitEnd(line.text, "module"); line = this.#require(`module '${name}'`, header)) {
        if (!SUBROUTINE_HEADER.test(line.text)) this.#rejectUnit(line);
        this.#parseSubroutine(container, line);
      }
    }
    if (!isUnitEnd(line.text, "module")) {
      throw new ParseError("GW6001", `Unexpected statement in the specification of module '${name}' at line ${line.line}: ${line.text}`);
    }
    this.#pos++;
    this.#applyVisibility(container, visibility);
  }

  /** Routines of a module are visible to each other regardless of order. */
  #declareContainedRoutines(table: SymbolTable): void {
    for (let i = this.#pos; i < this.#lines.length; i++) {
      const text = this.#lines[i]?.text ?? "";
      if (isEnd(text, "module")) return;
      const m = SUBROUTINE_HEADER.exec(text);
      if (m?.[1] !== undefined && !table.hasLocal(m[1])) table.add(new RoutineSymbol(m[1]));
    }
  }

  #applyVisibility(container: Container, v: VisibilityStatements): void {
    const table = container.symbolTable;
    for (const s of table.symbols) {
      if (s instanceof ContainerSymbol) continue;
      s.visibility = v.explicit.get(s.name.toLowerCase()) ?? v.defaultVisibility;
    }
    for (const [name, vis] of v.explicit) {
      if (!table.hasLocal(name)) container.preamble.push(`${vis} :: ${name}`);
    }
  }

  #parseRoutine(routine: Routine, args: readonly string[], header: SourceLine, kind: "program" | "subroutine"): void {
    this.#pos++;
    const table = routine.symbolTable;
    this.#parseSpecification(table, routine.preamble, null);

    const argumentSymbols = args.map((a) => {
      if (!table.hasLocal(a)) {
        const created = new DataSymbol(a, new DeferredType(), { interface: argumentInterface() });
        table.add(created);
        return created;
      }
      const s = table.lookupLocal(a);
      if (!(s instanceof DataSymbol)) {
        throw new ParseError("GW6001", `Argument '${a}' of '${routine.name}' is declared as a ${s.constructor.name}.`);
      }
      if (s.interface.kind !== "argument") s.interface = argumentInterface();
      return s;
    });
    table.setArgumentList(argumentSymbols);

    const body = this.#parseStatements(table, (t) => isUnitEnd(t, kind) || /^contains$/i.test(t), `${kind} '${routine.name}'`, header);
    for (const s of body) routine.addChild(s);
    const end = this.#require(`${kind} '${routine.name}'`, header);
    if (/^contains$/i.test(end.text)) {
      throw new ParseError("GW6001", `Internal procedures are not supported in '${routine.name}' at line ${end.line}.`);
    }
    this.#pos++;
  }

  #parseSpecification(table: SymbolTable, preamble: string[], visibility: VisibilityStatements | null): void {
    for (let line = this.#current(); line; line = this.#current()) {
      const text = line.text;
      if (/^use\b/i.test(text)) {
        this.#parseUse(table, preamble, line);
      } else if (/^implicit\s+none$/i.test(text)) {
        this.#pos++;
      } else if (/^implicit\b/i.test(text)) {
        preamble.push(text);
        this.#pos++;
      } else if (/^(private|public)\b/i.test(text) && visibility !== null) {
        this.#parseAccess(text, visibility);
        this.#pos++;
      } else if (TYPE_DEFINITION.test(text)) {
        this.#parseTypeDefinition(table, line, visibility);
      } else if (/^(abstract\s+)?interface\b/i.test(text)) {
        preamble.push(...this.#collectUntil(line, (t) => isEnd(t, "interface"), "interface block"));
      } else if (DECLARATION_START.test(text)) {
        try {
          this.#parseDeclaration(table, line, visibility);
        } catch (err) {
          if (!isUnsupported(err)) throw err;
          this.#unknownDeclaration(table, line, err);
        }
        this.#pos++;
      } else if (OTHER_SPECIFICATION.test(text)) {
        preamble.push(text);
        this.#pos++;
      } else {
        return;
      }
    }
  }

  #collectUntil(start: SourceLine, end: (text: string) => boolean, what: string): string[] {
    const out: string[] = [];
    for (;;) {
      const line = this.#require(what, start);
      out.push(line.text);
      this.#pos++;
      if (line !== start && end(line.text)) return out;
    }
  }

  #parseAccess(text: string, v: VisibilityStatements): void {
    const m = /^(private|public)\s*(?:::)?\s*(.*)$/i.exec(text);
    const vis: Visibility = m?.[1]?.toLowerCase() === "private" ? "private" : "public";
    const names = (m?.[2] ?? "")
      .split(",")
      .map((n) => n.trim())
      .filter((n) => n.length > 0);
    if (names.length === 0) v.defaultVisibility = vis;
    for (const n of names) v.explicit.set(n.toLowerCase(), vis);
  }

  #parseTypeDefinition(table: SymbolTable, start: SourceLine, access: VisibilityStatements | null): void {
    const name = /(\w+)\s*$/.exec(start.text)?.[1];
    if (name === undefined) throw new ParseError("GW6001", `Malformed type definition at line ${start.line}: ${start.text}`);
    const text = this.#collectUntil(start, (t) => isEnd(t, "type"), `type '${name}'`).join("\n");
    const attr = /^type\s*,[^:]*\b(private|public)\b/i.exec(start.text)?.[1]?.toLowerCase();
    const visibility: Visibility = attr === "private" ? "private" : "public";
    if (attr !== undefined) access?.explicit.set(name.toLowerCase(), visibility);
    table.add(new DataTypeSymbol(name, new UnknownFortranType(text), { visibility }));
  }

  #parseUse(table: SymbolTable, preamble: string[], line: SourceLine): void {
    this.#pos++;
    const text = line.text;
    if (/^use\s*,\s*intrinsic\b/i.test(text)) {
      preamble.push(text);
      return;
    }
    const m = /^use\s*(?:,\s*non_intrinsic\s*)?(?:::)?\s*([A-Za-z]\w*)\s*(?:,\s*only\s*:\s*(.*))?$/i.exec(text);
    const moduleName = m?.[1];
    if (moduleName === undefined) throw new ParseError("GW6001", `Malformed use statement at line ${line.line}: ${text}`);
    const onlyList = m?.[2];
    const hasOnly = /,\s*only\s*:/i.test(text);

    if (hasOnly && onlyList !== undefined && onlyList.includes("=>")) {
      preamble.push(text);
      for (const item of onlyList.split(",")) {
        const local = item.split("=>")[0]?.trim();
        if (local && !table.hasLocal(local)) {
          table.add(new DataSymbol(local, new DeferredType(), { interface: UNRESOLVED_INTERFACE }));
        }
      }
      return;
    }

    let container: ContainerSymbol;
    if (table.hasLocal(moduleName)) {
      const existing = table.lookupLocal(moduleName);
      if (!(existing instanceof ContainerSymbol)) {
        throw new SymbolError("GW1101", `Module '${moduleName}' clashes with the ${existing.constructor.name} of the same name.`);
      }
      container = existing;
      if (!hasOnly) container.wildcardImport = true;
    } else {
      container = new ContainerSymbol(moduleName, { wildcardImport: !hasOnly });
      table.add(container);
    }
    for (const item of (onlyList ?? "").split(",")) {
      const n = item.trim();
      if (n.length > 0 && !table.hasLocal(n)) {
        table.add(new DataSymbol(n, new DeferredType(), { interface: importInterface(container) }));
      }
    }
  }

  /** Declares the entities of a declaration the reader cannot model, keeping its text. */
  #unknownDeclaration(table: SymbolTable, line: SourceLine, cause: unknown): void {
    const at = line.text.indexOf("::");
    if (at < 0) throw cause;
    for (const entity of splitTopLevel(line.text.slice(at + 2))) {
      const name = /^\s*([A-Za-z]\w*)/.exec(entity)?.[1];
      if (name !== undefined && !table.hasLocal(name)) table.add(new DataSymbol(name, new UnknownFortranType(line.text)));
    }
  }

  #parseDeclaration(table: SymbolTable, line: SourceLine, access: VisibilityStatements | null): void {
    const s = new TokenStream(line.text, line.line);
    let unknown = false;
    let base: ScalarType | DataTypeSymbol | null = null;

    const head = s.next();
    if (head.text === "type" || head.text === "class") {
      s.expect("(");
      if (head.text === "class" || s.peek(1).text !== ")") {
        unknown = true;
        while (!s.accept(")", "op")) s.next();
      } else {
        base = this.#typeSymbol(table, s.expectName());
        s.expect(")");
      }
    } else {
      let intrinsic = head.text;
      let kind: string | undefined;
      if (intrinsic === "double") s.expect("precision");
      if (intrinsic === "doubleprecision") intrinsic = "double";
      if (s.accept("(", "op")) {
        if (s.peek().text === "kind" && s.peek(1).text === "=") {
          s.next();
          s.next();
        } else if (s.peek().kind === "name" && s.peek(1).text === "=") {
          unknown = true;
        }
        const k = s.next();
        if (k.kind === "int") kind = k.text;
        else if (k.kind === "name") kind = line.text.slice(k.offset, k.offset + k.text.length);
        else unknown = true;
        if (!s.accept(")", "op")) {
          unknown = true;
          while (!s.atEnd() && !s.accept(")", "op")) s.next();
        }
      } else if (s.accept("*", "op")) {
        kind = s.next().text;
      }
      if (intrinsic === "complex" || (intrinsic === "character" && kind !== undefined)) unknown = true;
      if (!unknown) {
        const mapped = intrinsic === "logical" ? "boolean" : intrinsic === "double" ? "real" : intrinsic;
        base = new ScalarType(mapped, intrinsic === "double" ? "double" : kindPrecision(kind, table));
      }
    }

    let dims: ShapeSpec[] | null = null;
    let intent: ArgumentAccess | null = null;
    let isConstant = false;
    let isStatic = false;
    let allocatable = false;
    let visibility: Visibility | undefined;
    while (s.accept(",", "op")) {
      const attr = s.next().text;
      switch (attr) {
        case "dimension":
          s.expect("(");
          dims = this.#shape(s, table);
          if (dims === null) unknown = true;
          break;
        case "intent": {
          s.expect("(");
          let word = s.next().text;
          if (word === "in" && s.accept("out", "name")) word = "inout";
          intent = INTENTS.get(word) ?? null;
          s.expect(")");
          if (intent === null) unknown = true;
          break;
        }
        case "parameter":
          isConstant = true;
          break;
        case "save":
          isStatic = true;
          break;
        case "allocatable":
          allocatable = true;
          break;
        case "private":
        case "public":
          visibility = attr;
          break;
        default:
          unknown = true;
          if (s.accept("(", "op")) {
            let depth = 1;
            while (depth > 0 && !s.atEnd()) {
              const t = s.next().text;
              if (t === "(") depth++;
              if (t === ")") depth--;
            }
          }
      }
    }
    s.accept("::", "op");

    const iface: SymbolInterface | undefined = intent === null ? undefined : argumentInterface(intent);
    for (;;) {
      const name = s.expectName();
      if (visibility !== undefined) access?.explicit.set(name.toLowerCase(), visibility);
      let shape = dims;
      if (s.accept("(", "op")) {
        shape = this.#shape(s, table);
        if (shape === null) unknown = true;
      }
      let initialValue: DataNode | undefined;
      if (s.accept("=", "op")) {
        initialValue = new ExpressionParser(s, table).parse();
      } else if (s.peek().text === "=>" || s.peek().text === "*") {
        unknown = true;
        while (!s.atEnd() && s.peek().text !== ",") s.next();
      }

      if (unknown || base === null) {
        table.add(new DataSymbol(name, new UnknownFortranType(line.text), { interface: iface, visibility }));
      } else {
        const extents = (shape ?? []).map((e) => (e === "attribute" && allocatable ? "deferred" : e));
        const datatype = extents.length > 0 ? new ArrayType(base, extents) : base;
        table.add(
          new DataSymbol(name, datatype, { interface: iface, visibility, isConstant, isStatic, initialValue })
        );
      }
      if (s.atEnd()) return;
      s.expect(",");
    }
  }

  /** Parses extents after `(`; null when a bound is outside the supported forms. */
  #shape(s: TokenStream, table: SymbolTable): ShapeSpec[] | null {
    const out: ShapeSpec[] = [];
    let supported = true;
    for (;;) {
      const t = s.next();
      if (t.text === ":" && t.kind === "op") {
        out.push("attribute");
      } else if (t.kind === "int" && [",", ")"].includes(s.peek().text)) {
        out.push(Number(t.text));
      } else if (t.kind === "name" && [",", ")"].includes(s.peek().text)) {
        out.push(resolveDataSymbol(s.source.slice(t.offset, t.offset + t.text.length), table));
      } else {
        supported = false;
        let depth = 0;
        while (!s.atEnd() && !(depth === 0 && [",", ")"].includes(s.peek().text))) {
          const x = s.next().text;
          if (x === "(") depth++;
          if (x === ")") depth--;
        }
      }
      if (s.accept(")", "op")) return supported ? out : null;
      s.expect(",");
    }
  }

  /** A derived type named in `type(name)`; an imported placeholder becomes a type symbol. */
  #typeSymbol(table: SymbolTable, name: string): DataTypeSymbol {
    const found = table.find(name);
    if (found instanceof DataTypeSymbol) return found;
    if (found instanceof DataSymbol && found.isDeferred && (found.isImport || found.isUnresolved)) {
      return this.#respecify(table, found, () => new DataTypeSymbol(found.name, new DeferredType(), { interface: found.interface, visibility: found.visibility }));
    }
    if (found === undefined && table.hasWildcardImport()) {
      const created = new DataTypeSymbol(name, new DeferredType(), { interface: UNRESOLVED_INTERFACE });
      table.add(created);
      return created;
    }
    throw new SymbolError("GW1102", `Could not find the derived type '${name}' in the symbol table.`);
  }

  #routineSymbol(table: SymbolTable, name: string): RoutineSymbol {
    const found = table.find(name);
    if (found instanceof RoutineSymbol) return found;
    if (found instanceof DataSymbol && found.isDeferred && (found.isImport || found.isUnresolved)) {
      return this.#respecify(table, found, () => new RoutineSymbol(found.name, { interface: found.interface, visibility: found.visibility }));
    }
    if (found !== undefined) {
      throw new ParseError("GW6004", `'${name}' is a ${found.constructor.name} and cannot be called.`);
    }
    const created = new RoutineSymbol(name, { interface: UNRESOLVED_INTERFACE });
    table.add(created);
    return created;
  }

  /** Replaces a placeholder symbol in whichever table in the chain declares it. */
  #respecify<T extends DataTypeSymbol | RoutineSymbol>(table: SymbolTable, old: DataSymbol, make: () => T): T {
    for (let t: SymbolTable | null = table; t; t = t.parentTable) {
      if (t.hasLocal(old.name) && t.lookupLocal(old.name) === old) {
        const made = make();
        t.remove(old);
        t.add(made);
        return made;
      }
    }
    throw new SymbolError("GW1102", `Could not find '${old.name}' in the symbol table.`);
  }

  #parseStatements(scope: SymbolTable, stop: (text: string) => boolean, what: string, start: SourceLine): Statement[] {
    const out: Statement[] = [];
    for (let line = this.#require(what, start); !stop(line.text); line = this.#require(what, start)) {
      out.push(this.#parseStatement(scope, line));
    }
    return out;
  }

  #blockEnd(start: number): number {
    let depth = 0;
    for (let i = start; i < this.#lines.length; i++) {
      const text = this.#lines[i]?.text ?? "";
      if (opensBlock(text)) depth++;
      else if (closesBlock(text)) depth--;
      if (depth === 0) return i;
    }
    const line = this.#lines[start];
    throw new ParseError("GW6002", `Unterminated block starting at line ${line?.line ?? 0}: ${line?.text ?? ""}`);
  }

  #codeBlock(from: number, to: number): CodeBlock {
    const lines = this.#lines.slice(from, to + 1).map((l) => l.text);
    this.#pos = to + 1;
    return new CodeBlock(lines);
  }

  #parseStatement(scope: SymbolTable, line: SourceLine): Statement {
    const text = line.text;
    const start = this.#pos;
    const block = opensBlock(text);
    if (block !== null) {
      const end = this.#blockEnd(start);
      try {
        if (block === "do" && /^do\s+[A-Za-z]\w*\s*=/i.test(text)) return this.#parseLoop(scope, line);
        if (block === "if" && /^if\b/i.test(text)) return this.#parseIf(scope, line, text);
      } catch (err) {
        if (!isUnsupported(err)) throw err;
      }
      return this.#codeBlock(start, end);
    }
    try {
      const single = this.#parseSimple(scope, text, line.line);
      this.#pos++;
      return single;
    } catch (err) {
      if (!isUnsupported(err)) throw err;
      return this.#codeBlock(start, start);
    }
  }

  #parseLoop(scope: SymbolTable, header: SourceLine): Loop {
    const s = new TokenStream(header.text, header.line);
    s.expect("do");
    const variable = resolveDataSymbol(s.expectName(), scope);
    s.expect("=");
    const expr = new ExpressionParser(s, scope);
    const from = expr.parse();
    s.expect(",");
    const to = expr.parse();
    const step = s.accept(",", "op") ? expr.parse() : new Literal("1", INTEGER_TYPE);
    s.expectEnd();
    this.#pos++;
    const body = this.#parseStatements(scope, (t) => isEnd(t, "do"), "do loop", header);
    this.#pos++;
    return Loop.create(variable, from, to, step, body);
  }

  #parseIf(scope: SymbolTable, header: SourceLine, text: string): IfBlock {
    const m = /^(?:else\s*)?if\s*\(/i.exec(text);
    const open = (m?.[0].length ?? 0) - 1;
    const close = closingParen(text, open);
    const condition = parseExpression(text.slice(open + 1, close - 1), scope, header.line);
    this.#pos++;
    const branchEnd = (t: string): boolean => isEnd(t, "if") || /^else\b/i.test(t);
    const ifBody = this.#parseStatements(scope, branchEnd, "if block", header);
    const next = this.#require("if block", header);

    if (/^else\s*if\b/i.test(next.text)) {
      const nested = this.#parseIf(scope, next, next.text);
      nested.wasElseIf = true;
      return IfBlock.create(condition, ifBody, [nested]);
    }
    if (/^else$/i.test(next.text)) {
      this.#pos++;
      const elseBody = this.#parseStatements(scope, (t) => isEnd(t, "if"), "if block", header);
      this.#pos++;
      return IfBlock.create(condition, ifBody, elseBody);
    }
    this.#pos++;
    return IfBlock.create(condition, ifBody);
  }

  /** Single-line statements: assignments, calls and the one-line `if`. */
  #parseSimple(scope: SymbolTable, text: string, line: number): Statement {
    const action = afterCondition(text, "if");
    if (action !== null && action.length > 0) {
      const close = closingParen(text, text.indexOf("("));
      const condition = parseExpression(text.slice(text.indexOf("(") + 1, close - 1), scope, line);
      return IfBlock.create(condition, [this.#parseSimple(scope, action, line)]);
    }
    if (/^call\b/i.test(text)) return this.#parseCall(scope, text, line);

    const s = new TokenStream(text, line);
    const first = s.peek();
    if (first.kind !== "name" || STATEMENT_KEYWORDS.has(first.text) || !hasTopLevelAssignment(text)) {
      throw new ParseError("GW6001", `Unsupported statement at line ${line}: ${text}`);
    }
    const lhs = new ExpressionParser(s, scope).parse();
    if (!s.accept("=", "op") || !(lhs instanceof Reference)) {
      throw new ParseError("GW6001", `Unsupported statement at line ${line}: ${text}`);
    }
    const rhs = new ExpressionParser(s, scope).parse();
    s.expectEnd();
    return Assignment.create(lhs, rhs);
  }

  #parseCall(scope: SymbolTable, text: string, line: number): Call {
    const s = new TokenStream(text, line);
    s.expect("call");
    const name = s.expectName();
    if (s.peek().text === "%") throw new ParseError("GW6004", `Unsupported type-bound call at line ${line}: ${text}`);
    const args: DataNode[] = [];
    if (s.accept("(", "op") && !s.accept(")", "op")) {
      const expr = new ExpressionParser(s, scope);
      for (;;) {
        if (s.peek().kind === "name" && s.peek(1).text === "=") {
          throw new ParseError("GW6004", `Unsupported keyword argument at line ${line}: ${text}`);
        }
        args.push(expr.parse());
        if (s.accept(")", "op")) break;
        s.expect(",");
      }
    }
    s.expectEnd();
    return Call.create(this.#routineSymbol(scope, name), args);
  }
}

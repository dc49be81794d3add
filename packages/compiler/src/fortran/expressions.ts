import { ParseError, SymbolError } from "../errors.js";
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
  fullRange,
} from "../ir/data.js";
import type { BinaryOperator, UnaryOperator } from "../ir/data.js";
import type { DataNode } from "../ir/node.js";
import { DeferredType, INTEGER_TYPE, ScalarType } from "../symbols/datatypes.js";
import type { Precision } from "../symbols/datatypes.js";
import type { SymbolTable } from "../symbols/symbol-table.js";
import { DataSymbol, UNRESOLVED_INTERFACE } from "../symbols/symbols.js";
import { TokenStream } from "./lexer.js";
import type { Token } from "./lexer.js";

const RELATIONAL: ReadonlyMap<string, BinaryOperator> = new Map<string, BinaryOperator>([
  ["==", "EQ"],
  ["eq", "EQ"],
  ["/=", "NE"],
  ["ne", "NE"],
  ["<", "LT"],
  ["lt", "LT"],
  ["<=", "LE"],
  ["le", "LE"],
  [">", "GT"],
  ["gt", "GT"],
  [">=", "GE"],
  ["ge", "GE"],
]);

const BINARY_INTRINSICS: ReadonlyMap<string, BinaryOperator> = new Map<string, BinaryOperator>([
  ["lbound", "LBOUND"],
  ["ubound", "UBOUND"],
  ["size", "SIZE"],
  ["max", "MAX"],
  ["min", "MIN"],
  ["mod", "MOD"],
  ["sign", "SIGN"],
]);

const UNARY_INTRINSICS: ReadonlyMap<string, UnaryOperator> = new Map<string, UnaryOperator>([
  ["sqrt", "SQRT"],
  ["exp", "EXP"],
  ["log", "LOG"],
  ["log10", "LOG10"],
  ["sin", "SIN"],
  ["cos", "COS"],
  ["tan", "TAN"],
  ["abs", "ABS"],
  ["real", "REAL"],
  ["int", "INT"],
  ["size", "SIZE"],
]);

function unsupported(stream: TokenStream, what: string): never {
  throw new ParseError("GW6004", `Unsupported expression: ${what} at line ${stream.line}: ${stream.source}`);
}

/**
 * Resolves a name used as a value. Unknown names become unresolved symbols
 * when a wildcard import could provide them.
 */
export function resolveDataSymbol(name: string, scope: SymbolTable): DataSymbol {
  const found = scope.find(name);
  if (found instanceof DataSymbol) return found;
  if (found !== undefined) {
    throw new ParseError("GW6004", `'${name}' is a ${found.constructor.name} and cannot be used as a value.`);
  }
  if (scope.hasWildcardImport()) {
    const created = new DataSymbol(name, new DeferredType(), { interface: UNRESOLVED_INTERFACE });
    scope.add(created);
    return created;
  }
  throw new SymbolError(
    "GW1102",
    `Could not find '${name}' in the symbol table and there is no wildcard import that could provide it.`
  );
}

/** Precision from a literal's kind suffix or a declaration's kind selector. */
export function kindPrecision(kind: string | undefined, scope: SymbolTable): Precision {
  if (kind === undefined) return "undefined";
  if (/^[0-9]+$/.test(kind)) return Number(kind);
  return resolveDataSymbol(kind, scope);
}

function scalar(intrinsic: string, precision: Precision): ScalarType {
  return precision === "undefined" && intrinsic === "integer" ? INTEGER_TYPE : new ScalarType(intrinsic, precision);
}

/** Recursive-descent parser over Fortran's operator precedence levels. */
export class ExpressionParser {
  readonly #s: TokenStream;
  readonly #scope: SymbolTable;

  constructor(stream: TokenStream, scope: SymbolTable) {
    this.#s = stream;
    this.#scope = scope;
  }

  parse(): DataNode {
    return this.#equivalence();
  }

  #equivalence(): DataNode {
    let left = this.#or();
    for (;;) {
      const t = this.#s.peek();
      if (t.kind !== "dotop" || (t.text !== "eqv" && t.text !== "neqv")) return left;
      this.#s.next();
      left = BinaryOperation.create(t.text === "eqv" ? "EQV" : "NEQV", left, this.#or());
    }
  }

  #or(): DataNode {
    let left = this.#and();
    while (this.#s.accept("or", "dotop")) left = BinaryOperation.create("OR", left, this.#and());
    return left;
  }

  #and(): DataNode {
    let left = this.#not();
    while (this.#s.accept("and", "dotop")) left = BinaryOperation.create("AND", left, this.#not());
    return left;
  }

  #not(): DataNode {
    if (this.#s.accept("not", "dotop")) return UnaryOperation.create("NOT", this.#not());
    return this.#relational();
  }

  #relational(): DataNode {
    const left = this.#additive();
    const t = this.#s.peek();
    const op = t.kind === "op" || t.kind === "dotop" ? RELATIONAL.get(t.text) : undefined;
    if (op === undefined) return left;
    this.#s.next();
    return BinaryOperation.create(op, left, this.#additive());
  }

  #additive(): DataNode {
    let left: DataNode;
    if (this.#s.accept("-", "op")) left = UnaryOperation.create("MINUS", this.#multiplicative());
    else if (this.#s.accept("+", "op")) left = UnaryOperation.create("PLUS", this.#multiplicative());
    else left = this.#multiplicative();
    for (;;) {
      if (this.#s.accept("+", "op")) left = BinaryOperation.create("ADD", left, this.#multiplicative());
      else if (this.#s.accept("-", "op")) left = BinaryOperation.create("SUB", left, this.#multiplicative());
      else if (this.#s.peek().text === "//") unsupported(this.#s, "character concatenation");
      else return left;
    }
  }

  #multiplicative(): DataNode {
    let left = this.#power();
    for (;;) {
      if (this.#s.accept("*", "op")) left = BinaryOperation.create("MUL", left, this.#signed());
      else if (this.#s.accept("/", "op")) left = BinaryOperation.create("DIV", left, this.#signed());
      else return left;
    }
  }

  /** A factor that may carry its own sign, as in `a * -b`. */
  #signed(): DataNode {
    if (this.#s.accept("-", "op")) return UnaryOperation.create("MINUS", this.#power());
    if (this.#s.accept("+", "op")) return UnaryOperation.create("PLUS", this.#power());
    return this.#power();
  }

  #power(): DataNode {
    const base = this.#primary();
    if (this.#s.accept("**", "op")) return BinaryOperation.create("POW", base, this.#signed());
    return base;
  }

  #primary(): DataNode {
    const t = this.#s.next();
    switch (t.kind) {
      case "int":
        return new Literal(t.text, scalar("integer", kindPrecision(t.kindParam, this.#scope)));
      case "real": {
        const precision = t.kindParam !== undefined ? kindPrecision(t.kindParam, this.#scope) : /[dD]/.test(t.text) ? "double" : "undefined";
        return new Literal(t.text, scalar("real", precision));
      }
      case "logical":
        return new Literal(t.text, scalar("boolean", kindPrecision(t.kindParam, this.#scope)));
      case "string":
        return new Literal(t.text, scalar("character", "undefined"));
      case "name":
        return this.#named(t);
      case "op":
        if (t.text === "(") {
          const inner = this.parse();
          if (this.#s.peek().text === ",") unsupported(this.#s, "complex literal");
          this.#s.expect(")");
          return inner;
        }
        if (t.text === "[") unsupported(this.#s, "array constructor");
        break;
      default:
        break;
    }
    throw new ParseError(
      "GW6004",
      `Unexpected '${t.kind === "eof" ? "end of statement" : t.text}' in expression at line ${this.#s.line}: ${this.#s.source}`
    );
  }

  #named(t: Token): DataNode {
    const name = this.#s.source.slice(t.offset, t.offset + t.text.length);
    const existing = this.#scope.find(name);
    if (this.#s.peek().text === "(" && !(existing instanceof DataSymbol)) {
      if (BINARY_INTRINSICS.has(t.text) || UNARY_INTRINSICS.has(t.text)) return this.#intrinsic(t.text);
      unsupported(this.#s, `call of function '${name}'`);
    }
    const symbol = resolveDataSymbol(name, this.#scope);

    if (this.#s.peek().text === "(") {
      if (!symbol.isArray) unsupported(this.#s, `'${name}(...)' where '${name}' is not a known array`);
      this.#s.next();
      const indices = this.#indexList((d, lo, hi, step) => this.#arrayRange(symbol, d, lo, hi, step));
      if (this.#s.peek().text === "%") unsupported(this.#s, "component of an array element");
      return ArrayReference.create(symbol, indices);
    }
    if (this.#s.accept("%", "op")) return StructureReference.create(symbol, this.#member());
    return new Reference(symbol);
  }

  #member(): Member {
    const name = this.#s.expectName();
    let member: Member;
    if (this.#s.accept("(", "op")) {
      const indices = this.#indexList((_d, lo, hi, step) => {
        if (lo === null || hi === null) unsupported(this.#s, `open range in component '${name}'`);
        return Range.create(lo, hi, step ?? undefined);
      });
      member = ArrayMember.create(name, indices);
    } else {
      member = new Member(name);
    }
    if (this.#s.accept("%", "op")) {
      if (member instanceof ArrayMember) unsupported(this.#s, "component of an array component");
      return StructureMember.create(name, this.#member());
    }
    return member;
  }

  #arrayRange(symbol: DataSymbol, d: number, lo: DataNode | null, hi: DataNode | null, step: DataNode | null): Range {
    if (lo === null && hi === null && step === null) return fullRange(symbol, d);
    const dim = (): Literal => new Literal(String(d + 1), INTEGER_TYPE);
    return Range.create(
      lo ?? BinaryOperation.create("LBOUND", new Reference(symbol), dim()),
      hi ?? BinaryOperation.create("UBOUND", new Reference(symbol), dim()),
      step ?? undefined
    );
  }

  /** Parses `i, lo:hi:step, ...)` after the opening parenthesis. */
  #indexList(range: (d: number, lo: DataNode | null, hi: DataNode | null, step: DataNode | null) => Range): DataNode[] {
    const out: DataNode[] = [];
    for (let d = 0; ; d++) {
      const endsPart = (): boolean => [":", ",", ")"].includes(this.#s.peek().text);
      const lo = endsPart() ? null : this.parse();
      if (this.#s.accept(":", "op")) {
        const hi = endsPart() ? null : this.parse();
        const step = this.#s.accept(":", "op") ? this.parse() : null;
        out.push(range(d, lo, hi, step));
      } else if (lo === null) {
        unsupported(this.#s, "empty index");
      } else {
        out.push(lo);
      }
      if (this.#s.accept(")", "op")) return out;
      this.#s.expect(",");
    }
  }

  #intrinsic(name: string): DataNode {
    this.#s.expect("(");
    const args: DataNode[] = [];
    if (!this.#s.accept(")", "op")) {
      for (;;) {
        if (this.#s.peek().kind === "name" && this.#s.peek(1).text === "=") unsupported(this.#s, "keyword argument");
        args.push(this.parse());
        if (this.#s.accept(")", "op")) break;
        this.#s.expect(",");
      }
    }
    const [a, b, ...rest] = args;
    const unary = UNARY_INTRINSICS.get(name);
    if (a !== undefined && b === undefined && unary !== undefined) return UnaryOperation.create(unary, a);
    const binary = BINARY_INTRINSICS.get(name);
    if (a !== undefined && b !== undefined && rest.length === 0 && binary !== undefined) {
      return BinaryOperation.create(binary, a, b);
    }
    return unsupported(this.#s, `${args.length} arguments to intrinsic '${name.toUpperCase()}'`);
  }
}

export function parseExpression(text: string, scope: SymbolTable, line = 0): DataNode {
  const stream = new TokenStream(text, line);
  const expr = new ExpressionParser(stream, scope).parse();
  if (!stream.atEnd()) unsupported(stream, `trailing '${stream.peek().text}'`);
  return expr;
}

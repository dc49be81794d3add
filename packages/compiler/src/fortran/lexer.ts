import { ParseError } from "../errors.js";

/** One statement after continuation lines are joined and comments dropped. */
export type SourceLine = {
  readonly text: string;
  /** 1-based line of the statement's first physical line. */
  readonly line: number;
};

export type TokenKind = "name" | "int" | "real" | "string" | "logical" | "dotop" | "op" | "eof";

export type Token = {
  readonly kind: TokenKind;
  /** Lower-cased for names and dot operators; verbatim otherwise. */
  readonly text: string;
  /** Kind parameter written after `_`. */
  readonly kindParam?: string;
  readonly offset: number;
};

/** Removes a trailing `!` comment, ignoring `!` inside character literals. */
export function stripComment(line: string): string {
  let quote: string | null = null;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === "'" || ch === '"') quote = ch;
    else if (ch === "!") return line.slice(0, i);
  }
  return line;
}

/**
 * Splits free-form source into logical statements: comments are dropped,
 * `&` continuations joined and blank lines skipped.
 */
export function logicalLines(source: string): SourceLine[] {
  const out: SourceLine[] = [];
  const physical = source.split(/\r?\n/);
  let pending = "";
  let start = 0;
  physical.forEach((raw, i) => {
    let text = stripComment(raw).trim();
    if (pending.length > 0 && text.startsWith("&")) text = text.slice(1).trimStart();
    if (text.length === 0 && pending.length === 0) return;
    if (pending.length === 0) start = i + 1;
    if (text.endsWith("&")) {
      pending += text.slice(0, -1).trimEnd() + " ";
      return;
    }
    const joined = (pending + text).trim();
    pending = "";
    if (joined.length > 0) out.push({ text: joined, line: start });
  });
  if (pending.trim().length > 0) {
    throw new ParseError("GW6001", `Source ends inside a continued statement starting at line ${start}.`);
  }
  return out;
}

const DOT_OPERATORS: ReadonlySet<string> = new Set([
  "and",
  "or",
  "not",
  "eqv",
  "neqv",
  "eq",
  "ne",
  "lt",
  "le",
  "gt",
  "ge",
]);

const SYMBOL_OPERATORS = ["**", "//", "==", "/=", "<=", ">=", "=>", "::", "(", ")", ",", ":", "%", "=", "+", "-", "*", "/", "<", ">", "[", "]"];

const NAME = /^[A-Za-z][A-Za-z0-9_]*/;
const NUMBER = /^(?:[0-9]+(?:\.(?![A-Za-z]+\.)[0-9]*)?|\.[0-9]+)(?:[eEdD][+-]?[0-9]+)?/;
const KIND_SUFFIX = /^_([A-Za-z][A-Za-z0-9_]*|[0-9]+)/;

function readKind(text: string, at: number): { kindParam?: string; length: number } {
  const m = KIND_SUFFIX.exec(text.slice(at));
  return m?.[1] ? { kindParam: m[1], length: m[0].length } : { length: 0 };
}

function readString(text: string, at: number, line: number): { value: string; length: number } {
  const quote = text[at];
  let value = "";
  let i = at + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === quote) {
      if (text[i + 1] === quote) {
        value += quote;
        i += 2;
        continue;
      }
      return { value, length: i + 1 - at };
    }
    value += ch;
    i++;
  }
  throw new ParseError("GW6001", `Unterminated character literal at line ${line}: ${text}`);
}

/** Tokenizes one logical statement. */
export function tokenize(text: string, line = 0): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text[i] ?? "";
    if (ch === " " || ch === "\t") {
      i++;
      continue;
    }
    const rest = text.slice(i);

    if (ch === "'" || ch === '"') {
      const s = readString(text, i, line);
      tokens.push({ kind: "string", text: s.value, offset: i });
      i += s.length;
      continue;
    }

    const num = NUMBER.exec(rest);
    if (num && (/[0-9]/.test(ch) || /^\.[0-9]/.test(rest))) {
      const literal = num[0];
      const isReal = /[.eEdD]/.test(literal);
      const kind = readKind(text, i + literal.length);
      tokens.push({ kind: isReal ? "real" : "int", text: literal, kindParam: kind.kindParam, offset: i });
      i += literal.length + kind.length;
      continue;
    }

    if (ch === ".") {
      const m = /^\.([A-Za-z]+)\./.exec(rest);
      const word = m?.[1]?.toLowerCase();
      if (m && word !== undefined && (word === "true" || word === "false")) {
        const kind = readKind(text, i + m[0].length);
        tokens.push({ kind: "logical", text: word, kindParam: kind.kindParam, offset: i });
        i += m[0].length + kind.length;
        continue;
      }
      if (m && word !== undefined && DOT_OPERATORS.has(word)) {
        tokens.push({ kind: "dotop", text: word, offset: i });
        i += m[0].length;
        continue;
      }
      throw new ParseError("GW6001", `Unexpected '.' at line ${line}: ${text}`);
    }

    const name = NAME.exec(rest);
    if (name) {
      tokens.push({ kind: "name", text: name[0].toLowerCase(), offset: i });
      i += name[0].length;
      continue;
    }

    const op = SYMBOL_OPERATORS.find((o) => rest.startsWith(o));
    if (op) {
      tokens.push({ kind: "op", text: op, offset: i });
      i += op.length;
      continue;
    }
    throw new ParseError("GW6001", `Unexpected character '${ch}' at line ${line}: ${text}`);
  }
  tokens.push({ kind: "eof", text: "", offset: text.length });
  return tokens;
}

/** Splits on commas outside parentheses, brackets and character literals. */
export function splitTopLevel(text: string): string[] {
  const out: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let from = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === quote) quote = null;
    } else if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === "(" || ch === "[") {
      depth++;
    } else if (ch === ")" || ch === "]") {
      depth--;
    } else if (ch === "," && depth === 0) {
      out.push(text.slice(from, i));
      from = i + 1;
    }
  }
  out.push(text.slice(from));
  return out;
}

/** Original spelling of a name token, which the token stores lower-cased. */
export function spelling(source: string, token: Token): string {
  return source.slice(token.offset, token.offset + token.text.length);
}

/** Cursor over a token list. */
export class TokenStream {
  readonly source: string;
  readonly line: number;
  readonly #tokens: readonly Token[];
  #pos = 0;

  constructor(source: string, line = 0) {
    this.source = source;
    this.line = line;
    this.#tokens = tokenize(source, line);
  }

  get position(): number {
    return this.#pos;
  }

  set position(value: number) {
    this.#pos = value;
  }

  peek(ahead = 0): Token {
    const last = this.#tokens[this.#tokens.length - 1];
    const t = this.#tokens[this.#pos + ahead] ?? last;
    if (!t) throw new ParseError("GW6001", `Empty statement at line ${this.line}.`);
    return t;
  }

  next(): Token {
    const t = this.peek();
    if (t.kind !== "eof") this.#pos++;
    return t;
  }

  atEnd(): boolean {
    return this.peek().kind === "eof";
  }

  /** Consumes the token if it matches. */
  accept(text: string, kind?: TokenKind): boolean {
    const t = this.peek();
    if (t.text === text && (kind === undefined || t.kind === kind)) {
      this.#pos++;
      return true;
    }
    return false;
  }

  expect(text: string, kind?: TokenKind): Token {
    const t = this.peek();
    if (t.text !== text || (kind !== undefined && t.kind !== kind)) {
      throw new ParseError(
        "GW6001",
        `Expected '${text}' but found '${t.kind === "eof" ? "end of statement" : t.text}' at line ${this.line}: ${this.source}`
      );
    }
    this.#pos++;
    return t;
  }

  expectName(): string {
    const t = this.peek();
    if (t.kind !== "name") {
      throw new ParseError(
        "GW6001",
        `Expected a name but found '${t.kind === "eof" ? "end of statement" : t.text}' at line ${this.line}: ${this.source}`
      );
    }
    this.#pos++;
    return spelling(this.source, t);
  }

  /** Text from the current token to the end of the statement. */
  rest(): string {
    return this.source.slice(this.peek().offset).trim();
  }

  expectEnd(): void {
    if (!this.atEnd()) {
      throw new ParseError("GW6001", `Unexpected '${this.peek().text}' at line ${this.line}: ${this.source}`);
    }
  }
}

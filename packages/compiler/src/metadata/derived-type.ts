import { ParseError } from "../errors.js";
import { logicalLines, splitTopLevel } from "../fortran/lexer.js";
import type { SourceLine } from "../fortran/lexer.js";

export type DerivedTypeComponent = {
  /** `integer`, `type(go_arg)`, ... */
  readonly typeSpec: string;
  readonly attributes: readonly string[];
  readonly name: string;
  /** Text after `=`, or null when the component has no default. */
  readonly initializer: string | null;
  readonly text: string;
};

export type TypeBoundProcedure = {
  readonly name: string;
  /** The procedure after `=>`; the binding name when there is none. */
  readonly procedure: string;
  readonly text: string;
};

const HEADER = /^type\s*(?:,(.*?))?(?:::)?\s*([A-Za-z]\w*)\s*$/i;
const EXTENDS = /^extends\s*\(\s*([A-Za-z]\w*)\s*\)$/i;
const END_TYPE = /^end\s*type(?:\s+([A-Za-z]\w*))?$/i;
const BINDING = /^procedure\s*(?:,[^:]*)?::\s*([A-Za-z]\w*)\s*(?:=>\s*([A-Za-z]\w*))?$/i;

function malformed(message: string): never {
  throw new ParseError("GW3001", message);
}

/** Index of the first `=` outside parentheses that is not part of `==` or `=>`. */
function assignmentIndex(text: string): number {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "(" || ch === "[") depth++;
    else if (ch === ")" || ch === "]") depth--;
    else if (ch === "=" && depth === 0 && text[i + 1] !== "=" && text[i + 1] !== ">" && text[i - 1] !== "=") return i;
  }
  return -1;
}

function parseComponent(line: SourceLine): DerivedTypeComponent {
  const at = line.text.indexOf("::");
  if (at < 0) malformed(`Expected a component declaration with '::' in a derived type but found '${line.text}'.`);
  const [typeSpec = "", ...attributes] = splitTopLevel(line.text.slice(0, at)).map((p) => p.trim());
  const entity = line.text.slice(at + 2).trim();
  const eq = assignmentIndex(entity);
  const lhs = (eq < 0 ? entity : entity.slice(0, eq)).trim();
  const name = /^([A-Za-z]\w*)/.exec(lhs)?.[1];
  if (name === undefined) malformed(`Expected a component name in '${line.text}'.`);
  return {
    typeSpec,
    attributes,
    name,
    initializer: eq < 0 ? null : entity.slice(eq + 1).trim(),
    text: line.text,
  };
}

/** A Fortran derived-type definition read into its parts. The original text is kept. */
export class DerivedTypeDefinition {
  readonly text: string;
  readonly name: string;
  readonly extends: string | null;
  readonly components: readonly DerivedTypeComponent[];
  /** Null when the definition has no `contains` section. */
  readonly bindings: readonly TypeBoundProcedure[] | null;

  private constructor(
    text: string,
    name: string,
    parent: string | null,
    components: readonly DerivedTypeComponent[],
    bindings: readonly TypeBoundProcedure[] | null
  ) {
    this.text = text;
    this.name = name;
    this.extends = parent;
    this.components = components;
    this.bindings = bindings;
  }

  static parse(text: string): DerivedTypeDefinition {
    const lines = logicalLines(text);
    const [first, ...rest] = lines;
    const last = rest.pop();
    const header = first === undefined ? null : HEADER.exec(first.text);
    if (first === undefined || header === null) {
      malformed(`Expected a derived-type definition starting with 'type' but found '${first?.text ?? ""}'.`);
    }
    const name = header[2] ?? "";
    if (last === undefined || !END_TYPE.test(last.text)) {
      malformed(`The derived type '${name}' is missing its 'end type' statement.`);
    }

    let parent: string | null = null;
    for (const attr of splitTopLevel(header[1] ?? "").map((a) => a.trim())) {
      const m = EXTENDS.exec(attr);
      if (m?.[1] !== undefined) parent = m[1];
    }

    const components: DerivedTypeComponent[] = [];
    let bindings: TypeBoundProcedure[] | null = null;
    for (const line of rest) {
      const lower = line.text.toLowerCase();
      if (lower === "contains") {
        if (bindings !== null) malformed(`The derived type '${name}' has more than one 'contains' statement.`);
        bindings = [];
        continue;
      }
      if (lower === "private" || lower === "sequence") continue;
      if (bindings === null) {
        components.push(parseComponent(line));
        continue;
      }
      const m = BINDING.exec(line.text);
      if (m?.[1] === undefined) malformed(`Expected a type-bound procedure but found '${line.text}'.`);
      bindings.push({ name: m[1], procedure: m[2] ?? m[1], text: line.text });
    }
    return new DerivedTypeDefinition(text, name, parent, components, bindings);
  }

  component(name: string): DerivedTypeComponent | undefined {
    return this.components.find((c) => c.name.toLowerCase() === name.toLowerCase());
  }
}

/**
 * Splits an array-constructor initializer, `(/ a, b /)` or `[a, b]`, into its
 * items. Any other text is a single item.
 */
export function constructorItems(initializer: string): string[] {
  const t = initializer.trim();
  let inner = t;
  if (t.startsWith("(/") && t.endsWith("/)")) inner = t.slice(2, -2);
  else if (t.startsWith("[") && t.endsWith("]")) inner = t.slice(1, -1);
  return splitTopLevel(inner)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/** Reads `name(a, b, ...)` into its name and trimmed arguments. */
export function callForm(text: string): { name: string; args: string[] } | null {
  const m = /^([A-Za-z]\w*)\s*\((.*)\)$/s.exec(text.trim());
  if (m?.[1] === undefined || m[2] === undefined) return null;
  return { name: m[1], args: splitTopLevel(m[2]).map((a) => a.trim()) };
}

// Blanks, continuation ampersands, line breaks and trailing comments.
const GAP = String.raw`(?:[ \t\r\n&]|![^\n]*)*`;

function replaceOnce(text: string, re: RegExp, value: string, what: string): string {
  let found = false;
  const out = text.replace(re, (_m, head: string) => {
    found = true;
    return `${head}${value}`;
  });
  if (!found) malformed(`Could not find ${what} in the derived-type text to replace it with '${value}'.`);
  return out;
}

/**
 * Replaces the value of `component = value` in definition text, leaving the
 * rest untouched. The value may sit on a continuation line.
 */
export function withInitializer(text: string, component: string, value: string): string {
  const re = new RegExp(`(::${GAP}${component}${GAP}=${GAP})[A-Za-z]\\w*`, "i");
  return replaceOnce(text, re, value, `the value of '${component}'`);
}

/** Replaces the procedure of the single type-bound binding in definition text. */
export function withBinding(text: string, value: string): string {
  const re = /=>/.test(text)
    ? new RegExp(`(=>${GAP})[A-Za-z]\\w*`)
    : new RegExp(`(procedure\\s*(?:,[^:\\n]*)?::${GAP})[A-Za-z]\\w*`, "i");
  return replaceOnce(text, re, value, "the type-bound procedure");
}

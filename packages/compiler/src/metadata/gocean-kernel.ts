import { readFileSync } from "node:fs";

import { InternalError, ParseError } from "../errors.js";
import { UnknownFortranType } from "../symbols/datatypes.js";
import type { DataTypeSymbol } from "../symbols/symbols.js";
import { DerivedTypeDefinition, callForm, constructorItems, withBinding, withInitializer } from "./derived-type.js";
import { OperatorArg, quotedList } from "./lfric-args.js";

export type GoceanVocabulary = {
  readonly accesses: readonly string[];
  readonly gridPointTypes: readonly string[];
  readonly stencilNames: readonly string[];
  readonly iteratesOver: readonly string[];
  readonly offsets: readonly string[];
  readonly gridProperties: readonly string[];
};

function tableStrings(table: Record<string, unknown>, key: string): readonly string[] {
  const value = table[key];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new InternalError("GW9003", `gocean-vocabulary.json: '${key}' must be an array of strings.`);
  }
  return Object.freeze(value.map((v) => v.toLowerCase()));
}

/** The packaged GOcean vocabulary; `gridProperties` replaces the packaged grid-property list. */
export function loadGoceanVocabulary(options: { gridProperties?: readonly string[] } = {}): GoceanVocabulary {
  const raw = readFileSync(new URL("./gocean-vocabulary.json", import.meta.url), "utf-8");
  const parsed = JSON.parse(raw) as unknown;
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new InternalError("GW9003", "gocean-vocabulary.json: the table must be an object.");
  }
  const table = parsed as Record<string, unknown>;
  return Object.freeze({
    accesses: tableStrings(table, "accesses"),
    gridPointTypes: tableStrings(table, "gridPointTypes"),
    stencilNames: tableStrings(table, "stencilNames"),
    iteratesOver: tableStrings(table, "iteratesOver"),
    offsets: tableStrings(table, "offsets"),
    gridProperties: options.gridProperties
      ? Object.freeze(options.gridProperties.map((p) => p.toLowerCase()))
      : tableStrings(table, "gridProperties"),
  });
}

export type GridPropertyArg = {
  readonly kind: "grid-property";
  readonly access: string;
  readonly gridProperty: string;
  readonly text: string;
};

export type GridFieldArg = {
  readonly kind: "field";
  readonly access: string;
  readonly gridPointType: string;
  /** The pointwise name, or `go_stencil` when `stencil` is set. */
  readonly form: string;
  readonly stencil: readonly string[] | null;
  readonly text: string;
};

export type GridOperatorArg = {
  readonly kind: "operator";
  readonly operator: OperatorArg;
  readonly text: string;
};

export type GoceanArg = GridPropertyArg | GridFieldArg | GridOperatorArg;

const SECTIONS = ["meta_args", "iterates_over", "index_offset"] as const;
type Section = (typeof SECTIONS)[number];

function isSection(name: string): name is Section {
  return SECTIONS.some((s) => s === name);
}

function inVocabulary(value: string, allowed: readonly string[], message: string): string {
  if (!allowed.includes(value.toLowerCase())) {
    throw new ParseError("GW3003", `${message} should be one of ${quotedList(allowed)}, but found '${value}'.`);
  }
  return value;
}

function parseStencil(form: string, args: readonly string[]): readonly string[] {
  for (const entry of args) {
    if (!/^[01]{3}$/.test(entry)) {
      throw new ParseError("GW3004", `Stencil entries should follow the pattern [01]{3} but found ${entry}.`);
    }
  }
  if (args.length !== 3) {
    throw new ParseError(
      "GW3005",
      `If the third metadata entry is a stencil, it should contain 3 arguments, but found ${args.length} in '${form}'.`
    );
  }
  return Object.freeze([...args]);
}

function parseField(entries: readonly string[], text: string, vocabulary: GoceanVocabulary): GridFieldArg {
  const [access = "", gridPointType = "", form = ""] = entries;
  inVocabulary(access, vocabulary.accesses, "The first metadata entry for a field argument");
  inVocabulary(gridPointType, vocabulary.gridPointTypes, "The second metadata entry for a field argument");
  const stencil = callForm(form);
  const badForm = (): never => {
    throw new ParseError(
      "GW3003",
      `The third metadata entry for a field argument should be one of ${quotedList(vocabulary.stencilNames)} or 'go_stencil(...)', but found '${form}'.`
    );
  };
  if (stencil !== null) {
    if (stencil.name.toLowerCase() !== "go_stencil") badForm();
    return { kind: "field", access, gridPointType, form: stencil.name, stencil: parseStencil(form, stencil.args), text };
  }
  if (!vocabulary.stencilNames.includes(form.toLowerCase())) badForm();
  return { kind: "field", access, gridPointType, form, stencil: null, text };
}

/** Categorises one `go_arg(...)` entry by its entry count. */
function parseArg(text: string, vocabulary: GoceanVocabulary): GoceanArg {
  const call = callForm(text);
  if (call === null) {
    throw new ParseError("GW3012", `Expected a metadata argument of the form 'go_arg(...)' but found '${text}'.`);
  }
  const entries = call.args;
  switch (entries.length) {
    case 2: {
      const [access = "", gridProperty = ""] = entries;
      inVocabulary(access, vocabulary.accesses, "The first metadata entry for a grid property argument");
      inVocabulary(gridProperty, vocabulary.gridProperties, "The second metadata entry for a grid property argument");
      return { kind: "grid-property", access, gridProperty, text };
    }
    case 3:
      return parseField(entries, text, vocabulary);
    case 5:
      return { kind: "operator", operator: OperatorArg.fromEntries(entries), text };
    default:
      throw new ParseError(
        "GW3002",
        `'meta_args' entries should have 2, 3 or 5 arguments, but found ${entries.length} in '${text}'.`
      );
  }
}

/**
 * GOcean kernel metadata, parsed once from its derived-type declaration. The
 * declaration text is kept and only rebuilt after a setter changes a value.
 */
export class KernelMetadata {
  readonly name: string;
  readonly args: readonly GoceanArg[];
  readonly #vocabulary: GoceanVocabulary;
  readonly #source: string;
  #iteratesOver: string;
  #indexOffset: string;
  #code: string;
  #text: string | null;

  private constructor(
    source: string,
    fields: { name: string; args: readonly GoceanArg[]; iteratesOver: string; indexOffset: string; code: string },
    vocabulary: GoceanVocabulary
  ) {
    this.#source = source;
    this.#text = source;
    this.#vocabulary = vocabulary;
    this.name = fields.name;
    this.args = Object.freeze([...fields.args]);
    this.#iteratesOver = fields.iteratesOver;
    this.#indexOffset = fields.indexOffset;
    this.#code = fields.code;
  }

  static fromDeclaration(text: string, vocabulary: GoceanVocabulary = loadGoceanVocabulary()): KernelMetadata {
    const def = DerivedTypeDefinition.parse(text);
    const found = new Map<Section, string>();

    for (const component of def.components) {
      const name = component.name.toLowerCase();
      if (!isSection(name)) {
        throw new ParseError(
          "GW3008",
          `Expecting metadata entries to be one of 'meta_args', 'iterates_over', or 'index_offset', but found '${component.name}' in '${def.name}'.`
        );
      }
      if (found.has(name)) {
        throw new ParseError("GW3006", `'${name}' should only be defined once in the metadata, but found it again in '${def.name}'.`);
      }
      if (component.initializer === null) {
        throw new ParseError("GW3012", `'${name}' has no value in '${def.name}'.`);
      }
      found.set(name, component.initializer);
    }

    const section = (name: Section): string => {
      const value = found.get(name);
      if (value === undefined) {
        throw new ParseError(
          "GW3007",
          `Expecting '${name}' to be an entry in the metadata but it was not found in '${def.name}'.`
        );
      }
      return value;
    };
    const metaArgs = section("meta_args");
    const iteratesOver = inVocabulary(section("iterates_over"), vocabulary.iteratesOver, "The value of 'iterates_over'");
    const indexOffset = inVocabulary(section("index_offset"), vocabulary.offsets, "The value of 'index_offset'");

    if (def.bindings === null) {
      throw new ParseError(
        "GW3009",
        `The metadata '${def.name}' does not have a contains keyword, which is required to name the kernel code.`
      );
    }
    const [binding, ...others] = def.bindings;
    if (binding === undefined || others.length > 0) {
      throw new ParseError(
        "GW3010",
        `Expecting a single entry after the 'contains' keyword but found ${def.bindings.length}.`
      );
    }

    const args = constructorItems(metaArgs).map((a) => parseArg(a, vocabulary));
    return new KernelMetadata(
      text,
      { name: def.name, args, iteratesOver, indexOffset, code: binding.procedure },
      vocabulary
    );
  }

  /** Reads the metadata held by a type symbol whose datatype is its declaration. */
  static fromSymbol(symbol: DataTypeSymbol, vocabulary?: GoceanVocabulary): KernelMetadata {
    const t = symbol.datatype;
    if (!(t instanceof UnknownFortranType)) {
      throw new ParseError(
        "GW3001",
        `Kernel metadata type '${symbol.name}' must hold its Fortran declaration, but its type is '${t.kind}'.`
      );
    }
    return KernelMetadata.fromDeclaration(t.declaration, vocabulary);
  }

  get iteratesOver(): string {
    return this.#iteratesOver;
  }

  set iteratesOver(value: string) {
    this.#iteratesOver = inVocabulary(value, this.#vocabulary.iteratesOver, "'iterates_over'");
    this.#text = null;
  }

  get indexOffset(): string {
    return this.#indexOffset;
  }

  set indexOffset(value: string) {
    this.#indexOffset = inVocabulary(value, this.#vocabulary.offsets, "'index_offset'");
    this.#text = null;
  }

  get code(): string {
    return this.#code;
  }

  set code(value: string) {
    if (!/^[A-Za-z]\w*$/.test(value)) {
      throw new ParseError("GW3012", `The kernel code must be a Fortran name, but found '${value}'.`);
    }
    this.#code = value;
    this.#text = null;
  }

  fortranString(): string {
    if (this.#text === null) {
      let text = withInitializer(this.#source, "iterates_over", this.#iteratesOver);
      text = withInitializer(text, "index_offset", this.#indexOffset);
      this.#text = withBinding(text, this.#code);
    }
    return this.#text;
  }
}

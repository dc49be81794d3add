import { readFileSync } from "node:fs";

import { InternalError, ParseError } from "../errors.js";
import { callForm } from "./derived-type.js";

type Category = {
  readonly datatypes: readonly string[];
  readonly accesses: readonly string[];
};

export type LfricVocabulary = {
  readonly scalar: Category;
  readonly field: Category;
  readonly operator: Category;
  readonly columnwiseOperator: Category;
  readonly functionSpaces: readonly string[];
  readonly anySpaces: readonly string[];
  readonly operatesOn: readonly string[];
};

function tableRecord(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new InternalError("GW9003", `lfric-vocabulary.json: ${label} must be an object.`);
  }
  return value as Record<string, unknown>;
}

function tableStrings(value: unknown, label: string): readonly string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new InternalError("GW9003", `lfric-vocabulary.json: ${label} must be an array of strings.`);
  }
  return Object.freeze([...value]);
}

function category(table: Record<string, unknown>, key: string): Category {
  const c = tableRecord(table[key], key);
  return Object.freeze({
    datatypes: tableStrings(c["datatypes"], `${key}.datatypes`),
    accesses: tableStrings(c["accesses"], `${key}.accesses`),
  });
}

function readVocabulary(): LfricVocabulary {
  const raw = readFileSync(new URL("./lfric-vocabulary.json", import.meta.url), "utf-8");
  const table = tableRecord(JSON.parse(raw) as unknown, "the table");
  return Object.freeze({
    scalar: category(table, "scalar"),
    field: category(table, "field"),
    operator: category(table, "operator"),
    columnwiseOperator: category(table, "columnwiseOperator"),
    functionSpaces: tableStrings(table["functionSpaces"], "functionSpaces"),
    anySpaces: tableStrings(table["anySpaces"], "anySpaces"),
    operatesOn: tableStrings(table["operatesOn"], "operatesOn"),
  });
}

export const LFRIC_VOCABULARY: LfricVocabulary = readVocabulary();

const ORDINALS = ["first", "second", "third", "fourth", "fifth"];

/** `['a', 'b']`, the way allowed sets appear in messages. */
export function quotedList(values: readonly string[]): string {
  return `[${values.map((v) => `'${v}'`).join(", ")}]`;
}

function checkEntry(value: string, allowed: readonly string[], position: number, what: string): string {
  if (!allowed.includes(value.toLowerCase())) {
    throw new ParseError(
      "GW3003",
      `The ${ORDINALS[position] ?? `#${position + 1}`} metadata entry for an argument should be a recognised ${what} (one of ${quotedList(allowed)}), but found '${value}'.`
    );
  }
  return value;
}

function optional(value: string | undefined, check: (v: string) => string): string | undefined {
  return value === undefined ? undefined : check(value);
}

function listWords(words: readonly string[]): string {
  if (words.length <= 1) return words.join("");
  return `${words.slice(0, -1).join(", ")} and ${words[words.length - 1] ?? ""}`;
}

/** Parses `arg_type(...)` and checks its entry count. */
function argTypeEntries(text: string, count: number): string[] {
  const form = callForm(text);
  if (form === null) {
    throw new ParseError("GW3012", `Expected kernel metadata in the form 'arg_type(...)' but found '${text}'.`);
  }
  if (form.name.toLowerCase() !== "arg_type") {
    throw new ParseError(
      "GW3012",
      `Expected kernel metadata to have the name 'arg_type' and be in the form 'arg_type(...)', but found '${text}'.`
    );
  }
  if (form.args.length !== count) {
    throw new ParseError(
      "GW3002",
      `Expected kernel metadata to have ${count} arguments, but found ${form.args.length} in '${text}'.`
    );
  }
  return form.args;
}

function checkForm(value: string, expected: string): void {
  if (value.toLowerCase() !== expected.toLowerCase()) {
    throw new ParseError(
      "GW3003",
      `The first metadata entry for an argument should be '${expected}', but found '${value}'.`
    );
  }
}

/** One `arg_type(...)` entry of LFRic `meta_args`. */
export abstract class LfricArg {
  abstract get form(): string;
  protected abstract readonly fieldNames: readonly string[];
  protected abstract values(): readonly (string | undefined)[];

  /** Entries written after the form. */
  protected entries(values: readonly string[]): readonly string[] {
    return values;
  }

  fortranString(): string {
    const values = this.values();
    const set = values.filter((v): v is string => v !== undefined);
    if (set.length !== values.length) {
      throw new ParseError(
        "GW3011",
        `Values for ${listWords(this.fieldNames)} must be provided before calling the fortranString method, but found ${listWords(values.map((v) => `'${v ?? "undefined"}'`))}, respectively.`
      );
    }
    return `arg_type(${[this.form, ...this.entries(set)].join(", ")})`;
  }
}

export class ScalarArg extends LfricArg {
  get form(): string {
    return "GH_SCALAR";
  }

  protected readonly fieldNames = ["datatype", "access"];
  #datatype: string | undefined;
  #access: string | undefined;

  constructor(datatype?: string, access?: string) {
    super();
    this.#datatype = optional(datatype, ScalarArg.#checkDatatype);
    this.#access = optional(access, ScalarArg.#checkAccess);
  }

  static #checkDatatype(v: string): string {
    return checkEntry(v, LFRIC_VOCABULARY.scalar.datatypes, 1, "datatype descriptor");
  }

  static #checkAccess(v: string): string {
    return checkEntry(v, LFRIC_VOCABULARY.scalar.accesses, 2, "access descriptor");
  }

  static fromFortranString(text: string): ScalarArg {
    return ScalarArg.fromEntries(argTypeEntries(text, 3));
  }

  static fromEntries(entries: readonly string[]): ScalarArg {
    const [form = "", datatype, access] = entries;
    checkForm(form, "GH_SCALAR");
    return new ScalarArg(datatype, access);
  }

  get datatype(): string | undefined {
    return this.#datatype;
  }

  set datatype(value: string) {
    this.#datatype = ScalarArg.#checkDatatype(value);
  }

  get access(): string | undefined {
    return this.#access;
  }

  set access(value: string) {
    this.#access = ScalarArg.#checkAccess(value);
  }

  protected values(): readonly (string | undefined)[] {
    return [this.#datatype, this.#access];
  }
}

function fieldSpaces(): readonly string[] {
  return [...LFRIC_VOCABULARY.functionSpaces, ...LFRIC_VOCABULARY.anySpaces];
}

export class FieldArg extends LfricArg {
  get form(): string {
    return "GH_FIELD";
  }

  protected readonly fieldNames: readonly string[] = ["datatype", "access", "function_space"];
  #datatype: string | undefined;
  #access: string | undefined;
  #functionSpace: string | undefined;

  constructor(datatype?: string, access?: string, functionSpace?: string) {
    super();
    this.#datatype = optional(datatype, FieldArg.checkDatatype);
    this.#access = optional(access, FieldArg.checkAccess);
    this.#functionSpace = optional(functionSpace, FieldArg.checkFunctionSpace);
  }

  protected static checkDatatype(v: string): string {
    return checkEntry(v, LFRIC_VOCABULARY.field.datatypes, 1, "datatype descriptor");
  }

  protected static checkAccess(v: string): string {
    return checkEntry(v, LFRIC_VOCABULARY.field.accesses, 2, "access descriptor");
  }

  protected static checkFunctionSpace(v: string): string {
    return checkEntry(v, fieldSpaces(), 3, "function space");
  }

  static fromFortranString(text: string): FieldArg {
    return FieldArg.fromEntries(argTypeEntries(text, 4));
  }

  static fromEntries(entries: readonly string[]): FieldArg {
    const [form = "", datatype, access, functionSpace] = entries;
    checkForm(form, "GH_FIELD");
    return new FieldArg(datatype, access, functionSpace);
  }

  get datatype(): string | undefined {
    return this.#datatype;
  }

  set datatype(value: string) {
    this.#datatype = FieldArg.checkDatatype(value);
  }

  get access(): string | undefined {
    return this.#access;
  }

  set access(value: string) {
    this.#access = FieldArg.checkAccess(value);
  }

  get functionSpace(): string | undefined {
    return this.#functionSpace;
  }

  set functionSpace(value: string) {
    this.#functionSpace = FieldArg.checkFunctionSpace(value);
  }

  protected values(): readonly (string | undefined)[] {
    return [this.#datatype, this.#access, this.#functionSpace];
  }
}

const VECTOR_FORM = /^gh_field\s*\*\s*(\S+)$/i;

function checkVectorLength(value: string): string {
  if (!/^[0-9]+$/.test(value) || Number(value) <= 1) {
    throw new ParseError(
      "GW3013",
      `The vector length metadata should be a string containing an integer greater than 1, but found '${value}'.`
    );
  }
  return value;
}

/** `GH_FIELD*n`: a field with n components. */
export class FieldVectorArg extends FieldArg {
  protected override readonly fieldNames: readonly string[] = ["datatype", "access", "function_space", "vector_length"];
  #vectorLength: string | undefined;

  constructor(datatype?: string, access?: string, functionSpace?: string, vectorLength?: string) {
    super(datatype, access, functionSpace);
    this.#vectorLength = optional(vectorLength, checkVectorLength);
  }

  override get form(): string {
    return `GH_FIELD*${this.#vectorLength ?? "undefined"}`;
  }

  static override fromFortranString(text: string): FieldVectorArg {
    return FieldVectorArg.fromEntries(argTypeEntries(text, 4));
  }

  static override fromEntries(entries: readonly string[]): FieldVectorArg {
    const [form = "", datatype, access, functionSpace] = entries;
    const m = VECTOR_FORM.exec(form);
    if (m?.[1] === undefined) {
      throw new ParseError(
        "GW3003",
        `The first metadata entry for a field vector argument should be 'GH_FIELD*n', but found '${form}'.`
      );
    }
    return new FieldVectorArg(datatype, access, functionSpace, m[1]);
  }

  get vectorLength(): string | undefined {
    return this.#vectorLength;
  }

  set vectorLength(value: string) {
    this.#vectorLength = checkVectorLength(value);
  }

  protected override values(): readonly (string | undefined)[] {
    return [...super.values(), this.#vectorLength];
  }

  /** The length is written in the form, not as an entry. */
  protected override entries(values: readonly string[]): readonly string[] {
    return values.slice(0, -1);
  }
}

export class OperatorArg extends LfricArg {
  get form(): string {
    return "GH_OPERATOR";
  }

  protected readonly fieldNames = ["datatype", "access", "function_space1", "function_space2"];
  readonly #category: Category;
  #datatype: string | undefined;
  #access: string | undefined;
  #functionSpace1: string | undefined;
  #functionSpace2: string | undefined;

  constructor(datatype?: string, access?: string, functionSpace1?: string, functionSpace2?: string) {
    super();
    this.#category = this.vocabulary();
    this.#datatype = optional(datatype, (v) => this.#checkDatatype(v));
    this.#access = optional(access, (v) => this.#checkAccess(v));
    this.#functionSpace1 = optional(functionSpace1, (v) => OperatorArg.#checkSpace(v, 3));
    this.#functionSpace2 = optional(functionSpace2, (v) => OperatorArg.#checkSpace(v, 4));
  }

  protected vocabulary(): Category {
    return LFRIC_VOCABULARY.operator;
  }

  #checkDatatype(v: string): string {
    return checkEntry(v, this.#category.datatypes, 1, "datatype descriptor");
  }

  #checkAccess(v: string): string {
    return checkEntry(v, this.#category.accesses, 2, "access descriptor");
  }

  static #checkSpace(v: string, position: number): string {
    return checkEntry(v, LFRIC_VOCABULARY.functionSpaces, position, "function space");
  }

  static fromFortranString(text: string): OperatorArg {
    return OperatorArg.fromEntries(argTypeEntries(text, 5));
  }

  static fromEntries(entries: readonly string[]): OperatorArg {
    const [form = "", datatype, access, fs1, fs2] = entries;
    checkForm(form, "GH_OPERATOR");
    return new OperatorArg(datatype, access, fs1, fs2);
  }

  get datatype(): string | undefined {
    return this.#datatype;
  }

  set datatype(value: string) {
    this.#datatype = this.#checkDatatype(value);
  }

  get access(): string | undefined {
    return this.#access;
  }

  set access(value: string) {
    this.#access = this.#checkAccess(value);
  }

  get functionSpace1(): string | undefined {
    return this.#functionSpace1;
  }

  set functionSpace1(value: string) {
    this.#functionSpace1 = OperatorArg.#checkSpace(value, 3);
  }

  get functionSpace2(): string | undefined {
    return this.#functionSpace2;
  }

  set functionSpace2(value: string) {
    this.#functionSpace2 = OperatorArg.#checkSpace(value, 4);
  }

  protected values(): readonly (string | undefined)[] {
    return [this.#datatype, this.#access, this.#functionSpace1, this.#functionSpace2];
  }
}

/** Column-wise (CMA) operator. */
export class ColumnwiseOperatorArg extends OperatorArg {
  override get form(): string {
    return "GH_COLUMNWISE_OPERATOR";
  }

  protected override vocabulary(): Category {
    return LFRIC_VOCABULARY.columnwiseOperator;
  }

  static override fromFortranString(text: string): ColumnwiseOperatorArg {
    return ColumnwiseOperatorArg.fromEntries(argTypeEntries(text, 5));
  }

  static override fromEntries(entries: readonly string[]): ColumnwiseOperatorArg {
    const [form = "", datatype, access, fs1, fs2] = entries;
    checkForm(form, "GH_COLUMNWISE_OPERATOR");
    return new ColumnwiseOperatorArg(datatype, access, fs1, fs2);
  }
}

export type AnyLfricArg = ScalarArg | FieldArg | FieldVectorArg | OperatorArg | ColumnwiseOperatorArg;

/** Reads any `arg_type(...)` entry, choosing the class from its first entry. */
export function lfricArgFromFortranString(text: string): AnyLfricArg {
  const form = callForm(text);
  const head = form?.args[0]?.toLowerCase().replace(/\s+/g, "");
  if (head === "gh_scalar") return ScalarArg.fromFortranString(text);
  if (head === "gh_field") return FieldArg.fromFortranString(text);
  if (head !== undefined && VECTOR_FORM.test(head)) return FieldVectorArg.fromFortranString(text);
  if (head === "gh_operator") return OperatorArg.fromFortranString(text);
  if (head === "gh_columnwise_operator") return ColumnwiseOperatorArg.fromFortranString(text);
  const allowed = ["gh_scalar", "gh_field", "gh_field*n", "gh_operator", "gh_columnwise_operator"];
  throw new ParseError(
    "GW3003",
    `The first metadata entry for an argument should be one of ${quotedList(allowed)}, but found '${form?.args[0] ?? text}'.`
  );
}

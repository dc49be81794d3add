import { readFileSync } from "node:fs";

import { DataTypeError, InternalError, SymbolError } from "../errors.js";
import { Literal } from "../ir/data.js";
import { ArrayType, INTEGER_TYPE, ScalarType, isScalarIntrinsic } from "./datatypes.js";
import type { ScalarIntrinsic, ShapeSpec } from "./datatypes.js";
import { ContainerSymbol, DataSymbol, importInterface } from "./symbols.js";
import type { DataSymbolOptions, SymbolInterface, Visibility } from "./symbols.js";

export type TypeFamilyKind = "generic-scalar" | "scalar" | "array";

/**
 * A named family of LFRic data types. Families are compared by identity;
 * `base` links a specialised family to the family it refines.
 */
export type TypeFamily = {
  readonly name: string;
  readonly kind: TypeFamilyKind;
  readonly base: TypeFamily | null;
  /** Extra attributes a symbol of this family must carry (e.g. `fs`). */
  readonly properties: readonly string[];
  /** Scalar family of the elements; set for arrays. */
  readonly scalar: TypeFamily | null;
  /** Descriptions of the dimensions; set for arrays. */
  readonly dims: readonly string[];
  readonly intrinsic: ScalarIntrinsic | null;
  readonly precision: DataSymbol | null;
};

export type FamilyDimension = ShapeSpec | Literal;

export type CreateFamilySymbolOptions = {
  readonly attributes?: Readonly<Record<string, string>>;
  readonly dims?: readonly FamilyDimension[];
  readonly interface?: SymbolInterface;
  readonly visibility?: Visibility;
};

/** A DataSymbol created through a type family. */
export class FamilyDataSymbol extends DataSymbol {
  readonly family: TypeFamily;
  readonly attributes: Readonly<Record<string, string>>;

  constructor(
    name: string,
    family: TypeFamily,
    datatype: ScalarType | ArrayType,
    attributes: Readonly<Record<string, string>>,
    options: DataSymbolOptions = {}
  ) {
    super(name, datatype, options);
    this.family = family;
    this.attributes = Object.freeze({ ...attributes });
  }

  override copy(): FamilyDataSymbol {
    const t = this.datatype;
    if (!(t instanceof ScalarType) && !(t instanceof ArrayType)) {
      throw new InternalError("GW9002", `Family symbol '${this.name}' no longer holds a family datatype.`);
    }
    return new FamilyDataSymbol(this.name, this.family, t, this.attributes, {
      visibility: this.visibility,
      interface: this.interface,
    });
  }
}

type TableRecord = Record<string, unknown>;

function asTableRecord(value: unknown, label: string): TableRecord {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new InternalError("GW9003", `lfric-types.json: ${label} must be an object.`);
  }
  return value as TableRecord;
}

function tableString(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new InternalError("GW9003", `lfric-types.json: ${label} must be a non-empty string.`);
  }
  return value;
}

function tableList(value: unknown, label: string): readonly unknown[] {
  if (!Array.isArray(value)) {
    throw new InternalError("GW9003", `lfric-types.json: ${label} must be an array.`);
  }
  return value;
}

function tableStrings(value: unknown, label: string): readonly string[] {
  return tableList(value, label).map((v, i) => tableString(v, `${label}[${i}]`));
}

function readTable(): TableRecord {
  const raw = readFileSync(new URL("./lfric-types.json", import.meta.url), "utf-8");
  return asTableRecord(JSON.parse(raw) as unknown, "the table");
}

export const LFRIC_DIMENSION_VALUES: readonly string[] = ["1", "3"];

/**
 * Type families for LFRic kernels. Built from the packaged data table; create
 * one per compilation.
 */
export class TypeFamilyRegistry {
  readonly constantsModule: ContainerSymbol;
  readonly #precisions = new Map<string, DataSymbol>();
  readonly #families = new Map<string, TypeFamily>();
  readonly #integerScalar: TypeFamily;

  constructor(table: TableRecord = readTable()) {
    const mod = asTableRecord(table.precisionModule, "'precisionModule'");
    this.constantsModule = new ContainerSymbol(tableString(mod.name, "'precisionModule.name'"));
    for (const p of tableStrings(mod.symbols, "'precisionModule.symbols'")) {
      this.#precisions.set(p, new DataSymbol(p, INTEGER_TYPE, { interface: importInterface(this.constantsModule) }));
    }

    tableList(table.genericScalars, "'genericScalars'").forEach((v, i) => {
      const e = asTableRecord(v, `'genericScalars[${i}]'`);
      const intrinsic = tableString(e.intrinsic, `'genericScalars[${i}].intrinsic'`);
      if (!isScalarIntrinsic(intrinsic)) {
        throw new InternalError("GW9003", `lfric-types.json: unknown intrinsic '${intrinsic}'.`);
      }
      this.#define({
        name: tableString(e.name, `'genericScalars[${i}].name'`),
        kind: "generic-scalar",
        base: null,
        properties: [],
        scalar: null,
        dims: [],
        intrinsic,
        precision: this.precisionSymbol(tableString(e.precision, `'genericScalars[${i}].precision'`)),
      });
    });

    tableList(table.specificScalars, "'specificScalars'").forEach((v, i) => {
      const e = asTableRecord(v, `'specificScalars[${i}]'`);
      const base = this.family(tableString(e.base, `'specificScalars[${i}].base'`));
      this.#define({
        ...base,
        name: tableString(e.name, `'specificScalars[${i}].name'`),
        kind: "scalar",
        base,
        properties: tableStrings(e.properties, `'specificScalars[${i}].properties'`),
      });
    });

    tableList(table.arrays, "'arrays'").forEach((v, i) => {
      const e = asTableRecord(v, `'arrays[${i}]'`);
      const scalar = this.family(tableString(e.scalar, `'arrays[${i}].scalar'`));
      this.#define({
        name: tableString(e.name, `'arrays[${i}].name'`),
        kind: "array",
        base: null,
        properties: tableStrings(e.properties, `'arrays[${i}].properties'`),
        scalar,
        dims: tableStrings(e.dims, `'arrays[${i}].dims'`),
        intrinsic: scalar.intrinsic,
        precision: scalar.precision,
      });
    });

    tableList(table.vectorFields, "'vectorFields'").forEach((v, i) => {
      const e = asTableRecord(v, `'vectorFields[${i}]'`);
      const base = this.family(tableString(e.base, `'vectorFields[${i}].base'`));
      this.#define({ ...base, name: tableString(e.name, `'vectorFields[${i}].name'`), base });
    });

    this.#integerScalar = this.family("LfricIntegerScalar");
  }

  #define(family: TypeFamily): void {
    this.#families.set(family.name, Object.freeze(family));
  }

  get families(): readonly TypeFamily[] {
    return [...this.#families.values()];
  }

  get precisionSymbols(): readonly DataSymbol[] {
    return [...this.#precisions.values()];
  }

  precisionSymbol(name: string): DataSymbol {
    const s = this.#precisions.get(name.toLowerCase());
    if (!s) {
      throw new SymbolError("GW1102", `Could not find '${name}' in the symbol table.`);
    }
    return s;
  }

  family(name: string): TypeFamily {
    const f = this.#families.get(name);
    if (!f) {
      throw new SymbolError("GW1106", `Unknown LFRic type family '${name}'.`);
    }
    return f;
  }

  /** Scalar or array datatype of a family. Arrays need one extent per dimension. */
  dataType(name: string, dims: readonly FamilyDimension[] = []): ScalarType | ArrayType {
    const f = this.family(name);
    const { intrinsic, precision } = f;
    if (intrinsic === null || precision === null) {
      throw new InternalError("GW9003", `Type family '${name}' has no scalar type.`);
    }
    const scalar = new ScalarType(intrinsic, precision);
    if (f.kind !== "array") return scalar;
    if (dims.length !== f.dims.length) {
      throw new DataTypeError(
        "GW1005",
        `'${f.name}DataType' expected the number of supplied dimensions to be ${f.dims.length} but found ${dims.length}.`
      );
    }
    return new ArrayType(
      scalar,
      dims.map((d) => (d instanceof Literal ? Number(d.value) : d))
    );
  }

  createSymbol(familyName: string, symbolName: string, options: CreateFamilySymbolOptions = {}): FamilyDataSymbol {
    const f = this.family(familyName);
    const attributes = options.attributes ?? {};
    const given = Object.keys(attributes).sort();
    const wanted = [...f.properties].sort();
    if (given.length !== wanted.length || given.some((k, i) => k !== wanted[i])) {
      throw new DataTypeError(
        "GW1006",
        `'${f.name}DataSymbol' expected attributes [${f.properties.join(", ")}] but found [${Object.keys(attributes).join(", ")}].`
      );
    }
    return new FamilyDataSymbol(symbolName, f, this.dataType(familyName, options.dims ?? []), attributes, {
      interface: options.interface,
      visibility: options.visibility,
    });
  }

  /** True if the symbol was created through `familyName` or a family refining it. */
  isMember(symbol: DataSymbol, familyName: string): boolean {
    if (!(symbol instanceof FamilyDataSymbol)) return false;
    const target = this.family(familyName);
    for (let f: TypeFamily | null = symbol.family; f; f = f.base) {
      if (f === target) return true;
    }
    return false;
  }

  /** Literal array extent used by basis functions; only 1 and 3 exist. */
  dimension(value: string): Literal {
    if (!LFRIC_DIMENSION_VALUES.includes(value)) {
      throw new DataTypeError("GW1007", `An LFRic dimension object must be '1' or '3', but found '${value}'.`);
    }
    const { intrinsic, precision } = this.#integerScalar;
    return new Literal(value, new ScalarType(intrinsic ?? "integer", precision ?? "undefined"));
  }

  get scalarDimension(): Literal {
    return this.dimension("1");
  }

  get vectorDimension(): Literal {
    return this.dimension("3");
  }
}

export function createTypeFamilyRegistry(): TypeFamilyRegistry {
  return new TypeFamilyRegistry();
}

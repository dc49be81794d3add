import { DataTypeError } from "../errors.js";
import { DataSymbol, DataTypeSymbol } from "./symbols.js";
import type { Visibility } from "./symbols.js";

export type ScalarIntrinsic = "integer" | "real" | "boolean" | "character";
export type PrecisionName = "single" | "double" | "undefined";

/**
 * A precision is either a generic name, a byte count or a kind parameter
 * symbol (`real(kind=r_def)`).
 */
export type Precision = PrecisionName | number | DataSymbol;

const SCALAR_INTRINSICS: readonly ScalarIntrinsic[] = ["integer", "real", "boolean", "character"];

export function isScalarIntrinsic(value: string): value is ScalarIntrinsic {
  return SCALAR_INTRINSICS.some((i) => i === value);
}

// Kind symbols and extent symbols must hold an integer (or not-yet-known) value.
function isIntegerLikeSymbol(symbol: DataSymbol): boolean {
  const t = symbol.datatype;
  if (t instanceof DataTypeSymbol) return false;
  if (t.kind === "deferred") return true;
  return t.kind === "scalar" && t.intrinsic === "integer";
}

export class ScalarType {
  readonly kind = "scalar" as const;
  readonly intrinsic: ScalarIntrinsic;
  readonly precision: Precision;

  constructor(intrinsic: string, precision: Precision) {
    if (!isScalarIntrinsic(intrinsic)) {
      throw new DataTypeError(
        "GW1001",
        `ScalarType expected 'intrinsic' to be one of ${SCALAR_INTRINSICS.map((i) => `'${i}'`).join(", ")} but found '${intrinsic}'.`
      );
    }
    if (typeof precision === "number") {
      if (!Number.isInteger(precision) || precision <= 0) {
        throw new DataTypeError(
          "GW1002",
          `The precision of a ScalarType should be a positive integer number of bytes but found '${precision}'.`
        );
      }
    } else if (precision instanceof DataSymbol) {
      if (!isIntegerLikeSymbol(precision)) {
        throw new DataTypeError(
          "GW1002",
          `A DataSymbol representing the precision of another DataSymbol must be of either 'deferred' or scalar, integer type but '${precision.name}' has type '${describeDataType(precision.datatype)}'.`
        );
      }
    }
    this.intrinsic = intrinsic;
    this.precision = precision;
  }

  copy(): ScalarType {
    return new ScalarType(this.intrinsic, this.precision);
  }

  toString(): string {
    const p = this.precision instanceof DataSymbol ? this.precision.name : String(this.precision);
    return `Scalar<${this.intrinsic.toUpperCase()}, ${p}>`;
  }
}

export type Extent =
  | { readonly kind: "literal"; readonly value: number }
  | { readonly kind: "symbol"; readonly symbol: DataSymbol }
  | { readonly kind: "deferred" }
  | { readonly kind: "attribute" };

/** Accepted when building an array type; normalised into an `Extent`. */
export type ShapeSpec = number | DataSymbol | "deferred" | "attribute" | Extent;

function normaliseExtent(spec: ShapeSpec, index: number): Extent {
  if (typeof spec === "number") {
    if (!Number.isInteger(spec) || spec < 1) {
      throw new DataTypeError(
        "GW1004",
        `An integer extent in an ArrayType shape must be at least 1 but dimension ${index} has '${spec}'.`
      );
    }
    return { kind: "literal", value: spec };
  }
  if (spec instanceof DataSymbol) {
    if (!isIntegerLikeSymbol(spec)) {
      throw new DataTypeError(
        "GW1004",
        `A symbol in an ArrayType shape must be a scalar integer or of deferred type but '${spec.name}' has type '${describeDataType(spec.datatype)}'.`
      );
    }
    return { kind: "symbol", symbol: spec };
  }
  if (spec === "deferred" || spec === "attribute") return { kind: spec };
  if (spec.kind === "literal" || spec.kind === "symbol") {
    return normaliseExtent(spec.kind === "literal" ? spec.value : spec.symbol, index);
  }
  return spec;
}

export type ArrayElementType = ScalarType | DataTypeSymbol;

export class ArrayType {
  readonly kind = "array" as const;
  readonly elementType: ArrayElementType;
  readonly shape: readonly Extent[];

  constructor(elementType: ArrayElementType, shape: readonly ShapeSpec[]) {
    if (!(elementType instanceof ScalarType) && !(elementType instanceof DataTypeSymbol)) {
      throw new DataTypeError(
        "GW1003",
        "ArrayType expected 'elementType' to be a ScalarType or a DataTypeSymbol."
      );
    }
    if (!Array.isArray(shape)) {
      throw new DataTypeError("GW1004", "ArrayType 'shape' must be a list of extents.");
    }
    if (shape.length === 0) {
      throw new DataTypeError("GW1004", "ArrayType 'shape' must have at least one dimension.");
    }
    this.elementType = elementType;
    this.shape = Object.freeze(shape.map((s, i) => normaliseExtent(s, i)));
  }

  get rank(): number {
    return this.shape.length;
  }

  copy(): ArrayType {
    const element = this.elementType instanceof ScalarType ? this.elementType.copy() : this.elementType;
    return new ArrayType(element, [...this.shape]);
  }

  toString(): string {
    const dims = this.shape.map((e) => {
      switch (e.kind) {
        case "literal":
          return String(e.value);
        case "symbol":
          return e.symbol.name;
        case "deferred":
          return "DEFERRED";
        case "attribute":
          return "ATTRIBUTE";
      }
    });
    const element = this.elementType instanceof ScalarType ? this.elementType.toString() : this.elementType.name;
    return `Array<${element}, shape=[${dims.join(", ")}]>`;
  }
}

export class DeferredType {
  readonly kind = "deferred" as const;

  copy(): DeferredType {
    return new DeferredType();
  }

  toString(): string {
    return "DeferredType";
  }
}

/** A type known only by its declaration text. */
export class UnknownFortranType {
  readonly kind = "unknown-fortran" as const;
  readonly declaration: string;

  constructor(declaration: string) {
    this.declaration = declaration;
  }

  copy(): UnknownFortranType {
    return new UnknownFortranType(this.declaration);
  }

  toString(): string {
    return `UnknownFortranType('${this.declaration}')`;
  }
}

export type StructureComponent = {
  readonly name: string;
  readonly datatype: DataType | DataTypeSymbol;
  readonly visibility: Visibility;
};

export class StructureType {
  readonly kind = "structure" as const;
  readonly #components = new Map<string, StructureComponent>();

  addComponent(name: string, datatype: DataType | DataTypeSymbol, visibility: Visibility = "public"): void {
    if (name.length === 0) {
      throw new DataTypeError("GW1009", "The name of a StructureType component must be a non-empty string.");
    }
    const key = name.toLowerCase();
    if (this.#components.has(key)) {
      throw new DataTypeError("GW1009", `StructureType already has a component named '${name}'.`);
    }
    this.#components.set(key, { name, datatype, visibility });
  }

  get components(): readonly StructureComponent[] {
    return [...this.#components.values()];
  }

  lookup(name: string): StructureComponent | undefined {
    return this.#components.get(name.toLowerCase());
  }

  copy(): StructureType {
    const out = new StructureType();
    for (const c of this.#components.values()) out.addComponent(c.name, c.datatype, c.visibility);
    return out;
  }

  toString(): string {
    return `StructureType<${this.components.map((c) => c.name).join(", ")}>`;
  }
}

export type DataType = ScalarType | ArrayType | DeferredType | UnknownFortranType | StructureType;

export function describeDataType(t: DataType | DataTypeSymbol): string {
  return t instanceof DataTypeSymbol ? `DataTypeSymbol(${t.name})` : t.toString();
}

function precisionsEqual(a: Precision, b: Precision): boolean {
  return a === b;
}

function extentsEqual(a: Extent, b: Extent): boolean {
  if (a.kind !== b.kind) return false;
  if (a.kind === "literal" && b.kind === "literal") return a.value === b.value;
  if (a.kind === "symbol" && b.kind === "symbol") return a.symbol === b.symbol;
  return true;
}

/** Structural equality; symbols compare by identity. */
export function dataTypesEqual(a: DataType | DataTypeSymbol, b: DataType | DataTypeSymbol): boolean {
  if (a instanceof DataTypeSymbol || b instanceof DataTypeSymbol) return a === b;
  switch (a.kind) {
    case "scalar":
      return b.kind === "scalar" && a.intrinsic === b.intrinsic && precisionsEqual(a.precision, b.precision);
    case "array":
      return (
        b.kind === "array" &&
        dataTypesEqual(a.elementType, b.elementType) &&
        a.shape.length === b.shape.length &&
        a.shape.every((e, i) => {
          const other = b.shape[i];
          return other !== undefined && extentsEqual(e, other);
        })
      );
    case "deferred":
      return b.kind === "deferred";
    case "unknown-fortran":
      return b.kind === "unknown-fortran" && a.declaration === b.declaration;
    case "structure": {
      if (b.kind !== "structure") return false;
      const ac = a.components;
      const bc = b.components;
      return (
        ac.length === bc.length &&
        ac.every((c, i) => {
          const o = bc[i];
          return (
            o !== undefined &&
            c.name.toLowerCase() === o.name.toLowerCase() &&
            c.visibility === o.visibility &&
            dataTypesEqual(c.datatype, o.datatype)
          );
        })
      );
    }
  }
}

export const INTEGER_TYPE = new ScalarType("integer", "undefined");
export const REAL_TYPE = new ScalarType("real", "undefined");
export const BOOLEAN_TYPE = new ScalarType("boolean", "undefined");
export const CHARACTER_TYPE = new ScalarType("character", "undefined");
export const REAL_SINGLE_TYPE = new ScalarType("real", "single");
export const REAL_DOUBLE_TYPE = new ScalarType("real", "double");
export const REAL4_TYPE = new ScalarType("real", 4);
export const REAL8_TYPE = new ScalarType("real", 8);
export const INTEGER_SINGLE_TYPE = new ScalarType("integer", "single");
export const INTEGER_DOUBLE_TYPE = new ScalarType("integer", "double");
export const INTEGER4_TYPE = new ScalarType("integer", 4);
export const INTEGER8_TYPE = new ScalarType("integer", 8);

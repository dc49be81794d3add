import { DataTypeError } from "../errors.js";
import type { DataNode } from "../ir/node.js";
import type { ArrayType, DataType, Extent } from "./datatypes.js";

export type Visibility = "public" | "private";
export type ArgumentAccess = "read" | "write" | "readwrite" | "unknown";

export type SymbolInterface =
  | { readonly kind: "local" }
  | { readonly kind: "import"; readonly container: ContainerSymbol }
  | { readonly kind: "argument"; readonly access: ArgumentAccess }
  | { readonly kind: "unresolved" };

export const LOCAL_INTERFACE: SymbolInterface = Object.freeze({ kind: "local" });
export const UNRESOLVED_INTERFACE: SymbolInterface = Object.freeze({ kind: "unresolved" });

export function importInterface(container: ContainerSymbol): SymbolInterface {
  return { kind: "import", container };
}

export function argumentInterface(access: ArgumentAccess = "unknown"): SymbolInterface {
  return { kind: "argument", access };
}

export type SymbolOptions = {
  readonly visibility?: Visibility;
  readonly interface?: SymbolInterface;
};

function checkName(name: string, what: string): string {
  if (typeof name !== "string" || name.length === 0) {
    throw new DataTypeError("GW1008", `${what} name must be a non-empty string.`);
  }
  return name;
}

export abstract class SymbolBase {
  readonly name: string;
  visibility: Visibility;
  interface: SymbolInterface;

  constructor(name: string, options: SymbolOptions = {}) {
    this.name = checkName(name, this.constructor.name);
    this.visibility = options.visibility ?? "public";
    this.interface = options.interface ?? LOCAL_INTERFACE;
  }

  get isImport(): boolean {
    return this.interface.kind === "import";
  }

  get isArgument(): boolean {
    return this.interface.kind === "argument";
  }

  get isLocal(): boolean {
    return this.interface.kind === "local";
  }

  get isUnresolved(): boolean {
    return this.interface.kind === "unresolved";
  }

  abstract copy(): SymbolBase;

  toString(): string {
    return `${this.name}: ${this.constructor.name}<${this.interface.kind}>`;
  }
}

export type SymbolDatatype = DataType | DataTypeSymbol;

export type DataSymbolOptions = SymbolOptions & {
  readonly isConstant?: boolean;
  readonly isStatic?: boolean;
  readonly initialValue?: DataNode;
};

export class DataSymbol extends SymbolBase {
  datatype: SymbolDatatype;
  isConstant: boolean;
  /** Fortran `save`. */
  isStatic: boolean;
  #initialValue: DataNode | undefined;

  constructor(name: string, datatype: SymbolDatatype, options: DataSymbolOptions = {}) {
    super(name, options);
    this.datatype = datatype;
    this.isConstant = options.isConstant ?? false;
    this.isStatic = options.isStatic ?? false;
    if (this.isConstant && options.initialValue === undefined) {
      throw new DataTypeError("GW1008", `DataSymbol '${name}' is a constant and must be given an initial value.`);
    }
    this.#initialValue = options.initialValue;
  }

  get initialValue(): DataNode | undefined {
    return this.#initialValue;
  }

  set initialValue(value: DataNode | undefined) {
    if (value !== undefined && value.parent) {
      throw new DataTypeError(
        "GW1008",
        `The initial value of DataSymbol '${this.name}' must be a detached node.`
      );
    }
    this.#initialValue = value;
  }

  get arrayType(): ArrayType | undefined {
    const t = this.datatype;
    return t instanceof DataTypeSymbol || t.kind !== "array" ? undefined : t;
  }

  get isArray(): boolean {
    return this.arrayType !== undefined;
  }

  get isScalar(): boolean {
    const t = this.datatype;
    return !(t instanceof DataTypeSymbol) && t.kind === "scalar";
  }

  get isDeferred(): boolean {
    const t = this.datatype;
    return !(t instanceof DataTypeSymbol) && t.kind === "deferred";
  }

  get shape(): readonly Extent[] {
    return this.arrayType?.shape ?? [];
  }

  copy(): DataSymbol {
    return new DataSymbol(this.name, this.datatype, {
      visibility: this.visibility,
      interface: this.interface,
      isConstant: this.isConstant,
      isStatic: this.isStatic,
      initialValue: this.#initialValue?.copy(),
    });
  }
}

export class ContainerSymbol extends SymbolBase {
  wildcardImport: boolean;

  constructor(name: string, options: SymbolOptions & { readonly wildcardImport?: boolean } = {}) {
    super(name, options);
    this.wildcardImport = options.wildcardImport ?? false;
  }

  copy(): ContainerSymbol {
    return new ContainerSymbol(this.name, {
      visibility: this.visibility,
      interface: this.interface,
      wildcardImport: this.wildcardImport,
    });
  }
}

/** Names a derived type; its `datatype` is the type definition. */
export class DataTypeSymbol extends SymbolBase {
  datatype: DataType;

  constructor(name: string, datatype: DataType, options: SymbolOptions = {}) {
    super(name, options);
    this.datatype = datatype;
  }

  copy(): DataTypeSymbol {
    return new DataTypeSymbol(this.name, this.datatype.copy(), {
      visibility: this.visibility,
      interface: this.interface,
    });
  }
}

export class RoutineSymbol extends SymbolBase {
  copy(): RoutineSymbol {
    return new RoutineSymbol(this.name, { visibility: this.visibility, interface: this.interface });
  }
}

export type AnySymbol = DataSymbol | ContainerSymbol | DataTypeSymbol | RoutineSymbol;

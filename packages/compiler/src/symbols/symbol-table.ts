import { SymbolError } from "../errors.js";
import { ContainerSymbol, DataSymbol, DataTypeSymbol, RoutineSymbol, importInterface } from "./symbols.js";
import type { AnySymbol } from "./symbols.js";

/** Resolves the enclosing scope lazily, so a table follows its node when the tree changes. */
export type ScopeResolver = () => SymbolTable | null;

type SymbolClass<T extends AnySymbol> = abstract new (...args: never[]) => T;

function key(name: string): string {
  return name.toLowerCase();
}

/**
 * Case-insensitive, insertion-ordered map of the symbols declared in one scope.
 */
export class SymbolTable {
  readonly #symbols = new Map<string, AnySymbol>();
  #argumentList: DataSymbol[] = [];
  #parent: SymbolTable | ScopeResolver | null;

  constructor(parent: SymbolTable | ScopeResolver | null = null) {
    this.#parent = parent;
  }

  get parentTable(): SymbolTable | null {
    const p = this.#parent;
    if (p === null || p instanceof SymbolTable) return p;
    return p();
  }

  setParent(parent: SymbolTable | ScopeResolver | null): void {
    this.#parent = parent;
  }

  add(symbol: AnySymbol): AnySymbol {
    const k = key(symbol.name);
    if (this.#symbols.has(k)) {
      throw new SymbolError("GW1101", `Symbol table already contains a symbol with name '${symbol.name}'.`);
    }
    this.#symbols.set(k, symbol);
    return symbol;
  }

  lookupLocal(name: string): AnySymbol {
    const s = this.#symbols.get(key(name));
    if (!s) throw new SymbolError("GW1102", `Could not find '${name}' in the symbol table.`);
    return s;
  }

  lookup(name: string): AnySymbol {
    const s = this.find(name);
    if (!s) throw new SymbolError("GW1102", `Could not find '${name}' in the symbol table.`);
    return s;
  }

  /** Like `lookup`, but absence is a value rather than an error. */
  find(name: string): AnySymbol | undefined {
    let table: SymbolTable | null = this;
    while (table) {
      const s = table.#symbols.get(key(name));
      if (s) return s;
      table = table.parentTable;
    }
    return undefined;
  }

  lookupOfKind<T extends AnySymbol>(name: string, kind: SymbolClass<T>): T {
    const s = this.lookup(name);
    if (!(s instanceof kind)) {
      throw new SymbolError(
        "GW1103",
        `Symbol '${name}' is a ${s.constructor.name} but a ${kind.name} was expected.`
      );
    }
    return s;
  }

  has(name: string): boolean {
    return this.find(name) !== undefined;
  }

  hasLocal(name: string): boolean {
    return this.#symbols.has(key(name));
  }

  remove(symbol: AnySymbol): void {
    const k = key(symbol.name);
    if (this.#symbols.get(k) !== symbol) {
      throw new SymbolError("GW1104", `Cannot remove symbol '${symbol.name}' as it is not in this symbol table.`);
    }
    if (symbol instanceof DataSymbol && this.#argumentList.includes(symbol)) {
      throw new SymbolError("GW1104", `Cannot remove symbol '${symbol.name}' as it is a routine argument.`);
    }
    if (symbol instanceof ContainerSymbol && this.importsFrom(symbol).length > 0) {
      throw new SymbolError(
        "GW1104",
        `Cannot remove container '${symbol.name}' as symbols are still imported from it.`
      );
    }
    this.#symbols.delete(k);
  }

  get symbols(): readonly AnySymbol[] {
    return [...this.#symbols.values()];
  }

  get dataSymbols(): readonly DataSymbol[] {
    return this.symbols.filter((s): s is DataSymbol => s instanceof DataSymbol);
  }

  get containerSymbols(): readonly ContainerSymbol[] {
    return this.symbols.filter((s): s is ContainerSymbol => s instanceof ContainerSymbol);
  }

  get dataTypeSymbols(): readonly DataTypeSymbol[] {
    return this.symbols.filter((s): s is DataTypeSymbol => s instanceof DataTypeSymbol);
  }

  get routineSymbols(): readonly RoutineSymbol[] {
    return this.symbols.filter((s): s is RoutineSymbol => s instanceof RoutineSymbol);
  }

  importsFrom(container: ContainerSymbol): readonly AnySymbol[] {
    return this.symbols.filter((s) => s.interface.kind === "import" && s.interface.container === container);
  }

  get argumentList(): readonly DataSymbol[] {
    return this.#argumentList;
  }

  setArgumentList(list: readonly DataSymbol[]): void {
    for (const s of list) {
      if (this.#symbols.get(key(s.name)) !== s) {
        throw new SymbolError("GW1105", `Argument '${s.name}' is not declared in this symbol table.`);
      }
      if (s.interface.kind !== "argument") {
        throw new SymbolError(
          "GW1105",
          `Symbol '${s.name}' is listed as a routine argument but has a '${s.interface.kind}' interface.`
        );
      }
    }
    this.#argumentList = [...list];
  }

  /** `root` if free in this scope chain, else the first free `root_<n>`. */
  nextAvailableName(root: string): string {
    if (!this.has(root)) return root;
    for (let n = 1; ; n++) {
      const candidate = `${root}_${n}`;
      if (!this.has(candidate)) return candidate;
    }
  }

  findOrCreate<T extends AnySymbol>(name: string, kind: SymbolClass<T>, create: () => T): T {
    const existing = this.find(name);
    if (existing === undefined) {
      const made = create();
      this.add(made);
      return made;
    }
    if (!(existing instanceof kind)) {
      throw new SymbolError(
        "GW1103",
        `Symbol '${name}' is a ${existing.constructor.name} but a ${kind.name} was expected.`
      );
    }
    return existing;
  }

  hasWildcardImport(): boolean {
    let table: SymbolTable | null = this;
    while (table) {
      if (table.containerSymbols.some((c) => c.wildcardImport)) return true;
      table = table.parentTable;
    }
    return false;
  }

  /**
   * Copies every symbol into a fresh table. Imports are re-pointed at the copied
   * containers and the argument list at the copied arguments. The returned map
   * takes each original symbol to its copy.
   */
  copy(parent: SymbolTable | ScopeResolver | null = null): { table: SymbolTable; mapping: Map<AnySymbol, AnySymbol> } {
    const table = new SymbolTable(parent);
    const mapping = new Map<AnySymbol, AnySymbol>();
    for (const s of this.symbols) {
      const c = s.copy();
      mapping.set(s, c);
      table.add(c);
    }
    for (const [orig, c] of mapping) {
      if (orig.interface.kind !== "import") continue;
      const container = mapping.get(orig.interface.container);
      if (container instanceof ContainerSymbol) c.interface = importInterface(container);
    }
    table.#argumentList = this.#argumentList.flatMap((a) => {
      const c = mapping.get(a);
      return c instanceof DataSymbol ? [c] : [];
    });
    return { table, mapping };
  }
}

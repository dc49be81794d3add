import { expect } from "chai";

import { SymbolError } from "../errors.js";
import { INTEGER_TYPE, REAL_TYPE } from "./datatypes.js";
import { SymbolTable } from "./symbol-table.js";
import { ContainerSymbol, DataSymbol, RoutineSymbol, argumentInterface, importInterface } from "./symbols.js";

describe("@gridweave/compiler symbol table", () => {
  it("looks names up case-insensitively through parent scopes", () => {
    const outer = new SymbolTable();
    const inner = new SymbolTable(outer);
    const n = new DataSymbol("N", INTEGER_TYPE);
    outer.add(n);
    expect(inner.lookup("n")).to.equal(n);
    expect(inner.has("n")).to.equal(true);
    expect(inner.hasLocal("n")).to.equal(false);
    expect(() => inner.lookupLocal("n")).to.throw(SymbolError, "Could not find 'n' in the symbol table.");
  });

  it("follows a resolver function for its parent", () => {
    const outer = new SymbolTable();
    let current: SymbolTable | null = null;
    const inner = new SymbolTable(() => current);
    outer.add(new DataSymbol("a", REAL_TYPE));
    expect(inner.has("a")).to.equal(false);
    current = outer;
    expect(inner.has("a")).to.equal(true);
  });

  it("rejects duplicates and reports misses", () => {
    const t = new SymbolTable();
    t.add(new DataSymbol("a", REAL_TYPE));
    expect(() => t.add(new DataSymbol("A", REAL_TYPE))).to.throw(SymbolError, "'A'");
    expect(() => t.lookup("x")).to.throw(SymbolError, "Could not find 'x' in the symbol table.");
  });

  it("checks the kind of a symbol", () => {
    const t = new SymbolTable();
    t.add(new RoutineSymbol("go"));
    expect(t.lookupOfKind("go", RoutineSymbol).name).to.equal("go");
    expect(() => t.lookupOfKind("go", DataSymbol)).to.throw(SymbolError, "is a RoutineSymbol but a DataSymbol was expected");
  });

  it("generates the next free name", () => {
    const t = new SymbolTable();
    expect(t.nextAvailableName("tmp")).to.equal("tmp");
    t.add(new DataSymbol("tmp", REAL_TYPE));
    t.add(new DataSymbol("tmp_1", REAL_TYPE));
    expect(t.nextAvailableName("tmp")).to.equal("tmp_2");
  });

  it("finds or creates symbols", () => {
    const t = new SymbolTable();
    const made = t.findOrCreate("i", DataSymbol, () => new DataSymbol("i", INTEGER_TYPE));
    const again = t.findOrCreate("I", DataSymbol, () => new DataSymbol("i", REAL_TYPE));
    expect(again).to.equal(made);
    expect(t.symbols).to.have.length(1);
  });

  it("tracks imports and wildcard imports", () => {
    const outer = new SymbolTable();
    const inner = new SymbolTable(outer);
    const mod = new ContainerSymbol("field_mod");
    outer.add(mod);
    const f = new DataSymbol("field_type", REAL_TYPE, { interface: importInterface(mod) });
    outer.add(f);
    expect(outer.importsFrom(mod)).to.deep.equal([f]);
    expect(inner.hasWildcardImport()).to.equal(false);
    outer.add(new ContainerSymbol("everything_mod", { wildcardImport: true }));
    expect(inner.hasWildcardImport()).to.equal(true);
    expect(() => outer.remove(mod)).to.throw(SymbolError, "still imported");
  });

  it("validates argument lists", () => {
    const t = new SymbolTable();
    const a = new DataSymbol("a", REAL_TYPE, { interface: argumentInterface("readwrite") });
    const b = new DataSymbol("b", REAL_TYPE);
    t.add(a);
    t.add(b);
    t.setArgumentList([a]);
    expect(t.argumentList).to.deep.equal([a]);
    expect(() => t.setArgumentList([b])).to.throw(SymbolError, "'local' interface");
    expect(() => t.remove(a)).to.throw(SymbolError, "routine argument");
  });

  it("copies symbols and re-points imports at the copies", () => {
    const t = new SymbolTable();
    const mod = new ContainerSymbol("m");
    const x = new DataSymbol("x", REAL_TYPE, { interface: importInterface(mod) });
    const arg = new DataSymbol("y", REAL_TYPE, { interface: argumentInterface("read") });
    t.add(mod);
    t.add(x);
    t.add(arg);
    t.setArgumentList([arg]);
    const { table, mapping } = t.copy();
    const x2 = table.lookup("x");
    expect(x2).to.not.equal(x);
    expect(mapping.get(x)).to.equal(x2);
    expect(x2.interface.kind === "import" && x2.interface.container).to.equal(table.lookup("m"));
    expect(table.argumentList[0]).to.equal(table.lookup("y"));
  });
});

import { TransformationError } from "../errors.js";
import { KernelMarker } from "../ir/domain.js";
import type { Statement } from "../ir/node.js";
import type { RegionName } from "../ir/regions.js";
import type { Routine } from "../ir/scopes.js";
import type { NameSpace } from "../names.js";
import { DeferredType } from "../symbols/datatypes.js";
import { ContainerSymbol, DataSymbol, DataTypeSymbol, RoutineSymbol, importInterface } from "../symbols/symbols.js";
import type { AnySymbol } from "../symbols/symbols.js";

/** The runtime library a family of data regions calls into. */
export type PsyDataLibrary = {
  readonly module: string;
  readonly type: string;
  readonly variable: string;
  /** Routines imported next to the type. */
  readonly routines: readonly string[];
};

function importName(routine: Routine, name: string, make: () => AnySymbol): AnySymbol {
  return routine.symbolTable.find(name) ?? routine.symbolTable.add(make());
}

/**
 * Makes sure the routine imports the library and declares one saved
 * variable of its type, and returns that variable.
 */
export function psyDataVariable(routine: Routine, library: PsyDataLibrary): DataSymbol {
  const table = routine.symbolTable;
  let container: ContainerSymbol;
  if (table.hasLocal(library.module)) {
    const existing = table.lookupLocal(library.module);
    if (!(existing instanceof ContainerSymbol)) {
      throw new TransformationError(
        "GW5001",
        `Cannot import '${library.module}' into '${routine.name}' as the name is already used by a ${existing.constructor.name}.`
      );
    }
    container = existing;
  } else {
    container = new ContainerSymbol(library.module);
    table.add(container);
  }

  const type = importName(routine, library.type, () =>
    new DataTypeSymbol(library.type, new DeferredType(), { interface: importInterface(container) })
  );
  if (!(type instanceof DataTypeSymbol)) {
    throw new TransformationError(
      "GW5001",
      `Cannot use '${library.type}' in '${routine.name}' as the name is already used by a ${type.constructor.name}.`
    );
  }
  for (const name of library.routines) {
    importName(routine, name, () => new RoutineSymbol(name, { interface: importInterface(container) }));
  }

  const existing = table.dataSymbols.find(
    (s) => s.datatype === type && s.isStatic && s.name.toLowerCase().startsWith(library.variable.toLowerCase())
  );
  if (existing) return existing;
  const variable = new DataSymbol(table.nextAvailableName(library.variable), type, { isStatic: true });
  table.add(variable);
  return variable;
}

/**
 * Module and region names of a new data region: the first kernel marker in
 * the range names it, and the region name is unique for the run.
 */
export function regionName(statements: readonly Statement[], names: NameSpace): RegionName {
  const marker = statements.flatMap((s) => (s instanceof KernelMarker ? [s] : s.walk(KernelMarker)))[0];
  return {
    moduleName: marker?.moduleName ?? "unknown-module",
    regionName: names.createName(marker?.name ?? "unknown-kernel"),
  };
}

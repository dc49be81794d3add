import { VariablesAccessInfo } from "../analysis/access-info.js";
import { TransformationError } from "../errors.js";
import { ExtractNode } from "../ir/regions.js";
import type { Routine } from "../ir/scopes.js";
import { NameSpace } from "../names.js";
import { psyDataVariable, regionName } from "./psy-data.js";
import type { PsyDataLibrary } from "./psy-data.js";
import { Transformation, enclosingRoutine, statementRange, wrapStatements } from "./transformation.js";
import type { NonEmptyStatements, StatementRange } from "./transformation.js";

export const EXTRACT_LIBRARY: PsyDataLibrary = Object.freeze({
  module: "extract_psy_data_mod",
  type: "extract_PSyDataType",
  variable: "extract_psy_data",
  routines: Object.freeze([]),
});

type ExtractPlan = {
  readonly statements: NonEmptyStatements;
  readonly routine: Routine;
  readonly inputs: readonly string[];
  readonly outputs: readonly string[];
};

/**
 * Brackets consecutive statements with calls that write out every variable
 * the region reads (before it runs) and writes (after it runs).
 */
export class ExtractTrans extends Transformation<StatementRange, Record<string, never>, ExtractNode, ExtractPlan> {
  readonly name = "ExtractTrans";
  readonly names: NameSpace;

  constructor(names: NameSpace = new NameSpace()) {
    super();
    this.names = names;
  }

  validate(target: StatementRange): ExtractPlan {
    const statements = statementRange(this.name, target);
    const routine = enclosingRoutine(this.name, statements[0]);
    if (statements[0].ancestor(ExtractNode) !== null || statements.some((s) => s instanceof ExtractNode || s.walk(ExtractNode).length > 0)) {
      throw new TransformationError("GW5001", `${this.name} cannot create an extract region inside another extract region.`);
    }
    const info = new VariablesAccessInfo(statements);
    return {
      statements,
      routine,
      inputs: info.variables.filter((v) => v.isRead()).map((v) => v.name),
      outputs: info.variables.filter((v) => v.isWritten()).map((v) => v.name),
    };
  }

  protected transform(_target: StatementRange, plan: ExtractPlan): ExtractNode {
    const variable = psyDataVariable(plan.routine, EXTRACT_LIBRARY);
    const name = regionName(plan.statements, this.names);
    return wrapStatements(plan.statements, (body) => ExtractNode.create(name, variable, plan, body));
  }
}

import { GenerationError } from "../errors.js";
import { ParallelLoopDirective } from "../ir/directives.js";
import type { Statement } from "../ir/node.js";
import { ProfileNode } from "../ir/regions.js";
import type { Routine } from "../ir/scopes.js";
import { Loop } from "../ir/statements.js";
import { NameSpace } from "../names.js";
import { psyDataVariable, regionName } from "./psy-data.js";
import type { PsyDataLibrary } from "./psy-data.js";
import { Transformation, enclosingRoutine, statementRange, wrapStatements } from "./transformation.js";
import type { NonEmptyStatements, StatementRange } from "./transformation.js";

export const PROFILE_LIBRARY: PsyDataLibrary = Object.freeze({
  module: "profile_mod",
  type: "ProfileData",
  variable: "profile_psy_data",
  routines: Object.freeze(["ProfileStart", "ProfileEnd"]),
});

type ProfilePlan = {
  readonly statements: NonEmptyStatements;
  readonly routine: Routine;
};

/** Brackets consecutive statements with `ProfileStart` / `ProfileEnd` calls. */
export class ProfileTrans extends Transformation<StatementRange, Record<string, never>, ProfileNode, ProfilePlan> {
  readonly name = "ProfileTrans";
  readonly names: NameSpace;

  constructor(names: NameSpace = new NameSpace()) {
    super();
    this.names = names;
  }

  validate(target: StatementRange): ProfilePlan {
    const statements = statementRange(this.name, target);
    return { statements, routine: enclosingRoutine(this.name, statements[0]) };
  }

  protected transform(_target: StatementRange, plan: ProfilePlan): ProfileNode {
    const variable = psyDataVariable(plan.routine, PROFILE_LIBRARY);
    const name = regionName(plan.statements, this.names);
    return wrapStatements(plan.statements, (body) => ProfileNode.create(name, variable, body));
  }
}

export const PROFILE_OPTIONS = ["invokes", "kernels"] as const;
export type ProfileOption = (typeof PROFILE_OPTIONS)[number];

function isProfileOption(value: string): value is ProfileOption {
  return PROFILE_OPTIONS.some((o) => o === value);
}

/** The loop itself, or the `parallel do` directive that owns it. */
function kernelStatement(loop: Loop): Statement {
  const owner = loop.parent?.parent;
  return owner instanceof ParallelLoopDirective ? owner : loop;
}

/** Automatic profiling: which regions of each routine get a profile node. */
export class Profiler {
  readonly options: readonly ProfileOption[];
  readonly #trans: ProfileTrans;

  constructor(options: readonly string[], names: NameSpace = new NameSpace()) {
    options.forEach((option, index) => {
      if (!isProfileOption(option)) {
        throw new GenerationError(
          "GW2008",
          `Error in Profiler options: options must be one of ${PROFILE_OPTIONS.map((o) => `'${o}'`).join(", ")} but found '${option}' at ${index}`
        );
      }
    });
    this.options = Object.freeze(options.filter(isProfileOption));
    this.#trans = new ProfileTrans(names);
  }

  has(option: ProfileOption): boolean {
    return this.options.includes(option);
  }

  /**
   * With `kernels`, wraps each outermost loop of the routine (with its `parallel do`, if any); with `invokes`,
   * wraps the whole routine body. Returns the number of profile nodes added.
   */
  addProfileNodes(routine: Routine): number {
    let added = 0;
    if (this.has("kernels")) {
      for (const loop of routine.walk(Loop, Loop)) {
        this.#trans.apply(kernelStatement(loop));
        added++;
      }
    }
    if (this.has("invokes") && routine.statements.length > 0) {
      this.#trans.apply(routine.statements);
      added++;
    }
    return added;
  }
}

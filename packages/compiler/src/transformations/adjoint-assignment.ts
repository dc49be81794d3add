import { activeReferences } from "../analysis/active.js";
import { TangentLinearError } from "../errors.js";
import { BinaryOperation, Literal, Reference, UnaryOperation } from "../ir/data.js";
import { DataNode } from "../ir/node.js";
import type { Node, Statement } from "../ir/node.js";
import { Assignment } from "../ir/statements.js";
import { FortranWriter } from "../fortran/writer.js";
import { REAL_TYPE } from "../symbols/datatypes.js";
import type { DataSymbol } from "../symbols/symbols.js";
import { Transformation } from "./transformation.js";

type Sign = 1 | -1;

type Term = {
  readonly sign: Sign;
  readonly expression: DataNode;
};

/** One right-hand-side term, split into its active reference and coefficient factors. */
type LinearTerm = {
  readonly sign: Sign;
  readonly active: Reference;
  readonly numerator: readonly DataNode[];
  readonly denominator: readonly DataNode[];
};

type AdjointPlan =
  | { readonly kind: "unchanged" }
  | { readonly kind: "zero"; readonly lhs: Reference }
  | { readonly kind: "terms"; readonly lhs: Reference; readonly terms: readonly LinearTerm[] };

const writer = new FortranWriter();

function text(node: DataNode): string {
  return writer.expression(node);
}

function assignmentText(a: Assignment): string {
  return `${text(a.lhs)} = ${text(a.rhs)}`;
}

/** Splits an expression on its top-level `+` and `-`, carrying the sign of each term. */
function splitTerms(node: DataNode, sign: Sign = 1): Term[] {
  if (node instanceof BinaryOperation && (node.operator === "ADD" || node.operator === "SUB")) {
    const right: Sign = node.operator === "SUB" ? (sign === 1 ? -1 : 1) : sign;
    return [...splitTerms(node.lhs, sign), ...splitTerms(node.rhs, right)];
  }
  return [{ sign, expression: node }];
}

function isZero(node: DataNode): boolean {
  return node instanceof Literal && /^[0.]*(?:[eEdD][+-]?[0-9]+)?$/.test(node.value) && /0/.test(node.value);
}

function product(factors: readonly DataNode[]): DataNode | null {
  const [first, ...rest] = factors;
  if (first === undefined) return null;
  return rest.reduce<DataNode>((acc, f) => BinaryOperation.create("MUL", acc, f.copy()), first.copy());
}

function one(): Literal {
  return new Literal("1.0", REAL_TYPE);
}

/**
 * Rewrites a tangent-linear assignment into its adjoint. Each right-hand-side
 * term must be one active variable scaled by passive factors.
 */
export class AssignmentTrans extends Transformation<Node, Record<string, never>, readonly Statement[], AdjointPlan> {
  readonly name = "AssignmentTrans";
  readonly active: readonly DataSymbol[];
  readonly #names: ReadonlySet<string>;

  constructor(active: readonly DataSymbol[]) {
    super();
    this.active = Object.freeze([...active]);
    this.#names = new Set(active.map((s) => s.name.toLowerCase()));
  }

  #isActive(ref: Reference): boolean {
    return this.#names.has(ref.name.toLowerCase());
  }

  validate(node: Node): AdjointPlan {
    if (!(node instanceof Assignment)) {
      throw new TangentLinearError(
        "GW5101",
        `Node argument in assignment transformation should be an Assignment, but found '${node.nodeName}'.`
      );
    }
    const lhs = node.lhs;
    const rhsActive = activeReferences(node.rhs, this.active);
    if (!this.#isActive(lhs)) {
      if (rhsActive.length > 0) {
        throw new TangentLinearError(
          "GW5102",
          `Assignment node '${assignmentText(node)}' has the following active variables on its RHS [${rhsActive.map((r) => `'${r.name}'`).join(", ")}] but its LHS '${lhs.name}' is not an active variable.`
        );
      }
      return { kind: "unchanged" };
    }
    if (rhsActive.length === 0) {
      return isZero(node.rhs) ? { kind: "unchanged" } : { kind: "zero", lhs };
    }

    const terms = splitTerms(node.rhs).map((t) => this.#linearTerm(node, t));
    return { kind: "terms", lhs, terms };
  }

  #linearTerm(assignment: Assignment, term: Term): LinearTerm {
    const refs = activeReferences(term.expression, this.active);
    const [active, ...others] = refs;
    if (active === undefined) {
      throw new TangentLinearError(
        "GW5103",
        `Each term on the RHS of the assignment '${assignmentText(assignment)}' must have an active variable but '${text(term.expression)}' does not.`
      );
    }
    if (others.length > 0) {
      throw new TangentLinearError(
        "GW5104",
        `Each term on the RHS of the assignment '${assignmentText(assignment)}' must not have more than one active variable but '${text(term.expression)}' has ${refs.length}.`
      );
    }

    let sign = term.sign;
    const numerator: DataNode[] = [];
    const denominator: DataNode[] = [];
    const visit = (node: DataNode): void => {
      if (node === active) return;
      if (node instanceof UnaryOperation && (node.operator === "MINUS" || node.operator === "PLUS")) {
        if (node.operator === "MINUS") sign = sign === 1 ? -1 : 1;
        visit(node.operand);
        return;
      }
      if (node instanceof BinaryOperation && node.operator === "MUL") {
        if (node.lhs === active || node.lhs.walk(Reference).includes(active)) {
          visit(node.lhs);
          numerator.push(node.rhs);
        } else {
          numerator.push(node.lhs);
          visit(node.rhs);
        }
        return;
      }
      if (node instanceof BinaryOperation && node.operator === "DIV") {
        if (node.lhs === active || node.lhs.walk(Reference).includes(active)) {
          visit(node.lhs);
          denominator.push(node.rhs);
          return;
        }
        throw new TangentLinearError(
          "GW5106",
          `A term on the RHS of the assignment '${assignmentText(assignment)}' with a division must not have the active variable as a divisor but found '${text(term.expression)}'.`
        );
      }
      throw new TangentLinearError(
        "GW5105",
        `Each term on the RHS of the assignment '${assignmentText(assignment)}' must be an active variable multiplied or divided by an expression, but found '${text(term.expression)}'.`
      );
    };
    visit(term.expression);
    return { sign, active, numerator, denominator };
  }

  protected transform(node: Node, plan: AdjointPlan): readonly Statement[] {
    if (!(node instanceof Assignment)) return [];
    if (plan.kind === "unchanged") return [node];

    const out: Statement[] = [];
    if (plan.kind === "zero") {
      out.push(Assignment.create(plan.lhs.copy(), new Literal("0.0", REAL_TYPE)));
    } else {
      const { lhs, terms } = plan;
      const self = terms.filter((t) => t.active.structurallyEqual(lhs));
      for (const t of terms) {
        if (self.includes(t)) continue;
        let increment: DataNode = lhs.copy();
        const num = product(t.numerator);
        if (num) increment = BinaryOperation.create("MUL", increment, num);
        const den = product(t.denominator);
        if (den) increment = BinaryOperation.create("DIV", increment, den);
        out.push(
          Assignment.create(t.active.copy(), BinaryOperation.create(t.sign === 1 ? "ADD" : "SUB", t.active.copy(), increment))
        );
      }
      const final = this.#selfUpdate(lhs, self);
      if (final) out.push(final);
    }

    const parent = node.parent;
    if (parent) {
      const at = node.position;
      node.detach();
      out.forEach((s, i) => parent.addChild(s, at + i));
    }
    return out;
  }

  /** `lhs = 0.0`, nothing for a plain copy of itself, or `lhs = lhs * coefficient`. */
  #selfUpdate(lhs: Reference, self: readonly LinearTerm[]): Assignment | null {
    if (self.length === 0) return Assignment.create(lhs.copy(), new Literal("0.0", REAL_TYPE));
    let coefficient: DataNode | null = null;
    for (const t of self) {
      const num = product(t.numerator) ?? one();
      const den = product(t.denominator);
      const factor = den ? BinaryOperation.create("DIV", num, den) : num;
      if (coefficient === null) {
        coefficient = t.sign === 1 ? factor : UnaryOperation.create("MINUS", factor);
      } else {
        coefficient = BinaryOperation.create(t.sign === 1 ? "ADD" : "SUB", coefficient, factor);
      }
    }
    if (coefficient === null || (coefficient instanceof Literal && coefficient.value === "1.0")) return null;
    return Assignment.create(lhs.copy(), BinaryOperation.create("MUL", lhs.copy(), coefficient));
  }
}

import { TransformationError } from "../errors.js";
import {
  ArrayReference,
  BinaryOperation,
  Literal,
  Range,
  Reference,
  StructureReference,
  fullRange,
} from "../ir/data.js";
import { ParallelDirective } from "../ir/directives.js";
import type { TaskClauses } from "../ir/directives.js";
import type { DataNode, Node } from "../ir/node.js";
import { Loop } from "../ir/statements.js";
import { INTEGER_TYPE } from "../symbols/datatypes.js";
import { DataSymbol, DataTypeSymbol } from "../symbols/symbols.js";
import { VariablesAccessInfo } from "./access-info.js";
import type { AccessInfo, SingleVariableAccessInfo } from "./access-info.js";

const BOUNDS = ["start", "stop", "step"] as const;

function lower(name: string): string {
  return name.toLowerCase();
}

/**
 * The region whose variables are private outside the task: the enclosing
 * parallel region, else the outermost enclosing loop, else the loop itself.
 */
export function taskRegion(loop: Loop): Node {
  const parallel = loop.ancestor(ParallelDirective);
  if (parallel) return parallel.dirBody;
  let outer: Loop = loop;
  for (let l = loop.ancestor(Loop); l; l = l.ancestor(Loop)) outer = l;
  return outer;
}

function loopsIn(node: Node): Loop[] {
  return node instanceof Loop ? [node, ...node.walk(Loop)] : node.walk(Loop);
}

function isStructure(v: SingleVariableAccessInfo): boolean {
  return v.symbol?.datatype instanceof DataTypeSymbol || v.accesses.some((a) => a.node instanceof StructureReference);
}

type Scope = {
  readonly regionLoops: readonly Loop[];
  readonly outerPrivate: ReadonlySet<string>;
  readonly taskLoops: readonly Loop[];
  readonly taskLoopVariables: ReadonlySet<string>;
  readonly taskPrivate: ReadonlySet<string>;
  readonly shared: ReadonlySet<string>;
};

function loopOf(loops: readonly Loop[], name: string): Loop | undefined {
  return loops.find((l) => lower(l.variable.name) === lower(name));
}

function integerLiteral(value: number): Literal {
  return new Literal(String(value), INTEGER_TYPE);
}

/** `m * s`, or just `s` when m is 1. */
function stepMultiple(m: number, step: number): DataNode {
  if (m === 1) return integerLiteral(step);
  return BinaryOperation.create("MUL", integerLiteral(m), integerLiteral(step));
}

/** `p + m*s`, keeping the operand order of the source expression. */
function shifted(base: DataSymbol, m: number, step: number, literalFirst: boolean): DataNode {
  if (m === 0) return new Reference(base);
  if (m < 0) return BinaryOperation.create("SUB", new Reference(base), stepMultiple(-m, step));
  return literalFirst
    ? BinaryOperation.create("ADD", stepMultiple(m, step), new Reference(base))
    : BinaryOperation.create("ADD", new Reference(base), stepMultiple(m, step));
}

class TaskIndexMapper {
  readonly #scope: Scope;

  constructor(scope: Scope) {
    this.#scope = scope;
  }

  #full(array: DataSymbol, dim: number): DataNode {
    return fullRange(array, dim);
  }

  #sharedIndex(name: string): never {
    throw new TransformationError(
      "GW4003",
      `Shared variable access used as an index inside a task directive which is not supported. Variable name is ${name}`
    );
  }

  /** The outer-private variable and loop step an index reference is chunked by, if any. */
  #chunkBase(ref: Reference): { base: DataSymbol; step: DataNode } | "full" | "keep" {
    const s = this.#scope;
    const name = lower(ref.name);
    if (s.taskLoopVariables.has(name)) {
      const loop = loopOf(s.taskLoops, name);
      const start = loop?.start;
      if (start instanceof Reference && start.children.length === 0 && s.outerPrivate.has(lower(start.name))) {
        const outer = loopOf(s.regionLoops, start.name);
        return outer ? { base: start.symbol, step: outer.step } : "keep";
      }
      return "full";
    }
    if (s.shared.has(name)) return this.#sharedIndex(ref.name);
    if (s.taskPrivate.has(name)) return "full";
    if (s.outerPrivate.has(name)) {
      const outer = loopOf(s.regionLoops, name);
      return outer ? { base: ref.symbol, step: outer.step } : "keep";
    }
    return this.#sharedIndex(ref.name);
  }

  map(array: DataSymbol, dim: number, index: DataNode): DataNode[] {
    if (index instanceof Literal) return [index.copy()];
    if (index instanceof Range) return [this.#full(array, dim)];
    if (index instanceof ArrayReference || index instanceof StructureReference) {
      throw new TransformationError(
        "GW4006",
        `ArrayReference used as an index inside a task directive which is not supported. Found '${index.name}' indexing '${array.name}'.`
      );
    }
    if (index instanceof Reference) {
      const chunk = this.#chunkBase(index);
      if (chunk === "full") return [this.#full(array, dim)];
      if (chunk === "keep") return [index.copy()];
      return [new Reference(chunk.base)];
    }
    if (index instanceof BinaryOperation) return this.#mapBinary(array, dim, index);
    throw new TransformationError(
      "GW4007",
      `Unsupported index expression '${index.nodeName}' used as an index of '${array.name}' inside a task directive.`
    );
  }

  #mapBinary(array: DataSymbol, dim: number, op: BinaryOperation): DataNode[] {
    if (op.operator !== "ADD" && op.operator !== "SUB") {
      throw new TransformationError(
        "GW4004",
        `Binary operator ${op.operator} used as an index inside a task directive which is not supported.`
      );
    }
    const { lhs, rhs } = op;
    for (const side of [lhs, rhs]) {
      if (side instanceof ArrayReference || side instanceof StructureReference) {
        throw new TransformationError(
          "GW4006",
          `ArrayReference used as an index inside a task directive which is not supported. Found '${side.name}' indexing '${array.name}'.`
        );
      }
    }
    let ref: Reference;
    let literal: Literal;
    let literalFirst: boolean;
    if (lhs instanceof Reference && rhs instanceof Literal) {
      ref = lhs;
      literal = rhs;
      literalFirst = false;
    } else if (lhs instanceof Literal && rhs instanceof Reference) {
      if (op.operator === "SUB") {
        throw new TransformationError(
          "GW4005",
          `Subtracting a reference from a literal is not supported as an index inside a task directive. Found '${lhs.value} - ${rhs.name}' indexing '${array.name}'.`
        );
      }
      ref = rhs;
      literal = lhs;
      literalFirst = true;
    } else {
      throw new TransformationError(
        "GW4005",
        `A binary operation used as an index inside a task directive must combine one reference and one integer literal, but found '${lhs.nodeName}' and '${rhs.nodeName}' indexing '${array.name}'.`
      );
    }
    if (literal.datatype.intrinsic !== "integer") {
      throw new TransformationError(
        "GW4005",
        `Only integer literals may offset an index inside a task directive but found '${literal.value}' indexing '${array.name}'.`
      );
    }

    const chunk = this.#chunkBase(ref);
    if (chunk === "full") return [this.#full(array, dim)];
    if (chunk === "keep") return [op.copy()];
    const { base, step } = chunk;
    if (!(step instanceof Literal) || step.datatype.intrinsic !== "integer") return [this.#full(array, dim)];

    const s = Number(step.value);
    const c = op.operator === "ADD" ? Number(literal.value) : -Number(literal.value);
    if (c % s === 0) return [shifted(base, c / s, s, literalFirst)];
    const ceil = Math.ceil(c / s);
    const floor = Math.floor(c / s);
    return [shifted(base, ceil, s, literalFirst), shifted(base, floor, s, literalFirst)];
  }
}

/** Every combination of the per-dimension alternatives, first dimension outermost. */
function cartesian(options: readonly (readonly DataNode[])[]): DataNode[][] {
  let acc: DataNode[][] = [[]];
  for (const dim of options) {
    const next: DataNode[][] = [];
    for (const prefix of acc) {
      for (const choice of dim) next.push([...prefix, choice.copy()]);
    }
    acc = next;
  }
  return acc;
}

function pushUnique(list: Reference[], ref: Reference): void {
  if (!list.some((r) => r.structurallyEqual(ref))) list.push(ref);
}

function dependTargets(v: SingleVariableAccessInfo, access: AccessInfo, mapper: TaskIndexMapper): Reference[] {
  const symbol = v.symbol;
  const indices = access.indices;
  if (symbol === null || indices === null || isStructure(v)) {
    return [new Reference(symbol ?? new DataSymbol(v.name, INTEGER_TYPE))];
  }
  const options = indices.map((idx, d) => mapper.map(symbol, d, idx));
  return cartesian(options).map((combo) => {
    const ref = new ArrayReference(symbol);
    ref.addChildren(combo);
    return ref;
  });
}

function boundsHaveArrayReference(loop: Loop): void {
  for (const bound of BOUNDS) {
    const expr = loop[bound];
    if (expr instanceof ArrayReference || expr.walk(ArrayReference).length > 0) {
      throw new TransformationError(
        "GW4001",
        `ArrayReference not supported in the ${bound} variable of a Loop in a task directive.`
      );
    }
  }
}

function referenceTo(v: SingleVariableAccessInfo): Reference {
  return new Reference(v.symbol ?? new DataSymbol(v.name, INTEGER_TYPE));
}

/**
 * Data-sharing and dependency clauses for a task around `loop`. Pure: the
 * tree is only read.
 */
export function computeTaskClauses(loop: Loop): TaskClauses {
  const region = taskRegion(loop);
  const regionLoops = loopsIn(region);
  const regionInfo = new VariablesAccessInfo(region);

  const outerPrivate = new Set<string>(regionLoops.map((l) => lower(l.variable.name)));
  for (const v of regionInfo.variables) {
    if (!v.isArray() && !isStructure(v) && v.firstAccess().accessType === "write") outerPrivate.add(lower(v.name));
  }

  const taskLoops = loopsIn(loop);
  for (const l of taskLoops) boundsHaveArrayReference(l);
  const taskLoopVariables = new Set(taskLoops.map((l) => lower(l.variable.name)));

  const info = new VariablesAccessInfo(loop);
  const privateRefs: Reference[] = [];
  const firstPrivateRefs: Reference[] = [];
  const sharedRefs: Reference[] = [];
  const taskPrivate = new Set<string>();
  const shared = new Set<string>();

  for (const v of info.variables) {
    const name = lower(v.name);
    if (taskLoopVariables.has(name)) {
      if (v.firstAccess().accessType !== "write") {
        throw new TransformationError(
          "GW4002",
          `Found shared loop variable which is not allowed in a task directive. Variable name is ${v.name}`
        );
      }
      privateRefs.push(referenceTo(v));
      taskPrivate.add(name);
      continue;
    }
    if (v.isArray() || isStructure(v)) {
      sharedRefs.push(referenceTo(v));
      shared.add(name);
      continue;
    }
    if (v.firstAccess().accessType === "write") {
      privateRefs.push(referenceTo(v));
      taskPrivate.add(name);
    } else if (v.isReadOnly() && outerPrivate.has(name)) {
      firstPrivateRefs.push(referenceTo(v));
    } else {
      sharedRefs.push(referenceTo(v));
      shared.add(name);
    }
  }

  const mapper = new TaskIndexMapper({ regionLoops, outerPrivate, taskLoops, taskLoopVariables, taskPrivate, shared });
  const dependIn: Reference[] = [];
  const dependOut: Reference[] = [];
  for (const v of info.variables) {
    if (!shared.has(lower(v.name))) continue;
    for (const access of v.accesses) {
      for (const target of dependTargets(v, access, mapper)) {
        if (access.isRead) pushUnique(dependIn, target);
        if (access.isWrite) pushUnique(dependOut, target.copy());
      }
    }
  }

  return {
    private: privateRefs,
    firstprivate: firstPrivateRefs,
    shared: sharedRefs,
    dependIn,
    dependOut,
  };
}

/**
 * Private list of a parallel region: loop variables of the loops inside and
 * scalars first written in it, sorted by name.
 */
export function parallelPrivateNames(body: Node): string[] {
  const names = new Set(loopsIn(body).map((l) => lower(l.variable.name)));
  for (const v of new VariablesAccessInfo(body).variables) {
    if (!v.isArray() && !isStructure(v) && v.firstAccess().accessType === "write") names.add(lower(v.name));
  }
  return [...names].sort();
}

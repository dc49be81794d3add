import { Reference } from "../ir/data.js";
import type { Node } from "../ir/node.js";
import type { DataSymbol } from "../symbols/symbols.js";

function activeNames(active: readonly DataSymbol[]): ReadonlySet<string> {
  return new Set(active.map((s) => s.name.toLowerCase()));
}

/** References in `node` (itself included) to any of the active variables. */
export function activeReferences(node: Node, active: readonly DataSymbol[]): Reference[] {
  const names = activeNames(active);
  const refs = node instanceof Reference ? [node, ...node.walk(Reference)] : node.walk(Reference);
  return refs.filter((r) => names.has(r.name.toLowerCase()));
}

export function nodeIsActive(node: Node, active: readonly DataSymbol[]): boolean {
  return activeReferences(node, active).length > 0;
}

export function nodeIsPassive(node: Node, active: readonly DataSymbol[]): boolean {
  return !nodeIsActive(node, active);
}

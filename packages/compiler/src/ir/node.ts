import { GenerationError } from "../errors.js";
import type { AnySymbol } from "../symbols/symbols.js";

export type NodeClass<T extends Node> = abstract new (...args: never[]) => T;

/**
 * Base of every IR node. A node owns its children; a child belongs to at most
 * one parent and must be detached before it can be attached elsewhere.
 */
export abstract class Node {
  abstract readonly nodeName: string;
  /** Textual children format, e.g. `[DataNode | Range]+`. */
  abstract readonly childrenFormat: string;

  #parent: Node | null = null;
  #children: Node[] = [];

  get parent(): Node | null {
    return this.#parent;
  }

  get children(): readonly Node[] {
    return this.#children;
  }

  protected abstract validChild(position: number, child: Node): boolean;

  protected abstract cloneShallow(): Node;

  #checkOrphan(child: Node): void {
    if (child.#parent) {
      throw new GenerationError(
        "GW2002",
        `Item '${child.nodeName}' can't be added as child of '${this.nodeName}' because it is not an orphan. It already has a '${child.#parent.nodeName}' as a parent. Use detach() to remove it first.`
      );
    }
  }

  #checkChildren(children: readonly Node[]): void {
    children.forEach((c, i) => {
      if (!this.validChild(i, c)) {
        throw new GenerationError(
          "GW2001",
          `Item '${c.nodeName}' can't be child ${i} of '${this.nodeName}'. The valid format is: '${this.childrenFormat}'.`
        );
      }
    });
  }

  addChild(child: Node, index?: number): void {
    this.#checkOrphan(child);
    if (child === this || this.ancestors().includes(child)) {
      throw new GenerationError("GW2002", `Item '${child.nodeName}' can't be added as a child of itself.`);
    }
    const at = index ?? this.#children.length;
    if (at < 0 || at > this.#children.length) {
      throw new GenerationError(
        "GW2005",
        `Cannot insert into '${this.nodeName}' at position ${at}; it has ${this.#children.length} children.`
      );
    }
    const next = [...this.#children];
    next.splice(at, 0, child);
    this.#checkChildren(next);
    this.#children = next;
    child.#parent = this;
  }

  addChildren(children: readonly Node[]): void {
    for (const c of children) this.addChild(c);
  }

  setChild(index: number, child: Node): Node {
    const old = this.#children[index];
    if (!old) {
      throw new GenerationError(
        "GW2005",
        `'${this.nodeName}' has no child at position ${index}; it has ${this.#children.length} children.`
      );
    }
    if (old === child) return old;
    this.#checkOrphan(child);
    const next = [...this.#children];
    next[index] = child;
    this.#checkChildren(next);
    this.#children = next;
    old.#parent = null;
    child.#parent = this;
    return old;
  }

  removeChild(index: number): Node {
    const old = this.#children[index];
    if (!old) {
      throw new GenerationError(
        "GW2005",
        `'${this.nodeName}' has no child at position ${index}; it has ${this.#children.length} children.`
      );
    }
    this.#children = this.#children.filter((_, i) => i !== index);
    old.#parent = null;
    return old;
  }

  popAllChildren(): Node[] {
    const out = this.#children;
    this.#children = [];
    for (const c of out) c.#parent = null;
    return out;
  }

  detach(): this {
    const p = this.#parent;
    if (p) p.removeChild(p.#children.indexOf(this));
    return this;
  }

  replaceWith(node: Node): void {
    const p = this.#parent;
    if (!p) {
      throw new GenerationError("GW2007", `Cannot replace '${this.nodeName}' as it has no parent.`);
    }
    p.setChild(p.#children.indexOf(this), node);
  }

  get root(): Node {
    let cur: Node = this;
    while (cur.#parent) cur = cur.#parent;
    return cur;
  }

  get position(): number {
    return this.#parent ? this.#parent.#children.indexOf(this) : 0;
  }

  get depth(): number {
    return this.ancestors().length;
  }

  ancestors(): Node[] {
    const out: Node[] = [];
    for (let p = this.#parent; p; p = p.#parent) out.push(p);
    return out;
  }

  ancestor<T extends Node>(kind: NodeClass<T>, options: { includeSelf?: boolean } = {}): T | null {
    if (options.includeSelf && this instanceof kind) return this;
    for (let p = this.#parent; p; p = p.#parent) {
      if (p instanceof kind) return p;
    }
    return null;
  }

  /** Descendants of the given kind in pre-order, not including this node. */
  walk<T extends Node>(kind: NodeClass<T>, stopAt?: NodeClass<Node>): T[] {
    const out: T[] = [];
    const visit = (n: Node): void => {
      for (const c of n.#children) {
        if (c instanceof kind) out.push(c);
        if (stopAt && c instanceof stopAt) continue;
        visit(c);
      }
    };
    visit(this);
    return out;
  }

  /** True when `this` comes before `other` in a pre-order walk of their shared root. */
  precedes(other: Node): boolean {
    const all = [this.root, ...this.root.walk(Node)];
    return all.indexOf(this) < all.indexOf(other);
  }

  protected copyInto<T extends Node>(shallow: T): T {
    for (const c of this.#children) shallow.addChild(c.copy());
    return shallow;
  }

  copy(): Node {
    return this.copyInto(this.cloneShallow());
  }

  /** Re-points the node's own symbol references through `mapping`. */
  replaceSymbols(_mapping: ReadonlyMap<AnySymbol, AnySymbol>): void {
    // nothing to replace
  }

  protected sameAttributes(_other: Node): boolean {
    return true;
  }

  structurallyEqual(other: Node): boolean {
    if (this.constructor !== other.constructor) return false;
    if (!this.sameAttributes(other)) return false;
    if (this.#children.length !== other.#children.length) return false;
    return this.#children.every((c, i) => {
      const o = other.#children[i];
      return o !== undefined && c.structurallyEqual(o);
    });
  }

  toString(): string {
    return `${this.nodeName}[]`;
  }
}

/** Nodes that produce a value. */
export abstract class DataNode extends Node {
  protected abstract override cloneShallow(): DataNode;

  override copy(): DataNode {
    return this.copyInto(this.cloneShallow());
  }
}

export abstract class Statement extends Node {
  protected abstract override cloneShallow(): Statement;

  override copy(): Statement {
    return this.copyInto(this.cloneShallow());
  }
}

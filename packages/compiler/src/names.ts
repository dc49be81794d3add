/**
 * Allocates generated names for one compilation run. A root is handed out as
 * itself the first time and as `root_1`, `root_2`, ... after that; no name is
 * handed out twice.
 */
export class NameSpace {
  readonly #issued = new Set<string>();
  readonly #next = new Map<string, number>();

  createName(root: string): string {
    const key = root.toLowerCase();
    let n = this.#next.get(key) ?? 0;
    let name = n === 0 ? key : `${key}_${n}`;
    while (this.#issued.has(name)) {
      n++;
      name = `${key}_${n}`;
    }
    this.#next.set(key, n + 1);
    this.#issued.add(name);
    return name;
  }

  has(name: string): boolean {
    return this.#issued.has(name.toLowerCase());
  }

  clear(): void {
    this.#issued.clear();
    this.#next.clear();
  }
}

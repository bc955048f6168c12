/**
 * Lexically bound Blatte names. Anything not found here is a global and is
 * read from `__env`.
 */
export class Scope {
  readonly parent?: Scope;
  readonly #names = new Set<string>();

  constructor(parent?: Scope, names: Iterable<string> = []) {
    this.parent = parent;
    for (const name of names) this.#names.add(name);
  }

  has(name: string): boolean {
    return this.#names.has(name) || (this.parent?.has(name) ?? false);
  }

  child(names: Iterable<string> = []): Scope {
    return new Scope(this, names);
  }
}

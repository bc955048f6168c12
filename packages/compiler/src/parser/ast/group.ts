import { SourceLocation, Syntax } from "./syntax.js";
import type { Wrapped } from "./wrapped.js";

/**
 * `{EXPR EXPR ...}` that is not a special form. Whether it is a call or a
 * list depends on the run time value of its first item.
 */
export class Group extends Syntax {
  readonly syntaxType = "group";
  readonly items: readonly Wrapped[];

  constructor(opts: { items: readonly Wrapped[]; location?: SourceLocation }) {
    super({ location: opts.location });
    this.items = opts.items;
  }

  get isEmpty() {
    return this.items.length === 0;
  }

  toJSON(): unknown {
    return this.items.map((item) => item.toJSON());
  }
}

/** `\name=EXPR` inside a group */
export class NamedArgument extends Syntax {
  readonly syntaxType = "named-argument";
  readonly name: string;
  readonly value: Wrapped;

  constructor(opts: { name: string; value: Wrapped; location?: SourceLocation }) {
    super({ location: opts.location });
    this.name = opts.name;
    this.value = opts.value;
  }

  toJSON(): unknown {
    return { named: this.name, value: this.value.toJSON() };
  }
}

import { SourceLocation, Syntax } from "./syntax.js";

export type ParameterKind = "positional" | "named" | "rest";

/** One entry of a `{\lambda {...} ...}` parameter list */
export class Parameter extends Syntax {
  readonly syntaxType = "parameter";
  readonly kind: ParameterKind;
  readonly name: string;

  constructor(opts: {
    kind: ParameterKind;
    name: string;
    location?: SourceLocation;
  }) {
    super({ location: opts.location });
    this.kind = opts.kind;
    this.name = opts.name;
  }

  toJSON() {
    const prefix = { positional: "\\", named: "\\=", rest: "\\&" }[this.kind];
    return `${prefix}${this.name}`;
  }
}

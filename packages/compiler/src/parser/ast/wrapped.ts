import type { Expr } from "./index.js";
import { SourceLocation, Syntax } from "./syntax.js";

/**
 * Pairs an expression with the whitespace that preceded it in the source.
 * Every expression the parser recognizes is returned inside one of these,
 * even when the whitespace is empty.
 */
export class Wrapped extends Syntax {
  readonly syntaxType = "wrapped";
  readonly ws: string;
  readonly expr: Expr;

  constructor(opts: { ws: string; expr: Expr; location?: SourceLocation }) {
    super({ location: opts.location });
    this.ws = opts.ws;
    this.expr = opts.expr;
  }

  toJSON(): unknown {
    return { ws: this.ws, expr: this.expr.toJSON() };
  }
}

import { type CompileExprOpts, compileExpression } from "./codegen.js";
import type { Wrapped } from "../parser/ast/wrapped.js";
import { str } from "./helpers.js";

export const compile = (opts: CompileExprOpts<Wrapped>) => {
  const { expr } = opts;
  const inner = compileExpression({ ...opts, expr: expr.expr });
  return `__rt.wrapws(${str(expr.ws)}, ${inner})`;
};

import { type CompileExprOpts, compileExpression, compileSequence } from "./codegen.js";
import type { While } from "../parser/ast/forms.js";
import { block, iife } from "./helpers.js";

export const compile = (opts: CompileExprOpts<While>) => {
  const { expr, scope } = opts;
  const test = compileExpression({ ...opts, expr: expr.test });
  const body = block(compileSequence(expr.body, scope));
  return iife(`while (__rt.isTrue(${test})) ${body} return [];`);
};

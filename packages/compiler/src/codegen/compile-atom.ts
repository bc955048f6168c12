import type { CompileExprOpts } from "./codegen.js";
import type { StringLiteral, Variable, Word } from "../parser/ast/atom.js";
import { local, str } from "./helpers.js";

export const compile = (opts: CompileExprOpts<Word | StringLiteral | Variable>) => {
  const { expr, scope } = opts;
  if (expr.syntaxType !== "variable") return str(expr.value);
  return scope.has(expr.name) ? local(expr.name) : `__env.get(${str(expr.name)})`;
};

import { type CompileExprOpts, compileExpression } from "./codegen.js";
import type { Group } from "../parser/ast/group.js";
import type { Wrapped } from "../parser/ast/wrapped.js";
import { str } from "./helpers.js";

/** `{}` is the empty list, anything else dispatches at run time */
export const compile = (opts: CompileExprOpts<Group>) => {
  const { expr } = opts;
  if (expr.isEmpty) return "[]";
  const items = expr.items.map((item) => compileItem({ ...opts, expr: item }));
  return `__rt.group([${items.join(", ")}])`;
};

const compileItem = (opts: CompileExprOpts<Wrapped>) => {
  const { expr: item } = opts;
  if (item.expr.syntaxType !== "named-argument") return compileExpression(opts);

  const { name, value } = item.expr;
  const compiled = compileExpression({ ...opts, expr: value });
  return `__rt.named(${str(item.ws)}, ${str(name)}, ${compiled})`;
};

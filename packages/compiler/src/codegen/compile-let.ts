import { type CompileExprOpts, compileBody, compileExpression } from "./codegen.js";
import type { Binding, Let } from "../parser/ast/forms.js";
import { iife, local } from "./helpers.js";
import type { Scope } from "./scope.js";

export const compile = (opts: CompileExprOpts<Let>) => {
  const { expr } = opts;
  if (expr.bindings.length === 0) {
    return iife(compileBody(expr.body, opts.scope.child()));
  }

  switch (expr.kind) {
    case "let":
      return compileLet(opts);
    case "let*":
      return compileLetStar(opts, expr.bindings);
    case "letrec":
      return compileLetRec(opts);
  }
};

/** Values see the enclosing scope only */
const compileLet = ({ expr, scope }: CompileExprOpts<Let>) => {
  const names = expr.bindings.map((binding) => binding.name);
  const values = expr.bindings.map((binding) =>
    compileExpression({ expr: binding.value, scope })
  );
  const body = compileBody(expr.body, scope.child(names));
  return `((${names.map(local).join(", ")}) => { ${body} })(${values.join(", ")})`;
};

/** One nested function per binding, so each value sees the bindings before it */
const compileLetStar = (
  { expr, scope }: CompileExprOpts<Let>,
  bindings: readonly Binding[]
): string => {
  const [binding, ...remaining] = bindings;
  const value = compileExpression({ expr: binding.value, scope });
  const inner = scope.child([binding.name]);
  const body =
    remaining.length === 0
      ? `{ ${compileBody(expr.body, inner)} }`
      : compileLetStar({ expr, scope: inner }, remaining);
  return `((${local(binding.name)}) => ${body})(${value})`;
};

/** Values are evaluated with every name already declared */
const compileLetRec = ({ expr, scope }: CompileExprOpts<Let>) => {
  const names = expr.bindings.map((binding) => binding.name);
  const inner: Scope = scope.child(names);
  const locals = names.map(local).join(", ");
  const values = expr.bindings.map((binding) =>
    compileExpression({ expr: binding.value, scope: inner })
  );
  const body = compileBody(expr.body, inner);
  return iife(`let ${locals}; [${locals}] = [${values.join(", ")}]; ${body}`);
};

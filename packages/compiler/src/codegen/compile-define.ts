import { type CompileExprOpts, compileExpression } from "./codegen.js";
import type {
  DefineFunction,
  DefineVariable,
  SetBang,
} from "../parser/ast/forms.js";
import { local, str } from "./helpers.js";

// Definitions always target globals and evaluate to the empty list.
// Assignments evaluate to the assigned value.

export const compileDefineVariable = (opts: CompileExprOpts<DefineVariable>) => {
  const { expr } = opts;
  const value = compileExpression({ ...opts, expr: expr.value });
  return `(__env.set(${str(expr.name)}, ${value}), [])`;
};

export const compileDefineFunction = (opts: CompileExprOpts<DefineFunction>) => {
  const { expr } = opts;
  const lambda = compileExpression({ ...opts, expr: expr.lambda });
  return `(__env.set(${str(expr.name)}, ${lambda}), [])`;
};

export const compileSetBang = (opts: CompileExprOpts<SetBang>) => {
  const { expr, scope } = opts;
  const value = compileExpression({ ...opts, expr: expr.value });
  const name = str(expr.name);
  return scope.has(expr.name)
    ? `(${local(expr.name)} = ${value})`
    : `__env.set(${name}, ${value}).get(${name})`;
};

import {
  type CompileExprOpts,
  compileBody,
  compileExpression,
  compileSequence,
} from "./codegen.js";
import type { Cond, If, Logical } from "../parser/ast/forms.js";
import { iife } from "./helpers.js";

export const compileIf = (opts: CompileExprOpts<If>) => {
  const { expr, scope } = opts;
  const test = compileExpression({ ...opts, expr: expr.test });
  const consequent = compileExpression({ ...opts, expr: expr.consequent });
  const alternatives = compileSequence(expr.alternatives, scope);
  const alternative =
    alternatives.length === 0
      ? "[]"
      : alternatives.length === 1
        ? alternatives[0]
        : `(${alternatives.join(", ")})`;
  return `(__rt.isTrue(${test}) ? ${consequent} : ${alternative})`;
};

/**
 * `and` stops at the first false value, `or` at the first true one. Either
 * returns the last value evaluated.
 */
export const compileLogical = (opts: CompileExprOpts<Logical>) => {
  const { expr, scope } = opts;
  const exprs = compileSequence(expr.exprs, scope);
  const last = exprs.pop();
  if (last === undefined) return "[]";
  if (exprs.length === 0) return last;

  const negate = expr.operator === "and" ? "!" : "";
  const checks = exprs.map(
    (compiled) =>
      `__v = ${compiled}; if (${negate}__rt.isTrue(__v)) return __v;`
  );
  return iife(`let __v; ${checks.join(" ")} return ${last};`);
};

/** A clause without THENs yields the value of its test */
export const compileCond = (opts: CompileExprOpts<Cond>) => {
  const { expr, scope } = opts;
  if (expr.clauses.length === 0) return "[]";

  const clauses = expr.clauses.map((clause) => {
    const test = compileExpression({ expr: clause.test, scope });
    const check = `if (__rt.isTrue(__c = ${test}))`;
    return clause.body.length === 0
      ? `${check} return __c;`
      : `${check} { ${compileBody(clause.body, scope)} }`;
  });
  return iife(`let __c; ${clauses.join(" ")} return [];`);
};

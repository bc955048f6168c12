import type { Expr } from "../parser/ast/index.js";
import { Syntax } from "../parser/ast/syntax.js";
import type { Wrapped } from "../parser/ast/wrapped.js";
import { compile as compileAtom } from "./compile-atom.js";
import {
  compileCond,
  compileIf,
  compileLogical,
} from "./compile-conditional.js";
import {
  compileDefineFunction,
  compileDefineVariable,
  compileSetBang,
} from "./compile-define.js";
import { compile as compileGroup } from "./compile-group.js";
import { compile as compileLambda } from "./compile-lambda.js";
import { compile as compileLet } from "./compile-let.js";
import { compile as compileWhile } from "./compile-while.js";
import { compile as compileWrapped } from "./compile-wrapped.js";
import { codegenError } from "./diagnostics.js";
import { functionBody } from "./helpers.js";
import { Scope } from "./scope.js";

export interface CompileExprOpts<T = Expr> {
  expr: T;
  scope: Scope;
}

export type GenerateOptions = {
  /** Names to treat as lexically bound instead of global */
  scope?: Scope;
};

/**
 * Translates a Blatte expression into a JavaScript expression. The result
 * refers to the free names `__rt` and `__env` supplied by the host.
 */
export const generate = (expr: Expr, options: GenerateOptions = {}): string =>
  compileExpression({ expr, scope: options.scope ?? new Scope() });

export const compileExpression = (opts: CompileExprOpts): string => {
  const { expr } = opts;
  switch (expr.syntaxType) {
    case "wrapped":
      return compileWrapped({ ...opts, expr });
    case "word":
    case "string":
    case "variable":
      return compileAtom({ ...opts, expr });
    case "group":
      return compileGroup({ ...opts, expr });
    case "define-variable":
      return compileDefineVariable({ ...opts, expr });
    case "define-function":
      return compileDefineFunction({ ...opts, expr });
    case "set!":
      return compileSetBang({ ...opts, expr });
    case "if":
      return compileIf({ ...opts, expr });
    case "logical":
      return compileLogical({ ...opts, expr });
    case "cond":
      return compileCond({ ...opts, expr });
    case "while":
      return compileWhile({ ...opts, expr });
    case "lambda":
      return compileLambda({ ...opts, expr });
    case "let":
      return compileLet({ ...opts, expr });
    case "named-argument":
      throw codegenError(
        `named argument \\${expr.name}= outside of a group`,
        expr
      );
    default:
      return unrecognized(expr);
  }
};

const unrecognized = (expr: never): never => {
  const node: unknown = expr;
  if (node instanceof Syntax) {
    throw codegenError(`Unrecognized expression ${node.syntaxType}`, node);
  }
  throw codegenError(`Unrecognized expression ${String(node)}`);
};

/** Compiles each expression of a body in `scope` */
export const compileSequence = (
  exprs: readonly Wrapped[],
  scope: Scope
): string[] => exprs.map((expr) => compileExpression({ expr, scope }));

/** Function body text returning the last expression's value */
export const compileBody = (exprs: readonly Wrapped[], scope: Scope): string =>
  functionBody(compileSequence(exprs, scope));

import { type CompileExprOpts, compileBody } from "./codegen.js";
import type { Lambda } from "../parser/ast/forms.js";
import { local, str } from "./helpers.js";

/**
 * Every callable takes the named argument record first and the positional
 * arguments after it. Named parameters are declared first, then positional,
 * then the rest parameter.
 */
export const compile = (opts: CompileExprOpts<Lambda>) => {
  const { expr, scope } = opts;
  const { named, positional, rest } = expr;
  const count = positional.length;

  const declarations = [
    `__rt.arity(__args, ${count}, ${rest ? "true" : "false"});`,
    ...named.map(
      (param) =>
        `let ${local(param.name)} = __rt.namedArg(__named, ${str(param.name)});`
    ),
    ...positional.map(
      (param, index) => `let ${local(param.name)} = __args[${index}];`
    ),
    ...(rest ? [`let ${local(rest.name)} = __args.slice(${count});`] : []),
  ];

  const inner = scope.child(expr.parameters.map((param) => param.name));
  const body = compileBody(expr.body, inner);
  return `__rt.lambda(function (__named, ...__args) { ${declarations.join(" ")} ${body} })`;
};

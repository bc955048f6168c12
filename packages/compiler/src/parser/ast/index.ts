import type { StringLiteral, Variable, Word } from "./atom.js";
import type {
  Cond,
  DefineFunction,
  DefineVariable,
  If,
  Lambda,
  Let,
  Logical,
  SetBang,
  While,
} from "./forms.js";
import type { Group, NamedArgument } from "./group.js";
import type { Wrapped } from "./wrapped.js";

export * from "./atom.js";
export * from "./forms.js";
export * from "./group.js";
export * from "./parameter.js";
export * from "./syntax.js";
export * from "./wrapped.js";

/** Every node that can appear as the inner expression of a {@link Wrapped} */
export type Expr =
  | Word
  | StringLiteral
  | Variable
  | Group
  | NamedArgument
  | Wrapped
  | DefineVariable
  | DefineFunction
  | SetBang
  | If
  | Logical
  | Cond
  | While
  | Lambda
  | Let;

import type { Expr } from "../ast/index.js";
import type { Reader } from "../reader.js";
import type { Token } from "../token.js";

export type SpecialFormContext = {
  /** The `{` that opened the form */
  open: Token;
  /** The variable token naming the form */
  head: Token;
};

/**
 * Parses a group whose head variable is `name`. `read` is called with the
 * head consumed and must consume everything up to and including the `}`.
 */
export interface SpecialForm {
  name: string;
  read: (reader: Reader, context: SpecialFormContext) => Expr;
}

import { Token } from "../token.js";
import { Syntax } from "./syntax.js";

/** Built from a token, or from bare text for nodes made outside the reader */
abstract class Atom extends Syntax {
  readonly value: string;

  constructor(source: Token | string) {
    super(typeof source === "string" ? {} : { location: source.location });
    this.value = typeof source === "string" ? source : source.value;
  }
}

/** A run of literal text. Escaped metacharacters are already decoded. */
export class Word extends Atom {
  readonly syntaxType = "word";

  toJSON() {
    return this.value;
  }
}

/** Text delimited by `\"`, whitespace included. */
export class StringLiteral extends Atom {
  readonly syntaxType = "string";

  toJSON() {
    return { string: this.value };
  }
}

/** `\name` */
export class Variable extends Atom {
  readonly syntaxType = "variable";

  get name() {
    return this.value;
  }

  toJSON() {
    return { variable: this.value };
  }
}

import { SourceLocation } from "./ast/syntax.js";

export type TokenKind =
  | "word"
  | "string"
  | "variable"
  | "named-argument"
  | "named-parameter"
  | "rest-parameter"
  | "open"
  | "close"
  | "whitespace"
  | "comment"
  | "forget"
  | "eof";

export class Token {
  kind: TokenKind;
  readonly location: SourceLocation;
  /**
   * Decoded text. Escapes are resolved for words and strings, names carry no
   * backslash or marker characters.
   */
  value = "";

  constructor(opts: {
    kind: TokenKind;
    location: SourceLocation;
    value?: string;
  }) {
    const { kind, value, location } = opts;
    this.kind = kind;
    this.value = value ?? "";
    this.location = location;
  }

  addChar(string: string) {
    this.value += string;
  }

  /** Source-like rendering, for messages */
  toString(): string {
    switch (this.kind) {
      case "variable":
        return `\\${this.value}`;
      case "named-argument":
        return `\\${this.value}=`;
      case "named-parameter":
        return `\\=${this.value}`;
      case "rest-parameter":
        return `\\&${this.value}`;
      case "open":
        return "{";
      case "close":
        return "}";
      case "eof":
        return "end of input";
      default:
        return this.value;
    }
  }
}

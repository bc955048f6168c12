import {
  Group,
  NamedArgument,
  StringLiteral,
  Variable,
  Word,
  Wrapped,
  type Expr,
} from "./ast/index.js";
import type { SourceLocation } from "./ast/syntax.js";
import { CharStream } from "./char-stream.js";
import { parseError } from "./errors.js";
import { Lexer } from "./lexer.js";
import type { SpecialForm } from "./special-forms/types.js";
import { Token } from "./token.js";

/** Where an expression is being read. Named arguments only occur in groups. */
export type ReadContext = "expression" | "group-item";

/**
 * Reads expressions from one stream. Created per read by {@link Parser};
 * special forms receive it to read their own operands.
 */
export class Reader {
  readonly chars: CharStream;
  readonly #lexer: Lexer;
  readonly #specialForms: ReadonlyMap<string, SpecialForm>;

  constructor(opts: {
    chars: CharStream;
    lexer: Lexer;
    specialForms: ReadonlyMap<string, SpecialForm>;
  }) {
    this.chars = opts.chars;
    this.#lexer = opts.lexer;
    this.#specialForms = opts.specialForms;
  }

  peek(): Token {
    const mark = this.chars.mark();
    const token = this.#lexer.tokenize(this.chars);
    this.chars.reset(mark);
    return token;
  }

  next(): Token {
    return this.#lexer.tokenize(this.chars);
  }

  isSpecialForm(name: string) {
    return this.#specialForms.has(name);
  }

  /**
   * Consumes whitespace, comments and forget markers. A forget marker drops
   * everything gathered before it.
   */
  gatherWhitespace(): string {
    let ws = "";
    while (true) {
      const token = this.peek();
      if (token.kind === "whitespace") {
        ws += token.value;
      } else if (token.kind === "forget") {
        ws = "";
      } else if (token.kind !== "comment") {
        return ws;
      }
      this.next();
    }
  }

  /**
   * Reads one expression together with the whitespace before it. Returns
   * undefined when a `}` or the end of input comes first; that token is left
   * unread, the whitespace before it is not.
   */
  readWrapped(context: ReadContext = "expression"): Wrapped | undefined {
    const location = this.chars.currentSourceLocation();
    const ws = this.gatherWhitespace();
    const token = this.peek();
    if (token.kind === "close" || token.kind === "eof") return undefined;

    this.next();
    const expr = this.#readExpr(token, context);
    location.setEndToStartOf(this.chars.currentSourceLocation());
    return new Wrapped({ ws, expr, location });
  }

  /** Like {@link readWrapped}, but a missing `}` is an error */
  readOperand(open: Token): Wrapped | undefined {
    const operand = this.readWrapped();
    if (!operand && this.peek().kind === "eof") throw unclosed(open);
    return operand;
  }

  readRequiredOperand(open: Token, form: string, what: string): Wrapped {
    const operand = this.readOperand(open);
    if (operand) return operand;
    throw parseError({
      code: "PS0002",
      params: { kind: "malformed-form", form, reason: `missing ${what}` },
      location: this.#spanFrom(open),
    });
  }

  /** Reads operands up to and including the closing `}` */
  readOperands(open: Token, context: ReadContext = "expression"): Wrapped[] {
    const operands: Wrapped[] = [];
    while (true) {
      const operand = this.readWrapped(context);
      if (!operand) break;
      operands.push(operand);
    }
    this.closeGroup(open);
    return operands;
  }

  /** Consumes the `}` matching `open` */
  closeGroup(open: Token) {
    const token = this.next();
    if (token.kind !== "close") throw unclosed(open);
  }

  /** Expects nothing but whitespace before the closing `}` of a form */
  finishForm(open: Token, form: string) {
    this.gatherWhitespace();
    const token = this.peek();
    if (token.kind === "eof") throw unclosed(open);
    if (token.kind !== "close") {
      throw parseError({
        code: "PS0002",
        params: { kind: "malformed-form", form, reason: "too many expressions" },
        location: token.location,
      });
    }
    this.next();
  }

  /** Skips whitespace and consumes the next significant token */
  nextSignificant(open: Token): Token {
    this.gatherWhitespace();
    const token = this.next();
    if (token.kind === "eof") throw unclosed(open);
    return token;
  }

  #readExpr(token: Token, context: ReadContext): Expr {
    switch (token.kind) {
      case "word":
        return new Word(token);
      case "string":
        return new StringLiteral(token);
      case "variable":
        if (this.isSpecialForm(token.value)) {
          throw parseError({
            code: "PS0005",
            params: { kind: "special-form", name: token.value },
            location: token.location,
          });
        }
        return new Variable(token);
      case "named-argument":
        return this.#readNamedArgument(token, context);
      case "named-parameter":
      case "rest-parameter":
        throw parseError({
          code: "PS0005",
          params: { kind: "parameter", name: token.toString() },
          location: token.location,
        });
      case "open":
        return this.#readGroup(token);
      default:
        throw new Error(`Unexpected ${token.kind} token`);
    }
  }

  #readNamedArgument(token: Token, context: ReadContext): NamedArgument {
    if (context !== "group-item") {
      throw parseError({
        code: "PS0005",
        params: { kind: "named-argument", name: token.value },
        location: token.location,
      });
    }

    const value = this.readWrapped();
    if (!value) {
      throw parseError({
        code: "PS0002",
        params: {
          kind: "malformed-form",
          form: "named argument",
          reason: `missing value for ${token.toString()}`,
        },
        location: token.location,
      });
    }

    return new NamedArgument({
      name: token.value,
      value,
      location: this.#spanFrom(token),
    });
  }

  #readGroup(open: Token): Expr {
    const mark = this.chars.mark();
    this.gatherWhitespace();
    const head = this.peek();
    const form =
      head.kind === "variable" ? this.#specialForms.get(head.value) : undefined;

    if (form) {
      this.next();
      return form.read(this, { open, head }).setLocation(this.#spanFrom(open));
    }

    this.chars.reset(mark);
    const items = this.readOperands(open, "group-item");
    return new Group({ items, location: this.#spanFrom(open) });
  }

  #spanFrom(token: Token): SourceLocation {
    const location = token.location.clone();
    location.setEndToStartOf(this.chars.currentSourceLocation());
    return location;
  }
}

const unclosed = (open: Token) =>
  parseError({
    code: "PS0001",
    params: { kind: "unclosed-group" },
    location: open.location,
  });

import { Token, type TokenKind } from "./token.js";
import { CharStream } from "./char-stream.js";
import {
  isIdentifierChar,
  isIdentifierStart,
  isMetaChar,
  isTerminator,
  isWhitespace,
  suffixedIdentifiers,
} from "./grammar.js";
import type {
  DiagnosticCode,
  DiagnosticParams,
} from "../diagnostics/index.js";
import { lexError, type LexError } from "./errors.js";

/**
 * Splits Blatte source into tokens. Stateless: every call reads exactly one
 * token from the current position of `chars`, so callers may mark and reset
 * the stream around it to peek.
 */
export class Lexer {
  tokenize(chars: CharStream): Token {
    const token = new Token({
      kind: "eof",
      location: chars.currentSourceLocation(),
    });

    const char = chars.next;
    if (char === undefined) return token;

    if (isWhitespace(char)) {
      this.consumeWhitespace(chars, token);
    } else if (char === "{" || char === "}") {
      token.kind = char === "{" ? "open" : "close";
      token.addChar(chars.consumeChar());
    } else if (char === "\\" && !isMetaChar(chars.at(1))) {
      this.consumeEscape(chars, token);
    } else {
      this.consumeWord(chars, token);
    }

    token.location.setEndToStartOf(chars.currentSourceLocation());
    return token;
  }

  private consumeWhitespace(chars: CharStream, token: Token) {
    token.kind = "whitespace";
    while (isWhitespace(chars.next)) {
      token.addChar(chars.consumeChar());
    }
  }

  /** A run of plain characters and escaped metacharacters */
  private consumeWord(chars: CharStream, token: Token) {
    token.kind = "word";
    while (chars.hasCharacters) {
      const char = chars.next;
      if (char === "\\" && isMetaChar(chars.at(1))) {
        chars.consumeChar();
        token.addChar(chars.consumeChar());
        continue;
      }

      if (isTerminator(char)) break;
      token.addChar(chars.consumeChar());
    }
  }

  /** Everything a backslash can introduce other than an escaped metacharacter */
  private consumeEscape(chars: CharStream, token: Token) {
    const escaped = chars.at(1);
    if (escaped === undefined) {
      chars.consumeChar();
      throw this.failAt(chars, token, {
        code: "LX0002",
        params: { kind: "trailing-backslash" },
      });
    }

    if (escaped === ";") {
      this.consumeComment(chars, token);
      return;
    }

    if (escaped === "/") {
      chars.consumeChar();
      chars.consumeChar();
      token.kind = "forget";
      return;
    }

    if (escaped === '"') {
      this.consumeString(chars, token);
      return;
    }

    if (escaped === "=" || escaped === "&") {
      chars.consumeChar();
      chars.consumeChar();
      const kind: TokenKind =
        escaped === "=" ? "named-parameter" : "rest-parameter";
      this.consumeIdentifier(chars, token, kind, escaped);
      return;
    }

    if (isIdentifierStart(escaped)) {
      chars.consumeChar();
      this.consumeIdentifier(chars, token, "variable", escaped);
      if (chars.next === "=") {
        chars.consumeChar();
        token.kind = "named-argument";
      }
      return;
    }

    chars.consumeChar();
    chars.consumeChar();
    throw this.failAt(chars, token, {
      code: "LX0003",
      params: { kind: "invalid-escape", char: escaped },
    });
  }

  private consumeIdentifier(
    chars: CharStream,
    token: Token,
    kind: TokenKind,
    escaped: string
  ) {
    if (!isIdentifierStart(chars.next)) {
      throw this.failAt(chars, token, {
        code: "LX0003",
        params: { kind: "invalid-escape", char: escaped },
      });
    }

    token.kind = kind;
    while (isIdentifierChar(chars.next)) {
      token.addChar(chars.consumeChar());
    }

    const suffix = chars.next;
    if (suffix !== undefined && suffixedIdentifiers.has(token.value + suffix)) {
      token.addChar(chars.consumeChar());
    }
  }

  private consumeComment(chars: CharStream, token: Token) {
    token.kind = "comment";
    chars.consumeChar();
    chars.consumeChar();
    while (chars.hasCharacters && chars.next !== "\n") {
      token.addChar(chars.consumeChar());
    }
  }

  private consumeString(chars: CharStream, token: Token) {
    token.kind = "string";
    chars.consumeChar();
    chars.consumeChar();

    while (chars.hasCharacters) {
      const char = chars.next;
      const following = chars.at(1);

      if (char === "\\" && following === '"') {
        chars.consumeChar();
        chars.consumeChar();
        return;
      }

      if (char === "\\" && following === "\\") {
        chars.consumeChar();
        token.addChar(chars.consumeChar());
        continue;
      }

      token.addChar(chars.consumeChar());
    }

    throw this.failAt(chars, token, {
      code: "LX0001",
      params: { kind: "unterminated-string" },
    });
  }

  /** An error spanning everything consumed for `token` so far */
  private failAt<K extends DiagnosticCode>(
    chars: CharStream,
    token: Token,
    error: { code: K; params: DiagnosticParams<K> }
  ): LexError {
    token.location.setEndToStartOf(chars.currentSourceLocation());
    return lexError({ ...error, location: token.location });
  }
}

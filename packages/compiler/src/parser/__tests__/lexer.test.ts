import { describe, expect, it } from "vitest";
import { CharStream } from "../char-stream.js";
import { LexError } from "../errors.js";
import { Lexer } from "../lexer.js";
import { Token } from "../token.js";

const lexAll = (text: string): Token[] => {
  const chars = new CharStream(text, "test.blt");
  const lexer = new Lexer();
  const tokens: Token[] = [];
  while (true) {
    const token = lexer.tokenize(chars);
    if (token.kind === "eof") return tokens;
    tokens.push(token);
  }
};

const kinds = (text: string) =>
  lexAll(text).map((token) => [token.kind, token.value]);

const lexFailure = (text: string): LexError => {
  try {
    lexAll(text);
  } catch (error) {
    if (error instanceof LexError) return error;
    throw error;
  }
  throw new Error(`expected ${JSON.stringify(text)} to fail`);
};

describe("lexer", () => {
  it("splits prose into words and whitespace runs", () => {
    expect(kinds("Hello,  world\t!")).toEqual([
      ["word", "Hello,"],
      ["whitespace", "  "],
      ["word", "world"],
      ["whitespace", "\t"],
      ["word", "!"],
    ]);
  });

  it("merges escaped metacharacters into words", () => {
    expect(kinds("a\\{b\\}c\\\\d")).toEqual([["word", "a{b}c\\d"]]);
  });

  it("recognizes variables and parameter markers", () => {
    expect(kinds("{\\foo \\x= \\=n \\&r}")).toEqual([
      ["open", "{"],
      ["variable", "foo"],
      ["whitespace", " "],
      ["named-argument", "x"],
      ["whitespace", " "],
      ["named-parameter", "n"],
      ["whitespace", " "],
      ["rest-parameter", "r"],
      ["close", "}"],
    ]);
  });

  it("keeps the punctuation of set! and let* only", () => {
    expect(kinds("\\set! \\let* \\letter*")).toEqual([
      ["variable", "set!"],
      ["whitespace", " "],
      ["variable", "let*"],
      ["whitespace", " "],
      ["variable", "letter"],
      ["word", "*"],
    ]);
  });

  it("ends a comment before the newline", () => {
    expect(kinds("a \\; note\nb")).toEqual([
      ["word", "a"],
      ["whitespace", " "],
      ["comment", " note"],
      ["whitespace", "\n"],
      ["word", "b"],
    ]);
  });

  it("emits forget markers", () => {
    expect(kinds("a \\/b")).toEqual([
      ["word", "a"],
      ["whitespace", " "],
      ["forget", ""],
      ["word", "b"],
    ]);
  });

  it("reads delimited strings literally apart from \\\\", () => {
    expect(kinds('\\"a {b} "c" \\\\ \\x\\"')).toEqual([
      ["string", 'a {b} "c" \\ \\x'],
    ]);
  });

  it("tracks token locations", () => {
    const [, , variable] = lexAll("ab\n  \\x");
    expect(variable.kind).toBe("variable");
    expect(variable.location.startIndex).toBe(5);
    expect(variable.location.endIndex).toBe(7);
    expect(variable.location.startLine).toBe(2);
    expect(variable.location.startColumn).toBe(2);
    expect(variable.location.toString()).toBe("test.blt:2:3");
  });

  it("rejects an unterminated string", () => {
    const error = lexFailure('x \\"abc');
    expect(error.diagnostic.code).toBe("LX0001");
    expect(error.diagnostic.span).toEqual({ file: "test.blt", start: 2, end: 7 });
  });

  it("rejects a backslash at the end of input", () => {
    const error = lexFailure("abc\\");
    expect(error.diagnostic.code).toBe("LX0002");
    expect(error.location.startColumn).toBe(3);
    expect(error.diagnostic.span).toEqual({ file: "test.blt", start: 3, end: 4 });
  });

  it("rejects identifiers that do not start with a letter", () => {
    const error = lexFailure("\\1x");
    expect(error.diagnostic.code).toBe("LX0003");
    expect(error.diagnostic.message).toBe("invalid escape \\1");
    expect(error.diagnostic.phase).toBe("lexing");
    expect(error.diagnostic.span).toEqual({ file: "test.blt", start: 0, end: 2 });
  });

  it("rejects parameter markers without a name", () => {
    const error = lexFailure("a \\=1");
    expect(error.diagnostic.message).toBe("invalid escape \\=");
    expect(error.diagnostic.span).toEqual({ file: "test.blt", start: 2, end: 4 });
  });
});

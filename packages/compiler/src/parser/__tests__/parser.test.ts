import { describe, expect, it } from "vitest";
import { readDocument, readSyntax } from "../../compiler.js";
import { Group } from "../ast/index.js";
import { CharStream } from "../char-stream.js";
import { ParseError } from "../errors.js";
import { getDefaultParser, Parser } from "../parser.js";
import type { SpecialForm } from "../special-forms/index.js";

const forms = (text: string) =>
  readDocument(text).forms.map((form) => form.toJSON());

const first = (text: string, parser?: Parser) =>
  readSyntax(text, { parser })?.toJSON();

const inner = (text: string) => readSyntax(text)?.expr.toJSON();

const parseFailure = (text: string): ParseError => {
  try {
    readDocument(text, { filePath: "broken.blt" });
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error(`expected ${JSON.stringify(text)} to fail`);
};

describe("parser", () => {
  it("wraps every expression in the whitespace before it", () => {
    const document = readDocument("Hello,  world\n");
    expect(document.forms.map((form) => form.toJSON())).toEqual([
      { ws: "", expr: "Hello," },
      { ws: "  ", expr: "world" },
    ]);
    expect(document.trailing).toBe("\n");
  });

  it("forgets whitespace gathered across comments", () => {
    expect(forms("a \\; c\n \\/b")).toEqual([
      { ws: "", expr: "a" },
      { ws: "", expr: "b" },
    ]);
  });

  it("keeps whitespace gathered after a forget marker", () => {
    expect(forms("a\\/ b")).toEqual([
      { ws: "", expr: "a" },
      { ws: " ", expr: "b" },
    ]);
  });

  it("reads strings and variables", () => {
    expect(forms('\\"x y\\" \\name')).toEqual([
      { ws: "", expr: { string: "x y" } },
      { ws: " ", expr: { variable: "name" } },
    ]);
  });

  it("reads generic groups with named arguments", () => {
    expect(first("{\\f \\n=x  y}")).toEqual({
      ws: "",
      expr: [
        { ws: "", expr: { variable: "f" } },
        { ws: " ", expr: { named: "n", value: { ws: "", expr: "x" } } },
        { ws: "  ", expr: "y" },
      ],
    });
  });

  it("drops whitespace before a closing brace", () => {
    expect(first("{a }")).toEqual({ ws: "", expr: [{ ws: "", expr: "a" }] });
  });

  it("nests groups", () => {
    expect(first(" {a {b}}")).toEqual({
      ws: " ",
      expr: [
        { ws: "", expr: "a" },
        { ws: " ", expr: [{ ws: "", expr: "b" }] },
      ],
    });
  });

  it("returns undefined and leaves the stream when nothing is left", () => {
    const chars = new CharStream("  \\; only a comment", "empty.blt");
    expect(getDefaultParser().read(chars)).toBeUndefined();
    expect(chars.consumed).toBe(0);
  });

  it("records locations spanning the whole form", () => {
    const form = readSyntax("x {\\if a b}", { filePath: "loc.blt" });
    expect(form?.location?.toJSON()).toEqual({
      startIndex: 0,
      endIndex: 1,
      startLine: 1,
      endLine: 1,
      startColumn: 0,
      endColumn: 1,
      filePath: "loc.blt",
    });

    const [, ifForm] = readDocument("x {\\if a b}").forms;
    expect(ifForm.expr.location?.startIndex).toBe(2);
    expect(ifForm.expr.location?.endIndex).toBe(11);
  });

  it("accepts custom special forms per parser", () => {
    const ignore: SpecialForm = {
      name: "ignore",
      read: (reader, { open }) => {
        reader.readOperands(open);
        return new Group({ items: [] });
      },
    };
    const parser = getDefaultParser().extend(ignore);

    expect(first("{\\ignore a b}", parser)).toEqual({ ws: "", expr: [] });
    expect(first("{\\ignore a}")).toEqual({
      ws: "",
      expr: [
        { ws: "", expr: { variable: "ignore" } },
        { ws: " ", expr: "a" },
      ],
    });
  });

  it("can be built without the default forms", () => {
    const parser = new Parser({ specialForms: [] });
    expect(first("{\\if a}", parser)).toEqual({
      ws: "",
      expr: [
        { ws: "", expr: { variable: "if" } },
        { ws: " ", expr: "a" },
      ],
    });
  });
});

describe("special forms", () => {
  it("reads a variable definition", () => {
    expect(first("{\\define \\x hi}")).toEqual({
      ws: "",
      expr: { define: "x", value: { ws: " ", expr: "hi" } },
    });
  });

  it("reads a function definition", () => {
    expect(first("{\\define {\\f \\a \\=n \\&r} \\a}")).toEqual({
      ws: "",
      expr: {
        define: "f",
        lambda: {
          lambda: ["\\a", "\\=n", "\\&r"],
          body: [{ ws: " ", expr: { variable: "a" } }],
        },
      },
    });
  });

  it("reads if with several else expressions", () => {
    expect(first("{\\if \\x yes no maybe}")).toEqual({
      ws: "",
      expr: {
        if: { ws: " ", expr: { variable: "x" } },
        then: { ws: " ", expr: "yes" },
        else: [
          { ws: " ", expr: "no" },
          { ws: " ", expr: "maybe" },
        ],
      },
    });
  });

  it("reads and, or and while", () => {
    expect(inner("{\\and a b}")).toEqual({
      and: [
        { ws: " ", expr: "a" },
        { ws: " ", expr: "b" },
      ],
    });
    expect(inner("{\\or a}")).toEqual({ or: [{ ws: " ", expr: "a" }] });
    expect(inner("{\\while \\x}")).toEqual({
      while: { ws: " ", expr: { variable: "x" } },
      body: [],
    });
  });

  it("reads cond clauses without calling them", () => {
    expect(inner("{\\cond {\\x a} {yes}}")).toEqual({
      cond: [
        {
          test: { ws: "", expr: { variable: "x" } },
          body: [{ ws: " ", expr: "a" }],
        },
        { test: { ws: "", expr: "yes" }, body: [] },
      ],
    });
  });

  it("reads let* bindings", () => {
    expect(inner("{\\let* {{\\a 1} {\\b \\a}} \\b}")).toEqual({
      "let*": [
        ["a", { ws: " ", expr: "1" }],
        ["b", { ws: " ", expr: { variable: "a" } }],
      ],
      body: [{ ws: " ", expr: { variable: "b" } }],
    });
  });

  it("allows let* to rebind a name", () => {
    expect(inner("{\\let* {{\\a 1} {\\a 2}}}")).toEqual({
      "let*": [
        ["a", { ws: " ", expr: "1" }],
        ["a", { ws: " ", expr: "2" }],
      ],
      body: [],
    });
  });

  it("reads set! and lambda", () => {
    expect(inner("{\\set! \\x {}}")).toEqual({
      set: "x",
      value: { ws: " ", expr: [] },
    });
    expect(inner("{\\lambda {} done}")).toEqual({
      lambda: [],
      body: [{ ws: " ", expr: "done" }],
    });
  });
});

describe("parse errors", () => {
  const failures: [string, string, string][] = [
    ["{a", "PS0001", "unmatched {: group is never closed"],
    ["a }", "PS0001", "unmatched }: no group to close"],
    ["{\\if a}", "PS0002", "malformed if: missing then branch"],
    ["{\\and}", "PS0002", "malformed and: missing expression"],
    ["{\\while}", "PS0002", "malformed while: missing test"],
    ["{\\define \\x a b}", "PS0002", "malformed define: too many expressions"],
    ["{\\define \\x}", "PS0002", "malformed define: missing value"],
    ["{\\set! {a} b}", "PS0002", "malformed set!: target must be a variable"],
    ["{\\cond x}", "PS0002", "malformed cond: each clause must be a group"],
    ["{\\cond {}}", "PS0002", "malformed cond: missing clause test"],
    ["{\\lambda {\\&r \\a} x}", "PS0003", "rest parameter \\&r must be last"],
    ["{\\lambda {\\&r \\&s} x}", "PS0003", "more than one rest parameter (\\&s)"],
    ["{\\lambda {\\a \\=a} x}", "PS0003", "duplicate parameter a"],
    [
      "{\\lambda {a} x}",
      "PS0003",
      "expected \\VAR, \\=VAR or \\&VAR in parameter list",
    ],
    ["{\\let {{\\a}} x}", "PS0004", "malformed let binding: expected {\\VAR VAL}"],
    ["{\\let {{\\a 1 2}} x}", "PS0004", "malformed let binding: expected {\\VAR VAL}"],
    ["{\\letrec {{\\a 1} {\\a 2}} x}", "PS0004", "duplicate letrec binding a"],
    ["\\x=1", "PS0005", "named argument \\x= is only allowed inside a group"],
    ["\\=x", "PS0005", "parameter \\=x is only allowed inside a parameter list"],
    ["\\if", "PS0005", "\\if is only allowed at the head of a group"],
    ["{a \\lambda}", "PS0005", "\\lambda is only allowed at the head of a group"],
    ["{\\define \\if 1}", "PS0005", "\\if is only allowed at the head of a group"],
  ];

  it.each(failures)("%s fails with %s", (text, code, message) => {
    const error = parseFailure(text);
    expect(error.diagnostic.code).toBe(code);
    expect(error.diagnostic.message).toBe(message);
    expect(error.diagnostic.phase).toBe("parsing");
    expect(error.diagnostic.span.file).toBe("broken.blt");
  });

  it("points at the unmatched brace", () => {
    expect(parseFailure("ab {c").location.startIndex).toBe(3);
    expect(parseFailure("ab c}").location.startIndex).toBe(4);
  });

  it("points at the surplus expression", () => {
    const error = parseFailure("{\\define \\x a b}");
    expect(error.location.startIndex).toBe(14);
    expect(error.diagnostic.span).toEqual({
      file: "broken.blt",
      start: 14,
      end: 15,
    });
  });
});

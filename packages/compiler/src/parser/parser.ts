import type { Wrapped } from "./ast/index.js";
import { CharStream } from "./char-stream.js";
import { parseError } from "./errors.js";
import { Lexer } from "./lexer.js";
import { Reader } from "./reader.js";
import {
  defaultSpecialForms,
  type SpecialForm,
} from "./special-forms/index.js";

export type ParserOptions = {
  /** Replaces the built in special forms */
  specialForms?: readonly SpecialForm[];
};

export type ParsedDocument = {
  forms: Wrapped[];
  /** Whitespace after the last form, comments and forget markers applied */
  trailing: string;
};

/**
 * Holds parser configuration. Reading state lives in the {@link CharStream},
 * so one parser can serve any number of streams.
 */
export class Parser {
  readonly specialForms: ReadonlyMap<string, SpecialForm>;
  readonly #lexer = new Lexer();

  constructor(opts: ParserOptions = {}) {
    const forms = opts.specialForms ?? defaultSpecialForms;
    this.specialForms = new Map(forms.map((form) => [form.name, form]));
  }

  /** A parser with `forms` added to (or replacing same-named) special forms */
  extend(...forms: SpecialForm[]): Parser {
    return new Parser({
      specialForms: [...this.specialForms.values(), ...forms],
    });
  }

  /**
   * Reads the next expression. When only whitespace and comments remain the
   * stream is left untouched and undefined is returned.
   */
  read(chars: CharStream): Wrapped | undefined {
    const start = chars.mark();
    const reader = this.#reader(chars);
    const form = reader.readWrapped();
    if (form) return form;

    const token = reader.peek();
    if (token.kind === "close") {
      throw parseError({
        code: "PS0001",
        params: { kind: "unexpected-close" },
        location: token.location,
      });
    }

    chars.reset(start);
    return undefined;
  }

  readAll(chars: CharStream): ParsedDocument {
    const forms: Wrapped[] = [];
    while (true) {
      const form = this.read(chars);
      if (!form) break;
      forms.push(form);
    }

    const trailing = this.#reader(chars).gatherWhitespace();
    return { forms, trailing };
  }

  #reader(chars: CharStream) {
    return new Reader({
      chars,
      lexer: this.#lexer,
      specialForms: this.specialForms,
    });
  }
}

let defaultParser: Parser | undefined;

/** Shared parser with the built in special forms, created on first use */
export const getDefaultParser = (): Parser => {
  if (!defaultParser) defaultParser = new Parser();
  return defaultParser;
};

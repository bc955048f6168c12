import { generate } from "./codegen/codegen.js";
import type { Wrapped } from "./parser/ast/index.js";
import { CharStream } from "./parser/char-stream.js";
import {
  getDefaultParser,
  type ParsedDocument,
  type Parser,
} from "./parser/parser.js";
import { SourceBuffer } from "./source-buffer.js";

export type CompileOptions = {
  /** Reported in locations and diagnostics. Ignored for a SourceBuffer. */
  filePath?: string;
  parser?: Parser;
};

export type CompiledDocument = {
  /** One JavaScript expression per top level form, in source order */
  forms: string[];
  trailing: string;
};

const DEFAULT_FILE_PATH = "<input>";

/**
 * Reads one expression. A {@link SourceBuffer} loses the consumed text on
 * success and is left untouched otherwise.
 */
export const readSyntax = (
  input: string | SourceBuffer,
  options: CompileOptions = {}
): Wrapped | undefined => {
  const parser = options.parser ?? getDefaultParser();
  if (typeof input === "string") {
    const chars = new CharStream(input, options.filePath ?? DEFAULT_FILE_PATH);
    return parser.read(chars);
  }

  const chars = input.stream();
  const form = parser.read(chars);
  if (form) input.commit(chars);
  return form;
};

/**
 * Compiles the next expression of `input` to JavaScript. Returns undefined
 * when only whitespace and comments remain.
 */
export const parse = (
  input: string | SourceBuffer,
  options: CompileOptions = {}
): string | undefined => {
  const form = readSyntax(input, options);
  return form && generate(form);
};

export const readDocument = (
  text: string,
  options: CompileOptions = {}
): ParsedDocument => {
  const parser = options.parser ?? getDefaultParser();
  return parser.readAll(
    new CharStream(text, options.filePath ?? DEFAULT_FILE_PATH)
  );
};

export const compileDocument = (
  text: string,
  options: CompileOptions = {}
): CompiledDocument => {
  const { forms, trailing } = readDocument(text, options);
  return { forms: forms.map((form) => generate(form)), trailing };
};

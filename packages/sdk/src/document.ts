import {
  compileDocument,
  parse,
  type CompiledDocument,
  type SourceBuffer,
} from "@blatte/compiler";
import {
  createBlatteHost,
  flatten,
  type BlatteHost,
  type Value,
} from "@blatte/js-host";
import type { RenderOptions } from "./shared/types.js";

const hostFor = (opts: Pick<RenderOptions, "host" | "globals">): BlatteHost =>
  opts.host ?? createBlatteHost({ globals: opts.globals });

/**
 * Runs compiled forms in order in one host. Each value is flattened on its
 * own, so whitespace before a form is never overridden.
 */
export const renderCompiled = (
  document: CompiledDocument,
  opts: Pick<RenderOptions, "host" | "globals"> = {}
): string => {
  const host = hostFor(opts);
  const rendered = document.forms.map((code) => flatten(host.evaluate(code)));
  return rendered.join("") + document.trailing;
};

/** Compiles and runs a whole document, returning the transformed text */
export const renderDocument = (
  text: string,
  opts: RenderOptions = {}
): string =>
  renderCompiled(
    compileDocument(text, { filePath: opts.filePath, parser: opts.parser }),
    opts
  );

/**
 * Compiles and runs the next expression of `input`. Returns undefined, and
 * evaluates nothing, when only whitespace and comments remain.
 */
export const evaluateExpression = (
  input: string | SourceBuffer,
  host: BlatteHost,
  opts: Pick<RenderOptions, "filePath" | "parser"> = {}
): Value | undefined => {
  const code = parse(input, opts);
  return code === undefined ? undefined : host.evaluate(code);
};

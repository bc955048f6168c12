import { readFileSync } from "node:fs";
import {
  compileDocument,
  DiagnosticError,
  readDocument,
} from "@blatte/compiler";
import { createBlatteHost } from "@blatte/js-host";
import { renderCompiled } from "@blatte/sdk";
import { getConfig } from "./config/index.js";
import type { BlatteCliConfig } from "./config/types.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { printJson, printLines, printRendered } from "./output.js";

const STDIN = 0;
const STDIN_PATH = "<stdin>";

export const exec = () => {
  const config = getConfig();
  let source: string | undefined;
  try {
    source = readInput(config);
    runCli(config, source);
  } catch (error) {
    errorHandler(error, { color: config.color, source });
  }
};

export const readInput = (config: BlatteCliConfig): string =>
  readFileSync(config.file ?? STDIN, "utf8");

export const runCli = (config: BlatteCliConfig, source: string) => {
  const filePath = config.file ?? STDIN_PATH;

  if (config.emitAst) {
    const { forms, trailing } = readDocument(source, { filePath });
    return printJson({ forms: forms.map((form) => form.toJSON()), trailing });
  }

  const compiled = compileDocument(source, { filePath });
  if (config.emitJs) {
    return printLines(compiled.forms);
  }

  printRendered(
    renderCompiled(compiled, { host: createBlatteHost({ filePath }) })
  );
};

function errorHandler(
  error: unknown,
  opts: { color: boolean; source?: string }
): never {
  if (error instanceof DiagnosticError) {
    console.error(formatCliDiagnostic(error.diagnostic, opts));
    process.exit(1);
  }

  console.error(error);
  process.exit(1);
}

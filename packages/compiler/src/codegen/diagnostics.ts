import {
  DiagnosticError,
  diagnosticFromCode,
  normalizeSpan,
  type Diagnostic,
} from "../diagnostics/index.js";
import type { Syntax } from "../parser/ast/syntax.js";
import { spanOf } from "../parser/errors.js";

export class CodeGenError extends DiagnosticError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic);
    this.name = "CodeGenError";
  }
}

export const codegenErrorToDiagnostic = (
  error: unknown,
  options: { node?: Syntax } = {}
): Diagnostic =>
  diagnosticFromCode({
    code: "CG0001",
    params: {
      kind: "codegen-error",
      message: error instanceof Error ? error.message : String(error),
    },
    span: normalizeSpan(
      options.node?.location ? spanOf(options.node.location) : undefined,
      { file: "<codegen>", start: 0, end: 0 }
    ),
  });

export const codegenError = (message: string, node?: Syntax): CodeGenError =>
  new CodeGenError(codegenErrorToDiagnostic(new Error(message), { node }));

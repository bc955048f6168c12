import { describe, expect, it } from "vitest";
import {
  createDiagnostic,
  diagnosticCodes,
  DiagnosticError,
  diagnosticFromCode,
  formatDiagnostic,
  normalizeSpan,
} from "../index.js";

describe("diagnostic utilities", () => {
  it("formats diagnostics with the registry phase", () => {
    const diagnostic = diagnosticFromCode({
      code: "PS0002",
      params: { kind: "malformed-form", form: "if", reason: "missing test" },
      span: { file: "file.blt", start: 1, end: 3 },
    });

    expect(formatDiagnostic(diagnostic)).toBe(
      "file.blt:1-3 ERROR [parsing] PS0002: malformed if: missing test"
    );
  });

  it("infers the phase from the code prefix", () => {
    const diagnostic = createDiagnostic({
      code: "LX9999",
      message: "custom",
      span: { file: "file.blt", start: 0, end: 0 },
    });
    expect(diagnostic.phase).toBe("lexing");
    expect(diagnostic.severity).toBe("error");
  });

  it("normalizes to the first available span", () => {
    const fallback = { file: "fallback", start: 0, end: 0 };
    const span = normalizeSpan(undefined, fallback);
    expect(span.file).toBe("fallback");
    expect(normalizeSpan().file).toBe("<unknown>");
  });

  it("carries registry hints onto diagnostics", () => {
    const diagnostic = diagnosticFromCode({
      code: "LX0001",
      params: { kind: "unterminated-string" },
      span: { file: "file.blt", start: 0, end: 1 },
    });
    expect(diagnostic.hints?.[0]?.message).toBe('Close the string with \\".');
  });

  it("describes each parameter problem", () => {
    const message = (name: string) =>
      diagnosticFromCode({
        code: "PS0003",
        params: { kind: "duplicate-parameter", name },
        span: { file: "file.blt", start: 0, end: 1 },
      }).message;
    expect(message("x")).toBe("duplicate parameter x");
  });

  it("lists every registered code", () => {
    expect(diagnosticCodes()).toEqual([
      "LX0001",
      "LX0002",
      "LX0003",
      "PS0001",
      "PS0002",
      "PS0003",
      "PS0004",
      "PS0005",
      "CG0001",
    ]);
  });

  it("wraps a diagnostic in an error", () => {
    const diagnostic = diagnosticFromCode({
      code: "CG0001",
      params: { kind: "codegen-error", message: "boom" },
      span: { file: "file.blt", start: 4, end: 5 },
    });
    const error = new DiagnosticError(diagnostic);
    expect(error.message).toBe("file.blt:4-5 ERROR [codegen] CG0001: boom");
    expect(error.diagnostics).toEqual([diagnostic]);
  });
});

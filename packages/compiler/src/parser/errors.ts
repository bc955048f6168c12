import {
  DiagnosticError,
  diagnosticFromCode,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticParams,
  type SourceSpan,
} from "../diagnostics/index.js";
import type { SourceLocation } from "./ast/syntax.js";

export const spanOf = (location: SourceLocation): SourceSpan => ({
  file: location.filePath,
  start: location.startIndex,
  end: location.endIndex,
});

export class ParseError extends DiagnosticError {
  readonly location: SourceLocation;

  constructor(diagnostic: Diagnostic, location: SourceLocation) {
    super(diagnostic);
    this.name = "ParseError";
    this.location = location.clone();
  }
}

export class LexError extends ParseError {
  constructor(diagnostic: Diagnostic, location: SourceLocation) {
    super(diagnostic, location);
    this.name = "LexError";
  }
}

type ErrorOptions<K extends DiagnosticCode> = {
  code: K;
  params: DiagnosticParams<K>;
  location: SourceLocation;
};

export const parseError = <K extends DiagnosticCode>({
  code,
  params,
  location,
}: ErrorOptions<K>): ParseError =>
  new ParseError(
    diagnosticFromCode({ code, params, span: spanOf(location) }),
    location
  );

export const lexError = <K extends DiagnosticCode>({
  code,
  params,
  location,
}: ErrorOptions<K>): LexError =>
  new LexError(
    diagnosticFromCode({ code, params, span: spanOf(location) }),
    location
  );

export {
  compileDocument,
  parse,
  readDocument,
  readSyntax,
  getDefaultParser,
  Parser,
  SourceBuffer,
  DiagnosticError,
  formatDiagnostic,
} from "@blatte/compiler";
export type {
  CompiledDocument,
  Diagnostic,
  DiagnosticSeverity,
  ParsedDocument,
  ParserOptions,
  SourceSpan,
  SpecialForm,
} from "@blatte/compiler";

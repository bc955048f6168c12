export * from "./diagnostics/index.js";
export * from "./parser/ast/index.js";
export { CharStream, type StreamPosition } from "./parser/char-stream.js";
export { LexError, ParseError } from "./parser/errors.js";
export { Lexer } from "./parser/lexer.js";
export {
  Parser,
  getDefaultParser,
  type ParsedDocument,
  type ParserOptions,
} from "./parser/parser.js";
export { Reader, type ReadContext } from "./parser/reader.js";
export * from "./parser/special-forms/index.js";
export { Token, type TokenKind } from "./parser/token.js";
export {
  compileExpression,
  generate,
  type CompileExprOpts,
  type GenerateOptions,
} from "./codegen/codegen.js";
export { CodeGenError } from "./codegen/diagnostics.js";
export { Scope } from "./codegen/scope.js";
export { SourceBuffer } from "./source-buffer.js";
export * from "./compiler.js";

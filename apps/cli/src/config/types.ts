export type BlatteCliConfig = {
  /** Blatte document to read. Standard input when absent. */
  file?: string;
  /** Print the parsed forms as JSON instead of rendering */
  emitAst: boolean;
  /** Print the generated JavaScript, one form per line */
  emitJs: boolean;
  /** Colorize diagnostics */
  color: boolean;
};

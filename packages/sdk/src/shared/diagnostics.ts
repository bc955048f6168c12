import { DiagnosticError, type Diagnostic } from "@blatte/compiler";

/**
 * Diagnostics carried by a compiler error. Anything else is not a problem
 * with the source and is rethrown.
 */
export const diagnosticsFromError = (error: unknown): Diagnostic[] => {
  if (error instanceof DiagnosticError) return [...error.diagnostics];
  throw error;
};

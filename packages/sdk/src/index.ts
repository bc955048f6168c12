import { compileDocument } from "@blatte/compiler";
import { renderCompiled, renderDocument } from "./document.js";
import { diagnosticsFromError } from "./shared/diagnostics.js";
import type {
  BlatteSdk,
  CompileOptions,
  CompileResult,
} from "./shared/types.js";

export const createSdk = (): BlatteSdk => ({
  compile: compileSdk,
  render: renderDocument,
});

/** Like compileDocument, with compiler errors reported as diagnostics */
const compileSdk = (
  source: string,
  opts: CompileOptions = {}
): CompileResult => {
  try {
    const document = compileDocument(source, opts);
    return {
      success: true,
      ...document,
      render: (renderOpts) => renderCompiled(document, renderOpts),
    };
  } catch (error) {
    return { success: false, diagnostics: diagnosticsFromError(error) };
  }
};

export { evaluateExpression, renderCompiled, renderDocument } from "./document.js";
export { diagnosticsFromError } from "./shared/diagnostics.js";
export type {
  BlatteSdk,
  CompileFailureResult,
  CompileOptions,
  CompileResult,
  CompileSuccessResult,
  RenderOptions,
} from "./shared/types.js";
export * from "./compiler.js";
export * from "./js-host.js";

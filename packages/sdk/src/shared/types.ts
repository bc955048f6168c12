import type {
  CompiledDocument,
  Diagnostic,
  Parser,
} from "@blatte/compiler";
import type { BlatteHost, HostOptions } from "@blatte/js-host";

export type { Diagnostic };

export type CompileOptions = {
  filePath?: string;
  parser?: Parser;
};

export type RenderOptions = CompileOptions & {
  /** Host to evaluate in. A fresh one is created from `globals` otherwise. */
  host?: BlatteHost;
  globals?: HostOptions["globals"];
};

export type CompileSuccessResult = CompiledDocument & {
  success: true;
  /** Evaluates the compiled forms and returns the rendered text */
  render: (opts?: Pick<RenderOptions, "host" | "globals">) => string;
};

export type CompileFailureResult = {
  success: false;
  diagnostics: Diagnostic[];
};

export type CompileResult = CompileSuccessResult | CompileFailureResult;

export type BlatteSdk = {
  compile: (source: string, opts?: CompileOptions) => CompileResult;
  render: (source: string, opts?: RenderOptions) => string;
};

import { runtime, type BlatteRuntime } from "./runtime.js";
import { isValue, type Value } from "./values.js";

export type HostOptions = {
  /** Initial global variables */
  globals?: Iterable<readonly [string, Value]> | Record<string, Value>;
  /** Source URL of generated code in stack traces */
  filePath?: string;
};

export type BlatteHost = {
  /** Global variables, read and written by generated code as `__env` */
  env: Map<string, Value>;
  runtime: BlatteRuntime;
  /** Runs one generated JavaScript expression */
  evaluate: (code: string) => Value;
};

export class HostEvaluationError extends Error {
  readonly result: unknown;

  constructor(result: unknown) {
    super(`generated code produced ${describe(result)}, not a Blatte value`);
    this.name = "HostEvaluationError";
    this.result = result;
  }
}

const describe = (value: unknown): string => {
  if (typeof value === "function") return "an unbranded function";
  if (typeof value === "object" && value !== null) {
    // Object.create(null) has no constructor
    const constructor: unknown = Reflect.get(value, "constructor");
    return typeof constructor === "function" && constructor.name
      ? `an instance of ${constructor.name}`
      : "an object without a prototype";
  }
  return `a ${typeof value}`;
};

const isIterable = (
  globals: NonNullable<HostOptions["globals"]>
): globals is Iterable<readonly [string, Value]> =>
  Symbol.iterator in globals;

const globalEntries = (
  globals: HostOptions["globals"]
): Iterable<readonly [string, Value]> => {
  if (!globals) return [];
  return isIterable(globals) ? globals : Object.entries(globals);
};

export const createBlatteHost = (options: HostOptions = {}): BlatteHost => {
  const env = new Map<string, Value>(globalEntries(options.globals));
  const sourceURL = options.filePath ?? "blatte-generated.js";

  const evaluate = (code: string): Value => {
    const run = new Function(
      "__rt",
      "__env",
      `"use strict";\nreturn (${code});\n//# sourceURL=${sourceURL}`
    );
    const result: unknown = run(runtime, env);
    if (!isValue(result)) throw new HostEvaluationError(result);
    return result;
  };

  return { env, runtime, evaluate };
};

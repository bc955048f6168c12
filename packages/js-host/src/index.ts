export { createBlatteHost, HostEvaluationError } from "./host.js";
export type { BlatteHost, HostOptions } from "./host.js";
export {
  arity,
  ArityError,
  group,
  named,
  namedArg,
  runtime,
} from "./runtime.js";
export type { BlatteRuntime, GroupItem } from "./runtime.js";
export * from "./tree.js";
export {
  CALLABLE,
  defineFunction,
  isCallable,
  isList,
  isValue,
  NamedArgument,
  WsWrapper,
} from "./values.js";
export type { Atom, BlatteFunction, NamedArgs, Value } from "./values.js";

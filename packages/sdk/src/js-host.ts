export {
  ArityError,
  createBlatteHost,
  defineFunction,
  flatten,
  HostEvaluationError,
  isTrue,
  quote,
  traverse,
  unwrapws,
  wrapws,
  wsof,
} from "@blatte/js-host";
export type {
  Atom,
  BlatteFunction,
  BlatteHost,
  HostOptions,
  NamedArgs,
  TraverseCallback,
  TraverseResult,
  Value,
} from "@blatte/js-host";

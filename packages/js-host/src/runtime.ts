import { isTrue, unwrapws, wrapws } from "./tree.js";
import {
  defineFunction,
  isCallable,
  NamedArgument,
  type BlatteFunction,
  type NamedArgs,
  type Value,
} from "./values.js";

export class ArityError extends Error {
  readonly expected: number;
  readonly received: number;
  readonly rest: boolean;

  constructor(opts: { expected: number; received: number; rest: boolean }) {
    const expected = `${opts.expected}${opts.rest ? " or more" : ""}`;
    super(`expected ${expected} arguments, received ${opts.received}`);
    this.name = "ArityError";
    this.expected = opts.expected;
    this.received = opts.received;
    this.rest = opts.rest;
  }
}

export type GroupItem = Value | NamedArgument;

/**
 * A call when the unwrapped first item is callable, a list otherwise. Named
 * items become the named argument record of a call and keep their own
 * whitespace in a list.
 */
export const group = (items: readonly GroupItem[]): Value => {
  const [head, ...rest] = items;
  const callee =
    items.length > 0 && !(head instanceof NamedArgument)
      ? unwrapws(head)
      : undefined;

  if (!isCallable(callee)) {
    return items.map((item) =>
      item instanceof NamedArgument ? wrapws(item.ws, item.value) : item
    );
  }

  const named: Record<string, Value> = {};
  const args: Value[] = [];
  for (const item of rest) {
    if (item instanceof NamedArgument) {
      named[item.name] = item.value;
    } else {
      args.push(item);
    }
  }
  return callee(named, ...args);
};

export const named = (ws: string, name: string, value: Value) =>
  new NamedArgument(ws, name, value);

/** Value of a named parameter, undefined when the caller left it out */
export const namedArg = (args: NamedArgs, name: string): Value =>
  Object.hasOwn(args, name) ? args[name] : undefined;

export const arity = (args: readonly Value[], count: number, rest: boolean) => {
  if (args.length < count || (!rest && args.length > count)) {
    throw new ArityError({ expected: count, received: args.length, rest });
  }
};

export type BlatteRuntime = {
  readonly wrapws: typeof wrapws;
  readonly isTrue: typeof isTrue;
  readonly group: typeof group;
  readonly named: typeof named;
  readonly namedArg: typeof namedArg;
  readonly arity: typeof arity;
  readonly lambda: (
    fn: (named: NamedArgs, ...args: Value[]) => Value
  ) => BlatteFunction;
};

/** The `__rt` object generated code calls into */
export const runtime: BlatteRuntime = Object.freeze({
  wrapws,
  isTrue,
  group,
  named,
  namedArg,
  arity,
  lambda: defineFunction,
});

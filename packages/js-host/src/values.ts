/** Brand carried by every function Blatte code may call */
export const CALLABLE: unique symbol = Symbol("blatte.callable");

export type NamedArgs = Readonly<Record<string, Value>>;

export type BlatteFunction = ((named: NamedArgs, ...args: Value[]) => Value) & {
  readonly [CALLABLE]: true;
};

export type Atom = string | number | boolean | null | undefined | BlatteFunction;

export type Value = Atom | WsWrapper | readonly Value[];

/** A value paired with the whitespace that preceded it */
export class WsWrapper {
  readonly ws: string;
  readonly obj: Value;

  constructor(ws: string, obj: Value) {
    this.ws = ws;
    this.obj = obj;
  }
}

/** A `\name=value` group item on its way into a call or a list */
export class NamedArgument {
  readonly ws: string;
  readonly name: string;
  readonly value: Value;

  constructor(ws: string, name: string, value: Value) {
    this.ws = ws;
    this.name = name;
    this.value = value;
  }
}

/** Brands `fn` so groups headed by it are calls instead of lists */
export const defineFunction = (
  fn: (named: NamedArgs, ...args: Value[]) => Value
): BlatteFunction => Object.assign(fn, { [CALLABLE]: true as const });

export const isCallable = (value: unknown): value is BlatteFunction =>
  typeof value === "function" && CALLABLE in value && value[CALLABLE] === true;

export const isList = (value: Value): value is readonly Value[] =>
  Array.isArray(value);

export const isValue = (value: unknown): value is Value => {
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
    case "undefined":
      return true;
    case "function":
      return isCallable(value);
    case "object":
      return (
        value === null ||
        (value instanceof WsWrapper && isValue(value.obj)) ||
        (Array.isArray(value) && value.every(isValue))
      );
    default:
      return false;
  }
};

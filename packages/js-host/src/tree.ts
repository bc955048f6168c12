import { isCallable, isList, WsWrapper, type Atom, type Value } from "./values.js";

export const wrapws = (ws: string, obj: Value): WsWrapper =>
  new WsWrapper(ws, obj);

/** Strips every wrapper around `obj` */
export const unwrapws = (obj: Value): Value =>
  obj instanceof WsWrapper ? unwrapws(obj.obj) : obj;

/** Whitespace of the outermost wrapper, or "" */
export const wsof = (obj: Value): string =>
  obj instanceof WsWrapper ? obj.ws : "";

/**
 * Blatte truth: the empty list is false, as are `0`, `"0"`, `""`, `false`,
 * `null` and `undefined`. Everything else is true.
 */
export const isTrue = (obj: Value): boolean => {
  const value = unwrapws(obj);
  if (isList(value)) return value.length > 0;
  if (isCallable(value)) return true;
  return !(
    value === undefined ||
    value === null ||
    value === false ||
    value === 0 ||
    value === "" ||
    value === "0"
  );
};

export { isTrue as true };

/** Blatte source text that reads back as the word or string `str` */
export const quote = (str: string): string => {
  if (str === "") return '\\"\\"';
  if (/\s/.test(str)) return `\\"${str.replace(/\\/g, "\\\\")}\\"`;
  return str.replace(/[\\{}]/g, "\\$&");
};

export type TraverseResult<R> = {
  /** Whether the callback used the whitespace it was given */
  consumed: boolean;
  value?: R;
};

export type TraverseCallback<R> = (
  ws: string | undefined,
  atom: Atom
) => TraverseResult<R>;

/**
 * Depth first walk over the atoms of `obj`. `ws` overrides the whitespace of
 * the atoms it reaches until one of them consumes it; from then on every
 * atom gets the whitespace of its nearest wrapper.
 */
export const traverse = <R>(
  obj: Value,
  callback: TraverseCallback<R>,
  ws?: string
): TraverseResult<R> => {
  if (obj instanceof WsWrapper) {
    return traverse(obj.obj, callback, ws ?? obj.ws);
  }

  if (isList(obj)) {
    if (obj.length === 0) return { consumed: false };

    let result = traverse(obj[0], callback, ws);
    for (const item of obj.slice(1)) {
      const next = traverse(item, callback, result.consumed ? undefined : ws);
      if (!result.consumed) result = next;
    }
    return result;
  }

  return callback(ws, obj);
};

export const atomText = (atom: Atom): string => {
  if (atom === undefined || atom === null) return "";
  if (isCallable(atom)) return "#<function>";
  return String(atom);
};

/** Renders `obj` as text, each atom preceded by its whitespace */
export const flatten = (obj: Value, ws?: string): string => {
  let text = "";
  traverse(
    obj,
    (atomWs, atom) => {
      if (atomWs !== undefined) text += atomWs;
      text += atomText(atom);
      return { consumed: true };
    },
    ws
  );
  return text;
};

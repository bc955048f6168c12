import { Parameter, type ParameterKind } from "../ast/index.js";
import { parseError } from "../errors.js";
import type { Reader } from "../reader.js";
import type { Token } from "../token.js";

export const misplacedForm = (token: Token) =>
  parseError({
    code: "PS0005",
    params: { kind: "special-form", name: token.value },
    location: token.location,
  });

const parameterKinds: Partial<Record<Token["kind"], ParameterKind>> = {
  variable: "positional",
  "named-parameter": "named",
  "rest-parameter": "rest",
};

/**
 * Reads `PARAM... }`, the rest of a parameter list whose `{` (and, for
 * `define`, the function name) was already consumed.
 */
export const readParameters = (reader: Reader, open: Token): Parameter[] => {
  const parameters: Parameter[] = [];
  const names = new Set<string>();
  let rest: Parameter | undefined;

  while (true) {
    const token = reader.nextSignificant(open);
    if (token.kind === "close") return parameters;

    const kind = parameterKinds[token.kind];
    if (!kind) {
      throw parseError({
        code: "PS0003",
        params: { kind: "invalid-parameter" },
        location: token.location,
      });
    }

    if (reader.isSpecialForm(token.value)) throw misplacedForm(token);

    if (rest) {
      throw parseError({
        code: "PS0003",
        params:
          kind === "rest"
            ? { kind: "duplicate-rest", name: token.value }
            : { kind: "rest-not-last", name: rest.name },
        location: token.location,
      });
    }

    if (names.has(token.value)) {
      throw parseError({
        code: "PS0003",
        params: { kind: "duplicate-parameter", name: token.value },
        location: token.location,
      });
    }

    const parameter = new Parameter({
      kind,
      name: token.value,
      location: token.location,
    });
    names.add(parameter.name);
    parameters.push(parameter);
    if (kind === "rest") rest = parameter;
  }
};

/** Reads `{PARAM...}` */
export const readParameterList = (
  reader: Reader,
  open: Token,
  form: string
): Parameter[] => {
  const list = reader.nextSignificant(open);
  if (list.kind !== "open") {
    throw parseError({
      code: "PS0002",
      params: { kind: "malformed-form", form, reason: "expected {PARAM...}" },
      location: list.location,
    });
  }
  return readParameters(reader, list);
};

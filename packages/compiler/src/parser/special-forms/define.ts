import { DefineFunction, DefineVariable, Lambda } from "../ast/index.js";
import { parseError } from "../errors.js";
import { misplacedForm, readParameters } from "./parameters.js";
import type { SpecialForm } from "./types.js";

/**
 * `{\define \VAR EXPR}` or `{\define {\NAME PARAM...} EXPR...}`
 */
export const defineForm: SpecialForm = {
  name: "define",
  read: (reader, { open }) => {
    const target = reader.nextSignificant(open);

    if (target.kind === "variable") {
      if (reader.isSpecialForm(target.value)) throw misplacedForm(target);
      const value = reader.readRequiredOperand(open, "define", "value");
      reader.finishForm(open, "define");
      return new DefineVariable({ name: target.value, value });
    }

    if (target.kind === "open") {
      const name = reader.nextSignificant(target);
      if (name.kind !== "variable") {
        throw parseError({
          code: "PS0002",
          params: {
            kind: "malformed-form",
            form: "define",
            reason: "expected a function name",
          },
          location: name.location,
        });
      }

      if (reader.isSpecialForm(name.value)) throw misplacedForm(name);

      const parameters = readParameters(reader, target);
      const body = reader.readOperands(open);
      const lambda = new Lambda({ parameters, body, location: target.location });
      return new DefineFunction({ name: name.value, lambda });
    }

    throw parseError({
      code: "PS0002",
      params: {
        kind: "malformed-form",
        form: "define",
        reason: "expected \\VAR or {\\NAME PARAM...}",
      },
      location: target.location,
    });
  },
};

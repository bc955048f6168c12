import { SetBang } from "../ast/index.js";
import { parseError } from "../errors.js";
import { misplacedForm } from "./parameters.js";
import type { SpecialForm } from "./types.js";

export const setForm: SpecialForm = {
  name: "set!",
  read: (reader, { open }) => {
    const target = reader.nextSignificant(open);
    if (target.kind !== "variable") {
      throw parseError({
        code: "PS0002",
        params: {
          kind: "malformed-form",
          form: "set!",
          reason: "target must be a variable",
        },
        location: target.location,
      });
    }

    if (reader.isSpecialForm(target.value)) throw misplacedForm(target);

    const value = reader.readRequiredOperand(open, "set!", "value");
    reader.finishForm(open, "set!");
    return new SetBang({ name: target.value, value });
  },
};

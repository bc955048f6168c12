import { Lambda } from "../ast/index.js";
import { readParameterList } from "./parameters.js";
import type { SpecialForm } from "./types.js";

export const lambdaForm: SpecialForm = {
  name: "lambda",
  read: (reader, { open }) => {
    const parameters = readParameterList(reader, open, "lambda");
    const body = reader.readOperands(open);
    return new Lambda({ parameters, body });
  },
};

import { If } from "../ast/index.js";
import type { SpecialForm } from "./types.js";

export const ifForm: SpecialForm = {
  name: "if",
  read: (reader, { open }) => {
    const test = reader.readRequiredOperand(open, "if", "test");
    const consequent = reader.readRequiredOperand(open, "if", "then branch");
    const alternatives = reader.readOperands(open);
    return new If({ test, consequent, alternatives });
  },
};

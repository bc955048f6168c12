import { While } from "../ast/index.js";
import type { SpecialForm } from "./types.js";

export const whileForm: SpecialForm = {
  name: "while",
  read: (reader, { open }) => {
    const test = reader.readRequiredOperand(open, "while", "test");
    const body = reader.readOperands(open);
    return new While({ test, body });
  },
};

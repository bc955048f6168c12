import { Logical } from "../ast/index.js";
import type { SpecialForm } from "./types.js";

const logicalForm = (operator: "and" | "or"): SpecialForm => ({
  name: operator,
  read: (reader, { open }) => {
    const first = reader.readRequiredOperand(open, operator, "expression");
    const exprs = [first, ...reader.readOperands(open)];
    return new Logical({ operator, exprs });
  },
});

export const andForm = logicalForm("and");
export const orForm = logicalForm("or");

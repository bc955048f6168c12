import { Cond, type CondClause } from "../ast/index.js";
import { parseError } from "../errors.js";
import type { SpecialForm } from "./types.js";

/** `{\cond {TEST THEN...} ...}`. Clause groups are read directly, never called. */
export const condForm: SpecialForm = {
  name: "cond",
  read: (reader, { open }) => {
    const clauses: CondClause[] = [];

    while (true) {
      const token = reader.nextSignificant(open);
      if (token.kind === "close") break;

      if (token.kind !== "open") {
        throw parseError({
          code: "PS0002",
          params: {
            kind: "malformed-form",
            form: "cond",
            reason: "each clause must be a group",
          },
          location: token.location,
        });
      }

      const test = reader.readRequiredOperand(token, "cond", "clause test");
      const body = reader.readOperands(token);
      clauses.push({ test, body });
    }

    return new Cond({ clauses });
  },
};

import { Let, type Binding, type LetKind } from "../ast/index.js";
import { parseError } from "../errors.js";
import type { Reader } from "../reader.js";
import type { Token } from "../token.js";
import { misplacedForm } from "./parameters.js";
import type { SpecialForm } from "./types.js";

const malformedBinding = (form: LetKind, token: Token) =>
  parseError({
    code: "PS0004",
    params: { kind: "malformed-binding", form },
    location: token.location,
  });

const readBinding = (reader: Reader, pair: Token, form: LetKind): Binding => {
  const name = reader.nextSignificant(pair);
  if (name.kind !== "variable") throw malformedBinding(form, name);
  if (reader.isSpecialForm(name.value)) throw misplacedForm(name);

  const value = reader.readOperand(pair);
  if (!value) throw malformedBinding(form, pair);

  const close = reader.nextSignificant(pair);
  if (close.kind !== "close") throw malformedBinding(form, close);

  return { name: name.value, value, location: name.location };
};

const readBindings = (reader: Reader, open: Token, form: LetKind) => {
  const list = reader.nextSignificant(open);
  if (list.kind !== "open") {
    throw parseError({
      code: "PS0002",
      params: {
        kind: "malformed-form",
        form,
        reason: "expected {{\\VAR VAL}...}",
      },
      location: list.location,
    });
  }

  const bindings: Binding[] = [];
  const names = new Set<string>();
  while (true) {
    const pair = reader.nextSignificant(list);
    if (pair.kind === "close") return bindings;
    if (pair.kind !== "open") throw malformedBinding(form, pair);

    const binding = readBinding(reader, pair, form);
    // let* rebinds sequentially, so repeating a name is meaningful there
    if (form !== "let*" && names.has(binding.name)) {
      throw parseError({
        code: "PS0004",
        params: { kind: "duplicate-binding", form, name: binding.name },
        location: binding.location ?? pair.location,
      });
    }

    names.add(binding.name);
    bindings.push(binding);
  }
};

const letForm = (kind: LetKind): SpecialForm => ({
  name: kind,
  read: (reader, { open }) => {
    const bindings = readBindings(reader, open, kind);
    const body = reader.readOperands(open);
    return new Let({ kind, bindings, body });
  },
});

export const letPlainForm = letForm("let");
export const letStarForm = letForm("let*");
export const letRecForm = letForm("letrec");

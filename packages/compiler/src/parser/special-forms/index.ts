import { condForm } from "./cond.js";
import { defineForm } from "./define.js";
import { ifForm } from "./if.js";
import { lambdaForm } from "./lambda.js";
import { letPlainForm, letRecForm, letStarForm } from "./let.js";
import { andForm, orForm } from "./logical.js";
import { setForm } from "./set.js";
import type { SpecialForm } from "./types.js";
import { whileForm } from "./while.js";

export type { SpecialForm, SpecialFormContext } from "./types.js";
export { readParameterList, readParameters } from "./parameters.js";

export const defaultSpecialForms: readonly SpecialForm[] = [
  defineForm,
  setForm,
  ifForm,
  andForm,
  orForm,
  condForm,
  whileForm,
  lambdaForm,
  letPlainForm,
  letStarForm,
  letRecForm,
];

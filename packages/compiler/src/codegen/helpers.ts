/** JavaScript string literal for `text` */
export const str = (text: string) => JSON.stringify(text);

/** JavaScript identifier of a lexically bound Blatte variable */
export const local = (name: string) => `$${name}`;

/** `E1; E2; return En;`, or `return [];` without statements */
export const functionBody = (statements: readonly string[]): string => {
  if (statements.length === 0) return "return [];";
  const last = statements.length - 1;
  return statements
    .map((statement, index) =>
      index === last ? `return ${statement};` : `${statement};`
    )
    .join(" ");
};

/** `{ S1; S2; }`, or `{}` without statements */
export const block = (statements: readonly string[]): string =>
  statements.length === 0
    ? "{}"
    : `{ ${statements.map((statement) => `${statement};`).join(" ")} }`;

/** Immediately invoked arrow function */
export const iife = (body: string) => `(() => { ${body} })()`;

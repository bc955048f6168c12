export const stringifyOutput = (value: unknown): string =>
  JSON.stringify(value, undefined, 2);

export const printJson = (value: unknown): void => {
  console.log(stringifyOutput(value));
};

export const printLines = (lines: readonly string[]): void => {
  for (const line of lines) console.log(line);
};

/** Rendered documents carry their own trailing whitespace */
export const printRendered = (text: string): void => {
  process.stdout.write(text);
};

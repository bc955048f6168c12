export const isWhitespace = (char?: string) =>
  char === " " ||
  char === "\t" ||
  char === "\n" ||
  char === "\r" ||
  char === "\f" ||
  char === "\v";

export const isMetaChar = (char?: string) =>
  char === "\\" || char === "{" || char === "}";

/** Characters that end a word */
export const isTerminator = (char?: string) =>
  char === undefined || isWhitespace(char) || isMetaChar(char);

export const isIdentifierStart = (char?: string) =>
  char !== undefined && /^[A-Za-z]$/.test(char);

export const isIdentifierChar = (char?: string) =>
  char !== undefined && /^[A-Za-z0-9_]$/.test(char);

/** Identifiers that keep a trailing punctuation character */
export const suffixedIdentifiers: ReadonlySet<string> = new Set([
  "set!",
  "let*",
]);

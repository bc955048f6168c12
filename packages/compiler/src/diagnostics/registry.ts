import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const escapeHint: DiagnosticHint = {
  message: "Write \\\\, \\{ or \\} for a literal metacharacter.",
};

const stringHint: DiagnosticHint = {
  message: 'Close the string with \\".',
};

type DiagnosticParamsMap = {
  LX0001: { kind: "unterminated-string" };
  LX0002: { kind: "trailing-backslash" };
  LX0003: { kind: "invalid-escape"; char: string };
  PS0001: { kind: "unclosed-group" } | { kind: "unexpected-close" };
  PS0002: { kind: "malformed-form"; form: string; reason: string };
  PS0003:
    | { kind: "duplicate-rest"; name: string }
    | { kind: "rest-not-last"; name: string }
    | { kind: "duplicate-parameter"; name: string }
    | { kind: "invalid-parameter" };
  PS0004:
    | { kind: "malformed-binding"; form: string }
    | { kind: "duplicate-binding"; form: string; name: string };
  PS0005:
    | { kind: "named-argument"; name: string }
    | { kind: "parameter"; name: string }
    | { kind: "special-form"; name: string };
  CG0001: { kind: "codegen-error"; message: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> =
  DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  LX0001: {
    code: "LX0001",
    message: () => "unterminated string",
    severity: "error",
    phase: "lexing",
    hints: [stringHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0001"]>,
  LX0002: {
    code: "LX0002",
    message: () => "backslash at end of input",
    severity: "error",
    phase: "lexing",
    hints: [escapeHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0002"]>,
  LX0003: {
    code: "LX0003",
    message: (params) => `invalid escape \\${params.char}`,
    severity: "error",
    phase: "lexing",
    hints: [
      escapeHint,
      { message: "Variable names must begin with a letter." },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0003"]>,
  PS0001: {
    code: "PS0001",
    message: (params) =>
      params.kind === "unclosed-group"
        ? "unmatched {: group is never closed"
        : "unmatched }: no group to close",
    severity: "error",
    phase: "parsing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0001"]>,
  PS0002: {
    code: "PS0002",
    message: (params) => `malformed ${params.form}: ${params.reason}`,
    severity: "error",
    phase: "parsing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0002"]>,
  PS0003: {
    code: "PS0003",
    message: (params) => {
      switch (params.kind) {
        case "duplicate-rest":
          return `more than one rest parameter (\\&${params.name})`;
        case "rest-not-last":
          return `rest parameter \\&${params.name} must be last`;
        case "duplicate-parameter":
          return `duplicate parameter ${params.name}`;
        case "invalid-parameter":
          return "expected \\VAR, \\=VAR or \\&VAR in parameter list";
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "parsing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0003"]>,
  PS0004: {
    code: "PS0004",
    message: (params) =>
      params.kind === "malformed-binding"
        ? `malformed ${params.form} binding: expected {\\VAR VAL}`
        : `duplicate ${params.form} binding ${params.name}`,
    severity: "error",
    phase: "parsing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0004"]>,
  PS0005: {
    code: "PS0005",
    message: (params) => {
      switch (params.kind) {
        case "named-argument":
          return `named argument \\${params.name}= is only allowed inside a group`;
        case "parameter":
          return `parameter ${params.name} is only allowed inside a parameter list`;
        case "special-form":
          return `\\${params.name} is only allowed at the head of a group`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "parsing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0005"]>,
  CG0001: {
    code: "CG0001",
    message: (params) => params.message,
    severity: "error",
    phase: "codegen",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CG0001"]>,
};

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(
  code: K,
): DiagnosticDefinition<DiagnosticParams<K>> => diagnosticsRegistry[code];

const isDiagnosticCode = (code: string): code is DiagnosticCode =>
  Object.hasOwn(diagnosticsRegistry, code);

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);

const exhaustive = (_value: never): never => _value;

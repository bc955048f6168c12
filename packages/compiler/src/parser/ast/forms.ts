import type { Parameter } from "./parameter.js";
import { SourceLocation, Syntax } from "./syntax.js";
import type { Wrapped } from "./wrapped.js";

type FormOpts = { location?: SourceLocation };

const body = (exprs: readonly Wrapped[]) => exprs.map((expr) => expr.toJSON());

/** `{\define \name EXPR}` */
export class DefineVariable extends Syntax {
  readonly syntaxType = "define-variable";
  readonly name: string;
  readonly value: Wrapped;

  constructor(opts: FormOpts & { name: string; value: Wrapped }) {
    super(opts);
    this.name = opts.name;
    this.value = opts.value;
  }

  toJSON(): unknown {
    return { define: this.name, value: this.value.toJSON() };
  }
}

/** `{\define {\name PARAM...} EXPR...}`, shorthand for a define of a lambda */
export class DefineFunction extends Syntax {
  readonly syntaxType = "define-function";
  readonly name: string;
  readonly lambda: Lambda;

  constructor(opts: FormOpts & { name: string; lambda: Lambda }) {
    super(opts);
    this.name = opts.name;
    this.lambda = opts.lambda;
  }

  toJSON(): unknown {
    return { define: this.name, lambda: this.lambda.toJSON() };
  }
}

/** `{\set! \name EXPR}` */
export class SetBang extends Syntax {
  readonly syntaxType = "set!";
  readonly name: string;
  readonly value: Wrapped;

  constructor(opts: FormOpts & { name: string; value: Wrapped }) {
    super(opts);
    this.name = opts.name;
    this.value = opts.value;
  }

  toJSON(): unknown {
    return { set: this.name, value: this.value.toJSON() };
  }
}

/** `{\if TEST THEN ELSE...}` */
export class If extends Syntax {
  readonly syntaxType = "if";
  readonly test: Wrapped;
  readonly consequent: Wrapped;
  readonly alternatives: readonly Wrapped[];

  constructor(
    opts: FormOpts & {
      test: Wrapped;
      consequent: Wrapped;
      alternatives: readonly Wrapped[];
    }
  ) {
    super(opts);
    this.test = opts.test;
    this.consequent = opts.consequent;
    this.alternatives = opts.alternatives;
  }

  toJSON(): unknown {
    return {
      if: this.test.toJSON(),
      then: this.consequent.toJSON(),
      else: body(this.alternatives),
    };
  }
}

/** `{\and EXPR...}` and `{\or EXPR...}` */
export class Logical extends Syntax {
  readonly syntaxType = "logical";
  readonly operator: "and" | "or";
  readonly exprs: readonly Wrapped[];

  constructor(
    opts: FormOpts & { operator: "and" | "or"; exprs: readonly Wrapped[] }
  ) {
    super(opts);
    this.operator = opts.operator;
    this.exprs = opts.exprs;
  }

  toJSON(): unknown {
    return { [this.operator]: body(this.exprs) };
  }
}

export type CondClause = {
  test: Wrapped;
  body: readonly Wrapped[];
};

/** `{\cond {TEST THEN...} ...}` */
export class Cond extends Syntax {
  readonly syntaxType = "cond";
  readonly clauses: readonly CondClause[];

  constructor(opts: FormOpts & { clauses: readonly CondClause[] }) {
    super(opts);
    this.clauses = opts.clauses;
  }

  toJSON(): unknown {
    return {
      cond: this.clauses.map((clause) => ({
        test: clause.test.toJSON(),
        body: body(clause.body),
      })),
    };
  }
}

/** `{\while TEST EXPR...}` */
export class While extends Syntax {
  readonly syntaxType = "while";
  readonly test: Wrapped;
  readonly body: readonly Wrapped[];

  constructor(opts: FormOpts & { test: Wrapped; body: readonly Wrapped[] }) {
    super(opts);
    this.test = opts.test;
    this.body = opts.body;
  }

  toJSON(): unknown {
    return { while: this.test.toJSON(), body: body(this.body) };
  }
}

/** `{\lambda {PARAM...} EXPR...}` */
export class Lambda extends Syntax {
  readonly syntaxType = "lambda";
  readonly parameters: readonly Parameter[];
  readonly body: readonly Wrapped[];

  constructor(
    opts: FormOpts & {
      parameters: readonly Parameter[];
      body: readonly Wrapped[];
    }
  ) {
    super(opts);
    this.parameters = opts.parameters;
    this.body = opts.body;
  }

  get positional() {
    return this.parameters.filter((p) => p.kind === "positional");
  }

  get named() {
    return this.parameters.filter((p) => p.kind === "named");
  }

  get rest() {
    return this.parameters.find((p) => p.kind === "rest");
  }

  toJSON(): unknown {
    return {
      lambda: this.parameters.map((p) => p.toJSON()),
      body: body(this.body),
    };
  }
}

export type LetKind = "let" | "let*" | "letrec";

export type Binding = {
  name: string;
  value: Wrapped;
  location?: SourceLocation;
};

/** `{\let {{\VAR VAL}...} EXPR...}` and its `let*` and `letrec` variants */
export class Let extends Syntax {
  readonly syntaxType = "let";
  readonly kind: LetKind;
  readonly bindings: readonly Binding[];
  readonly body: readonly Wrapped[];

  constructor(
    opts: FormOpts & {
      kind: LetKind;
      bindings: readonly Binding[];
      body: readonly Wrapped[];
    }
  ) {
    super(opts);
    this.kind = opts.kind;
    this.bindings = opts.bindings;
    this.body = opts.body;
  }

  toJSON(): unknown {
    return {
      [this.kind]: this.bindings.map((binding) => [
        binding.name,
        binding.value.toJSON(),
      ]),
      body: body(this.body),
    };
  }
}

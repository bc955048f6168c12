/** Base of every node the reader produces */
export abstract class Syntax {
  abstract readonly syntaxType: string;
  location?: SourceLocation;

  constructor(opts: { location?: SourceLocation } = {}) {
    this.location = opts.location;
  }

  abstract toJSON(): unknown;

  setLocation(location?: SourceLocation) {
    this.location = location;
    return this;
  }
}

export type SourceLocationJSON = {
  startIndex: number;
  endIndex: number;
  startLine: number;
  endLine: number;
  startColumn: number;
  endColumn: number;
  filePath: string;
};

/**
 * Span of source text. Indexes are absolute offsets into the input, lines
 * count from 1 and columns from 0.
 */
export class SourceLocation implements SourceLocationJSON {
  startIndex: number;
  endIndex: number;
  startLine: number;
  endLine: number;
  startColumn: number;
  endColumn: number;
  readonly filePath: string;

  constructor(span: SourceLocationJSON) {
    this.startIndex = span.startIndex;
    this.endIndex = span.endIndex;
    this.startLine = span.startLine;
    this.endLine = span.endLine;
    this.startColumn = span.startColumn;
    this.endColumn = span.endColumn;
    this.filePath = span.filePath;
  }

  /** Ends this span where `next` begins */
  setEndToStartOf(next: SourceLocation) {
    this.endIndex = next.startIndex;
    this.endLine = next.startLine;
    this.endColumn = next.startColumn;
  }

  toString() {
    return `${this.filePath}:${this.startLine}:${this.startColumn + 1}`;
  }

  toJSON(): SourceLocationJSON {
    const { startIndex, endIndex, startLine, endLine, startColumn, endColumn } =
      this;
    return {
      startIndex,
      endIndex,
      startLine,
      endLine,
      startColumn,
      endColumn,
      filePath: this.filePath,
    };
  }

  clone() {
    return new SourceLocation(this.toJSON());
  }
}

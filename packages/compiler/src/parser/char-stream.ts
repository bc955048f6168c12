import { SourceLocation } from "./ast/syntax.js";

export type StreamPosition = {
  /** Absolute character offset from the start of the original input */
  index: number;
  line: number;
  column: number;
};

export const startOfInput = (): StreamPosition => ({
  index: 0,
  line: 1,
  column: 0,
});

export class CharStream {
  readonly filePath: string;
  readonly contents: string;
  /** Position of `contents[0]` within the original input */
  readonly origin: StreamPosition;
  readonly location: StreamPosition;

  constructor(
    contents: string,
    filePath: string,
    origin: StreamPosition = startOfInput()
  ) {
    this.contents = contents;
    this.filePath = filePath;
    this.origin = { ...origin };
    this.location = { ...origin };
  }

  /** Characters consumed since the stream was created */
  get consumed() {
    return this.location.index - this.origin.index;
  }

  get hasCharacters() {
    return this.consumed < this.contents.length;
  }

  get next(): string | undefined {
    return this.at(0);
  }

  at(offset: number): string | undefined {
    return this.contents[this.consumed + offset];
  }

  currentSourceLocation() {
    return new SourceLocation({
      startIndex: this.location.index,
      endIndex: this.location.index,
      startLine: this.location.line,
      endLine: this.location.line,
      startColumn: this.location.column,
      endColumn: this.location.column,
      filePath: this.filePath,
    });
  }

  /** Returns the next character and removes it from the queue */
  consumeChar(): string {
    const char = this.next;
    if (char === undefined) {
      throw new Error("Out of characters");
    }

    this.location.index += 1;
    this.location.column += 1;
    if (char === "\n") {
      this.location.line += 1;
      this.location.column = 0;
    }

    return char;
  }

  mark(): StreamPosition {
    return { ...this.location };
  }

  reset(position: StreamPosition) {
    this.location.index = position.index;
    this.location.line = position.line;
    this.location.column = position.column;
  }

  /** Text not yet consumed */
  remaining(): string {
    return this.contents.slice(this.consumed);
  }
}

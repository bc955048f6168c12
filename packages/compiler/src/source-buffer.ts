import {
  CharStream,
  startOfInput,
  type StreamPosition,
} from "./parser/char-stream.js";

/**
 * Input that is consumed one expression at a time. Consumed text is removed
 * from the front of `text` while `origin` keeps later locations absolute.
 */
export class SourceBuffer {
  text: string;
  readonly filePath: string;
  origin: StreamPosition;

  constructor(text: string, filePath = "<input>") {
    this.text = text;
    this.filePath = filePath;
    this.origin = startOfInput();
  }

  get isEmpty() {
    return this.text.length === 0;
  }

  stream(): CharStream {
    return new CharStream(this.text, this.filePath, this.origin);
  }

  /** Drops everything `chars` consumed */
  commit(chars: CharStream) {
    this.text = chars.remaining();
    this.origin = chars.mark();
  }
}

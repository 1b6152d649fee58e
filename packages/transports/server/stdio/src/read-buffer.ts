/**
 * Splits a byte stream into newline-terminated records.
 *
 * Bytes are kept as Buffers until a terminator arrives, so a multi-byte
 * character split across chunks is decoded intact.
 */

const LINE_FEED = 0x0a;
const EMPTY = Buffer.alloc(0);

export type ReadBufferEvent = { readonly type: "record"; readonly record: string } | { readonly type: "overflow"; readonly size: number };

export class ReadBuffer {
  private buffer: Buffer = EMPTY;
  /** True while skipping the rest of an oversized line */
  private discarding = false;

  constructor(private readonly maxMessageSize: number) {}

  append(chunk: Buffer): void {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
  }

  /**
   * Returns the next complete record, an overflow event for a line longer than
   * the limit, or undefined when more input is needed. Blank lines are skipped.
   */
  next(): ReadBufferEvent | undefined {
    for (;;) {
      const index = this.buffer.indexOf(LINE_FEED);

      if (index === -1) {
        if (this.discarding) {
          this.buffer = EMPTY;
          return undefined;
        }
        if (this.buffer.length > this.maxMessageSize) {
          const size = this.buffer.length;
          this.buffer = EMPTY;
          this.discarding = true;
          return { type: "overflow", size };
        }
        return undefined;
      }

      const line = this.buffer.subarray(0, index);
      this.buffer = this.buffer.subarray(index + 1);

      if (this.discarding) {
        this.discarding = false;
        continue;
      }
      if (line.length > this.maxMessageSize) {
        return { type: "overflow", size: line.length };
      }

      const record = stripCarriageReturn(line.toString("utf8"));
      if (record.trim() === "") {
        continue;
      }
      return { type: "record", record };
    }
  }

  /**
   * Empties the buffer at end of input.
   *
   * @returns the unterminated trailing data, if any that is not blank.
   */
  flush(): string | undefined {
    const rest = this.buffer;
    const discarding = this.discarding;
    this.buffer = EMPTY;
    this.discarding = false;

    if (discarding) {
      return undefined;
    }
    const text = stripCarriageReturn(rest.toString("utf8"));
    return text.trim() === "" ? undefined : text;
  }

  clear(): void {
    this.buffer = EMPTY;
    this.discarding = false;
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

import { decodeOutput } from "./decodeOutput.js";

const CR = 0x0d;
const LF = 0x0a;

/**
 * Splits a byte stream into text lines. `\n`, `\r\n` and a lone `\r` (used by
 * progress bars to redraw a line) all end a line. Lines are split on bytes and
 * decoded whole, so a multi-byte character split between chunks stays intact.
 */
export class LineBuffer {
  private pending: Buffer = Buffer.alloc(0);
  private pendingCarriageReturn = false;

  push(chunk: Buffer | string): string[] {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    const lines: string[] = [];
    let start = 0;

    for (let i = 0; i < bytes.length; i += 1) {
      const byte = bytes[i];

      if (this.pendingCarriageReturn) {
        this.pendingCarriageReturn = false;
        if (byte === LF) {
          start = i + 1;
          continue;
        }
      }

      if (byte === CR || byte === LF) {
        lines.push(this.take(bytes.subarray(start, i)));
        start = i + 1;
        this.pendingCarriageReturn = byte === CR;
      }
    }

    this.pending = Buffer.concat([this.pending, bytes.subarray(start)]);
    return lines;
  }

  flush(): string[] {
    const rest = this.pending.length > 0 ? decodeOutput(this.pending) : "";
    this.pending = Buffer.alloc(0);
    this.pendingCarriageReturn = false;
    return rest ? [rest] : [];
  }

  private take(tail: Buffer): string {
    const line = decodeOutput(Buffer.concat([this.pending, tail]));
    this.pending = Buffer.alloc(0);
    return line;
  }
}

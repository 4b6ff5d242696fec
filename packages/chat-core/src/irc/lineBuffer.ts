import type { Logger } from "../types";

/** Tags (8191) plus the 512-byte message body. */
export const MAX_LINE_LENGTH = 8703;

export type LineBufferOptions = {
  maxLineLength?: number;
  logger?: Logger;
};

/**
 * Frames a chunked byte stream into protocol lines. UTF-8 sequences split
 * across chunks are reassembled; lines end at LF with an optional CR. Lines
 * longer than `maxLineLength` are dropped, including one still arriving.
 */
export class LineBuffer {
  private readonly decoder = new TextDecoder("utf-8");
  private readonly maxLineLength: number;
  private readonly logger?: Logger;
  private pending = "";
  // Inside an oversized line: skip up to the next LF.
  private discarding = false;

  constructor(options: LineBufferOptions = {}) {
    this.maxLineLength = options.maxLineLength ?? MAX_LINE_LENGTH;
    this.logger = options.logger;
  }

  push(chunk: Uint8Array): string[] {
    return this.take(this.decoder.decode(chunk, { stream: true }));
  }

  /** Flushes the decoder and returns whatever unterminated line remains. */
  end(): string[] {
    const lines = this.take(this.decoder.decode());
    const last = stripCr(this.pending);
    this.pending = "";
    this.discarding = false;
    if (last) lines.push(last);
    return lines;
  }

  private take(text: string): string[] {
    const pieces = `${this.pending}${text}`.split("\n");
    this.pending = pieces.pop() ?? "";

    const lines: string[] = [];
    for (const piece of pieces) {
      if (this.discarding) {
        this.discarding = false;
        continue;
      }
      const line = stripCr(piece);
      if (line.length > this.maxLineLength) {
        this.dropped();
      } else if (line) {
        lines.push(line);
      }
    }

    if (this.discarding) {
      this.pending = "";
    } else if (stripCr(this.pending).length > this.maxLineLength) {
      this.dropped();
      this.pending = "";
      this.discarding = true;
    }
    return lines;
  }

  private dropped() {
    this.logger?.(`Dropped a line longer than ${this.maxLineLength} characters.`);
  }
}

const stripCr = (line: string) => (line.endsWith("\r") ? line.slice(0, -1) : line);

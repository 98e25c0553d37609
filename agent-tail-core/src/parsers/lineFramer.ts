/**
 * Byte-level line framing for tailed files.
 *
 * Reads land on arbitrary byte boundaries, possibly in the middle of a
 * multi-byte UTF-8 sequence. The framer only decodes bytes up to the last
 * newline it has seen; anything after that stays buffered as raw bytes
 * until the rest of the line arrives.
 *
 * @module parsers/lineFramer
 */

const NEWLINE = 0x0a;

export class LineFramer {
  private pending: Buffer = Buffer.alloc(0);

  /** Bytes of the unterminated last line. */
  get pendingBytes(): number {
    return this.pending.length;
  }

  /**
   * Feeds a chunk and returns the complete lines it finishes.
   * Line terminators (`\n` or `\r\n`) are stripped; blank lines are kept
   * so callers can see exact framing.
   */
  push(chunk: Buffer): string[] {
    const combined = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    const lastNewline = combined.lastIndexOf(NEWLINE);

    if (lastNewline === -1) {
      // Copy so the caller may reuse its read buffer
      this.pending = Buffer.from(combined);
      return [];
    }

    const complete = combined.toString('utf-8', 0, lastNewline);
    this.pending = Buffer.from(combined.subarray(lastNewline + 1));

    return complete.split('\n').map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
  }

  /** Drops the buffered tail (after truncation or rotation). */
  reset(): void {
    this.pending = Buffer.alloc(0);
  }
}

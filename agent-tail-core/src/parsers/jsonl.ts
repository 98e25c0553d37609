/**
 * Byte-buffered JSONL parser: LineFramer + parseSessionRecord.
 *
 * One instance per tracked file. It owns that file's pending tail, so
 * chunks read from the file can be fed in as they arrive.
 *
 * @module parsers/jsonl
 */

import { RecordParseError } from '../errors';
import type { SessionRecord } from '../types/sessionRecord';
import { LineFramer } from './lineFramer';
import { parseSessionRecord } from './recordParser';
import type { RecordContext } from './recordParser';

export interface JsonlParserCallbacks {
  /** Called once per record, with the exact line it came from. */
  onRecord: (record: SessionRecord, line: string) => void;
  onError?: (error: RecordParseError) => void;
}

export class JsonlParser {
  private readonly framer = new LineFramer();
  private readonly onRecord: JsonlParserCallbacks['onRecord'];
  private readonly onError?: JsonlParserCallbacks['onError'];

  constructor(callbacks: JsonlParserCallbacks, private readonly context: RecordContext = {}) {
    this.onRecord = callbacks.onRecord;
    this.onError = callbacks.onError;
  }

  get pendingBytes(): number {
    return this.framer.pendingBytes;
  }

  processBytes(chunk: Buffer): void {
    for (const line of this.framer.push(chunk)) {
      this.parseLine(line);
    }
  }

  reset(): void {
    this.framer.reset();
  }

  private parseLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;

    let record: SessionRecord | null;
    try {
      record = parseSessionRecord(trimmed, this.context);
    } catch (error) {
      this.onError?.(error instanceof RecordParseError
        ? error
        : new RecordParseError(trimmed, error, this.context.sourceFile));
      return;
    }
    if (record) {
      this.onRecord(record, trimmed);
    }
  }
}

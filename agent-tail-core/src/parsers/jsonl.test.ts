import { describe, it, expect } from 'vitest';
import { JsonlParser } from './jsonl';
import type { SessionRecord } from '../types/sessionRecord';
import type { RecordParseError } from '../errors';

function makeParser(context = {}) {
  const records: SessionRecord[] = [];
  const lines: string[] = [];
  const errors: RecordParseError[] = [];
  const parser = new JsonlParser({
    onRecord: (record, line) => {
      records.push(record);
      lines.push(line);
    },
    onError: error => errors.push(error),
  }, context);
  return { parser, records, lines, errors };
}

describe('JsonlParser', () => {
  it('emits complete records and buffers the partial tail', () => {
    const { parser, records } = makeParser();
    parser.processBytes(Buffer.from(
      '{"type":"summary","summary":"one"}\n{"type":"summary","summary":"two"}\n{"type":"summ',
    ));
    expect(records.map(r => r.type === 'summary' && r.summary)).toEqual(['one', 'two']);

    parser.processBytes(Buffer.from('ary","summary":"three"}\n'));
    expect(records).toHaveLength(3);
    expect(parser.pendingBytes).toBe(0);
  });

  it('passes the trimmed source line alongside the record', () => {
    const { parser, lines } = makeParser();
    parser.processBytes(Buffer.from('  {"type":"summary","summary":"x"}  \n'));

    expect(lines).toEqual(['{"type":"summary","summary":"x"}']);
  });

  it('skips blank lines and unknown types silently', () => {
    const { parser, records, errors } = makeParser();
    parser.processBytes(Buffer.from('\n   \n{"type":"progress"}\n'));

    expect(records).toHaveLength(0);
    expect(errors).toHaveLength(0);
  });

  it('reports malformed lines and keeps going', () => {
    const { parser, records, errors } = makeParser({ sourceFile: '/logs/s.jsonl' });
    parser.processBytes(Buffer.from('not json\n{"type":"summary","summary":"ok"}\n'));

    expect(errors).toHaveLength(1);
    expect(errors[0].line).toBe('not json');
    expect(errors[0].filePath).toBe('/logs/s.jsonl');
    expect(records).toHaveLength(1);
  });

  it('reset drops the buffered tail', () => {
    const { parser, records, errors } = makeParser();
    parser.processBytes(Buffer.from('{"type":"summ'));
    parser.reset();
    parser.processBytes(Buffer.from('{"type":"summary","summary":"fresh"}\n'));

    expect(errors).toHaveLength(0);
    expect(records).toHaveLength(1);
  });
});

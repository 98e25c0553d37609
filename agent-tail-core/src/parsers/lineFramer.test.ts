import { describe, it, expect, beforeEach } from 'vitest';
import { LineFramer } from './lineFramer';

describe('LineFramer', () => {
  let framer: LineFramer;

  beforeEach(() => {
    framer = new LineFramer();
  });

  it('returns complete lines and holds back the unterminated tail', () => {
    const lines = framer.push(Buffer.from('{"a":1}\n{"b":2}\n{"c"'));

    expect(lines).toEqual(['{"a":1}', '{"b":2}']);
    expect(framer.pendingBytes).toBe(4);
  });

  it('completes the tail when the rest of the line arrives', () => {
    framer.push(Buffer.from('{"c"'));
    const lines = framer.push(Buffer.from(':3}\n'));

    expect(lines).toEqual(['{"c":3}']);
    expect(framer.pendingBytes).toBe(0);
  });

  it('keeps everything pending when no newline has arrived', () => {
    expect(framer.push(Buffer.from('partial'))).toEqual([]);
    expect(framer.push(Buffer.from(' still'))).toEqual([]);
    expect(framer.pendingBytes).toBe(13);
  });

  it('strips carriage returns from CRLF endings', () => {
    expect(framer.push(Buffer.from('one\r\ntwo\r\n'))).toEqual(['one', 'two']);
  });

  it('keeps blank lines', () => {
    expect(framer.push(Buffer.from('a\n\nb\n'))).toEqual(['a', '', 'b']);
  });

  it('does not split a multi-byte character across reads', () => {
    const bytes = Buffer.from('{"text":"héllo ✓"}\n', 'utf-8');
    // Cut inside the three-byte check mark
    const cut = bytes.indexOf(Buffer.from('✓', 'utf-8')) + 1;

    expect(framer.push(bytes.subarray(0, cut))).toEqual([]);
    expect(framer.push(bytes.subarray(cut))).toEqual(['{"text":"héllo ✓"}']);
  });

  it('produces the same lines whatever the chunk size', () => {
    const text = '{"n":"ü"}\n{"n":"日本"}\n\n{"n":"x"}\n';
    const bytes = Buffer.from(text, 'utf-8');
    const expected = text.split('\n').slice(0, -1);

    for (const size of [1, 2, 3, 5, 7]) {
      const chunked = new LineFramer();
      const lines: string[] = [];
      for (let i = 0; i < bytes.length; i += size) {
        lines.push(...chunked.push(bytes.subarray(i, i + size)));
      }
      expect(lines).toEqual(expected);
    }
  });

  it('does not retain the caller buffer', () => {
    const buffer = Buffer.from('abc');
    framer.push(buffer);
    buffer.fill(0x78);

    expect(framer.push(Buffer.from('\n'))).toEqual(['abc']);
  });

  it('reset discards the pending tail', () => {
    framer.push(Buffer.from('garbage'));
    framer.reset();

    expect(framer.pendingBytes).toBe(0);
    expect(framer.push(Buffer.from('clean\n'))).toEqual(['clean']);
  });
});

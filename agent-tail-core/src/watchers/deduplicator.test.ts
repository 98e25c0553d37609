import { describe, it, expect } from 'vitest';
import { Deduplicator, getSeenKey, DEFAULT_DEDUP_CAPACITY } from './deduplicator';
import type { SessionRecord } from '../types/sessionRecord';

function makeSummary(overrides: Partial<Extract<SessionRecord, { type: 'summary' }>> = {}): SessionRecord {
  return {
    type: 'summary',
    timestamp: '2025-01-01T00:00:00.000Z',
    sessionId: 'sess-1',
    uuid: null,
    parentUuid: null,
    isSubAgent: false,
    summary: 'x',
    leafUuid: null,
    ...overrides,
  };
}

describe('Deduplicator', () => {
  it('accepts a key once', () => {
    const dedup = new Deduplicator();
    expect(dedup.tryMarkSeen('a')).toBe(true);
    expect(dedup.tryMarkSeen('a')).toBe(false);
    expect(dedup.has('a')).toBe(true);
    expect(dedup.size).toBe(1);
  });

  it('defaults to a capacity of 100,000', () => {
    expect(DEFAULT_DEDUP_CAPACITY).toBe(100_000);
  });

  it('evicts the oldest key when full', () => {
    const dedup = new Deduplicator(2);
    dedup.tryMarkSeen('a');
    dedup.tryMarkSeen('b');
    dedup.tryMarkSeen('c');

    expect(dedup.size).toBe(2);
    expect(dedup.has('a')).toBe(false);
    expect(dedup.tryMarkSeen('b')).toBe(false);
    expect(dedup.tryMarkSeen('a')).toBe(true);
  });

  it('stays bounded and remembers the most recent keys', () => {
    const dedup = new Deduplicator(100_000);
    let maxSize = 0;
    for (let i = 0; i < 150_000; i++) {
      dedup.tryMarkSeen(`key-${i}`);
      maxSize = Math.max(maxSize, dedup.size);
    }

    expect(maxSize).toBe(100_000);
    let rejected = 0;
    for (let i = 50_000; i < 150_000; i++) {
      if (!dedup.tryMarkSeen(`key-${i}`)) rejected++;
    }
    expect(rejected).toBe(100_000);
    expect(dedup.has('key-49999')).toBe(false);
  });

  it('clear forgets everything', () => {
    const dedup = new Deduplicator();
    dedup.tryMarkSeen('a');
    dedup.clear();
    expect(dedup.size).toBe(0);
    expect(dedup.tryMarkSeen('a')).toBe(true);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new Deduplicator(0)).toThrow(RangeError);
  });
});

describe('getSeenKey', () => {
  it('uses the uuid when present', () => {
    expect(getSeenKey(makeSummary({ uuid: 'u-1' }), 'line')).toBe('u-1');
  });

  it('falls back to type, timestamp and a hash of the line', () => {
    const record = makeSummary();
    const a = getSeenKey(record, '{"type":"summary","summary":"x"}');
    const b = getSeenKey(record, '{"type":"summary","summary":"y"}');

    expect(a).toMatch(/^summary:2025-01-01T00:00:00\.000Z:[0-9a-f]{40}$/);
    expect(a).not.toBe(b);
    expect(getSeenKey(record, '{"type":"summary","summary":"x"}')).toBe(a);
  });
});

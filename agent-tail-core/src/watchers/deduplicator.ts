/**
 * Bounded seen-set for at-most-once emission.
 *
 * Keys are evicted oldest-first once the capacity is reached. A key evicted
 * long ago could pass again; that is the price of bounded memory.
 *
 * @module watchers/deduplicator
 */

import { createHash } from 'crypto';
import type { SessionRecord } from '../types/sessionRecord';

export const DEFAULT_DEDUP_CAPACITY = 100_000;

export class Deduplicator {
  // Sets iterate in insertion order, so the first value is the oldest key
  private readonly seen = new Set<string>();
  private readonly capacity: number;

  constructor(capacity = DEFAULT_DEDUP_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Dedup capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Returns false if the key was already seen; otherwise records it and returns true. */
  tryMarkSeen(key: string): boolean {
    if (this.seen.has(key)) return false;

    while (this.seen.size >= this.capacity) {
      const oldest = this.seen.values().next();
      if (oldest.done) break;
      this.seen.delete(oldest.value);
    }
    this.seen.add(key);
    return true;
  }

  has(key: string): boolean {
    return this.seen.has(key);
  }

  get size(): number {
    return this.seen.size;
  }

  clear(): void {
    this.seen.clear();
  }
}

/**
 * Identity of a record for deduplication: its uuid when present,
 * otherwise type + timestamp + a hash of the exact line.
 */
export function getSeenKey(record: SessionRecord, line: string): string {
  if (record.uuid) return record.uuid;
  const hash = createHash('sha1').update(line).digest('hex');
  return `${record.type}:${record.timestamp}:${hash}`;
}

import { describe, it, expect } from 'vitest';
import {
  AgentTailError,
  FileReadError,
  InvalidOptionsError,
  getErrorCode,
  isTransientIoError,
  toError,
} from './errors';

function errnoError(code: string): Error {
  return Object.assign(new Error(`${code}: simulated`), { code });
}

describe('isTransientIoError', () => {
  it('treats lock and race codes as transient', () => {
    for (const code of ['ENOENT', 'EBUSY', 'EACCES', 'EPERM', 'EAGAIN', 'EMFILE']) {
      expect(isTransientIoError(errnoError(code))).toBe(true);
    }
  });

  it('treats other failures as reportable', () => {
    expect(isTransientIoError(errnoError('EIO'))).toBe(false);
    expect(isTransientIoError(new Error('no code'))).toBe(false);
    expect(isTransientIoError('string')).toBe(false);
  });
});

describe('error classes', () => {
  it('FileReadError carries the path, code and kind', () => {
    const error = new FileReadError('/logs/s.jsonl', errnoError('EIO'));

    expect(error).toBeInstanceOf(AgentTailError);
    expect(error.kind).toBe('io');
    expect(error.code).toBe('EIO');
    expect(error.filePath).toBe('/logs/s.jsonl');
    expect(error.message).toBe('Failed to read /logs/s.jsonl: EIO: simulated');
  });

  it('InvalidOptionsError joins its issues', () => {
    const error = new InvalidOptionsError(['a: bad', 'b: worse']);

    expect(error.message).toBe('Invalid monitor options: a: bad; b: worse');
    expect(error.kind).toBe('config');
  });
});

describe('helpers', () => {
  it('getErrorCode reads string codes only', () => {
    expect(getErrorCode(errnoError('ENOENT'))).toBe('ENOENT');
    expect(getErrorCode({ code: 42 })).toBeUndefined();
  });

  it('toError wraps non-errors', () => {
    const original = new Error('x');
    expect(toError(original)).toBe(original);
    expect(toError('plain').message).toBe('plain');
  });
});

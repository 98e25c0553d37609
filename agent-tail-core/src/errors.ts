/**
 * Error types reported by the monitor's error channel.
 *
 * @module errors
 */

export type AgentTailErrorKind = 'io' | 'parse' | 'fatal' | 'subscriber' | 'config';

export class AgentTailError extends Error {
  readonly kind: AgentTailErrorKind;

  constructor(kind: AgentTailErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AgentTailError';
    this.kind = kind;
  }
}

/** A read of a tracked file failed for a reason other than a transient lock or race. */
export class FileReadError extends AgentTailError {
  readonly filePath: string;
  readonly code?: string;

  constructor(filePath: string, cause: unknown) {
    super('io', `Failed to read ${filePath}: ${describeError(cause)}`, { cause });
    this.name = 'FileReadError';
    this.filePath = filePath;
    this.code = getErrorCode(cause);
  }
}

/** One JSONL line could not be turned into a record. The line is dropped. */
export class RecordParseError extends AgentTailError {
  readonly line: string;
  readonly filePath?: string;

  constructor(line: string, cause: unknown, filePath?: string) {
    super('parse', `Malformed record${filePath ? ` in ${filePath}` : ''}: ${describeError(cause)}`, { cause });
    this.name = 'RecordParseError';
    this.line = line;
    this.filePath = filePath;
  }
}

/** Setting up a watch failed at start; the monitor keeps polling. */
export class WatchSetupError extends AgentTailError {
  readonly target: string;

  constructor(target: string, cause: unknown) {
    super('fatal', `Failed to watch ${target}: ${describeError(cause)}`, { cause });
    this.name = 'WatchSetupError';
    this.target = target;
  }
}

/** A record subscriber threw while handling a record. */
export class SubscriberError extends AgentTailError {
  constructor(cause: unknown) {
    super('subscriber', `Subscriber threw: ${describeError(cause)}`, { cause });
    this.name = 'SubscriberError';
  }
}

export class InvalidOptionsError extends AgentTailError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('config', `Invalid monitor options: ${issues.join('; ')}`);
    this.name = 'InvalidOptionsError';
    this.issues = issues;
  }
}

// ── Helpers ──

const TRANSIENT_CODES = new Set(['ENOENT', 'EBUSY', 'EACCES', 'EPERM', 'EAGAIN', 'EMFILE', 'ENFILE']);

export function getErrorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Errors worth retrying silently on the next poll tick. */
export function isTransientIoError(err: unknown): boolean {
  const code = getErrorCode(err);
  return code !== undefined && TRANSIENT_CODES.has(code);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

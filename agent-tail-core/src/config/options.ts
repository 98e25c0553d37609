/**
 * Monitor options: schema, defaults and resolution.
 *
 * @module config/options
 */

import { z } from 'zod';
import { InvalidOptionsError } from '../errors';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { getLogRoot } from '../paths';
import { DEFAULT_DEDUP_CAPACITY } from '../watchers/deduplicator';

export const DEFAULT_POLL_INTERVAL_MS = 100;
export const DEFAULT_CREATION_TOLERANCE_SECONDS = 2;
export const DEFAULT_MAX_READ_BYTES = 1024 * 1024;

export const MonitorOptionsSchema = z.object({
  /** Working directory of the agent; used to derive the project directory. */
  workingDirectory: z.string().min(1).optional(),
  /** Follow this session only; bypasses discovery. */
  sessionId: z.string().min(1).optional(),
  /** Overrides the log root (default ~/.claude/projects). */
  logRoot: z.string().min(1).optional(),
  /** Emit lines already in the session file at start (explicit session only). */
  includeExistingContent: z.boolean().optional(),
  /** Files created up to this many seconds before start are still adopted. */
  creationToleranceSeconds: z.number().nonnegative().optional(),
  pollIntervalMs: z.number().int().positive().optional(),
  /** Upper bound on bytes read per file per tick. */
  maxReadBytes: z.number().int().positive().optional(),
  dedupCapacity: z.number().int().positive().optional(),
  /** Use fs.watch notifications in addition to polling. */
  useFileWatcher: z.boolean().optional(),
});

export type MonitorOptionsInput = z.infer<typeof MonitorOptionsSchema>;

export interface MonitorOptions extends MonitorOptionsInput {
  logger?: Logger;
}

export interface ResolvedMonitorOptions {
  workingDirectory: string | null;
  sessionId: string | null;
  logRoot: string;
  includeExistingContent: boolean;
  creationToleranceSeconds: number;
  pollIntervalMs: number;
  maxReadBytes: number;
  dedupCapacity: number;
  useFileWatcher: boolean;
  logger: Logger;
}

/**
 * Validates options and fills in defaults.
 * @throws InvalidOptionsError listing every invalid field
 */
export function resolveMonitorOptions(options: MonitorOptions = {}): ResolvedMonitorOptions {
  const { logger, ...rest } = options;
  const parsed = MonitorOptionsSchema.safeParse(rest);
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const opts = parsed.data;
  return {
    workingDirectory: opts.workingDirectory ?? null,
    sessionId: opts.sessionId ?? null,
    logRoot: getLogRoot(opts.logRoot),
    includeExistingContent: opts.includeExistingContent ?? false,
    creationToleranceSeconds: opts.creationToleranceSeconds ?? DEFAULT_CREATION_TOLERANCE_SECONDS,
    pollIntervalMs: opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
    maxReadBytes: opts.maxReadBytes ?? DEFAULT_MAX_READ_BYTES,
    dedupCapacity: opts.dedupCapacity ?? DEFAULT_DEDUP_CAPACITY,
    useFileWatcher: opts.useFileWatcher ?? true,
    logger: logger ?? createLogger(),
  };
}

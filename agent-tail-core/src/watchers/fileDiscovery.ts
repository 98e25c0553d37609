/**
 * Finds the log files to tail.
 *
 * Two timing problems shape this module: the project directory may not
 * exist yet when monitoring starts, and the agent may create its first file
 * a moment before the watch is in place. The first is handled by watching
 * the log root (and re-checking on every poll tick); the second by the
 * creation-tolerance window, which backdates the watch start.
 *
 * Notifications and poll ticks both end in `consider()`, which is
 * idempotent per path.
 *
 * @module watchers/fileDiscovery
 */

import * as fs from 'fs';
import * as path from 'path';
import { WatchSetupError, isTransientIoError, toError } from '../errors';
import type { Logger } from '../logger';
import {
  findSessionFile,
  getAgentIdFromFile,
  getFileStem,
  getProjectDirectory,
  isLogFile,
  isSubagentFile,
} from '../paths';

export interface DiscoveredFile {
  path: string;
  isPrimary: boolean;
  /** Set for sidecar files named agent-<id>.jsonl. */
  agentId?: string;
  /** Byte offset reading should start from. */
  startOffset: number;
}

export interface FileDiscoveryCallbacks {
  /** A file was adopted. Called at most once per path per discovery instance. */
  onTrack: (file: DiscoveredFile) => void;
  /** The platform reported a change to an adopted file. */
  onChange: (filePath: string) => void;
  /** Watch setup failed; discovery carries on with polling only. */
  onError: (error: Error) => void;
}

export interface FileDiscoveryOptions {
  logRoot: string;
  /** Explicit session to follow. When null the project directory is derived. */
  sessionId: string | null;
  workingDirectory: string;
  includeExistingContent: boolean;
  creationToleranceSeconds: number;
  useFileWatcher: boolean;
  /** Moment watching started (ms since epoch). */
  watchStartMs: number;
  /** Files to treat as already tracked; they skip the tolerance window. */
  knownFiles?: readonly KnownFile[];
  logger: Logger;
}

/** A file a previous run already tracked. */
export interface KnownFile {
  path: string;
  isPrimary: boolean;
}

interface Candidate {
  path: string;
  createdMs: number;
}

/** Creation time, falling back to mtime where the platform reports no birth time. */
function getCreationTimeMs(stat: fs.Stats): number {
  return stat.birthtimeMs > 0 ? stat.birthtimeMs : stat.mtimeMs;
}

export class FileDiscovery {
  private active = false;
  private readonly tracked = new Set<string>();
  /** Files created before the tolerance window; they never qualify later. */
  private readonly ignored = new Set<string>();
  private readonly watchers = new Map<string, fs.FSWatcher>();
  private readonly failedWatchTargets = new Set<string>();
  private primaryPath: string | null = null;
  private _sessionId: string | null;
  private targetDirectory: string | null;
  private readonly thresholdMs: number;

  constructor(private readonly options: FileDiscoveryOptions, private readonly callbacks: FileDiscoveryCallbacks) {
    this._sessionId = options.sessionId;
    this.targetDirectory = options.sessionId
      ? null
      : getProjectDirectory(options.workingDirectory, options.logRoot);
    this.thresholdMs = options.watchStartMs - options.creationToleranceSeconds * 1000;

    for (const known of options.knownFiles ?? []) {
      this.tracked.add(known.path);
      if (known.isPrimary) {
        this.primaryPath = known.path;
        this._sessionId = options.sessionId ?? getFileStem(known.path);
        if (options.sessionId) this.targetDirectory = path.dirname(known.path);
      }
    }
  }

  /** Session id: the explicit one, or the primary file's name once found. */
  get sessionId(): string | null {
    return this._sessionId;
  }

  /** The directory being scanned, once known. */
  get directory(): string | null {
    return this.targetDirectory;
  }

  /** Sets up watches and runs the first scan. */
  async start(): Promise<void> {
    if (this.active) return;
    this.active = true;

    if (this.options.sessionId) {
      if (!this.primaryPath) await this.locateSessionFile(true);
    } else if (this.targetDirectory && !(await directoryExists(this.targetDirectory))) {
      this.options.logger.debug({ dir: this.targetDirectory }, 'Project directory does not exist yet');
      if (await directoryExists(this.options.logRoot)) {
        this.watchForDirectoryCreation();
      }
    }

    await this.scan();
  }

  stop(): void {
    if (!this.active) return;
    this.active = false;
    for (const watcher of this.watchers.values()) {
      watcher.close();
    }
    this.watchers.clear();
  }

  /**
   * One discovery pass. Safe to call on every poll tick; errors are
   * swallowed and the pass is simply retried on the next tick.
   */
  async scan(): Promise<void> {
    if (!this.active) return;
    try {
      if (this.options.sessionId && !this.primaryPath) {
        await this.locateSessionFile(false);
      }

      const dir = this.targetDirectory;
      if (!dir || !(await directoryExists(dir))) return;
      if (!this.active) return;

      this.watchDirectory(dir);
      await this.scanDirectory(dir);
    } catch (error) {
      this.options.logger.debug({ err: toError(error) }, 'Discovery scan failed; retrying next tick');
    }
  }

  /**
   * Adopts a file if it qualifies. Idempotent: already tracked paths return
   * immediately.
   *
   * @param fromNotification - bypasses the ignored-file cache, since the
   *   platform just told us this path was (re)created or changed
   */
  async consider(filePath: string, fromNotification = false): Promise<boolean> {
    if (!this.active || this.tracked.has(filePath)) return false;
    if (!isLogFile(filePath) || !this.accepts(filePath)) return false;
    if (!fromNotification && this.ignored.has(filePath)) return false;

    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(filePath);
    } catch (error) {
      if (!isTransientIoError(error)) {
        this.options.logger.debug({ err: toError(error), file: filePath }, 'Cannot stat candidate file');
      }
      return false;
    }
    if (!this.active || !stat.isFile()) return false;

    return this.adopt({ path: filePath, createdMs: getCreationTimeMs(stat) });
  }

  // ── Session mode ──

  private async locateSessionFile(atStart: boolean): Promise<void> {
    const sessionId = this.options.sessionId;
    if (!sessionId) return;

    const sessionPath = await findSessionFile(this.options.logRoot, sessionId);
    if (!sessionPath || !this.active || this.tracked.has(sessionPath)) return;

    let startOffset = 0;
    // A file found at start already holds history; one found later is new
    if (atStart && !this.options.includeExistingContent) {
      try {
        startOffset = (await fs.promises.stat(sessionPath)).size;
      } catch {
        startOffset = 0;
      }
    }

    this.targetDirectory = path.dirname(sessionPath);
    this.track(sessionPath, true, startOffset);
    this.options.logger.info({ file: sessionPath, startOffset }, 'Following session file');
  }

  // ── Directory scanning ──

  private async scanDirectory(dir: string): Promise<void> {
    let names: string[];
    try {
      names = await fs.promises.readdir(dir);
    } catch {
      return;
    }

    const candidates: Candidate[] = [];
    for (const name of names) {
      const filePath = path.join(dir, name);
      if (!isLogFile(name) || this.tracked.has(filePath) || this.ignored.has(filePath)) continue;
      if (!this.accepts(filePath)) continue;
      try {
        const stat = await fs.promises.stat(filePath);
        if (stat.isFile()) {
          candidates.push({ path: filePath, createdMs: getCreationTimeMs(stat) });
        }
      } catch (error) {
        // Usually vanished between readdir and stat
        this.options.logger.debug({ err: toError(error), file: filePath }, 'Cannot stat candidate file');
      }
    }

    // Oldest first, so the earliest new session file becomes primary
    candidates.sort((a, b) => a.createdMs - b.createdMs);
    for (const candidate of candidates) {
      if (!this.active) return;
      if (!this.tracked.has(candidate.path)) this.adopt(candidate);
    }
  }

  private adopt(candidate: Candidate): boolean {
    if (candidate.createdMs < this.thresholdMs) {
      this.ignored.add(candidate.path);
      return false;
    }
    this.ignored.delete(candidate.path);
    const isPrimary = !this.primaryPath && !isSubagentFile(candidate.path);
    this.track(candidate.path, isPrimary, 0);
    return true;
  }

  /** In session mode only sidecars may join the primary file. */
  private accepts(filePath: string): boolean {
    if (!this.options.sessionId) return true;
    return isSubagentFile(filePath);
  }

  private track(filePath: string, isPrimary: boolean, startOffset: number): void {
    this.tracked.add(filePath);
    if (isPrimary) {
      this.primaryPath = filePath;
      this._sessionId = this.options.sessionId ?? getFileStem(filePath);
    }

    const agentId = getAgentIdFromFile(filePath);
    this.options.logger.debug({ file: filePath, isPrimary, agentId }, 'Tracking log file');
    this.callbacks.onTrack({
      path: filePath,
      isPrimary,
      ...(agentId && !isPrimary ? { agentId } : {}),
      startOffset,
    });
  }

  // ── Watches ──

  private watchDirectory(dir: string): void {
    this.createWatcher(dir, filename => {
      if (!isLogFile(filename)) return;
      const filePath = path.join(dir, filename);
      this.handleNotification(filePath).catch(error => {
        this.options.logger.debug({ err: toError(error), file: filePath }, 'Notification handling failed');
      });
    });
  }

  private watchForDirectoryCreation(): void {
    const target = this.targetDirectory;
    if (!target) return;
    const targetName = path.basename(target);

    this.createWatcher(this.options.logRoot, filename => {
      if (filename !== targetName) return;
      this.options.logger.info({ dir: target }, 'Project directory created');
      this.scan().catch(error => {
        this.options.logger.debug({ err: toError(error) }, 'Scan after directory creation failed');
      });
    });
  }

  private async handleNotification(filePath: string): Promise<void> {
    if (!this.active) return;
    if (!this.tracked.has(filePath)) {
      await this.consider(filePath, true);
    }
    if (this.tracked.has(filePath)) {
      this.callbacks.onChange(filePath);
    }
  }

  private createWatcher(target: string, onFile: (filename: string) => void): void {
    if (!this.options.useFileWatcher || !this.active) return;
    if (this.watchers.has(target) || this.failedWatchTargets.has(target)) return;

    try {
      const watcher = fs.watch(target, { persistent: false }, (_eventType, filename) => {
        if (this.active && filename) onFile(filename.toString());
      });
      watcher.on('error', error => {
        // Directory removed or watcher invalidated; polling keeps going
        this.options.logger.debug({ err: error, dir: target }, 'Watcher closed');
        watcher.close();
        this.watchers.delete(target);
      });
      this.watchers.set(target, watcher);
      this.options.logger.debug({ dir: target }, 'Watcher established');
    } catch (error) {
      this.failedWatchTargets.add(target);
      this.options.logger.warn({ err: toError(error), dir: target }, 'Watch setup failed; polling only');
      this.callbacks.onError(new WatchSetupError(target, error));
    }
  }
}

async function directoryExists(dir: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

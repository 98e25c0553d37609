/**
 * Live monitor for agent session logs.
 *
 * Tails every JSONL file of one session (the primary file plus sub-agent
 * sidecars) and emits each new record exactly once, in order, to its
 * subscribers. Uses byte-offset tracking, fs.watch notifications and a
 * fixed-interval poll loop; both triggers funnel into the same per-file
 * read, which never runs twice at once for the same file.
 *
 * @example
 * ```typescript
 * const monitor = new SessionMonitor({ workingDirectory: process.cwd() });
 * monitor.subscribe(record => console.log(record.type));
 * await monitor.start();
 * ```
 *
 * @module watchers/sessionMonitor
 */

import * as fs from 'fs';
import { resolveMonitorOptions } from '../config/options';
import type { MonitorOptions, ResolvedMonitorOptions } from '../config/options';
import { FileReadError, WatchSetupError, isTransientIoError, toError } from '../errors';
import type { Logger } from '../logger';
import { JsonlParser } from '../parsers/jsonl';
import type { SessionRecord } from '../types/sessionRecord';
import { toActivities } from './activityBridge';
import { Deduplicator, getSeenKey } from './deduplicator';
import { EventBus } from './eventBus';
import type { Unsubscribe } from './eventBus';
import { FileDiscovery } from './fileDiscovery';
import type { DiscoveredFile } from './fileDiscovery';
import type { Activity, MonitorState, TrackedFileInfo } from './types';

interface TrackedFile {
  readonly path: string;
  offset: number;
  readonly isPrimary: boolean;
  readonly agentId?: string;
  readonly parser: JsonlParser;
  /** Resolves to true when the read stopped at maxReadBytes with more data left. */
  inFlight: Promise<boolean> | null;
}

export class SessionMonitor {
  private readonly options: ResolvedMonitorOptions;
  private readonly logger: Logger;
  private readonly bus: EventBus<SessionRecord>;
  private readonly dedup: Deduplicator;
  private readonly files = new Map<string, TrackedFile>();
  private discovery: FileDiscovery | null = null;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private _state: MonitorState = 'stopped';
  private generation = 0;
  private ticking = false;
  private disposed = false;

  /**
   * @throws InvalidOptionsError when an option fails validation
   */
  constructor(options: MonitorOptions = {}) {
    this.options = resolveMonitorOptions(options);
    this.logger = this.options.logger;
    this.bus = new EventBus<SessionRecord>(this.logger);
    this.dedup = new Deduplicator(this.options.dedupCapacity);
  }

  get state(): MonitorState {
    return this._state;
  }

  get isMonitoring(): boolean {
    return this._state !== 'stopped';
  }

  /** Explicit session id, or the primary file's name once discovered. */
  get sessionId(): string | null {
    return this.discovery?.sessionId ?? this.options.sessionId;
  }

  get trackedFiles(): TrackedFileInfo[] {
    return [...this.files.values()].map(file => ({
      path: file.path,
      offset: file.offset,
      pendingBytes: file.parser.pendingBytes,
      isPrimary: file.isPrimary,
      ...(file.agentId ? { agentId: file.agentId } : {}),
    }));
  }

  subscribe(handler: (record: SessionRecord) => void): Unsubscribe {
    return this.bus.subscribe(handler);
  }

  onError(handler: (error: Error) => void): Unsubscribe {
    return this.bus.onError(handler);
  }

  /** Subscribes to the flattened tool-call / tool-result / thought stream. */
  onActivity(handler: (activity: Activity) => void): Unsubscribe {
    return this.bus.subscribe(record => {
      for (const activity of toActivities(record)) {
        handler(activity);
      }
    });
  }

  /**
   * Starts watching. Resolves once discovery has run and every adopted file
   * has been read once. No-op unless stopped.
   *
   * A restart resumes the files tracked by the previous run at their offsets.
   */
  async start(): Promise<void> {
    if (this.disposed || this._state !== 'stopped') return;

    this._state = 'starting';
    const generation = ++this.generation;

    const discovery = new FileDiscovery(
      {
        logRoot: this.options.logRoot,
        sessionId: this.options.sessionId,
        workingDirectory: this.options.workingDirectory ?? process.cwd(),
        includeExistingContent: this.options.includeExistingContent,
        creationToleranceSeconds: this.options.creationToleranceSeconds,
        useFileWatcher: this.options.useFileWatcher,
        watchStartMs: Date.now(),
        knownFiles: [...this.files.values()].map(file => ({ path: file.path, isPrimary: file.isPrimary })),
        logger: this.logger,
      },
      {
        onTrack: file => this.trackFile(file, generation),
        onChange: filePath => this.handleChange(filePath),
        onError: error => this.bus.reportError(error),
      },
    );
    this.discovery = discovery;

    try {
      await discovery.start();
    } catch (error) {
      this.logger.warn({ err: toError(error) }, 'Discovery failed at start; continuing with polling');
      this.bus.reportError(new WatchSetupError(this.options.logRoot, error));
    }
    if (generation !== this.generation) return;

    this.pollTimer = setInterval(() => {
      // Skip while the previous tick is still scanning or reading
      if (this.ticking) return;
      this.ticking = true;
      this.tick(generation)
        .catch(error => {
          this.logger.error({ err: toError(error) }, 'Poll tick failed');
        })
        .finally(() => {
          this.ticking = false;
        });
    }, this.options.pollIntervalMs);
    this._state = 'watching';
    this.logger.info(
      { sessionId: this.sessionId, directory: discovery.directory },
      'Session monitoring started',
    );

    await this.drain(generation);
  }

  /**
   * Stops watching. Reads still in flight are discarded. Tracked files and
   * their offsets are kept for a later `start()`. No-op when stopped.
   */
  stop(): void {
    if (this._state === 'stopped') return;
    this._state = 'stopped';
    this.generation++;

    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    this.discovery?.stop();
    this.logger.info({ sessionId: this.sessionId }, 'Session monitoring stopped');
  }

  dispose(): void {
    if (this.disposed) return;
    this.stop();
    this.disposed = true;
    this.bus.dispose();
  }

  /**
   * Runs discovery and reads every tracked file to its current end,
   * waiting for reads already in flight instead of dropping the request.
   */
  async readNow(): Promise<void> {
    if (this._state !== 'watching' || !this.discovery) return;
    const generation = this.generation;
    await this.discovery.scan();
    await this.drain(generation);
  }

  // ── Read path ──

  private async tick(generation: number): Promise<void> {
    if (generation !== this.generation || !this.discovery) return;
    await this.discovery.scan();
    await this.readAll();
  }

  private async readAll(): Promise<void> {
    await Promise.all([...this.files.values()].map(file => this.read(file)));
  }

  /** Reads every file to its end, waiting out reads already in flight. */
  private async drain(generation: number): Promise<void> {
    for (const file of this.files.values()) {
      let more = true;
      while (more && generation === this.generation) {
        while (file.inFlight) await file.inFlight;
        more = await this.read(file);
      }
    }
  }

  private handleChange(filePath: string): void {
    const file = this.files.get(filePath);
    if (!file) return;
    this.read(file).catch(error => {
      this.logger.error({ err: toError(error), file: filePath }, 'Read after notification failed');
    });
  }

  /** Single entry point for reads. A trigger arriving mid-read is dropped. */
  private read(file: TrackedFile): Promise<boolean> {
    if (file.inFlight) return Promise.resolve(false);
    if (this._state !== 'watching') return Promise.resolve(false);

    const pending = this.readChunk(file, this.generation).finally(() => {
      file.inFlight = null;
    });
    file.inFlight = pending;
    return pending;
  }

  private async readChunk(file: TrackedFile, generation: number): Promise<boolean> {
    let handle: fs.promises.FileHandle | null = null;
    try {
      handle = await fs.promises.open(file.path, 'r');
      const { size } = await handle.stat();
      if (generation !== this.generation) return false;

      if (size < file.offset) {
        this.logger.info({ file: file.path, size, offset: file.offset }, 'File truncated; reading from start');
        file.offset = 0;
        file.parser.reset();
      }
      if (size === file.offset) return false;

      const length = Math.min(size - file.offset, this.options.maxReadBytes);
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, file.offset);
      if (bytesRead === 0 || generation !== this.generation) return false;

      file.offset += bytesRead;
      file.parser.processBytes(buffer.subarray(0, bytesRead));
      return file.offset < size;
    } catch (error) {
      this.handleReadError(file, error);
      return false;
    } finally {
      if (handle) {
        await handle.close().catch(error => {
          this.logger.debug({ err: toError(error), file: file.path }, 'Close failed');
        });
      }
    }
  }

  private handleReadError(file: TrackedFile, error: unknown): void {
    if (isTransientIoError(error)) {
      this.logger.debug({ err: toError(error), file: file.path }, 'Transient read failure; retrying next tick');
      return;
    }
    const readError = new FileReadError(file.path, error);
    this.logger.warn({ err: readError }, 'Read failed');
    this.bus.reportError(readError);
  }

  // ── Tracking & emission ──

  private trackFile(discovered: DiscoveredFile, generation: number): void {
    if (generation !== this.generation || this.files.has(discovered.path)) return;

    const file: TrackedFile = {
      path: discovered.path,
      offset: discovered.startOffset,
      isPrimary: discovered.isPrimary,
      ...(discovered.agentId ? { agentId: discovered.agentId } : {}),
      inFlight: null,
      parser: new JsonlParser(
        {
          onRecord: (record, line) => this.accept(file, record, line),
          onError: error => {
            this.logger.warn({ err: error, file: discovered.path }, 'Dropped malformed line');
            this.bus.reportError(error);
          },
        },
        {
          sourceFile: discovered.path,
          isPrimary: discovered.isPrimary,
          ...(discovered.agentId ? { agentId: discovered.agentId } : {}),
        },
      ),
    };
    this.files.set(file.path, file);
  }

  private accept(file: TrackedFile, record: SessionRecord, line: string): void {
    if (this._state !== 'watching') return;

    // Sidecars in a shared directory may belong to other sessions
    const target = this.options.sessionId;
    if (target && !file.isPrimary && record.sessionId && record.sessionId !== target) return;

    if (!this.dedup.tryMarkSeen(getSeenKey(record, line))) return;
    this.bus.publish(record);
  }
}

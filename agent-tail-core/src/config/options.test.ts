import { describe, it, expect, afterEach, vi } from 'vitest';
import * as path from 'path';
import pino from 'pino';
import {
  DEFAULT_CREATION_TOLERANCE_SECONDS,
  DEFAULT_MAX_READ_BYTES,
  DEFAULT_POLL_INTERVAL_MS,
  resolveMonitorOptions,
} from './options';
import { InvalidOptionsError } from '../errors';

describe('resolveMonitorOptions', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('fills in defaults', () => {
    vi.stubEnv('AGENT_TAIL_LOG_ROOT', '/env/logs');
    const options = resolveMonitorOptions();

    expect(options).toMatchObject({
      workingDirectory: null,
      sessionId: null,
      logRoot: path.resolve('/env/logs'),
      includeExistingContent: false,
      creationToleranceSeconds: DEFAULT_CREATION_TOLERANCE_SECONDS,
      pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
      maxReadBytes: DEFAULT_MAX_READ_BYTES,
      dedupCapacity: 100_000,
      useFileWatcher: true,
    });
    expect(DEFAULT_POLL_INTERVAL_MS).toBe(100);
    expect(DEFAULT_CREATION_TOLERANCE_SECONDS).toBe(2);
    expect(DEFAULT_MAX_READ_BYTES).toBe(1024 * 1024);
  });

  it('keeps provided values and the injected logger', () => {
    const logger = pino({ level: 'silent' });
    const options = resolveMonitorOptions({
      sessionId: 'sess-1',
      logRoot: '/custom',
      pollIntervalMs: 25,
      creationToleranceSeconds: 0,
      logger,
    });

    expect(options.sessionId).toBe('sess-1');
    expect(options.logRoot).toBe(path.resolve('/custom'));
    expect(options.pollIntervalMs).toBe(25);
    expect(options.creationToleranceSeconds).toBe(0);
    expect(options.logger).toBe(logger);
  });

  it('lists every invalid field', () => {
    try {
      resolveMonitorOptions({ pollIntervalMs: 0, maxReadBytes: 1.5, sessionId: '' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidOptionsError);
      if (!(error instanceof InvalidOptionsError)) return;
      expect(error.kind).toBe('config');
      expect(error.issues.map(issue => issue.split(':')[0]).sort()).toEqual(['maxReadBytes', 'pollIntervalMs', 'sessionId']);
    }
  });
});

import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger } from './logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('defaults to warn', () => {
    vi.stubEnv('AGENT_TAIL_LOG_LEVEL', '');
    expect(createLogger().level).toBe('warn');
  });

  it('reads the level from AGENT_TAIL_LOG_LEVEL', () => {
    vi.stubEnv('AGENT_TAIL_LOG_LEVEL', 'debug');
    expect(createLogger().level).toBe('debug');
  });

  it('ignores unknown levels from the environment', () => {
    vi.stubEnv('AGENT_TAIL_LOG_LEVEL', 'chatty');
    expect(createLogger().level).toBe('warn');
  });

  it('prefers the explicit level', () => {
    vi.stubEnv('AGENT_TAIL_LOG_LEVEL', 'debug');
    expect(createLogger({ level: 'silent' }).level).toBe('silent');
  });
});

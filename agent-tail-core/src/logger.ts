/**
 * Shared pino logger factory. Level comes from the caller, then
 * AGENT_TAIL_LOG_LEVEL, then `warn`.
 *
 * @module logger
 */

import pino from 'pino';

export type Logger = pino.Logger;

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function createLogger(options: { level?: LogLevel } = {}): Logger {
  const envLevel = process.env.AGENT_TAIL_LOG_LEVEL;
  return pino({
    name: 'agent-tail',
    level: options.level ?? (isLogLevel(envLevel) ? envLevel : 'warn'),
  });
}

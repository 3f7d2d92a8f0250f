import { LogLevel } from '@nestjs/common';

const LEVELS: Record<string, LogLevel[]> = {
  error: ['error', 'fatal'],
  warn: ['error', 'fatal', 'warn'],
  info: ['error', 'fatal', 'warn', 'log'],
  debug: ['error', 'fatal', 'warn', 'log', 'debug'],
  verbose: ['error', 'fatal', 'warn', 'log', 'debug', 'verbose'],
};

/**
 * Nest logger levels enabled for a LOG_LEVEL name
 */
export function logLevelsFor(level: string | undefined): LogLevel[] {
  return LEVELS[level ?? 'info'] ?? LEVELS.info;
}

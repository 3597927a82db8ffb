import { LogLevel } from '@nestjs/common';

const DEFAULT_TRUNCATE_LENGTH = 100;

/**
 * Log levels from least to most verbose
 * NestJS levels are cumulative, so enabling 'debug' also enables error, warn and log
 */
export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

export function isLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some(candidate => candidate === level);
}

/**
 * Serialize data for a log line, cut to maxLength characters
 */
export function truncateForLog(data: unknown, maxLength: number = DEFAULT_TRUNCATE_LENGTH): string {
  const str = JSON.stringify(data) ?? String(data);
  if (str.length <= maxLength) {
    return str;
  }
  return str.substring(0, maxLength) + '...';
}

/**
 * Enabled log levels for a minimum level; unknown levels fall back to 'log'
 */
export function getLogLevels(minLevel: string = 'log'): LogLevel[] {
  if (!isLogLevel(minLevel)) {
    return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf('log') + 1);
  }
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(minLevel) + 1);
}

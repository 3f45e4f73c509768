/**
 * Logger
 *
 * pino logger whose timestamps are rendered in the local time zone, e.g.
 * `2025-01-15 13:00:00 +0100`.
 */

import pino from 'pino';
import type { DestinationStream, Logger, LevelWithSilent } from 'pino';

/**
 * The subset of the logger that operations depend on.
 */
export type OperationLogger = Pick<Logger, 'info' | 'warn' | 'debug'>;

export interface LoggerOptions {
  /** Logger name binding */
  name?: string;
  /** Minimum level (default: info) */
  level?: LevelWithSilent;
  /** Where to write log lines (default: stdout) */
  destination?: DestinationStream;
  /** Clock used for timestamps */
  now?: () => Date;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format a UTC offset in minutes east of Greenwich as `+HHMM` / `-HHMM`
 */
export function formatUtcOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`;
}

/**
 * Render a date as `YYYY-MM-DD HH:MM:SS +HHMM` in the local time zone
 */
export function formatLocalTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  // getTimezoneOffset() is minutes west of UTC
  return `${day} ${time} ${formatUtcOffset(-date.getTimezoneOffset())}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const now = options.now ?? (() => new Date());
  const config: pino.LoggerOptions = {
    name: options.name ?? 'depot-trust',
    level: options.level ?? 'info',
    base: undefined,
    timestamp: () => `,"time":${JSON.stringify(formatLocalTimestamp(now()))}`,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  return options.destination ? pino(config, options.destination) : pino(config);
}

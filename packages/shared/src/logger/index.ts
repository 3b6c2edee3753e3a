/**
 * Structured logging for ChargeTrace
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

// Re-export pino.Logger type for convenience
export type Logger = pino.Logger;

export interface LogContext {
  entityId?: string;
  component?: string;
  [key: string]: unknown;
}

function createBaseLogger(level: LogLevel = 'info') {
  return pino({
    level,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: {
      service: 'chargetrace',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

function resolveLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

// Singleton logger instance
let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = createBaseLogger(resolveLevel(process.env.LOG_LEVEL));
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

/**
 * Structured summary line emitted once per analysed station
 */
export function logStationAnalysis(
  entityId: string,
  events: number,
  dropped: number,
  chains: number,
  durationMs: number
): void {
  getLogger().info(
    {
      event: 'station_analysis',
      entityId,
      events,
      dropped,
      chains,
      durationMs,
    },
    `Station ${entityId} analysed: ${events} events, ${chains} causal chain(s)${dropped > 0 ? `, ${dropped} line(s) dropped` : ''}`
  );
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}

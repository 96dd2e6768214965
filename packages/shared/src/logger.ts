import pino, { stdTimeFunctions } from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';
import type { LogLevel } from './envConfig';

export type { Logger } from 'pino';

export type CreateLoggerOptions = {
  name?: string;
  level?: LogLevel;
  destination?: DestinationStream;
};

export const createLoggerOptions = (level: LogLevel, name?: string): LoggerOptions => ({
  name,
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions = createLoggerOptions(options.level ?? 'info', options.name);
  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}

/** Logger that drops everything; handy as a default for library callers and tests. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Structured JSON logging using Pino
 */
import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from './config';

// Redact credentials from logs
const redactPaths = [
  'apiKey',
  'key',
  'headers.authorization',
  'headers.Authorization',
];

export interface LoggerOptions {
  level?: LogLevel;
  /** Destination stream, stdout when omitted */
  destination?: pino.DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const config: pino.LoggerOptions = {
    name: 'search-keys-sdk',
    level: options.level ?? 'info',
    redact: redactPaths,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return options.destination ? pino(config, options.destination) : pino(config);
}

export type { Logger };

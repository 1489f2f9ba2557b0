/**
 * @tracewell/core - Logger Factory
 *
 * Structured JSON logging on top of pino. Tracing backends write through
 * a logger created here so that every entry shares the same serializers
 * and redaction rules.
 *
 * @module infrastructure/logging/logger
 */

import pino, { type DestinationStream, type Level, type Logger } from 'pino';

/**
 * Log level threshold, `silent` disables output entirely.
 */
export type LogLevel = Level | 'silent';

/**
 * Options for {@link createLogger}.
 */
export interface LoggerOptions {
  /** Logger name, emitted as `name` on every line */
  name?: string;

  /** Threshold; falls back to `LOG_LEVEL`, then `info` */
  level?: LogLevel;

  /** Where lines are written; stdout when omitted */
  destination?: DestinationStream;
}

/**
 * Field paths whose values never reach the output.
 */
export const REDACTED_PATHS = [
  'apiKey',
  'authorization',
  'password',
  'secret',
  '*.apiKey',
  '*.authorization',
  '*.password',
  '*.secret',
];

/** Create a structured pino logger instance. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? 'tracewell',
      level: options.level ?? process.env['LOG_LEVEL'] ?? 'info',
      serializers: {
        err: pino.stdSerializers.err,
      },
      redact: {
        paths: REDACTED_PATHS,
        censor: '[REDACTED]',
      },
    },
    options.destination,
  );
}

export type { Logger };

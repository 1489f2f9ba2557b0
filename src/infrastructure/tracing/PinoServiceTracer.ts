/**
 * @tracewell/core - Pino Service Tracer
 *
 * {@link IServiceTracer} backend writing structured JSON lines through pino.
 *
 * @module infrastructure/tracing/PinoServiceTracer
 */

import type { DestinationStream, Level } from 'pino';
import { createLogger, type Logger, type LogLevel } from '../logging/logger';
import type { IServiceTracer, ServiceTraceOptions } from './IServiceTracer';
import type { TracePayload } from './ITracer';
import { PINO_LEVELS, toLogRecord } from './logRecord';

/**
 * Options for {@link PinoServiceTracer}.
 */
export interface PinoServiceTracerOptions {
  /** Tracer name, also used as the logger name */
  name?: string;

  /** Existing logger; `level` and `destination` are ignored when set */
  logger?: Logger;

  level?: LogLevel;

  destination?: DestinationStream;
}

/**
 * PinoServiceTracer - service-level tracing over pino.
 *
 * Entries carry `checkpointId` (empty string when omitted) and no
 * transaction id. `warning` maps to pino's `warn`, `critical` to `fatal`.
 *
 * @example
 * ```typescript
 * const tracer = new PinoServiceTracer({ name: 'scheduler' });
 * tracer.warning('job skipped', { checkpointId: 'nightly-export' });
 * // {"level":40,"name":"scheduler","checkpointId":"nightly-export","msg":"job skipped",...}
 * ```
 */
export class PinoServiceTracer implements IServiceTracer {
  readonly name: string;
  private readonly logger: Logger;

  constructor(options: PinoServiceTracerOptions = {}) {
    this.name = options.name ?? 'service-tracer';
    this.logger =
      options.logger ??
      createLogger({
        name: this.name,
        level: options.level,
        destination: options.destination,
      });
  }

  isEnabled(): boolean {
    return this.logger.level !== 'silent';
  }

  info(payload: TracePayload, options: ServiceTraceOptions = {}): void {
    this.write(PINO_LEVELS.info, payload, options);
  }

  debug(payload: TracePayload, options: ServiceTraceOptions = {}): void {
    this.write(PINO_LEVELS.debug, payload, options);
  }

  warning(payload: TracePayload, options: ServiceTraceOptions = {}): void {
    this.write(PINO_LEVELS.warning, payload, options);
  }

  error(payload: TracePayload, options: ServiceTraceOptions = {}): void {
    this.write(PINO_LEVELS.error, payload, options);
  }

  critical(payload: TracePayload, options: ServiceTraceOptions = {}): void {
    this.write(PINO_LEVELS.critical, payload, options);
  }

  private write(
    level: Level,
    payload: TracePayload,
    options: ServiceTraceOptions,
  ): void {
    const { fields, message } = toLogRecord(payload, {
      extra: options.extra,
      args: options.args,
      fields: { checkpointId: options.checkpointId || '' },
    });
    this.logger[level](fields, message);
  }
}

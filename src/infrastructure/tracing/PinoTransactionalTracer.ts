/**
 * @tracewell/core - Pino Transactional Tracer
 *
 * {@link TransactionalTracer} backend writing structured JSON lines
 * through pino.
 *
 * @module infrastructure/tracing/PinoTransactionalTracer
 */

import type { DestinationStream, Level } from 'pino';
import type { ITransactionContext } from '../../domain/context/ITransactionContext';
import { createLogger, type Logger, type LogLevel } from '../logging/logger';
import type { TracePayload } from './ITracer';
import type {
  TechErrorTraceOptions,
  TransactionalTraceOptions,
} from './ITransactionalTracer';
import { PINO_LEVELS, toLogRecord } from './logRecord';
import {
  TransactionalTracer,
  type ResolvedTraceIds,
  type TransactionScope,
} from './TransactionalTracer';

/**
 * Options for {@link PinoTransactionalTracer}.
 */
export interface PinoTransactionalTracerOptions {
  /** Tracer name, also used as the logger name */
  name?: string;

  /** Existing logger; `level` and `destination` are ignored when set */
  logger?: Logger;

  level?: LogLevel;

  destination?: DestinationStream;

  /** Source of transaction ids; the shared transaction manager by default */
  transactionContext?: ITransactionContext;

  /**
   * Transaction an omitted id falls back to.
   * @defaultValue 'current'
   */
  transactionScope?: TransactionScope;
}

/**
 * PinoTransactionalTracer - transactional tracing over pino.
 *
 * @remarks
 * | Operation             | pino level | Extra fields                  |
 * |-----------------------|------------|-------------------------------|
 * | `debug`               | debug      |                               |
 * | `info`                | info       |                               |
 * | `warning`             | warn       |                               |
 * | `error`               | error      |                               |
 * | `critical`            | fatal      |                               |
 * | `funcError`           | error      | `errorType: 'functional'`     |
 * | `techError`           | error      | `errorType: 'technical'`, `err` |
 * | `reportStartExternal` | info       | `external: 'start'`           |
 * | `reportEndExternal`   | info       | `external: 'end'`             |
 *
 * @example
 * ```typescript
 * const tracer = new PinoTransactionalTracer({ name: 'orders' });
 *
 * await transactionManager.runTransaction(async () => {
 *   tracer.info('order accepted', { checkpointId: 'checkout' });
 *   // {"level":30,"name":"orders","transactionId":"<uuid>","checkpointId":"checkout","msg":"order accepted",...}
 * });
 * ```
 */
export class PinoTransactionalTracer extends TransactionalTracer {
  readonly name: string;
  readonly transactionScope: TransactionScope;
  private readonly logger: Logger;

  constructor(options: PinoTransactionalTracerOptions = {}) {
    super(options.transactionContext);
    this.name = options.name ?? 'transactional-tracer';
    this.transactionScope = options.transactionScope ?? 'current';
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

  info(payload: TracePayload, options: TransactionalTraceOptions = {}): void {
    this.write(PINO_LEVELS.info, payload, options);
  }

  debug(payload: TracePayload, options: TransactionalTraceOptions = {}): void {
    this.write(PINO_LEVELS.debug, payload, options);
  }

  warning(payload: TracePayload, options: TransactionalTraceOptions = {}): void {
    this.write(PINO_LEVELS.warning, payload, options);
  }

  error(payload: TracePayload, options: TransactionalTraceOptions = {}): void {
    this.write(PINO_LEVELS.error, payload, options);
  }

  critical(payload: TracePayload, options: TransactionalTraceOptions = {}): void {
    this.write(PINO_LEVELS.critical, payload, options);
  }

  funcError(payload: TracePayload, options: TransactionalTraceOptions = {}): void {
    this.write(PINO_LEVELS.error, payload, options, {
      errorType: 'functional',
    });
  }

  techError(payload: TracePayload, options: TechErrorTraceOptions = {}): void {
    const fields: Record<string, unknown> = { errorType: 'technical' };
    if (options.error !== undefined) {
      fields['err'] = options.error;
    }
    this.write(PINO_LEVELS.error, payload, options, fields);
  }

  reportStartExternal(
    payload: TracePayload,
    options: TransactionalTraceOptions = {},
  ): void {
    this.write(PINO_LEVELS.info, payload, options, { external: 'start' });
  }

  reportEndExternal(
    payload: TracePayload,
    options: TransactionalTraceOptions = {},
  ): void {
    this.write(PINO_LEVELS.info, payload, options, { external: 'end' });
  }

  private resolveIds(options: TransactionalTraceOptions): ResolvedTraceIds {
    return this.transactionScope === 'main'
      ? this.resolveWithMain(options.transactionId, options.checkpointId)
      : this.resolveWithCurrent(options.transactionId, options.checkpointId);
  }

  private write(
    level: Level,
    payload: TracePayload,
    options: TransactionalTraceOptions,
    fields: Record<string, unknown> = {},
  ): void {
    const ids = this.resolveIds(options);
    const record = toLogRecord(payload, {
      extra: options.extra,
      args: options.args,
      fields: { ...ids, ...fields },
    });
    this.logger[level](record.fields, record.message);
  }
}

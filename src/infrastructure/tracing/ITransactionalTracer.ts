/**
 * @tracewell/core - Transactional Tracer Interface
 *
 * Logging keyed by transaction id and checkpoint id, with separate
 * channels for functional errors, technical errors and external calls.
 *
 * @module infrastructure/tracing/ITransactionalTracer
 */

import type { ITracer, TraceOptions, TracePayload } from './ITracer';

/**
 * Options of a transactional trace call.
 */
export interface TransactionalTraceOptions extends TraceOptions {
  /**
   * Transaction the entry belongs to.
   * Resolved from the transaction context when omitted.
   */
  transactionId?: string;
}

/**
 * Options of a technical error report.
 */
export interface TechErrorTraceOptions extends TransactionalTraceOptions {
  /**
   * Error that caused the failure.
   */
  error?: unknown;
}

/**
 * ITransactionalTracer - transaction-aware tracing contract.
 *
 * @example
 * ```typescript
 * tracer.reportStartExternal('charging card', { checkpointId: 'payment' });
 * try {
 *   await gateway.charge(order);
 * } catch (error) {
 *   tracer.techError('charge failed', { checkpointId: 'payment', error });
 *   throw error;
 * } finally {
 *   tracer.reportEndExternal('charging card', { checkpointId: 'payment' });
 * }
 * ```
 */
export interface ITransactionalTracer extends ITracer {
  info(payload: TracePayload, options?: TransactionalTraceOptions): void;

  debug(payload: TracePayload, options?: TransactionalTraceOptions): void;

  warning(payload: TracePayload, options?: TransactionalTraceOptions): void;

  error(payload: TracePayload, options?: TransactionalTraceOptions): void;

  critical(payload: TracePayload, options?: TransactionalTraceOptions): void;

  /**
   * Report a business-rule violation.
   */
  funcError(payload: TracePayload, options?: TransactionalTraceOptions): void;

  /**
   * Report an infrastructure or runtime failure, optionally with its cause.
   */
  techError(payload: TracePayload, options?: TechErrorTraceOptions): void;

  /**
   * Mark the start of a call to an external system.
   */
  reportStartExternal(
    payload: TracePayload,
    options?: TransactionalTraceOptions,
  ): void;

  /**
   * Mark the end of a call to an external system.
   */
  reportEndExternal(
    payload: TracePayload,
    options?: TransactionalTraceOptions,
  ): void;
}

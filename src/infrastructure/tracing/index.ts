/**
 * @fileoverview Tracing Exports
 * @description
 * Tracing contracts, the transactional tracer base and the bundled
 * backends (pino, no-op).
 *
 * @packageDocumentation
 * @module @tracewell/core/infrastructure/tracing
 *
 * @example
 * ```typescript
 * import {
 *   loadTracingConfig,
 *   createTransactionalTracer,
 * } from '@tracewell/core/infrastructure/tracing';
 *
 * const tracer = createTransactionalTracer(loadTracingConfig());
 * tracer.funcError('credit limit exceeded', {
 *   checkpointId: 'checkout',
 *   extra: { customerId: 'customer-7' },
 * });
 * ```
 */

export {
  TransactionalTracer,
  resolveTraceIds,
} from './TransactionalTracer';
export { PinoServiceTracer } from './PinoServiceTracer';
export { PinoTransactionalTracer } from './PinoTransactionalTracer';
export { NoopServiceTracer, NoopTransactionalTracer } from './NoopTracer';
export { toLogRecord, PINO_LEVELS, RESERVED_LOG_KEYS } from './logRecord';
export {
  tracingEnvSchema,
  loadTracingConfig,
  createTransactionalTracer,
  createServiceTracer,
  TracingConfigError,
} from './config';

export type {
  ITracer,
  TraceValue,
  TracePayload,
  TraceExtra,
  TraceLevel,
  TraceOptions,
} from './ITracer';
export type { IServiceTracer, ServiceTraceOptions } from './IServiceTracer';
export type {
  ITransactionalTracer,
  TransactionalTraceOptions,
  TechErrorTraceOptions,
} from './ITransactionalTracer';
export type { ResolvedTraceIds, TransactionScope } from './TransactionalTracer';
export type { PinoServiceTracerOptions } from './PinoServiceTracer';
export type { PinoTransactionalTracerOptions } from './PinoTransactionalTracer';
export type { LogRecord } from './logRecord';
export type { TracingConfig } from './config';

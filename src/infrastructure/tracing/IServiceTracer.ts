/**
 * @tracewell/core - Service Tracer Interface
 *
 * @module infrastructure/tracing/IServiceTracer
 */

import type { ITracer, TraceOptions, TracePayload } from './ITracer';

/**
 * Options of a service-level trace call.
 */
export type ServiceTraceOptions = TraceOptions;

/**
 * IServiceTracer - service-level logging without transaction context.
 *
 * Used by long-lived components (schedulers, adapters, startup code)
 * whose entries do not belong to a unit of work.
 *
 * @example
 * ```typescript
 * tracer.info('cache warmed', {
 *   checkpointId: 'startup',
 *   extra: { entries: 1200 },
 * });
 *
 * tracer.critical({ reason: 'disk full' }, { checkpointId: 'export' });
 * ```
 */
export interface IServiceTracer extends ITracer {
  info(payload: TracePayload, options?: ServiceTraceOptions): void;

  debug(payload: TracePayload, options?: ServiceTraceOptions): void;

  warning(payload: TracePayload, options?: ServiceTraceOptions): void;

  error(payload: TracePayload, options?: ServiceTraceOptions): void;

  critical(payload: TracePayload, options?: ServiceTraceOptions): void;
}

/**
 * @tracewell/core - Tracing Interface
 *
 * Root tracing capability and the value types shared by every tracer.
 * Service-level and transactional tracers specialize {@link ITracer}
 * with their own operation sets.
 *
 * @module infrastructure/tracing/ITracer
 */

/**
 * Any value a tracer accepts as payload, extra field or format argument.
 *
 * JSON-shaped so that any backend (console, file, remote collector) can
 * serialize it without knowing where it came from.
 *
 * @example
 * ```typescript
 * const payload: TraceValue = {
 *   orderId: 'order-42',
 *   lines: [{ sku: 'sku-1', quantity: 2 }],
 *   express: true,
 * };
 * ```
 */
export type TraceValue =
  | string
  | number
  | boolean
  | null
  | readonly TraceValue[]
  | { readonly [key: string]: TraceValue | undefined };

/**
 * Data or message being traced.
 * A string payload is treated as the log message by message-oriented backends.
 */
export type TracePayload = TraceValue;

/**
 * Supplementary context attached to a trace entry.
 */
export type TraceExtra = Readonly<Record<string, TraceValue | undefined>>;

/**
 * Severity levels shared by service and transactional tracers.
 */
export type TraceLevel = 'debug' | 'info' | 'warning' | 'error' | 'critical';

/**
 * Options accepted by every leveled trace operation.
 */
export interface TraceOptions {
  /**
   * Named point of the traced workflow.
   * Backends receive an empty string when omitted.
   */
  checkpointId?: string;

  /**
   * Supplementary context for this entry.
   */
  extra?: TraceExtra;

  /**
   * Backend-specific formatting arguments, passed through untouched.
   */
  args?: readonly TraceValue[];
}

/**
 * ITracer - root tracing capability.
 */
export interface ITracer {
  /**
   * Name of this tracer instance.
   * Usually the service or library name.
   */
  readonly name: string;

  /**
   * Check if the tracer emits anything at all.
   */
  isEnabled(): boolean;
}

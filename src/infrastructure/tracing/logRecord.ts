/**
 * @tracewell/core - Log Record Builder
 *
 * Shapes a trace call into the object a structured logger writes.
 *
 * @module infrastructure/tracing/logRecord
 */

import type { Level } from 'pino';
import type {
  TraceExtra,
  TraceLevel,
  TracePayload,
  TraceValue,
} from './ITracer';

/**
 * pino level each trace level is written at.
 */
export const PINO_LEVELS: Readonly<Record<TraceLevel, Level>> = {
  debug: 'debug',
  info: 'info',
  warning: 'warn',
  error: 'error',
  critical: 'fatal',
};

/**
 * Keys pino writes on every line; `extra` never sets them.
 */
export const RESERVED_LOG_KEYS: ReadonlySet<string> = new Set([
  'level',
  'time',
  'pid',
  'hostname',
  'name',
  'msg',
]);

/**
 * Object form of a trace entry plus the message, if the payload was one.
 */
export interface LogRecord {
  fields: Record<string, unknown>;
  message?: string;
}

/**
 * Build a log record.
 *
 * Extra fields come first so that identifiers and `fields` always win on
 * a name clash; extra keys in {@link RESERVED_LOG_KEYS} are dropped. A
 * string payload becomes the message; anything else is
 * stored under `payload`. `args` is only set when non-empty.
 *
 * @example
 * ```typescript
 * toLogRecord({ orderId: 'order-1' }, {
 *   extra: { region: 'eu' },
 *   fields: { transactionId: 'tx-1', checkpointId: '' },
 * });
 * // {
 * //   fields: {
 * //     region: 'eu',
 * //     transactionId: 'tx-1',
 * //     checkpointId: '',
 * //     payload: { orderId: 'order-1' },
 * //   },
 * // }
 * ```
 */
export function toLogRecord(
  payload: TracePayload,
  options: {
    extra?: TraceExtra;
    args?: readonly TraceValue[];
    fields: Record<string, unknown>;
  },
): LogRecord {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(options.extra ?? {})) {
    if (!RESERVED_LOG_KEYS.has(key)) {
      fields[key] = value;
    }
  }
  Object.assign(fields, options.fields);

  if (options.args && options.args.length > 0) {
    fields['args'] = options.args;
  }

  if (typeof payload === 'string') {
    return { fields, message: payload };
  }

  fields['payload'] = payload;
  return { fields };
}

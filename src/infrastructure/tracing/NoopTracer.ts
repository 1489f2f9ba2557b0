/**
 * @tracewell/core - No-op Tracers
 *
 * Tracers that accept every call and emit nothing. Useful as defaults
 * in tests and in components where tracing is optional.
 *
 * @module infrastructure/tracing/NoopTracer
 */

import type { IServiceTracer } from './IServiceTracer';
import type { ITransactionalTracer } from './ITransactionalTracer';

export class NoopServiceTracer implements IServiceTracer {
  readonly name = 'noop';

  isEnabled(): boolean {
    return false;
  }

  info(): void {}

  debug(): void {}

  warning(): void {}

  error(): void {}

  critical(): void {}
}

export class NoopTransactionalTracer implements ITransactionalTracer {
  readonly name = 'noop';

  isEnabled(): boolean {
    return false;
  }

  info(): void {}

  debug(): void {}

  warning(): void {}

  error(): void {}

  critical(): void {}

  funcError(): void {}

  techError(): void {}

  reportStartExternal(): void {}

  reportEndExternal(): void {}
}

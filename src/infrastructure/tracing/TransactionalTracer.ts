/**
 * @tracewell/core - Transactional Tracer Base
 *
 * Abstract base for transactional tracing backends. It owns the
 * identifier resolution every backend needs, so that backends always
 * receive a `(transactionId, checkpointId)` pair of strings however lazy
 * the caller was.
 *
 * @module infrastructure/tracing/TransactionalTracer
 */

import type { ITransactionContext } from '../../domain/context/ITransactionContext';
import { transactionManager } from '../../domain/context/TransactionManager';
import type { TracePayload } from './ITracer';
import type {
  ITransactionalTracer,
  TechErrorTraceOptions,
  TransactionalTraceOptions,
} from './ITransactionalTracer';

/**
 * Which transaction an omitted transaction id falls back to:
 * the outermost (`main`) or the innermost (`current`) one.
 */
export type TransactionScope = 'main' | 'current';

/**
 * Normalized identifier pair handed to a backend.
 */
export interface ResolvedTraceIds {
  transactionId: string;
  checkpointId: string;
}

/**
 * Resolve the identifiers of a trace call.
 *
 * An omitted transaction id is read from `context` (main or current,
 * depending on `scope`); an explicit one, even empty, is kept. A missing
 * or empty checkpoint id becomes `''`.
 *
 * @example
 * ```typescript
 * resolveTraceIds(transactionManager, 'main');
 * // { transactionId: '<main id>', checkpointId: '' }
 *
 * resolveTraceIds(transactionManager, 'current', 'tx-1', 'checkout');
 * // { transactionId: 'tx-1', checkpointId: 'checkout' }
 * ```
 */
export function resolveTraceIds(
  context: ITransactionContext,
  scope: TransactionScope,
  transactionId?: string,
  checkpointId?: string,
): ResolvedTraceIds {
  const resolvedTransactionId =
    transactionId ??
    (scope === 'main'
      ? context.getMainTransactionId()
      : context.getTransactionId());

  return {
    transactionId: resolvedTransactionId,
    checkpointId: checkpointId || '',
  };
}

/**
 * TransactionalTracer - base class for transactional tracing backends.
 *
 * @remarks
 * Every trace operation is abstract: a backend that forgets one does not
 * compile. Backends call {@link TransactionalTracer.resolveWithMain} or
 * {@link TransactionalTracer.resolveWithCurrent} before formatting an
 * entry, depending on whether nested work should be logged against the
 * outermost or the innermost transaction.
 *
 * @example
 * ```typescript
 * class ConsoleTracer extends TransactionalTracer {
 *   readonly name = 'console';
 *
 *   isEnabled(): boolean {
 *     return true;
 *   }
 *
 *   info(payload: TracePayload, options: TransactionalTraceOptions = {}): void {
 *     const { transactionId, checkpointId } = this.resolveWithCurrent(
 *       options.transactionId,
 *       options.checkpointId,
 *     );
 *     console.info(`[${transactionId}][${checkpointId}]`, payload);
 *   }
 *
 *   // ...remaining operations
 * }
 * ```
 */
export abstract class TransactionalTracer implements ITransactionalTracer {
  abstract readonly name: string;

  protected readonly transactionContext: ITransactionContext;

  constructor(transactionContext: ITransactionContext = transactionManager) {
    this.transactionContext = transactionContext;
  }

  /**
   * Resolve identifiers, falling back to the main transaction.
   */
  protected resolveWithMain(
    transactionId?: string,
    checkpointId?: string,
  ): ResolvedTraceIds {
    return resolveTraceIds(
      this.transactionContext,
      'main',
      transactionId,
      checkpointId,
    );
  }

  /**
   * Resolve identifiers, falling back to the current transaction.
   */
  protected resolveWithCurrent(
    transactionId?: string,
    checkpointId?: string,
  ): ResolvedTraceIds {
    return resolveTraceIds(
      this.transactionContext,
      'current',
      transactionId,
      checkpointId,
    );
  }

  abstract isEnabled(): boolean;

  abstract info(payload: TracePayload, options?: TransactionalTraceOptions): void;

  abstract debug(payload: TracePayload, options?: TransactionalTraceOptions): void;

  abstract warning(payload: TracePayload, options?: TransactionalTraceOptions): void;

  abstract error(payload: TracePayload, options?: TransactionalTraceOptions): void;

  abstract critical(payload: TracePayload, options?: TransactionalTraceOptions): void;

  abstract funcError(payload: TracePayload, options?: TransactionalTraceOptions): void;

  abstract techError(payload: TracePayload, options?: TechErrorTraceOptions): void;

  abstract reportStartExternal(
    payload: TracePayload,
    options?: TransactionalTraceOptions,
  ): void;

  abstract reportEndExternal(
    payload: TracePayload,
    options?: TransactionalTraceOptions,
  ): void;
}

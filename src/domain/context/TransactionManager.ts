/**
 * @fileoverview TransactionManager - AsyncLocalStorage-based Transaction Context
 *
 * @packageDocumentation
 * @module @tracewell/core/domain/context
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core Implementation)
 *
 * Concrete {@link ITransactionContext} backed by Node.js AsyncLocalStorage.
 *
 * Each call to {@link TransactionManager.runTransaction} opens a scope that
 * follows the callback through promises, timers and nested async functions.
 * Concurrent scopes never see each other's identifiers:
 *
 * ```
 * Execution Context 1 (Request A)  →  { main: 'tx-A', current: 'tx-A' }
 * Execution Context 2 (Request B)  →  { main: 'tx-B', current: 'tx-B-1' }
 * ```
 *
 * @see {@link https://nodejs.org/api/async_context.html | Node.js AsyncLocalStorage}
 * @version 1.0.0
 */

import { AsyncLocalStorage } from 'async_hooks';
import { v4 as uuidv4 } from 'uuid';
import { ITransactionContext, TransactionScopeOptions } from './ITransactionContext';

/**
 * Internal store structure for one transaction scope.
 *
 * @internal
 */
interface TransactionStore {
  /** Identifier of the outermost transaction of this chain */
  mainTransactionId: string;

  /** Identifier of this scope's transaction */
  transactionId: string;

  /** Nesting depth, 0 for the main transaction */
  depth: number;
}

/**
 * TransactionManager - opens transaction scopes and answers which
 * transaction is active.
 *
 * @remarks
 * Instances are independent: each one owns its AsyncLocalStorage, so a
 * test (or an embedded sub-system) can use its own manager without
 * touching the shared {@link transactionManager}.
 *
 * @example Basic usage
 * ```typescript
 * await transactionManager.runTransaction(async () => {
 *   tracer.info('order received'); // logged against the new transaction
 *
 *   await transactionManager.runTransaction(async () => {
 *     transactionManager.getMainTransactionId(); // outer id
 *     transactionManager.getTransactionId();     // inner id
 *   });
 * });
 * ```
 *
 * @example Continuing an incoming transaction
 * ```typescript
 * app.use((req, res, next) => {
 *   transactionManager.runTransaction(() => next(), {
 *     transactionId: req.headers['x-transaction-id'] as string | undefined,
 *   });
 * });
 * ```
 */
export class TransactionManager implements ITransactionContext {
  private readonly als = new AsyncLocalStorage<TransactionStore>();

  /**
   * Run a callback inside a new transaction scope.
   *
   * The first scope opened in an async chain becomes the main transaction;
   * scopes opened inside it keep the main id and only change the current one.
   *
   * @param callback - Work to run inside the scope; its result is returned as is
   * @param options - Optional explicit transaction id
   */
  runTransaction<R>(
    callback: () => R,
    options: TransactionScopeOptions = {},
  ): R {
    const parent = this.als.getStore();
    const transactionId = options.transactionId ?? uuidv4();

    const store: TransactionStore = parent
      ? {
          mainTransactionId: parent.mainTransactionId,
          transactionId,
          depth: parent.depth + 1,
        }
      : { mainTransactionId: transactionId, transactionId, depth: 0 };

    return this.als.run(store, callback);
  }

  getMainTransactionId(): string {
    return this.als.getStore()?.mainTransactionId ?? '';
  }

  getTransactionId(): string {
    return this.als.getStore()?.transactionId ?? '';
  }

  /**
   * Check whether the caller runs inside a transaction scope.
   */
  hasTransaction(): boolean {
    return this.als.getStore() !== undefined;
  }

  /**
   * Nesting depth of the current scope: 0 for the main transaction,
   * -1 outside any transaction.
   */
  getDepth(): number {
    return this.als.getStore()?.depth ?? -1;
  }
}

/**
 * Shared transaction manager used by tracers and filters when no
 * context is injected.
 */
export const transactionManager = new TransactionManager();

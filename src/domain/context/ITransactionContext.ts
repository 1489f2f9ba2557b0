/**
 * @fileoverview Transaction Context Interface - Domain Layer Core Abstraction
 *
 * @packageDocumentation
 * @module @tracewell/core/domain/context
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * A transaction is a logical unit of work. Transactions nest: the
 * outermost active transaction is the **main** transaction, the innermost
 * one is the **current** transaction. Outside any nested work both are
 * the same.
 *
 * ```
 * runTransaction(tx-A)            main: tx-A   current: tx-A
 *   └─ runTransaction(tx-B)       main: tx-A   current: tx-B
 *        └─ runTransaction(tx-C)  main: tx-A   current: tx-C
 * ```
 *
 * Tracers only ever read the context. Opening and closing transactions
 * belongs to the code that owns the unit of work.
 *
 * @see {@link TransactionManager} for the AsyncLocalStorage-based implementation
 * @version 1.0.0
 */

/**
 * ITransactionContext - read access to the active transaction identifiers.
 *
 * @remarks
 * Both accessors return an empty string when no transaction is active,
 * never `undefined`. A single read reflects the transaction active at the
 * moment of the call.
 *
 * @example
 * ```typescript
 * const context: ITransactionContext = transactionManager;
 *
 * transactionManager.runTransaction(() => {
 *   context.getMainTransactionId(); // 'tx-order-1'
 * }, { transactionId: 'tx-order-1' });
 * ```
 */
export interface ITransactionContext {
  /**
   * Identifier of the outermost active transaction.
   */
  getMainTransactionId(): string;

  /**
   * Identifier of the innermost active transaction.
   */
  getTransactionId(): string;
}

/**
 * Options for opening a transaction scope.
 */
export interface TransactionScopeOptions {
  /**
   * Identifier to use for the new transaction.
   * A random UUID (v4) is generated when omitted.
   */
  transactionId?: string;
}

/**
 * @tracewell/core - Context Module
 *
 * Transaction context propagation and access
 */

export type {
  ITransactionContext,
  TransactionScopeOptions,
} from './ITransactionContext';
export { TransactionManager, transactionManager } from './TransactionManager';

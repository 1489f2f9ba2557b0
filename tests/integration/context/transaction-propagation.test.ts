/**
 * @file Transaction Propagation Integration Tests
 * @description Transaction ids follow async work through AsyncLocalStorage
 * and reach the tracers without being passed around.
 */

import { describe, it, expect } from '@jest/globals';
import {
  PinoTransactionalTracer,
  TransactionManager,
} from '../../../src/index';

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('Transaction Propagation - AsyncLocalStorage', () => {
  // ============================================================================
  // TEST GROUP 1: Scopes
  // ============================================================================

  describe('Scopes', () => {
    it('should expose empty values outside any transaction', () => {
      const manager = new TransactionManager();

      expect(manager.getMainTransactionId()).toBe('');
      expect(manager.getTransactionId()).toBe('');
      expect(manager.hasTransaction()).toBe(false);
      expect(manager.getDepth()).toBe(-1);
    });

    it('should generate a uuid when no id is given', () => {
      const manager = new TransactionManager();

      const ids = manager.runTransaction(() => ({
        main: manager.getMainTransactionId(),
        current: manager.getTransactionId(),
      }));

      expect(ids.main).toMatch(UUID_PATTERN);
      expect(ids.current).toBe(ids.main);
    });

    it('should return the callback result', async () => {
      const manager = new TransactionManager();

      const total = await manager.runTransaction(async () => 40 + 2);

      expect(total).toBe(42);
    });

    it('should keep the main id across nested scopes and restore on exit', () => {
      const manager = new TransactionManager();
      const seen: Array<[string, string, number]> = [];

      manager.runTransaction(
        () => {
          seen.push([
            manager.getMainTransactionId(),
            manager.getTransactionId(),
            manager.getDepth(),
          ]);
          manager.runTransaction(
            () => {
              seen.push([
                manager.getMainTransactionId(),
                manager.getTransactionId(),
                manager.getDepth(),
              ]);
            },
            { transactionId: 'tx-child' },
          );
          seen.push([
            manager.getMainTransactionId(),
            manager.getTransactionId(),
            manager.getDepth(),
          ]);
        },
        { transactionId: 'tx-root' },
      );

      expect(seen).toEqual([
        ['tx-root', 'tx-root', 0],
        ['tx-root', 'tx-child', 1],
        ['tx-root', 'tx-root', 0],
      ]);
      expect(manager.hasTransaction()).toBe(false);
    });
  });

  // ============================================================================
  // TEST GROUP 2: Async Boundaries
  // ============================================================================

  describe('Async Boundaries', () => {
    it('should propagate through await and timers', async () => {
      const manager = new TransactionManager();

      const captured = await manager.runTransaction(
        async () => {
          await Promise.resolve();
          const afterAwait = manager.getTransactionId();
          await delay(5);
          const afterTimer = manager.getTransactionId();
          return [afterAwait, afterTimer];
        },
        { transactionId: 'tx-async' },
      );

      expect(captured).toEqual(['tx-async', 'tx-async']);
    });

    it('should propagate into Promise.all branches', async () => {
      const manager = new TransactionManager();

      const captured = await manager.runTransaction(
        () =>
          Promise.all(
            [3, 1, 2].map(async (ms) => {
              await delay(ms);
              return manager.getTransactionId();
            }),
          ),
        { transactionId: 'tx-parallel' },
      );

      expect(captured).toEqual(['tx-parallel', 'tx-parallel', 'tx-parallel']);
    });

    it('should isolate concurrent transactions', async () => {
      const manager = new TransactionManager();

      const run = (id: string, ms: number): Promise<string> =>
        manager.runTransaction(
          async () => {
            await delay(ms);
            return manager.getTransactionId();
          },
          { transactionId: id },
        );

      const results = await Promise.all([
        run('tx-a', 10),
        run('tx-b', 1),
        run('tx-c', 5),
      ]);

      expect(results).toEqual(['tx-a', 'tx-b', 'tx-c']);
    });
  });

  // ============================================================================
  // TEST GROUP 3: Tracer Integration
  // ============================================================================

  describe('Tracer Integration', () => {
    function createTracer(
      manager: TransactionManager,
      transactionScope: 'main' | 'current',
    ): { tracer: PinoTransactionalTracer; lines: Array<Record<string, unknown>> } {
      const lines: Array<Record<string, unknown>> = [];
      const tracer = new PinoTransactionalTracer({
        name: 'orders',
        level: 'info',
        transactionContext: manager,
        transactionScope,
        destination: {
          write(msg: string) {
            lines.push(JSON.parse(msg));
          },
        },
      });
      return { tracer, lines };
    }

    it('should log nested work against the innermost transaction', async () => {
      const manager = new TransactionManager();
      const { tracer, lines } = createTracer(manager, 'current');

      await manager.runTransaction(
        async () => {
          tracer.info('outer');
          await manager.runTransaction(
            async () => {
              await delay(1);
              tracer.info('inner');
            },
            { transactionId: 'tx-child' },
          );
        },
        { transactionId: 'tx-root' },
      );

      expect(lines.map((line) => [line['msg'], line['transactionId']])).toEqual([
        ['outer', 'tx-root'],
        ['inner', 'tx-child'],
      ]);
    });

    it('should log nested work against the main transaction', async () => {
      const manager = new TransactionManager();
      const { tracer, lines } = createTracer(manager, 'main');

      await manager.runTransaction(
        () =>
          manager.runTransaction(
            async () => {
              tracer.funcError('limit exceeded', { checkpointId: 'checkout' });
            },
            { transactionId: 'tx-child' },
          ),
        { transactionId: 'tx-root' },
      );

      expect(lines[0]).toMatchObject({
        msg: 'limit exceeded',
        errorType: 'functional',
        transactionId: 'tx-root',
        checkpointId: 'checkout',
      });
    });

    it('should log an empty transaction id outside any transaction', () => {
      const manager = new TransactionManager();
      const { tracer, lines } = createTracer(manager, 'current');

      tracer.info('startup');

      expect(lines[0]).toMatchObject({ transactionId: '', checkpointId: '' });
    });
  });
});

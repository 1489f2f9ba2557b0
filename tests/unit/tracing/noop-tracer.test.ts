/**
 * @fileoverview Unit tests for the no-op tracers
 */

import { describe, it, expect } from '@jest/globals';
import {
  IServiceTracer,
  ITransactionalTracer,
  NoopServiceTracer,
  NoopTransactionalTracer,
} from '../../../src';

describe('NoopServiceTracer', () => {
  it('should be disabled and accept every call', () => {
    const tracer: IServiceTracer = new NoopServiceTracer();

    expect(tracer.name).toBe('noop');
    expect(tracer.isEnabled()).toBe(false);
    expect(() => {
      tracer.info('info', { checkpointId: 'startup' });
      tracer.debug({ step: 1 });
      tracer.warning('warning');
      tracer.error('error');
      tracer.critical('critical');
    }).not.toThrow();
  });
});

describe('NoopTransactionalTracer', () => {
  it('should be disabled and accept every call', () => {
    const tracer: ITransactionalTracer = new NoopTransactionalTracer();

    expect(tracer.isEnabled()).toBe(false);
    expect(() => {
      tracer.info('info', { transactionId: 'tx-1' });
      tracer.funcError('rule broken');
      tracer.techError('io failed', { error: new Error('EPIPE') });
      tracer.reportStartExternal('crm');
      tracer.reportEndExternal('crm');
    }).not.toThrow();
  });
});

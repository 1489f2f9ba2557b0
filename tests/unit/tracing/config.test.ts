/**
 * @fileoverview Unit tests for tracing configuration
 */

import { describe, it, expect } from '@jest/globals';
import {
  createServiceTracer,
  createTransactionalTracer,
  loadTracingConfig,
  PinoServiceTracer,
  PinoTransactionalTracer,
  TracingConfigError,
} from '../../../src';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('loadTracingConfig', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadTracingConfig({})).toEqual({
      serviceName: 'app',
      level: 'info',
      transactionScope: 'current',
    });
  });

  it('should read every variable', () => {
    const config = loadTracingConfig({
      TRACING_SERVICE_NAME: 'orders',
      LOG_LEVEL: 'debug',
      TRACING_TRANSACTION_SCOPE: 'main',
    });

    expect(config).toEqual({
      serviceName: 'orders',
      level: 'debug',
      transactionScope: 'main',
    });
  });

  it('should ignore unrelated variables', () => {
    const config = loadTracingConfig({ HOME: '/home/app', LOG_LEVEL: 'warn' });

    expect(config.level).toBe('warn');
  });

  it('should reject an unknown log level', () => {
    const error = captureError(() => loadTracingConfig({ LOG_LEVEL: 'verbose' }));

    expect(error).toBeInstanceOf(TracingConfigError);
    if (error instanceof TracingConfigError) {
      expect(error.name).toBe('TracingConfigError');
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0].startsWith('LOG_LEVEL: ')).toBe(true);
      expect(error.message).toBe(
        `Invalid tracing configuration: ${error.issues[0]}`,
      );
    }
  });

  it('should reject an empty service name', () => {
    const error = captureError(() =>
      loadTracingConfig({ TRACING_SERVICE_NAME: '' }),
    );

    expect(error).toBeInstanceOf(TracingConfigError);
    if (error instanceof TracingConfigError) {
      expect(error.issues).toEqual([
        'TRACING_SERVICE_NAME: Service name cannot be empty',
      ]);
    }
  });

  it('should report every invalid variable at once', () => {
    const error = captureError(() =>
      loadTracingConfig({
        LOG_LEVEL: 'loud',
        TRACING_TRANSACTION_SCOPE: 'outer',
      }),
    );

    expect(error).toBeInstanceOf(TracingConfigError);
    if (error instanceof TracingConfigError) {
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0].startsWith('LOG_LEVEL: ')).toBe(true);
      expect(error.issues[1].startsWith('TRACING_TRANSACTION_SCOPE: ')).toBe(
        true,
      );
    }
  });
});

describe('Tracer factories', () => {
  const config = loadTracingConfig({
    TRACING_SERVICE_NAME: 'billing',
    LOG_LEVEL: 'silent',
    TRACING_TRANSACTION_SCOPE: 'main',
  });

  it('should build a transactional tracer from the configuration', () => {
    const tracer = createTransactionalTracer(config);

    expect(tracer).toBeInstanceOf(PinoTransactionalTracer);
    expect(tracer.name).toBe('billing');
    expect(tracer.transactionScope).toBe('main');
    expect(tracer.isEnabled()).toBe(false);
  });

  it('should build a service tracer from the configuration', () => {
    const tracer = createServiceTracer(config);

    expect(tracer).toBeInstanceOf(PinoServiceTracer);
    expect(tracer.name).toBe('billing');
    expect(tracer.isEnabled()).toBe(false);
  });
});

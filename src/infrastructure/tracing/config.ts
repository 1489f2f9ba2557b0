/**
 * @tracewell/core - Tracing Configuration
 *
 * Reads tracing settings from environment variables, validates them with
 * zod and builds the pino-backed tracers from the result.
 *
 * | Variable                    | Values                                            | Default   |
 * |-----------------------------|---------------------------------------------------|-----------|
 * | `TRACING_SERVICE_NAME`      | non-empty string                                  | `app`     |
 * | `LOG_LEVEL`                 | fatal, error, warn, info, debug, trace, silent    | `info`    |
 * | `TRACING_TRANSACTION_SCOPE` | main, current                                     | `current` |
 *
 * @module infrastructure/tracing/config
 */

import { z } from 'zod';
import type { LogLevel } from '../logging/logger';
import {
  PinoServiceTracer,
  type PinoServiceTracerOptions,
} from './PinoServiceTracer';
import {
  PinoTransactionalTracer,
  type PinoTransactionalTracerOptions,
} from './PinoTransactionalTracer';
import type { TransactionScope } from './TransactionalTracer';

/**
 * Schema for the tracing environment variables.
 */
export const tracingEnvSchema = z.object({
  TRACING_SERVICE_NAME: z
    .string()
    .min(1, 'Service name cannot be empty')
    .default('app'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  TRACING_TRANSACTION_SCOPE: z.enum(['main', 'current']).default('current'),
});

/**
 * Validated tracing configuration.
 */
export interface TracingConfig {
  serviceName: string;
  level: LogLevel;
  transactionScope: TransactionScope;
}

/**
 * Error thrown when the tracing environment is invalid.
 */
export class TracingConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[],
  ) {
    super(message);
    this.name = 'TracingConfigError';
  }
}

/**
 * Load and validate the tracing configuration.
 *
 * @param env - Variables to read, `process.env` by default
 * @throws TracingConfigError listing every invalid variable
 *
 * @example
 * ```typescript
 * const config = loadTracingConfig();
 * const tracer = createTransactionalTracer(config);
 * ```
 */
export function loadTracingConfig(
  env: NodeJS.ProcessEnv = process.env,
): TracingConfig {
  const result = tracingEnvSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new TracingConfigError(
      `Invalid tracing configuration: ${issues.join('; ')}`,
      issues,
    );
  }

  return {
    serviceName: result.data.TRACING_SERVICE_NAME,
    level: result.data.LOG_LEVEL,
    transactionScope: result.data.TRACING_TRANSACTION_SCOPE,
  };
}

/**
 * Build a transactional tracer from a loaded configuration.
 */
export function createTransactionalTracer(
  config: TracingConfig,
  options: Omit<
    PinoTransactionalTracerOptions,
    'name' | 'level' | 'transactionScope'
  > = {},
): PinoTransactionalTracer {
  return new PinoTransactionalTracer({
    ...options,
    name: config.serviceName,
    level: config.level,
    transactionScope: config.transactionScope,
  });
}

/**
 * Build a service tracer from a loaded configuration.
 */
export function createServiceTracer(
  config: TracingConfig,
  options: Omit<PinoServiceTracerOptions, 'name' | 'level'> = {},
): PinoServiceTracer {
  return new PinoServiceTracer({
    ...options,
    name: config.serviceName,
    level: config.level,
  });
}

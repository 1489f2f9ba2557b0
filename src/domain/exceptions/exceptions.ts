/**
 * @tracewell/core - Exception Filter Interface
 *
 * Turns caught errors into transport-neutral error responses and reports
 * them through a transactional tracer: domain exceptions as functional
 * errors, everything else as technical errors.
 */

import type { ITransactionContext } from '../context/ITransactionContext';
import { transactionManager } from '../context/TransactionManager';
import { createLogger, type Logger } from '../../infrastructure/logging/logger';
import type { TraceExtra } from '../../infrastructure/tracing/ITracer';
import type { ITransactionalTracer } from '../../infrastructure/tracing/ITransactionalTracer';
import {
  resolveTraceIds,
  type ResolvedTraceIds,
} from '../../infrastructure/tracing/TransactionalTracer';
import { DomainException, type DomainExceptionKind } from './DomainException';
import {
  ErrorExtException,
  type ErrorExtKind,
} from './ExternalInteractionError';

/**
 * Status codes produced by the built-in filters (HTTP-compatible).
 */
export enum ErrorStatus {
  FORBIDDEN = 403,
  NOT_FOUND = 404,
  UNPROCESSABLE_ENTITY = 422,
  INTERNAL_SERVER_ERROR = 500,
  BAD_GATEWAY = 502,
  SERVICE_UNAVAILABLE = 503,
  GATEWAY_TIMEOUT = 504,
}

const STATUS_TEXT: Readonly<Record<ErrorStatus, string>> = {
  [ErrorStatus.FORBIDDEN]: 'Forbidden',
  [ErrorStatus.NOT_FOUND]: 'Not Found',
  [ErrorStatus.UNPROCESSABLE_ENTITY]: 'Unprocessable Entity',
  [ErrorStatus.INTERNAL_SERVER_ERROR]: 'Internal Server Error',
  [ErrorStatus.BAD_GATEWAY]: 'Bad Gateway',
  [ErrorStatus.SERVICE_UNAVAILABLE]: 'Service Unavailable',
  [ErrorStatus.GATEWAY_TIMEOUT]: 'Gateway Timeout',
};

/**
 * Exception context containing the error and where it happened
 */
export interface ExceptionContext {
  /** The caught value */
  error: unknown;

  /** Transaction the failure belongs to; resolved from the context when omitted */
  transactionId?: string;

  /** Checkpoint the failure happened at */
  checkpointId?: string;

  /** Timestamp when exception occurred */
  timestamp: Date;

  /** Additional metadata, forwarded to the tracer as extra fields */
  metadata?: TraceExtra;
}

/**
 * Body of an error response
 */
export interface ErrorResponseBody {
  error: string;
  message: string;
  statusCode: number;
  keyname?: string;
  kind?: string;
  transactionId: string;
  checkpointId: string;
  timestamp: string;
}

/**
 * Error response produced by a filter
 */
export interface ErrorResponse {
  status: ErrorStatus;
  body: ErrorResponseBody;
}

/**
 * IExceptionFilter - Exception handling interface
 *
 * A filter either returns a response or rethrows the error so the next
 * filter of an {@link ExceptionFilterChain} can try.
 *
 * @example
 * ```typescript
 * const chain = new ExceptionFilterChain().addFilters([
 *   new DomainExceptionFilter({ tracer }),
 *   new ExternalInteractionExceptionFilter({ tracer }),
 *   new DefaultExceptionFilter({ tracer }),
 * ]);
 *
 * try {
 *   await useCase.execute(command);
 * } catch (error) {
 *   const response = await chain.catch({ error, timestamp: new Date() });
 *   reply.status(response.status).send(response.body);
 * }
 * ```
 */
export interface IExceptionFilter {
  /**
   * Handle an exception and return a response
   *
   * @param ctx - Exception context
   * @returns Response to send to client, or throws to pass to next filter
   */
  catch(ctx: ExceptionContext): Promise<ErrorResponse>;
}

/**
 * Exception filter function type
 */
export type ExceptionFilterFunction = (
  ctx: ExceptionContext,
) => Promise<ErrorResponse>;

/**
 * Create an exception filter from a function
 */
export function createExceptionFilter(
  fn: ExceptionFilterFunction,
): IExceptionFilter {
  return { catch: fn };
}

/**
 * Options shared by the built-in filters
 */
export interface ExceptionFilterOptions {
  /** Tracer failures are reported to */
  tracer: ITransactionalTracer;

  /** Source of transaction ids; the shared transaction manager by default */
  transactionContext?: ITransactionContext;

  /**
   * Called when the tracer throws while reporting. The response is still
   * returned. Defaults to an error line on a pino logger.
   */
  onTracerError?: (error: unknown) => void;
}

let fallbackLogger: Logger | undefined;

function logTracerFailure(error: unknown): void {
  fallbackLogger ??= createLogger({ name: 'exception-filter' });
  fallbackLogger.error(
    { err: error },
    'Tracer failed while reporting an exception',
  );
}

function buildResponse(
  status: ErrorStatus,
  message: string,
  ids: ResolvedTraceIds,
  timestamp: Date,
  details: { keyname?: string; kind?: string } = {},
): ErrorResponse {
  return {
    status,
    body: {
      error: STATUS_TEXT[status],
      message,
      statusCode: status,
      ...details,
      transactionId: ids.transactionId,
      checkpointId: ids.checkpointId,
      timestamp: timestamp.toISOString(),
    },
  };
}

/**
 * Base of the built-in filters: tracer access and id resolution.
 */
abstract class TracingExceptionFilter implements IExceptionFilter {
  private readonly tracer: ITransactionalTracer;
  private readonly transactionContext: ITransactionContext;
  private readonly onTracerError: (error: unknown) => void;

  constructor(options: ExceptionFilterOptions) {
    this.tracer = options.tracer;
    this.transactionContext = options.transactionContext ?? transactionManager;
    this.onTracerError = options.onTracerError ?? logTracerFailure;
  }

  abstract catch(ctx: ExceptionContext): Promise<ErrorResponse>;

  /**
   * Run a tracer call. A throwing tracer goes to `onTracerError` and never
   * reaches the chain, which would read it as "not handled".
   */
  protected report(trace: (tracer: ITransactionalTracer) => void): void {
    try {
      trace(this.tracer);
    } catch (error) {
      this.onTracerError(error);
    }
  }

  protected resolveIds(ctx: ExceptionContext): ResolvedTraceIds {
    return resolveTraceIds(
      this.transactionContext,
      'current',
      ctx.transactionId,
      ctx.checkpointId,
    );
  }
}

// ==================== Built-in Exception Filters ====================

function domainStatus(kind: DomainExceptionKind): ErrorStatus {
  switch (kind) {
    case 'not-found':
      return ErrorStatus.NOT_FOUND;
    case 'not-allowed':
      return ErrorStatus.FORBIDDEN;
    case 'domain':
      return ErrorStatus.UNPROCESSABLE_ENTITY;
    default: {
      const unhandled: never = kind;
      throw new Error(`Unhandled domain exception kind: ${String(unhandled)}`);
    }
  }
}

/**
 * Domain exception filter - handles DomainException and its subtypes
 *
 * `NotFound` → 404, `NotAllowed` → 403, any other domain exception → 422.
 * Reported as a functional error.
 */
export class DomainExceptionFilter extends TracingExceptionFilter {
  async catch(ctx: ExceptionContext): Promise<ErrorResponse> {
    const { error } = ctx;

    if (!(error instanceof DomainException)) {
      throw error; // Pass to next filter
    }

    const ids = this.resolveIds(ctx);
    this.report((tracer) =>
      tracer.funcError(error.message, {
        ...ids,
        extra: { ...ctx.metadata, keyname: error.keyname, kind: error.kind },
      }),
    );

    return buildResponse(
      domainStatus(error.kind),
      error.message,
      ids,
      ctx.timestamp,
      { keyname: error.keyname, kind: error.kind },
    );
  }
}

function externalStatus(kind: ErrorExtKind): ErrorStatus {
  switch (kind) {
    case 'timeout':
      return ErrorStatus.GATEWAY_TIMEOUT;
    case 'connection':
    case 'delivery':
      return ErrorStatus.SERVICE_UNAVAILABLE;
    case 'interface':
    case 'configuration':
    case 'internal':
    case 'processing':
      return ErrorStatus.INTERNAL_SERVER_ERROR;
    case 'error':
    case 'external-dependency':
    case 'data':
    case 'operational':
    case 'authentication':
    case 'authorization':
    case 'integrity':
    case 'programming':
    case 'not-supported':
    case 'invalid-data':
      return ErrorStatus.BAD_GATEWAY;
    default: {
      const unhandled: never = kind;
      throw new Error(
        `Unhandled external interaction kind: ${String(unhandled)}`,
      );
    }
  }
}

/**
 * External interaction filter - handles ErrorExtException and its subtypes
 *
 * Timeouts → 504, connection and delivery failures → 503, interface and
 * internal failures → 500, other dependency failures → 502. Warnings are
 * not errors and pass through. Reported as a technical error.
 */
export class ExternalInteractionExceptionFilter extends TracingExceptionFilter {
  async catch(ctx: ExceptionContext): Promise<ErrorResponse> {
    const { error } = ctx;

    if (!(error instanceof ErrorExtException)) {
      throw error; // Pass to next filter
    }

    const ids = this.resolveIds(ctx);
    this.report((tracer) =>
      tracer.techError(error.message, {
        ...ids,
        error,
        extra: { ...ctx.metadata, kind: error.kind },
      }),
    );

    return buildResponse(
      externalStatus(error.kind),
      error.message,
      ids,
      ctx.timestamp,
      { kind: error.kind },
    );
  }
}

/**
 * Options of the default filter
 */
export interface DefaultExceptionFilterOptions extends ExceptionFilterOptions {
  /**
   * Expose the original message in the response.
   * @defaultValue true unless NODE_ENV is 'production'
   */
  includeDetails?: boolean;
}

/**
 * Default exception filter - handles all exceptions
 *
 * Answers 500 and reports a technical error. The original message is
 * replaced by a generic one unless `includeDetails` is set.
 */
export class DefaultExceptionFilter extends TracingExceptionFilter {
  private readonly includeDetails: boolean;

  constructor(options: DefaultExceptionFilterOptions) {
    super(options);
    this.includeDetails =
      options.includeDetails ?? process.env.NODE_ENV !== 'production';
  }

  async catch(ctx: ExceptionContext): Promise<ErrorResponse> {
    const { error } = ctx;
    const message = error instanceof Error ? error.message : String(error);
    const ids = this.resolveIds(ctx);

    this.report((tracer) =>
      tracer.techError(message, { ...ids, error, extra: ctx.metadata }),
    );

    return buildResponse(
      ErrorStatus.INTERNAL_SERVER_ERROR,
      this.includeDetails ? message : 'An unexpected error occurred',
      ids,
      ctx.timestamp,
    );
  }
}

/**
 * Exception filter chain - runs filters in order
 */
export class ExceptionFilterChain implements IExceptionFilter {
  private filters: IExceptionFilter[] = [];

  constructor(
    private readonly transactionContext: ITransactionContext = transactionManager,
  ) {}

  /**
   * Add a filter to the chain
   */
  addFilter(filter: IExceptionFilter): this {
    this.filters.push(filter);
    return this;
  }

  /**
   * Add multiple filters
   */
  addFilters(filters: IExceptionFilter[]): this {
    this.filters.push(...filters);
    return this;
  }

  async catch(ctx: ExceptionContext): Promise<ErrorResponse> {
    let lastError: unknown = ctx.error;

    for (const filter of this.filters) {
      try {
        return await filter.catch({ ...ctx, error: lastError });
      } catch (error) {
        lastError = error;
      }
    }

    // If no filter handled it, use default response
    return buildResponse(
      ErrorStatus.INTERNAL_SERVER_ERROR,
      lastError instanceof Error ? lastError.message : String(lastError),
      resolveTraceIds(
        this.transactionContext,
        'current',
        ctx.transactionId,
        ctx.checkpointId,
      ),
      ctx.timestamp,
    );
  }
}

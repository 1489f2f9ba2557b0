/**
 * @tracewell/core - External Interaction Errors
 *
 * Failures attributable to a call that crosses the system boundary
 * (network, database, third-party service). The class raised is the
 * classification; handling code catches at the granularity it needs:
 *
 * ```
 * ExternalInteractionError
 * ├─ WarningExtException
 * └─ ErrorExtException
 *    ├─ InterfaceExtException
 *    │  └─ ConfigurationExtException
 *    ├─ ExternalDependencyErrorExtException
 *    │  ├─ DataErrorExtException
 *    │  ├─ OperationalErrorExtException
 *    │  │  ├─ ConnectionExtException
 *    │  │  ├─ TimeoutExtException
 *    │  │  ├─ AuthenticationExtException
 *    │  │  ├─ AuthorizationExtException
 *    │  │  └─ DeliveryExtException
 *    │  ├─ IntegrityErrorExtException
 *    │  ├─ ProgrammingErrorExtException
 *    │  ├─ NotSupportedErrorExtException
 *    │  └─ InvalidDataExtException
 *    └─ InternalErrorExtException
 *       └─ ProcessingExtException
 * ```
 *
 * Every class also carries a `kind` literal. The `kind` type of an
 * intermediate class is the union of its own kind and its descendants',
 * so a `switch` over `kind` can be checked for exhaustiveness.
 */

// ==================== Kinds ====================

export type OperationalErrorKind =
  | 'operational'
  | 'connection'
  | 'timeout'
  | 'authentication'
  | 'authorization'
  | 'delivery';

export type ExternalDependencyErrorKind =
  | 'external-dependency'
  | 'data'
  | OperationalErrorKind
  | 'integrity'
  | 'programming'
  | 'not-supported'
  | 'invalid-data';

export type InterfaceErrorKind = 'interface' | 'configuration';

export type InternalErrorKind = 'internal' | 'processing';

export type ErrorExtKind =
  | 'error'
  | InterfaceErrorKind
  | ExternalDependencyErrorKind
  | InternalErrorKind;

export type ExternalInteractionKind =
  | 'external-interaction'
  | 'warning'
  | ErrorExtKind;

/**
 * Options accepted by every external interaction error.
 */
export interface ExternalInteractionErrorOptions {
  /** Underlying error reported by the client library */
  cause?: unknown;
}

// ==================== Root ====================

/**
 * Base class of every external interaction failure.
 *
 * @example
 * ```typescript
 * try {
 *   return await paymentGateway.charge(order);
 * } catch (error) {
 *   throw new TimeoutExtException('payment gateway did not answer', {
 *     cause: error,
 *   });
 * }
 * ```
 */
export class ExternalInteractionError extends Error {
  readonly kind: ExternalInteractionKind = 'external-interaction';

  constructor(message = '', options: ExternalInteractionErrorOptions = {}) {
    super(
      message,
      options.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = new.target.name;
    Error.captureStackTrace(this, new.target);
  }
}

/** The external system answered, but flagged something worth noting. */
export class WarningExtException extends ExternalInteractionError {
  readonly kind: 'warning' = 'warning';
}

/** The external interaction failed. */
export class ErrorExtException extends ExternalInteractionError {
  readonly kind: ErrorExtKind = 'error';
}

// ==================== Interface ====================

/** Our side of the integration is wrong (client setup, contract mismatch). */
export class InterfaceExtException extends ErrorExtException {
  readonly kind: InterfaceErrorKind = 'interface';
}

export class ConfigurationExtException extends InterfaceExtException {
  readonly kind: 'configuration' = 'configuration';
}

// ==================== External dependency ====================

/** The dependency itself reported or caused the failure. */
export class ExternalDependencyErrorExtException extends ErrorExtException {
  readonly kind: ExternalDependencyErrorKind = 'external-dependency';
}

/** Problem with the processed data (division by zero, value out of range...). */
export class DataErrorExtException extends ExternalDependencyErrorExtException {
  readonly kind: 'data' = 'data';
}

/** The dependency could not operate: unreachable, slow, rejecting us. */
export class OperationalErrorExtException extends ExternalDependencyErrorExtException {
  readonly kind: OperationalErrorKind = 'operational';
}

export class ConnectionExtException extends OperationalErrorExtException {
  readonly kind: 'connection' = 'connection';
}

export class TimeoutExtException extends OperationalErrorExtException {
  readonly kind: 'timeout' = 'timeout';
}

export class AuthenticationExtException extends OperationalErrorExtException {
  readonly kind: 'authentication' = 'authentication';
}

export class AuthorizationExtException extends OperationalErrorExtException {
  readonly kind: 'authorization' = 'authorization';
}

/** A message or request could not be delivered. */
export class DeliveryExtException extends OperationalErrorExtException {
  readonly kind: 'delivery' = 'delivery';
}

/** Relational integrity violated (duplicate key, broken foreign key). */
export class IntegrityErrorExtException extends ExternalDependencyErrorExtException {
  readonly kind: 'integrity' = 'integrity';
}

/** The request was malformed for the dependency (bad query, wrong arity). */
export class ProgrammingErrorExtException extends ExternalDependencyErrorExtException {
  readonly kind: 'programming' = 'programming';
}

export class NotSupportedErrorExtException extends ExternalDependencyErrorExtException {
  readonly kind: 'not-supported' = 'not-supported';
}

export class InvalidDataExtException extends ExternalDependencyErrorExtException {
  readonly kind: 'invalid-data' = 'invalid-data';
}

// ==================== Internal ====================

/** The dependency failed internally. */
export class InternalErrorExtException extends ErrorExtException {
  readonly kind: InternalErrorKind = 'internal';
}

export class ProcessingExtException extends InternalErrorExtException {
  readonly kind: 'processing' = 'processing';
}

/**
 * Union of every external interaction error class.
 */
export type ExternalInteractionFailure =
  | ExternalInteractionError
  | WarningExtException
  | ErrorExtException
  | InterfaceExtException
  | ConfigurationExtException
  | ExternalDependencyErrorExtException
  | DataErrorExtException
  | OperationalErrorExtException
  | ConnectionExtException
  | TimeoutExtException
  | AuthenticationExtException
  | AuthorizationExtException
  | DeliveryExtException
  | IntegrityErrorExtException
  | ProgrammingErrorExtException
  | NotSupportedErrorExtException
  | InvalidDataExtException
  | InternalErrorExtException
  | ProcessingExtException;

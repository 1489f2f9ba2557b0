/**
 * @tracewell/core - Exception Module
 *
 * Domain and external interaction taxonomies plus the filters that turn
 * them into error responses
 */

// Domain exceptions
export { DomainException, NotFound, NotAllowed } from './DomainException';
export type { DomainExceptionKind } from './DomainException';

// External interaction errors
export {
  ExternalInteractionError,
  WarningExtException,
  ErrorExtException,
  InterfaceExtException,
  ConfigurationExtException,
  ExternalDependencyErrorExtException,
  DataErrorExtException,
  OperationalErrorExtException,
  ConnectionExtException,
  TimeoutExtException,
  AuthenticationExtException,
  AuthorizationExtException,
  DeliveryExtException,
  IntegrityErrorExtException,
  ProgrammingErrorExtException,
  NotSupportedErrorExtException,
  InvalidDataExtException,
  InternalErrorExtException,
  ProcessingExtException,
} from './ExternalInteractionError';
export type {
  ExternalInteractionKind,
  ErrorExtKind,
  InterfaceErrorKind,
  ExternalDependencyErrorKind,
  OperationalErrorKind,
  InternalErrorKind,
  ExternalInteractionErrorOptions,
  ExternalInteractionFailure,
} from './ExternalInteractionError';

// Built-in filters
export {
  createExceptionFilter,
  ErrorStatus,
  DomainExceptionFilter,
  ExternalInteractionExceptionFilter,
  DefaultExceptionFilter,
  ExceptionFilterChain,
} from './exceptions';
export type {
  IExceptionFilter,
  ExceptionFilterFunction,
  ExceptionFilterOptions,
  DefaultExceptionFilterOptions,
  ExceptionContext,
  ErrorResponse,
  ErrorResponseBody,
} from './exceptions';

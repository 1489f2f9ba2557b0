/**
 * @tracewell/core - Domain Exceptions
 *
 * Business-rule failures raised by the application's own logic.
 * Each carries a machine-readable `keyname` and a human-readable message,
 * both fixed at construction; the subtype encodes the category.
 */

/**
 * Category discriminant of a domain exception.
 */
export type DomainExceptionKind = 'domain' | 'not-found' | 'not-allowed';

/**
 * Base domain exception.
 *
 * @example
 * ```typescript
 * try {
 *   await orders.cancel(orderId);
 * } catch (error) {
 *   if (error instanceof NotFound) {
 *     // 404-style handling
 *   } else if (error instanceof DomainException) {
 *     // any other business-rule failure
 *   }
 *   throw error;
 * }
 * ```
 */
export class DomainException extends Error {
  readonly kind: DomainExceptionKind = 'domain';
  declare readonly message: string;

  constructor(
    public readonly keyname: string,
    message: string,
  ) {
    super(message);
    this.name = 'DomainException';
    Error.captureStackTrace(this, this.constructor);
    Object.defineProperty(this, 'message', { writable: false });
    Object.defineProperty(this, 'keyname', { writable: false });
  }
}

/**
 * The subject of the operation does not exist.
 */
export class NotFound extends DomainException {
  readonly kind: 'not-found' = 'not-found';

  constructor(keyname: string, message: string) {
    super(keyname, message);
    this.name = 'NotFound';
  }
}

/**
 * The operation is forbidden for the current actor or state.
 */
export class NotAllowed extends DomainException {
  readonly kind: 'not-allowed' = 'not-allowed';

  constructor(keyname: string, message: string) {
    super(keyname, message);
    this.name = 'NotAllowed';
  }
}

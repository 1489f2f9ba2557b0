/**
 * @fileoverview Unit tests for the domain exception hierarchy
 */

import {
  DomainException,
  ExternalInteractionError,
  NotAllowed,
  NotFound,
} from '../../../src';

describe('DomainException', () => {
  describe('Hierarchy', () => {
    it('should derive NotFound and NotAllowed from DomainException', () => {
      expect(new NotFound('user-not-found', 'User not found')).toBeInstanceOf(
        DomainException,
      );
      expect(
        new NotAllowed('action-restricted', 'You cannot perform this action'),
      ).toBeInstanceOf(DomainException);
    });

    it('should derive DomainException from Error', () => {
      expect(new DomainException('general-error', 'boom')).toBeInstanceOf(Error);
    });

    it('should stay apart from external interaction errors', () => {
      expect(new NotFound('order-missing', 'Order missing')).not.toBeInstanceOf(
        ExternalInteractionError,
      );
    });
  });

  describe('Fields', () => {
    it('should expose keyname and message', () => {
      const exception = new DomainException(
        'general-error',
        'A general error occurred',
      );

      expect(exception.keyname).toBe('general-error');
      expect(exception.message).toBe('A general error occurred');
    });

    it('should keep keyname and message on subtypes', () => {
      const notFound = new NotFound('user-not-found', 'User not found');
      const notAllowed = new NotAllowed(
        'action-restricted',
        'You cannot perform this action',
      );

      expect(notFound.keyname).toBe('user-not-found');
      expect(notFound.message).toBe('User not found');
      expect(notAllowed.keyname).toBe('action-restricted');
      expect(notAllowed.message).toBe('You cannot perform this action');
    });

    it('should refuse to change keyname and message after construction', () => {
      const exception = new NotFound('user-not-found', 'User not found');

      expect(Reflect.set(exception, 'message', 'changed')).toBe(false);
      expect(Reflect.set(exception, 'keyname', 'changed')).toBe(false);
      expect(exception.message).toBe('User not found');
      expect(exception.keyname).toBe('user-not-found');
    });

    it('should accept empty strings', () => {
      const exception = new NotFound('', '');

      expect(exception.keyname).toBe('');
      expect(exception.message).toBe('');
    });

    it('should tag each category with its kind and name', () => {
      expect(new DomainException('k', 'm')).toMatchObject({
        kind: 'domain',
        name: 'DomainException',
      });
      expect(new NotFound('k', 'm')).toMatchObject({
        kind: 'not-found',
        name: 'NotFound',
      });
      expect(new NotAllowed('k', 'm')).toMatchObject({
        kind: 'not-allowed',
        name: 'NotAllowed',
      });
    });
  });

  describe('Catching', () => {
    it('should catch NotFound as DomainException', () => {
      expect(() => {
        throw new NotFound('resource-missing', 'Requested resource is missing');
      }).toThrowErrorType(DomainException);
    });

    it('should catch NotAllowed as DomainException', () => {
      expect(() => {
        throw new NotAllowed('forbidden', 'This action is not allowed');
      }).toThrowErrorType(DomainException);
    });

    it('should catch each category by its own type only', () => {
      expect(() => {
        throw new NotFound('user-missing', 'User does not exist');
      }).toThrowErrorType(NotFound);
      expect(() => {
        throw new NotAllowed('forbidden', 'This action is not allowed');
      }).not.toThrowErrorType(NotFound);
    });
  });
});

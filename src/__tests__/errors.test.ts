/**
 * Unit tests for error handling
 */

import {
  ShippingError,
  ErrorCode,
  errorMessage,
  isNotFoundError,
  isRetryableError,
  providerStatusToErrorCode,
} from '../errors';

describe('Error Handling', () => {
  describe('ShippingError', () => {
    it('should create error with code and message', () => {
      const error = new ShippingError(ErrorCode.FORMAT_ERROR, 'CSV file must have at least 2 header rows');

      expect(error.code).toBe(ErrorCode.FORMAT_ERROR);
      expect(error.message).toBe('CSV file must have at least 2 header rows');
      expect(error.name).toBe('ShippingError');
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(ShippingError);
    });

    it('should include optional details', () => {
      const details = { column: 3 };
      const error = new ShippingError(ErrorCode.FORMAT_ERROR, 'Unexpected header', { details });

      expect(error.details).toEqual(details);
    });

    it('should include HTTP status code', () => {
      const error = new ShippingError(ErrorCode.PROVIDER_UNAVAILABLE, 'usps responded with HTTP 503', { statusCode: 503 });

      expect(error.statusCode).toBe(503);
    });

    it('should include original error', () => {
      const originalError = new Error('socket hang up');
      const error = new ShippingError(ErrorCode.NETWORK_ERROR, 'Network failed', { originalError });

      expect(error.originalError).toBe(originalError);
    });

    it('should convert to ErrorInfo format', () => {
      const error = new ShippingError(ErrorCode.ADDRESS_NOT_FOUND, 'Address not found', {
        details: { addressId: 'a-1' },
      });

      expect(error.toErrorInfo()).toEqual({
        code: ErrorCode.ADDRESS_NOT_FOUND,
        message: 'Address not found',
        details: { addressId: 'a-1' },
      });
    });
  });

  describe('Error Code Utilities', () => {
    it('should classify provider HTTP statuses', () => {
      expect(providerStatusToErrorCode(400)).toBe(ErrorCode.PROVIDER_REJECTED);
      expect(providerStatusToErrorCode(403)).toBe(ErrorCode.PROVIDER_REJECTED);
      expect(providerStatusToErrorCode(429)).toBe(ErrorCode.PROVIDER_RATE_LIMITED);
      expect(providerStatusToErrorCode(500)).toBe(ErrorCode.PROVIDER_UNAVAILABLE);
      expect(providerStatusToErrorCode(503)).toBe(ErrorCode.PROVIDER_UNAVAILABLE);
    });

    it('should identify retryable errors', () => {
      const retryableErrors = [
        ErrorCode.TIMEOUT,
        ErrorCode.NETWORK_ERROR,
        ErrorCode.PROVIDER_RATE_LIMITED,
        ErrorCode.PROVIDER_UNAVAILABLE,
      ];

      retryableErrors.forEach((code) => {
        const error = new ShippingError(code, 'Error message');
        expect(isRetryableError(error)).toBe(true);
      });
    });

    it('should not retry non-retryable errors', () => {
      const nonRetryableErrors = [
        ErrorCode.INVALID_REQUEST,
        ErrorCode.INVALID_RESPONSE,
        ErrorCode.PROVIDER_REJECTED,
        ErrorCode.UNKNOWN,
      ];

      nonRetryableErrors.forEach((code) => {
        const error = new ShippingError(code, 'Error message');
        expect(isRetryableError(error)).toBe(false);
      });
    });

    it('should recognise not-found errors only', () => {
      expect(isNotFoundError(new ShippingError(ErrorCode.SHIPMENT_NOT_FOUND, 'Shipment not found'))).toBe(true);
      expect(isNotFoundError(new ShippingError(ErrorCode.PACKAGE_NOT_FOUND, 'Package not found'))).toBe(true);
      expect(isNotFoundError(new ShippingError(ErrorCode.INVALID_REQUEST, 'Bad request'))).toBe(false);
      expect(isNotFoundError(new Error('Shipment not found'))).toBe(false);
    });

    it('should render messages from any thrown value', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage('plain text')).toBe('plain text');
    });
  });
});

/**
 * Error types for the shipping platform
 * Every failure that crosses a module boundary is a ShippingError with a stable code
 */

import { ErrorInfo } from '../types/domain';

export enum ErrorCode {
  // Upload and request input
  FORMAT_ERROR = 'FORMAT_ERROR',
  INVALID_REQUEST = 'INVALID_REQUEST',
  PRECONDITION_FAILED = 'PRECONDITION_FAILED',
  UNKNOWN_SERVICE = 'UNKNOWN_SERVICE',

  // Lookups
  SHIPMENT_NOT_FOUND = 'SHIPMENT_NOT_FOUND',
  ADDRESS_NOT_FOUND = 'ADDRESS_NOT_FOUND',
  PACKAGE_NOT_FOUND = 'PACKAGE_NOT_FOUND',

  // Address provider calls
  TIMEOUT = 'TIMEOUT',
  NETWORK_ERROR = 'NETWORK_ERROR',
  PROVIDER_REJECTED = 'PROVIDER_REJECTED',
  PROVIDER_RATE_LIMITED = 'PROVIDER_RATE_LIMITED',
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',
  INVALID_RESPONSE = 'INVALID_RESPONSE',

  UNKNOWN = 'UNKNOWN',
}

export class ShippingError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly statusCode?: number;
  public readonly originalError?: Error;

  constructor(
    code: ErrorCode,
    message: string,
    options: {
      details?: Record<string, unknown>;
      statusCode?: number;
      originalError?: Error;
    } = {}
  ) {
    super(message);
    this.name = 'ShippingError';
    this.code = code;
    this.details = options.details;
    this.statusCode = options.statusCode;
    this.originalError = options.originalError;

    Object.setPrototypeOf(this, ShippingError.prototype);
  }

  toErrorInfo(): ErrorInfo {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Classify a provider's HTTP error status
 */
export function providerStatusToErrorCode(status: number): ErrorCode {
  if (status === 429) {
    return ErrorCode.PROVIDER_RATE_LIMITED;
  }
  return status >= 500 ? ErrorCode.PROVIDER_UNAVAILABLE : ErrorCode.PROVIDER_REJECTED;
}

const RETRYABLE_CODES: readonly ErrorCode[] = [
  ErrorCode.TIMEOUT,
  ErrorCode.NETWORK_ERROR,
  ErrorCode.PROVIDER_RATE_LIMITED,
  ErrorCode.PROVIDER_UNAVAILABLE,
];

export function isRetryableError(error: ShippingError): boolean {
  return RETRYABLE_CODES.includes(error.code);
}

export function isNotFoundError(error: unknown): error is ShippingError {
  return (
    error instanceof ShippingError &&
    [ErrorCode.SHIPMENT_NOT_FOUND, ErrorCode.ADDRESS_NOT_FOUND, ErrorCode.PACKAGE_NOT_FOUND].includes(
      error.code
    )
  );
}

/**
 * Render any thrown value as a message for logs and row reports
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

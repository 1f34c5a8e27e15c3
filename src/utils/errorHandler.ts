import { ApiError, AuthError, CraftyError, ErrorCode, TransportError } from '../models/ErrorTypes';

export interface ErrorInfo {
  code: ErrorCode;
  message: string;
  status?: number;
  isRetryable: boolean;
}

/**
 * Extract error information from various error types
 */
export function extractErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof ApiError) {
    return {
      code: error.code,
      message: error.message,
      status: error.status,
      isRetryable: error.status >= 500
    };
  }

  if (error instanceof AuthError) {
    return {
      code: error.code,
      message: error.message,
      ...(error.status !== undefined && { status: error.status }),
      isRetryable: false
    };
  }

  if (error instanceof TransportError) {
    return {
      code: error.code,
      message: error.message,
      isRetryable: true
    };
  }

  if (error instanceof CraftyError) {
    return {
      code: error.code,
      message: error.message,
      isRetryable: isRetryableError(error.code)
    };
  }

  return {
    code: ErrorCode.INTERNAL_SERVER_ERROR,
    message: error instanceof Error ? error.message : String(error),
    isRetryable: false
  };
}

/**
 * Determine if an error code represents a retryable error
 */
export function isRetryableError(code: ErrorCode): boolean {
  const retryableErrors = [
    ErrorCode.SERVICE_UNAVAILABLE,
    ErrorCode.REQUEST_TIMEOUT
  ];

  return retryableErrors.includes(code);
}

/**
 * Normalise a thrown value into an Error for the logger
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Generate unique request ID
 */
export function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Common error codes used throughout the application
 */
export enum ErrorCode {
  // Crafty API errors
  CRAFTY_AUTH_FAILED = "CRAFTY_AUTH_FAILED",
  CRAFTY_API_ERROR = "CRAFTY_API_ERROR",
  SERVICE_UNAVAILABLE = "SERVICE_UNAVAILABLE",
  REQUEST_TIMEOUT = "REQUEST_TIMEOUT",

  // Configuration errors
  INVALID_CONFIGURATION = "INVALID_CONFIGURATION",

  // Validation errors
  INVALID_FIELD_VALUE = "INVALID_FIELD_VALUE",

  // Internal errors
  INTERNAL_SERVER_ERROR = "INTERNAL_SERVER_ERROR"
}

/**
 * Validation error details
 */
export interface ValidationError {
  /** Field that failed validation */
  field: string;

  /** Validation rule that was violated */
  rule: string;

  /** Human-readable error message */
  message: string;

  /** Value that failed validation */
  value?: unknown;
}

/**
 * Base class for every error raised by this application
 */
export class CraftyError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;

  constructor(code: ErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'CraftyError';
    this.code = code;
    this.timestamp = new Date();
  }
}

/**
 * Login failed or the login response carried no token
 */
export class AuthError extends CraftyError {
  public readonly status: number | undefined;

  constructor(message: string, status?: number, cause?: unknown) {
    super(ErrorCode.CRAFTY_AUTH_FAILED, message, cause);
    this.name = 'AuthError';
    this.status = status;
  }
}

/**
 * Crafty answered with a status >= 400 after any permitted retry
 */
export class ApiError extends CraftyError {
  public readonly status: number;
  public readonly body: string;

  constructor(status: number, body: string, message: string = `HTTP ${status}: ${body}`) {
    super(ErrorCode.CRAFTY_API_ERROR, message);
    this.name = 'ApiError';
    this.status = status;
    this.body = body;
  }
}

/**
 * Connection refused/reset or request timeout
 */
export class TransportError extends CraftyError {
  public readonly timedOut: boolean;

  constructor(message: string, timedOut: boolean, cause?: unknown) {
    super(timedOut ? ErrorCode.REQUEST_TIMEOUT : ErrorCode.SERVICE_UNAVAILABLE, message, cause);
    this.name = 'TransportError';
    this.timedOut = timedOut;
  }
}

/**
 * Configuration document is missing or invalid
 */
export class ConfigurationError extends CraftyError {
  public readonly errors: ValidationError[];

  constructor(message: string, errors: ValidationError[] = [], cause?: unknown) {
    super(ErrorCode.INVALID_CONFIGURATION, message, cause);
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}

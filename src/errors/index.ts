import { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';

/**
 * Base error class for the Xen inventory
 * Extends native Error with additional metadata
 */
export class InventoryError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly timestamp: number;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = 'InventoryError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = Date.now();
    this.originalError = originalError;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON format
   */
  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  /**
   * Convert error to string representation
   */
  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends InventoryError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIGURATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * A XenAPI session could not be established
 */
export class AuthenticationError extends InventoryError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.AUTHENTICATION_FAILED, ErrorSeverity.CRITICAL, context, originalError);
    this.name = 'AuthenticationError';
  }
}

/**
 * A XenAPI call failed after the session was established.
 * `errorDescription` is the host's ErrorDescription array, code first.
 */
export class RemoteAPIError extends InventoryError {
  public readonly errorDescription: string[];

  constructor(
    message: string,
    errorDescription: string[] = [],
    code: ErrorCode = ErrorCode.REMOTE_API_FAILURE,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message, code, ErrorSeverity.HIGH, context, originalError);
    this.name = 'RemoteAPIError';
    this.errorDescription = errorDescription;
  }

  get failureCode(): string | undefined {
    return this.errorDescription[0];
  }
}

/**
 * Cache file is missing, unreadable, or not an inventory document
 */
export class DecodeError extends InventoryError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CACHE_DECODE_ERROR, ErrorSeverity.LOW, context, originalError);
    this.name = 'DecodeError';
  }
}

/**
 * The filesystem refused to create the cache directory
 */
export class PermissionError extends InventoryError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CACHE_PERMISSION_DENIED, ErrorSeverity.HIGH, context, originalError);
    this.name = 'PermissionError';
  }
}

export class CacheWriteError extends InventoryError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CACHE_WRITE_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'CacheWriteError';
  }
}

/**
 * Narrow an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Read the `code` of a Node.js system error (ENOENT, EACCES, ...)
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

// Export types
export { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';

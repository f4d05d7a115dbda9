/**
 * Error types and error codes for the Xen inventory
 * Codes are grouped by the component that raises them
 */

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  VALIDATION_ERROR = 1001,
  CONFIGURATION_ERROR = 1002,

  // XenAPI session errors (2000-2999)
  AUTHENTICATION_FAILED = 2000,
  REMOTE_API_FAILURE = 2001,
  MALFORMED_RESPONSE = 2002,

  // Cache errors (3000-3999)
  CACHE_DECODE_ERROR = 3000,
  CACHE_PERMISSION_DENIED = 3001,
  CACHE_WRITE_ERROR = 3002,
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  context?: ErrorContext;
  originalError?: Error;
  timestamp: number;
  stack?: string;
}

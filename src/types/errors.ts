/**
 * Error Codes
 *
 * Categorized by error type:
 * - 1xxx: Authentication errors
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 4xxx: Rate limiting errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Authentication errors (1xxx)
  UNAUTHORIZED = 1001,
  INVALID_TOKEN = 1002,
  TOKEN_EXPIRED = 1003,
  FORBIDDEN = 1005,
  AUTHENTICATION_FAILED = 1006,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,

  // Business errors (3xxx)
  INSUFFICIENT_CREDITS = 3001,
  RESOURCE_NOT_FOUND = 3002,
  INVALID_STATE_TRANSITION = 3003,
  ACTIVE_GENERATION_LIMIT = 3004,
  DUPLICATE_OPERATION = 3005,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  STORAGE_UNAVAILABLE = 5002,
  QUEUE_UNAVAILABLE = 5003,
  QUEUE_FULL = 5004,
  UPSTREAM_UNAVAILABLE = 5005,
  UPSTREAM_TIMEOUT = 5006,
  INVARIANT_VIOLATION = 5007,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.TOKEN_EXPIRED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.AUTHENTICATION_FAILED]: 401,

  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,

  [ErrorCode.INSUFFICIENT_CREDITS]: 402,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,
  [ErrorCode.INVALID_STATE_TRANSITION]: 409,
  [ErrorCode.ACTIVE_GENERATION_LIMIT]: 409,
  // Replays are answered with the original result, never with this code
  [ErrorCode.DUPLICATE_OPERATION]: 200,

  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,

  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.STORAGE_UNAVAILABLE]: 503,
  [ErrorCode.QUEUE_UNAVAILABLE]: 503,
  [ErrorCode.QUEUE_FULL]: 503,
  [ErrorCode.UPSTREAM_UNAVAILABLE]: 502,
  [ErrorCode.UPSTREAM_TIMEOUT]: 504,
  [ErrorCode.INVARIANT_VIOLATION]: 500,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
}

export type ApiResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;

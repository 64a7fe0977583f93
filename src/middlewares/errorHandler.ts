/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * error logging, and appropriate error sanitization for production.
 */

import { Request, Response, NextFunction } from 'express';

import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

/**
 * API Error class for throwing operational errors
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(
    errorCode: ErrorCode,
    message: string,
    options?: {
      statusCode?: number;
      isOperational?: boolean;
      validationErrors?: Record<string, string[]>;
    }
  ) {
    super(message);
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options?.statusCode ?? errorCodeToStatus[errorCode] ?? 500;
    this.isOperational = options?.isOperational ?? true;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  static unauthorized(message = 'Unauthorized'): ApiError {
    return new ApiError(ErrorCode.UNAUTHORIZED, message);
  }

  static invalidToken(message = 'Invalid token'): ApiError {
    return new ApiError(ErrorCode.INVALID_TOKEN, message);
  }

  static tokenExpired(message = 'Token expired'): ApiError {
    return new ApiError(ErrorCode.TOKEN_EXPIRED, message);
  }

  static forbidden(message = 'Forbidden'): ApiError {
    return new ApiError(ErrorCode.FORBIDDEN, message);
  }

  static authenticationFailed(message = 'Signature verification failed'): ApiError {
    return new ApiError(ErrorCode.AUTHENTICATION_FAILED, message);
  }

  static validationError(message: string, validationErrors?: Record<string, string[]>): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, { validationErrors });
  }

  static invalidAmount(message = 'Amount must be a positive integer'): ApiError {
    return new ApiError(ErrorCode.INVALID_AMOUNT, message);
  }

  static insufficientCredits(message = 'Insufficient credits'): ApiError {
    return new ApiError(ErrorCode.INSUFFICIENT_CREDITS, message);
  }

  static notFound(resource: string): ApiError {
    return new ApiError(ErrorCode.RESOURCE_NOT_FOUND, `${resource} not found`);
  }

  static invalidTransition(message: string): ApiError {
    return new ApiError(ErrorCode.INVALID_STATE_TRANSITION, message);
  }

  static activeGenerationLimit(message = 'An active generation is already in progress'): ApiError {
    return new ApiError(ErrorCode.ACTIVE_GENERATION_LIMIT, message);
  }

  /**
   * Reserved or available credits would go negative, or a commit/release
   * does not match its reservation. Never retried, never clamped.
   */
  static invariantViolation(message: string): ApiError {
    return new ApiError(ErrorCode.INVARIANT_VIOLATION, message, { isOperational: false });
  }

  static storageUnavailable(message = 'Storage temporarily unavailable'): ApiError {
    return new ApiError(ErrorCode.STORAGE_UNAVAILABLE, message);
  }

  static queueUnavailable(message = 'Job queue temporarily unavailable'): ApiError {
    return new ApiError(ErrorCode.QUEUE_UNAVAILABLE, message);
  }

  static queueFull(message = 'Generation queue is full, try again later'): ApiError {
    return new ApiError(ErrorCode.QUEUE_FULL, message);
  }

  static upstreamUnavailable(message = 'Upstream service unavailable'): ApiError {
    return new ApiError(ErrorCode.UPSTREAM_UNAVAILABLE, message);
  }

  static upstreamTimeout(message = 'Upstream service timed out'): ApiError {
    return new ApiError(ErrorCode.UPSTREAM_TIMEOUT, message);
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, { isOperational: false });
  }

  static rateLimitExceeded(message = 'Rate limit exceeded'): ApiError {
    return new ApiError(ErrorCode.RATE_LIMIT_EXCEEDED, message);
  }
}

export const isApiError = (error: unknown): error is ApiError => error instanceof ApiError;

/**
 * body-parser raises a SyntaxError carrying a status for malformed JSON
 */
const isBodyParseError = (err: unknown): err is SyntaxError & { status: number } =>
  err instanceof SyntaxError && 'status' in err && err.status === 400;

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * Logs errors with correlation ID for traceability.
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const errorCode = isBodyParseError(err)
    ? ErrorCode.INVALID_INPUT
    : err.errorCode || ErrorCode.INTERNAL_ERROR;
  const statusCode = err.statusCode || errorCodeToStatus[errorCode] || 500;

  const logPayload = {
    correlationId,
    errorCode,
    statusCode,
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
    isOperational: err.isOperational,
  };

  if (statusCode >= 500) {
    logger.error(logPayload, `Error: ${err.message}`);
  } else {
    logger.warn(logPayload, `Request rejected: ${err.message}`);
  }

  // Sanitize error message for production 5xx errors
  const message =
    config.isProduction && statusCode >= 500
      ? 'Internal server error'
      : err.message || 'An error occurred';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (err.validationErrors) {
    response.error.details = err.validationErrors;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  res.status(404).json(response);
};

/**
 * Async handler wrapper to catch errors in async route handlers
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

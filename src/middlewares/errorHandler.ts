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
  ledgerCode?: number;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

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

  const errorCode = err.errorCode || ErrorCode.INTERNAL_ERROR;
  const statusCode = err.statusCode || errorCodeToStatus[errorCode] || 500;

  const logPayload = {
    correlationId,
    errorCode,
    ledgerCode: err.ledgerCode,
    statusCode,
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
    isOperational: err.isOperational,
  };

  // Operational 4xx errors are expected outcomes of ledger rules
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

  if (err.ledgerCode !== undefined) {
    response.error.ledgerCode = err.ledgerCode;
  }

  if (err.validationErrors) {
    response.error.details = err.validationErrors;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
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
 * Map HTTP status codes to error codes for plain-status constructors
 */
const statusToErrorCode: Record<number, ErrorCode> = {
  400: ErrorCode.VALIDATION_ERROR,
  401: ErrorCode.UNAUTHORIZED,
  403: ErrorCode.NOT_AUTHORIZED,
  404: ErrorCode.RESOURCE_NOT_FOUND,
  409: ErrorCode.ALREADY_EXISTS,
  429: ErrorCode.RATE_LIMIT_EXCEEDED,
  500: ErrorCode.INTERNAL_ERROR,
  503: ErrorCode.REDIS_ERROR,
};

// ErrorCodes are 1000+ while HTTP status codes are < 600
const isErrorCode = (value: number): value is ErrorCode =>
  value >= 1000 && value in errorCodeToStatus;

/**
 * API Error class for throwing operational errors
 *
 * Accepts either an ErrorCode or a plain HTTP status code.
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(
    codeOrStatus: ErrorCode | number,
    message: string,
    options?: {
      statusCode?: number;
      isOperational?: boolean;
      validationErrors?: Record<string, string[]>;
    }
  ) {
    super(message);
    this.name = 'ApiError';

    if (isErrorCode(codeOrStatus)) {
      this.errorCode = codeOrStatus;
      this.statusCode = options?.statusCode || errorCodeToStatus[codeOrStatus] || 500;
    } else {
      this.statusCode = codeOrStatus;
      this.errorCode = statusToErrorCode[codeOrStatus] || ErrorCode.INTERNAL_ERROR;
    }

    this.isOperational = options?.isOperational ?? true;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Factory methods for common errors
   */
  static unauthorized(message = 'Unauthorized'): ApiError {
    return new ApiError(ErrorCode.UNAUTHORIZED, message);
  }

  static invalidToken(message = 'Invalid token'): ApiError {
    return new ApiError(ErrorCode.INVALID_TOKEN, message);
  }

  static tokenExpired(message = 'Token expired'): ApiError {
    return new ApiError(ErrorCode.TOKEN_EXPIRED, message);
  }

  static validationError(
    message: string,
    validationErrors?: Record<string, string[]>
  ): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, {
      validationErrors,
    });
  }

  static invalidAmount(message = 'Amount must be a positive integer'): ApiError {
    return new ApiError(ErrorCode.INVALID_AMOUNT, message);
  }

  static insufficientFunds(message = 'Insufficient funds'): ApiError {
    return new ApiError(ErrorCode.INSUFFICIENT_FUNDS, message);
  }

  static notFound(resource: string): ApiError {
    return new ApiError(ErrorCode.RESOURCE_NOT_FOUND, `${resource} not found`);
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, {
      isOperational: false,
    });
  }
}

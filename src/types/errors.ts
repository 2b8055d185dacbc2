/**
 * Error Codes for the Band Split Ledger API
 *
 * Categorized by error type:
 * - 1xxx: Authentication / authorization errors
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
  NOT_AUTHORIZED = 1004,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,
  INVALID_PERCENTAGE = 2004,

  // Business errors (3xxx)
  INSUFFICIENT_BALANCE = 3001,
  BAND_NOT_FOUND = 3002,
  MEMBER_NOT_FOUND = 3003,
  ALREADY_EXISTS = 3004,
  INSUFFICIENT_FUNDS = 3005,
  FUNDING_DISABLED = 3006,
  RESOURCE_NOT_FOUND = 3010,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,
  TOO_MANY_LEDGER_OPERATIONS = 4003,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  REDIS_ERROR = 5003,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Auth errors -> 401/403
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.TOKEN_EXPIRED]: 401,
  [ErrorCode.NOT_AUTHORIZED]: 403,

  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.INVALID_PERCENTAGE]: 400,

  // Business errors -> 400/403/404/409
  [ErrorCode.INSUFFICIENT_BALANCE]: 400,
  [ErrorCode.BAND_NOT_FOUND]: 404,
  [ErrorCode.MEMBER_NOT_FOUND]: 404,
  [ErrorCode.ALREADY_EXISTS]: 409,
  [ErrorCode.INSUFFICIENT_FUNDS]: 400,
  [ErrorCode.FUNDING_DISABLED]: 403,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  // Rate limiting errors -> 429
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.TOO_MANY_LEDGER_OPERATIONS]: 429,

  // System errors -> 500/503
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.REDIS_ERROR]: 503,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    ledgerCode?: number;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}

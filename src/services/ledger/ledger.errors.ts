import { ApiError } from '../../middlewares/errorHandler';
import { ErrorCode } from '../../types/errors';

/**
 * Flat taxonomy of ledger rule violations.
 * Every failed ledger operation reports exactly one of these.
 */
export enum LedgerErrorKind {
  NOT_AUTHORIZED = 'NotAuthorized',
  BAND_NOT_FOUND = 'BandNotFound',
  MEMBER_NOT_FOUND = 'MemberNotFound',
  INVALID_PERCENTAGE = 'InvalidPercentage',
  INSUFFICIENT_BALANCE = 'InsufficientBalance',
  ALREADY_EXISTS = 'AlreadyExists',
  INVALID_AMOUNT = 'InvalidAmount',
}

/**
 * Numeric ledger codes, stable across API versions
 */
export const ledgerErrorCodes: Record<LedgerErrorKind, number> = {
  [LedgerErrorKind.NOT_AUTHORIZED]: 100,
  [LedgerErrorKind.BAND_NOT_FOUND]: 101,
  [LedgerErrorKind.MEMBER_NOT_FOUND]: 102,
  [LedgerErrorKind.INVALID_PERCENTAGE]: 103,
  [LedgerErrorKind.INSUFFICIENT_BALANCE]: 104,
  [LedgerErrorKind.ALREADY_EXISTS]: 105,
  [LedgerErrorKind.INVALID_AMOUNT]: 106,
};

const kindToErrorCode: Record<LedgerErrorKind, ErrorCode> = {
  [LedgerErrorKind.NOT_AUTHORIZED]: ErrorCode.NOT_AUTHORIZED,
  [LedgerErrorKind.BAND_NOT_FOUND]: ErrorCode.BAND_NOT_FOUND,
  [LedgerErrorKind.MEMBER_NOT_FOUND]: ErrorCode.MEMBER_NOT_FOUND,
  [LedgerErrorKind.INVALID_PERCENTAGE]: ErrorCode.INVALID_PERCENTAGE,
  [LedgerErrorKind.INSUFFICIENT_BALANCE]: ErrorCode.INSUFFICIENT_BALANCE,
  [LedgerErrorKind.ALREADY_EXISTS]: ErrorCode.ALREADY_EXISTS,
  [LedgerErrorKind.INVALID_AMOUNT]: ErrorCode.INVALID_AMOUNT,
};

export class LedgerError extends ApiError {
  readonly kind: LedgerErrorKind;
  readonly ledgerCode: number;

  constructor(kind: LedgerErrorKind, message: string) {
    super(kindToErrorCode[kind], message);
    this.name = 'LedgerError';
    this.kind = kind;
    this.ledgerCode = ledgerErrorCodes[kind];
  }

  static notAuthorized(message = 'Caller is not authorized for this band'): LedgerError {
    return new LedgerError(LedgerErrorKind.NOT_AUTHORIZED, message);
  }

  static bandNotFound(bandId: number): LedgerError {
    return new LedgerError(LedgerErrorKind.BAND_NOT_FOUND, `Band ${bandId} not found`);
  }

  static memberNotFound(bandId: number, member: string): LedgerError {
    return new LedgerError(
      LedgerErrorKind.MEMBER_NOT_FOUND,
      `Member ${member} not found in band ${bandId}`
    );
  }

  static invalidPercentage(percentage: number): LedgerError {
    return new LedgerError(
      LedgerErrorKind.INVALID_PERCENTAGE,
      `Percentage must be an integer between 1 and 100, got ${percentage}`
    );
  }

  static insufficientBalance(message = 'Insufficient balance'): LedgerError {
    return new LedgerError(LedgerErrorKind.INSUFFICIENT_BALANCE, message);
  }

  static alreadyExists(message: string): LedgerError {
    return new LedgerError(LedgerErrorKind.ALREADY_EXISTS, message);
  }

  static invalidAmount(message = 'Amount must be a positive integer'): LedgerError {
    return new LedgerError(LedgerErrorKind.INVALID_AMOUNT, message);
  }
}

export const isLedgerError = (error: unknown): error is LedgerError =>
  error instanceof LedgerError;

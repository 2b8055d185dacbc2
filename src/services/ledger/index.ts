/**
 * Ledger Service Module
 *
 * Bands, members and pooled balances with percentage-based withdrawals.
 */

// Engine
export { LedgerEngine, computeShare } from './ledger.engine';
export type { LedgerEngineOptions } from './ledger.engine';
export { LedgerStore } from './ledger.store';
export { LedgerError, LedgerErrorKind, ledgerErrorCodes, isLedgerError } from './ledger.errors';
export type {
  AssetTransfer,
  Band,
  BandBalance,
  BandId,
  BandMember,
  LedgerSnapshot,
  Principal,
} from './ledger.types';

// Service
export { ledgerService, ledgerEngine, LedgerService } from './ledger.service';
export type {
  CreateBandResult,
  DepositResult,
  WithdrawalResult,
  EmergencyWithdrawalResult,
} from './ledger.service';

// Controller
export { ledgerController } from './ledger.controller';

// Routes
export { default as ledgerRoutes } from './ledger.routes';

/**
 * Ledger Engine
 *
 * Serial state machine over the band, member and balance tables.
 * Every operation checks all of its preconditions before the first write,
 * so a failure leaves the store exactly as it was. Funds move through the
 * AssetTransfer port before any bookkeeping is recorded; if the transfer
 * throws, its error propagates and nothing is written.
 *
 * All operations are synchronous. On a single event loop each call runs to
 * completion before the next one starts.
 */

import { LedgerError } from './ledger.errors';
import { LedgerStore } from './ledger.store';
import {
  AssetTransfer,
  Band,
  BandBalance,
  BandId,
  BandMember,
  LedgerSnapshot,
  Principal,
} from './ledger.types';

export interface LedgerEngineOptions {
  transfer: AssetTransfer;
  /** Account holding the pooled funds of every band */
  custodyAccount: Principal;
  store?: LedgerStore;
}

const isValidPercentage = (percentage: number): boolean =>
  Number.isInteger(percentage) && percentage > 0 && percentage <= 100;

const isValidAmount = (amount: number): boolean =>
  Number.isSafeInteger(amount) && amount > 0;

/**
 * ⌊balance × percentage / 100⌋, exact for every safe-integer balance
 */
export const computeShare = (balance: number, percentage: number): number => {
  const remainder = balance % 100;
  const hundreds = (balance - remainder) / 100;
  return hundreds * percentage + Math.floor((remainder * percentage) / 100);
};

export class LedgerEngine {
  private readonly store: LedgerStore;
  private readonly transfer: AssetTransfer;
  readonly custodyAccount: Principal;

  constructor(options: LedgerEngineOptions) {
    this.store = options.store ?? new LedgerStore();
    this.transfer = options.transfer;
    this.custodyAccount = options.custodyAccount;
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  createBand(name: string, caller: Principal): BandId {
    const bandId = this.store.nextBandId;

    if (this.store.hasBand(bandId)) {
      throw LedgerError.alreadyExists(`Band ${bandId} already exists`);
    }

    this.store.setBand(bandId, {
      name,
      owner: caller,
      totalMembers: 0,
      active: true,
    });
    this.store.setBalance(bandId, { balance: 0 });
    this.store.nextBandId = bandId + 1;

    return bandId;
  }

  addMember(
    bandId: BandId,
    member: Principal,
    memberName: string,
    percentage: number,
    caller: Principal
  ): true {
    const band = this.requireOwnedBand(bandId, caller);

    if (!isValidPercentage(percentage)) {
      throw LedgerError.invalidPercentage(percentage);
    }

    if (this.store.hasMember(bandId, member)) {
      throw LedgerError.alreadyExists(`Member ${member} already exists in band ${bandId}`);
    }

    this.store.setMember(bandId, member, {
      name: memberName,
      percentage,
      totalEarned: 0,
      joinedAt: this.store.memberJoinSequence,
    });
    band.totalMembers += 1;
    this.store.memberJoinSequence += 1;

    return true;
  }

  updateMemberPercentage(
    bandId: BandId,
    member: Principal,
    newPercentage: number,
    caller: Principal
  ): true {
    this.requireOwnedBand(bandId, caller);

    const record = this.store.getMember(bandId, member);
    if (!record) {
      throw LedgerError.memberNotFound(bandId, member);
    }

    if (!isValidPercentage(newPercentage)) {
      throw LedgerError.invalidPercentage(newPercentage);
    }

    record.percentage = newPercentage;
    return true;
  }

  depositPayment(bandId: BandId, amount: number, caller: Principal): true {
    const band = this.store.getBand(bandId);
    if (!band) {
      throw LedgerError.bandNotFound(bandId);
    }

    if (!isValidAmount(amount)) {
      throw LedgerError.invalidAmount();
    }

    // NotAuthorized doubles as the "band inactive" failure
    if (!band.active) {
      throw LedgerError.notAuthorized(`Band ${bandId} is inactive`);
    }

    const pool = this.requireBalance(bandId);
    if (!Number.isSafeInteger(pool.balance + amount)) {
      throw LedgerError.invalidAmount('Deposit would overflow the band balance');
    }

    this.transfer.transfer(caller, this.custodyAccount, amount);
    pool.balance += amount;

    return true;
  }

  withdrawEarnings(bandId: BandId, caller: Principal): number {
    const record = this.store.getMember(bandId, caller);
    if (!record) {
      throw LedgerError.memberNotFound(bandId, caller);
    }

    const pool = this.store.getBalance(bandId);
    if (!pool) {
      throw LedgerError.bandNotFound(bandId);
    }

    const share = computeShare(pool.balance, record.percentage);
    if (share <= 0) {
      throw LedgerError.insufficientBalance(`No earnings available in band ${bandId}`);
    }

    this.transfer.transfer(this.custodyAccount, caller, share);
    record.totalEarned += share;
    pool.balance -= share;

    return share;
  }

  emergencyWithdraw(bandId: BandId, caller: Principal): number {
    const band = this.requireOwnedBand(bandId, caller);

    const pool = this.store.getBalance(bandId);
    if (!pool || pool.balance <= 0) {
      throw LedgerError.insufficientBalance(`Band ${bandId} has no balance to withdraw`);
    }

    const amount = pool.balance;
    this.transfer.transfer(this.custodyAccount, band.owner, amount);
    pool.balance = 0;

    return amount;
  }

  /**
   * Stop a band from accepting deposits. Withdrawals keep working.
   */
  deactivateBand(bandId: BandId, caller: Principal): true {
    const band = this.requireOwnedBand(bandId, caller);
    band.active = false;
    return true;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  getBandInfo(bandId: BandId): Band | undefined {
    const band = this.store.getBand(bandId);
    return band && { ...band };
  }

  getMemberInfo(bandId: BandId, member: Principal): BandMember | undefined {
    const record = this.store.getMember(bandId, member);
    return record && { ...record };
  }

  getBandBalance(bandId: BandId): BandBalance | undefined {
    const pool = this.store.getBalance(bandId);
    return pool && { ...pool };
  }

  calculateMemberEarnings(bandId: BandId, member: Principal): number | undefined {
    const record = this.store.getMember(bandId, member);
    const pool = this.store.getBalance(bandId);

    if (!record || !pool) {
      return undefined;
    }

    return computeShare(pool.balance, record.percentage);
  }

  getMemberJoinOrder(): number {
    return this.store.memberJoinSequence;
  }

  getTotalBands(): number {
    return this.store.nextBandId - 1;
  }

  isBandMember(bandId: BandId, member: Principal): boolean {
    return this.store.hasMember(bandId, member);
  }

  totalPooled(): number {
    return this.store.totalPooled();
  }

  snapshot(): LedgerSnapshot {
    return this.store.snapshot();
  }

  // ===========================================================================
  // Guards
  // ===========================================================================

  private requireOwnedBand(bandId: BandId, caller: Principal): Band {
    const band = this.store.getBand(bandId);
    if (!band) {
      throw LedgerError.bandNotFound(bandId);
    }

    if (band.owner !== caller) {
      throw LedgerError.notAuthorized();
    }

    return band;
  }

  private requireBalance(bandId: BandId): BandBalance {
    const pool = this.store.getBalance(bandId);
    if (!pool) {
      throw LedgerError.bandNotFound(bandId);
    }
    return pool;
  }
}

/**
 * Ledger Service
 *
 * Wraps the ledger engine for the HTTP surface: traces and counts every
 * operation, logs outcomes, and publishes a domain event after each
 * committed mutation. The engine itself never logs or retries.
 */

import { config } from '../../config';
import { eventBus } from '../../events/eventBus';
import { ApiError } from '../../middlewares/errorHandler';
import {
  bandsTotal,
  createServiceLogger,
  eventsPublishedTotal,
  ledgerAmount,
  ledgerOperationsTotal,
  pooledBalanceTotal,
  traceLedgerOperation,
} from '../../observability';
import { EventPublisher, EventType, LedgerEvent } from '../../types/events';
import { accountService } from '../account/account.service';
import { LedgerEngine } from './ledger.engine';
import { isLedgerError } from './ledger.errors';
import { Band, BandBalance, BandId, BandMember, Principal } from './ledger.types';

const log = createServiceLogger('ledger-service');

export interface CreateBandResult {
  bandId: BandId;
  band: Band;
}

export interface DepositResult {
  bandId: BandId;
  amount: number;
  balance: number;
}

export interface WithdrawalResult {
  bandId: BandId;
  amount: number;
  balance: number;
  totalEarned: number;
}

export interface EmergencyWithdrawalResult {
  bandId: BandId;
  amount: number;
  balance: number;
}

export class LedgerService {
  constructor(
    private readonly engine: LedgerEngine,
    private readonly events: EventPublisher
  ) {}

  // ===========================================================================
  // Mutations
  // ===========================================================================

  async createBand(name: string, caller: Principal): Promise<CreateBandResult> {
    const { bandId, band } = await this.run('create_band', { 'ledger.caller': caller }, () => {
      const id = this.engine.createBand(name, caller);
      return { bandId: id, band: this.committed(this.engine.getBandInfo(id), `band ${id}`) };
    });

    await this.emit({
      eventType: EventType.BAND_CREATED,
      bandId,
      timestamp: new Date(),
      payload: { name: band.name, owner: band.owner },
    });

    return { bandId, band };
  }

  async addMember(
    bandId: BandId,
    member: Principal,
    memberName: string,
    percentage: number,
    caller: Principal
  ): Promise<BandMember> {
    const record = await this.run(
      'add_member',
      { 'ledger.band_id': bandId, 'ledger.caller': caller },
      () => {
        this.engine.addMember(bandId, member, memberName, percentage, caller);
        return this.committed(this.engine.getMemberInfo(bandId, member), `member ${member}`);
      }
    );

    await this.emit({
      eventType: EventType.MEMBER_ADDED,
      bandId,
      timestamp: new Date(),
      payload: { member, name: record.name, percentage: record.percentage, joinedAt: record.joinedAt },
    });

    return record;
  }

  async updateMemberPercentage(
    bandId: BandId,
    member: Principal,
    newPercentage: number,
    caller: Principal
  ): Promise<BandMember> {
    const record = await this.run(
      'update_member_percentage',
      { 'ledger.band_id': bandId, 'ledger.caller': caller },
      () => {
        this.engine.updateMemberPercentage(bandId, member, newPercentage, caller);
        return this.committed(this.engine.getMemberInfo(bandId, member), `member ${member}`);
      }
    );

    await this.emit({
      eventType: EventType.MEMBER_PERCENTAGE_UPDATED,
      bandId,
      timestamp: new Date(),
      payload: { member, percentage: record.percentage },
    });

    return record;
  }

  async depositPayment(bandId: BandId, amount: number, caller: Principal): Promise<DepositResult> {
    const { balance } = await this.run(
      'deposit_payment',
      { 'ledger.band_id': bandId, 'ledger.caller': caller },
      () => {
        this.engine.depositPayment(bandId, amount, caller);
        return this.committed(this.engine.getBandBalance(bandId), `balance of band ${bandId}`);
      }
    );
    ledgerAmount.observe({ direction: 'deposit' }, amount);

    await this.emit({
      eventType: EventType.PAYMENT_DEPOSITED,
      bandId,
      timestamp: new Date(),
      payload: { depositor: caller, amount, newBalance: balance },
    });

    return { bandId, amount, balance };
  }

  async withdrawEarnings(bandId: BandId, caller: Principal): Promise<WithdrawalResult> {
    const { amount, balance, totalEarned } = await this.run(
      'withdraw_earnings',
      { 'ledger.band_id': bandId, 'ledger.caller': caller },
      () => {
        const withdrawn = this.engine.withdrawEarnings(bandId, caller);
        return {
          amount: withdrawn,
          balance: this.committed(this.engine.getBandBalance(bandId), `balance of band ${bandId}`)
            .balance,
          totalEarned: this.committed(this.engine.getMemberInfo(bandId, caller), `member ${caller}`)
            .totalEarned,
        };
      }
    );
    ledgerAmount.observe({ direction: 'withdrawal' }, amount);

    await this.emit({
      eventType: EventType.EARNINGS_WITHDRAWN,
      bandId,
      timestamp: new Date(),
      payload: { member: caller, amount, newBalance: balance, totalEarned },
    });

    return { bandId, amount, balance, totalEarned };
  }

  async emergencyWithdraw(bandId: BandId, caller: Principal): Promise<EmergencyWithdrawalResult> {
    const amount = await this.run(
      'emergency_withdraw',
      { 'ledger.band_id': bandId, 'ledger.caller': caller },
      () => this.engine.emergencyWithdraw(bandId, caller)
    );
    ledgerAmount.observe({ direction: 'emergency' }, amount);
    log.warn({ bandId, owner: caller, amount }, 'Emergency withdrawal swept band pool');

    await this.emit({
      eventType: EventType.EMERGENCY_WITHDRAWN,
      bandId,
      timestamp: new Date(),
      payload: { owner: caller, amount },
    });

    return { bandId, amount, balance: 0 };
  }

  async deactivateBand(bandId: BandId, caller: Principal): Promise<Band> {
    const band = await this.run(
      'deactivate_band',
      { 'ledger.band_id': bandId, 'ledger.caller': caller },
      () => {
        this.engine.deactivateBand(bandId, caller);
        return this.committed(this.engine.getBandInfo(bandId), `band ${bandId}`);
      }
    );

    await this.emit({
      eventType: EventType.BAND_DEACTIVATED,
      bandId,
      timestamp: new Date(),
      payload: { owner: band.owner },
    });

    return band;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  getBandInfo(bandId: BandId): Band | undefined {
    return this.engine.getBandInfo(bandId);
  }

  getMemberInfo(bandId: BandId, member: Principal): BandMember | undefined {
    return this.engine.getMemberInfo(bandId, member);
  }

  getBandBalance(bandId: BandId): BandBalance | undefined {
    return this.engine.getBandBalance(bandId);
  }

  calculateMemberEarnings(bandId: BandId, member: Principal): number | undefined {
    return this.engine.calculateMemberEarnings(bandId, member);
  }

  getMemberJoinOrder(): number {
    return this.engine.getMemberJoinOrder();
  }

  getTotalBands(): number {
    return this.engine.getTotalBands();
  }

  isBandMember(bandId: BandId, member: Principal): boolean {
    return this.engine.isBandMember(bandId, member);
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Runs fn to completion before yielding, so values it reads back are the
   * ones its own mutation committed
   */
  private async run<T>(
    operation: string,
    attributes: Record<string, string | number>,
    fn: () => T
  ): Promise<T> {
    return traceLedgerOperation(operation, attributes, async () => {
      try {
        const result = fn();
        ledgerOperationsTotal.inc({ operation, outcome: 'ok' });
        bandsTotal.set(this.engine.getTotalBands());
        pooledBalanceTotal.set(this.engine.totalPooled());
        log.info({ operation, ...attributes }, 'Ledger operation committed');
        return result;
      } catch (error) {
        const outcome = isLedgerError(error) ? error.kind : 'error';
        ledgerOperationsTotal.inc({ operation, outcome });
        log.warn(
          {
            operation,
            outcome,
            ...attributes,
            error: error instanceof Error ? error.message : String(error),
          },
          'Ledger operation rejected'
        );
        throw error;
      }
    });
  }

  /**
   * Events are published after the commit; a failed publish cannot undo it
   */
  private async emit(event: LedgerEvent): Promise<void> {
    try {
      await this.events.publish(event);
      eventsPublishedTotal.inc({ event_type: event.eventType, status: 'published' });
    } catch (error) {
      eventsPublishedTotal.inc({ event_type: event.eventType, status: 'failed' });
      log.error(
        { err: error, eventType: event.eventType, bandId: event.bandId },
        'Failed to publish ledger event'
      );
    }
  }

  private committed<T>(value: T | undefined, what: string): T {
    if (value === undefined) {
      throw ApiError.internal(`Ledger lost ${what} after commit`);
    }
    return value;
  }
}

export const ledgerEngine = new LedgerEngine({
  transfer: accountService,
  custodyAccount: config.ledger.custodyAccount,
});

export const ledgerService = new LedgerService(ledgerEngine, eventBus);

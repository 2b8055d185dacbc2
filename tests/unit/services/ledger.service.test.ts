/**
 * Ledger Service Unit Tests
 *
 * Runs the service over a fresh engine and a recording publisher.
 */

import { LedgerEngine } from '../../../src/services/ledger/ledger.engine';
import { LedgerError, LedgerErrorKind } from '../../../src/services/ledger/ledger.errors';
import { LedgerService } from '../../../src/services/ledger/ledger.service';
import { EventPublisher, EventType, LedgerEvent } from '../../../src/types/events';
import { RecordingTransfer } from '../../helpers/testLedger';

class RecordingPublisher implements EventPublisher {
  readonly events: LedgerEvent[] = [];
  failure: Error | null = null;

  async publish(event: LedgerEvent): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.events.push(event);
  }
}

describe('LedgerService', () => {
  let publisher: RecordingPublisher;
  let engine: LedgerEngine;
  let service: LedgerService;

  beforeEach(() => {
    publisher = new RecordingPublisher();
    engine = new LedgerEngine({ transfer: new RecordingTransfer(), custodyAccount: 'custody' });
    service = new LedgerService(engine, publisher);
  });

  describe('createBand', () => {
    it('should return the new band and publish BAND_CREATED', async () => {
      const result = await service.createBand('The Test Band', 'owner');

      expect(result).toEqual({
        bandId: 1,
        band: { name: 'The Test Band', owner: 'owner', totalMembers: 0, active: true },
      });
      expect(publisher.events).toHaveLength(1);
      expect(publisher.events[0]).toMatchObject({
        eventType: EventType.BAND_CREATED,
        bandId: 1,
        payload: { name: 'The Test Band', owner: 'owner' },
      });
    });
  });

  describe('addMember', () => {
    it('should return the member record and publish MEMBER_ADDED', async () => {
      const { bandId } = await service.createBand('Test Band', 'owner');

      const member = await service.addMember(bandId, 'alice', 'Alice', 40, 'owner');

      expect(member).toEqual({ name: 'Alice', percentage: 40, totalEarned: 0, joinedAt: 0 });
      expect(publisher.events[1]).toMatchObject({
        eventType: EventType.MEMBER_ADDED,
        bandId,
        payload: { member: 'alice', name: 'Alice', percentage: 40, joinedAt: 0 },
      });
    });

    it('should rethrow ledger errors without publishing', async () => {
      const { bandId } = await service.createBand('Test Band', 'owner');

      await expect(
        service.addMember(bandId, 'alice', 'Alice', 40, 'intruder')
      ).rejects.toMatchObject({ kind: LedgerErrorKind.NOT_AUTHORIZED, ledgerCode: 100 });

      expect(publisher.events).toHaveLength(1);
    });
  });

  describe('updateMemberPercentage', () => {
    it('should return the updated record and publish MEMBER_PERCENTAGE_UPDATED', async () => {
      const { bandId } = await service.createBand('Test Band', 'owner');
      await service.addMember(bandId, 'alice', 'Alice', 40, 'owner');

      const member = await service.updateMemberPercentage(bandId, 'alice', 55, 'owner');

      expect(member.percentage).toBe(55);
      expect(publisher.events[2]).toMatchObject({
        eventType: EventType.MEMBER_PERCENTAGE_UPDATED,
        payload: { member: 'alice', percentage: 55 },
      });
    });
  });

  describe('pool movements', () => {
    let bandId: number;

    beforeEach(async () => {
      ({ bandId } = await service.createBand('Test Band', 'owner'));
      await service.addMember(bandId, 'alice', 'Alice', 40, 'owner');
    });

    it('should report the new balance after a deposit', async () => {
      const result = await service.depositPayment(bandId, 1000, 'payer');

      expect(result).toEqual({ bandId, amount: 1000, balance: 1000 });
      expect(publisher.events[2]).toMatchObject({
        eventType: EventType.PAYMENT_DEPOSITED,
        payload: { depositor: 'payer', amount: 1000, newBalance: 1000 },
      });
    });

    it('should report amount, balance and totalEarned after a withdrawal', async () => {
      await service.depositPayment(bandId, 1000, 'payer');

      const result = await service.withdrawEarnings(bandId, 'alice');

      expect(result).toEqual({ bandId, amount: 400, balance: 600, totalEarned: 400 });
      expect(publisher.events[3]).toMatchObject({
        eventType: EventType.EARNINGS_WITHDRAWN,
        payload: { member: 'alice', amount: 400, newBalance: 600, totalEarned: 400 },
      });
    });

    it('should report the swept amount after an emergency withdrawal', async () => {
      await service.depositPayment(bandId, 750, 'payer');

      const result = await service.emergencyWithdraw(bandId, 'owner');

      expect(result).toEqual({ bandId, amount: 750, balance: 0 });
      expect(publisher.events[3]).toMatchObject({
        eventType: EventType.EMERGENCY_WITHDRAWN,
        payload: { owner: 'owner', amount: 750 },
      });
    });

    it('should report each deposit its own balance when requests overlap', async () => {
      const [first, second] = await Promise.all([
        service.depositPayment(bandId, 100, 'payer'),
        service.depositPayment(bandId, 200, 'payer'),
      ]);

      expect(first).toEqual({ bandId, amount: 100, balance: 100 });
      expect(second).toEqual({ bandId, amount: 200, balance: 300 });
      expect(publisher.events[2]).toMatchObject({ payload: { newBalance: 100 } });
      expect(publisher.events[3]).toMatchObject({ payload: { newBalance: 300 } });
    });

    it('should report the balance left by the withdrawal itself when a deposit overlaps', async () => {
      await service.depositPayment(bandId, 1000, 'payer');

      const [withdrawal, deposit] = await Promise.all([
        service.withdrawEarnings(bandId, 'alice'),
        service.depositPayment(bandId, 500, 'payer'),
      ]);

      expect(withdrawal).toEqual({ bandId, amount: 400, balance: 600, totalEarned: 400 });
      expect(deposit).toEqual({ bandId, amount: 500, balance: 1100 });
    });

    it('should reject withdrawals on an empty pool', async () => {
      const error = await service.withdrawEarnings(bandId, 'alice').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LedgerError);
      expect(error).toMatchObject({ kind: LedgerErrorKind.INSUFFICIENT_BALANCE });
    });
  });

  describe('deactivateBand', () => {
    it('should return the band and publish BAND_DEACTIVATED', async () => {
      const { bandId } = await service.createBand('Test Band', 'owner');

      const band = await service.deactivateBand(bandId, 'owner');

      expect(band.active).toBe(false);
      expect(publisher.events[1]).toMatchObject({
        eventType: EventType.BAND_DEACTIVATED,
        payload: { owner: 'owner' },
      });
    });
  });

  describe('event publishing failures', () => {
    it('should keep the committed mutation when publishing fails', async () => {
      publisher.failure = new Error('Event bus not connected');

      const { bandId } = await service.createBand('Test Band', 'owner');
      const result = await service.depositPayment(bandId, 500, 'payer');

      expect(result.balance).toBe(500);
      expect(service.getBandBalance(bandId)).toEqual({ balance: 500 });
      expect(publisher.events).toHaveLength(0);
    });
  });

  describe('queries', () => {
    it('should pass through to the engine', async () => {
      const { bandId } = await service.createBand('Test Band', 'owner');
      await service.addMember(bandId, 'alice', 'Alice', 25, 'owner');
      await service.depositPayment(bandId, 390, 'payer');

      expect(service.getTotalBands()).toBe(1);
      expect(service.getMemberJoinOrder()).toBe(1);
      expect(service.isBandMember(bandId, 'alice')).toBe(true);
      expect(service.isBandMember(bandId, 'bob')).toBe(false);
      expect(service.calculateMemberEarnings(bandId, 'alice')).toBe(97);
      expect(service.getMemberInfo(bandId, 'alice')?.name).toBe('Alice');
      expect(service.getBandInfo(bandId)?.owner).toBe('owner');
      expect(service.getBandInfo(42)).toBeUndefined();
    });
  });
});

import { Band, BandBalance, BandId, BandMember, LedgerSnapshot, Principal } from './ledger.types';

const isNonNegativeInteger = (value: number): boolean =>
  Number.isSafeInteger(value) && value >= 0;

const isPercentage = (value: number): boolean =>
  Number.isInteger(value) && value > 0 && value <= 100;

/**
 * In-process tables and counters of the ledger.
 *
 * Members are kept in a nested map keyed by band id, then by member principal,
 * so a (bandId, member) pair is unique by construction.
 */
export class LedgerStore {
  nextBandId = 1;
  memberJoinSequence = 0;

  private readonly bands = new Map<BandId, Band>();
  private readonly members = new Map<BandId, Map<Principal, BandMember>>();
  private readonly balances = new Map<BandId, BandBalance>();

  getBand(bandId: BandId): Band | undefined {
    return this.bands.get(bandId);
  }

  hasBand(bandId: BandId): boolean {
    return this.bands.has(bandId);
  }

  setBand(bandId: BandId, band: Band): void {
    this.bands.set(bandId, band);
  }

  getMember(bandId: BandId, member: Principal): BandMember | undefined {
    return this.members.get(bandId)?.get(member);
  }

  hasMember(bandId: BandId, member: Principal): boolean {
    return this.members.get(bandId)?.has(member) ?? false;
  }

  setMember(bandId: BandId, member: Principal, record: BandMember): void {
    let bandMembers = this.members.get(bandId);
    if (!bandMembers) {
      bandMembers = new Map();
      this.members.set(bandId, bandMembers);
    }
    bandMembers.set(member, record);
  }

  getBalance(bandId: BandId): BandBalance | undefined {
    return this.balances.get(bandId);
  }

  setBalance(bandId: BandId, record: BandBalance): void {
    this.balances.set(bandId, record);
  }

  /**
   * Sum of every band's pooled balance
   */
  totalPooled(): number {
    let total = 0;
    for (const { balance } of this.balances.values()) {
      total += balance;
    }
    return total;
  }

  snapshot(): LedgerSnapshot {
    const members: LedgerSnapshot['members'] = [];
    for (const [bandId, bandMembers] of this.members) {
      for (const [member, record] of bandMembers) {
        members.push({ bandId, member, ...record });
      }
    }

    return {
      nextBandId: this.nextBandId,
      memberJoinSequence: this.memberJoinSequence,
      bands: [...this.bands].map(([bandId, band]) => ({ bandId, ...band })),
      members,
      balances: [...this.balances].map(([bandId, record]) => ({ bandId, ...record })),
    };
  }

  /**
   * Rebuild a store from a snapshot written by an external persistence layer.
   * Throws if the snapshot breaks a table invariant: every member and balance
   * row belongs to a listed band, every band has exactly one balance row,
   * totalMembers matches the listed members, and join orders are unique and
   * below memberJoinSequence.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): LedgerStore {
    if (!Number.isSafeInteger(snapshot.nextBandId) || snapshot.nextBandId < 1) {
      throw new Error(`Invalid snapshot: nextBandId ${snapshot.nextBandId}`);
    }
    if (!isNonNegativeInteger(snapshot.memberJoinSequence)) {
      throw new Error(`Invalid snapshot: memberJoinSequence ${snapshot.memberJoinSequence}`);
    }

    const store = new LedgerStore();
    store.nextBandId = snapshot.nextBandId;
    store.memberJoinSequence = snapshot.memberJoinSequence;

    for (const { bandId, name, owner, totalMembers, active } of snapshot.bands) {
      if (store.hasBand(bandId)) {
        throw new Error(`Invalid snapshot: duplicate band ${bandId}`);
      }
      store.setBand(bandId, { name, owner, totalMembers, active });
    }

    const joinOrders = new Set<number>();
    for (const { bandId, member, name, percentage, totalEarned, joinedAt } of snapshot.members) {
      if (!store.hasBand(bandId)) {
        throw new Error(`Invalid snapshot: member ${member} in unknown band ${bandId}`);
      }
      if (store.hasMember(bandId, member)) {
        throw new Error(`Invalid snapshot: duplicate member ${member} in band ${bandId}`);
      }
      if (!isPercentage(percentage)) {
        throw new Error(`Invalid snapshot: percentage ${percentage} for member ${member}`);
      }
      if (!isNonNegativeInteger(totalEarned)) {
        throw new Error(`Invalid snapshot: totalEarned ${totalEarned} for member ${member}`);
      }
      if (
        !isNonNegativeInteger(joinedAt) ||
        joinedAt >= snapshot.memberJoinSequence ||
        joinOrders.has(joinedAt)
      ) {
        throw new Error(`Invalid snapshot: joinedAt ${joinedAt} for member ${member}`);
      }
      joinOrders.add(joinedAt);
      store.setMember(bandId, member, { name, percentage, totalEarned, joinedAt });
    }

    for (const { bandId, totalMembers } of snapshot.bands) {
      const count = store.members.get(bandId)?.size ?? 0;
      if (totalMembers !== count) {
        throw new Error(
          `Invalid snapshot: band ${bandId} counts ${totalMembers} members but lists ${count}`
        );
      }
    }

    for (const { bandId, balance } of snapshot.balances) {
      if (!store.hasBand(bandId)) {
        throw new Error(`Invalid snapshot: balance for unknown band ${bandId}`);
      }
      if (store.getBalance(bandId)) {
        throw new Error(`Invalid snapshot: duplicate balance for band ${bandId}`);
      }
      if (!isNonNegativeInteger(balance)) {
        throw new Error(`Invalid snapshot: balance ${balance} for band ${bandId}`);
      }
      store.setBalance(bandId, { balance });
    }

    for (const bandId of store.bands.keys()) {
      if (!store.getBalance(bandId)) {
        throw new Error(`Invalid snapshot: band ${bandId} has no balance`);
      }
    }

    return store;
  }
}

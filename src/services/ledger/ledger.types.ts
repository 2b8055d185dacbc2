/**
 * Ledger domain types
 *
 * A principal is the trusted caller identity supplied by the host
 * (the `principal` claim of the caller's token).
 */

export type Principal = string;

export type BandId = number;

export interface Band {
  name: string;
  owner: Principal;
  totalMembers: number;
  active: boolean;
}

export interface BandMember {
  name: string;
  /** Share of the live pool, integer in (0, 100] */
  percentage: number;
  /** Cumulative amount withdrawn; never decreases */
  totalEarned: number;
  /** Position in the join sequence shared by all bands */
  joinedAt: number;
}

export interface BandBalance {
  balance: number;
}

/**
 * Moves funds between principals. Implementations throw when the transfer
 * cannot be completed; nothing is moved in that case.
 */
export interface AssetTransfer {
  transfer(from: Principal, to: Principal, amount: number): void;
}

/**
 * Plain JSON-safe image of every table and counter of the ledger
 */
export interface LedgerSnapshot {
  nextBandId: number;
  memberJoinSequence: number;
  bands: Array<{ bandId: BandId } & Band>;
  members: Array<{ bandId: BandId; member: Principal } & BandMember>;
  balances: Array<{ bandId: BandId } & BandBalance>;
}

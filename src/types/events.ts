export enum EventType {
  // Band lifecycle
  BAND_CREATED = 'BAND_CREATED',
  BAND_DEACTIVATED = 'BAND_DEACTIVATED',

  // Membership
  MEMBER_ADDED = 'MEMBER_ADDED',
  MEMBER_PERCENTAGE_UPDATED = 'MEMBER_PERCENTAGE_UPDATED',

  // Pool movements
  PAYMENT_DEPOSITED = 'PAYMENT_DEPOSITED',
  EARNINGS_WITHDRAWN = 'EARNINGS_WITHDRAWN',
  EMERGENCY_WITHDRAWN = 'EMERGENCY_WITHDRAWN',
}

export interface BaseEvent {
  eventType: EventType;
  bandId: number;
  timestamp: Date;
  payload: Record<string, unknown>;
}

export interface BandCreatedEvent extends BaseEvent {
  eventType: EventType.BAND_CREATED;
  payload: {
    name: string;
    owner: string;
  };
}

export interface BandDeactivatedEvent extends BaseEvent {
  eventType: EventType.BAND_DEACTIVATED;
  payload: {
    owner: string;
  };
}

export interface MemberAddedEvent extends BaseEvent {
  eventType: EventType.MEMBER_ADDED;
  payload: {
    member: string;
    name: string;
    percentage: number;
    joinedAt: number;
  };
}

export interface MemberPercentageUpdatedEvent extends BaseEvent {
  eventType: EventType.MEMBER_PERCENTAGE_UPDATED;
  payload: {
    member: string;
    percentage: number;
  };
}

export interface PaymentDepositedEvent extends BaseEvent {
  eventType: EventType.PAYMENT_DEPOSITED;
  payload: {
    depositor: string;
    amount: number;
    newBalance: number;
  };
}

export interface EarningsWithdrawnEvent extends BaseEvent {
  eventType: EventType.EARNINGS_WITHDRAWN;
  payload: {
    member: string;
    amount: number;
    newBalance: number;
    totalEarned: number;
  };
}

export interface EmergencyWithdrawnEvent extends BaseEvent {
  eventType: EventType.EMERGENCY_WITHDRAWN;
  payload: {
    owner: string;
    amount: number;
  };
}

export type LedgerEvent =
  | BandCreatedEvent
  | BandDeactivatedEvent
  | MemberAddedEvent
  | MemberPercentageUpdatedEvent
  | PaymentDepositedEvent
  | EarningsWithdrawnEvent
  | EmergencyWithdrawnEvent;

/**
 * Anything that can publish ledger events
 */
export interface EventPublisher {
  publish(event: LedgerEvent): Promise<void>;
}

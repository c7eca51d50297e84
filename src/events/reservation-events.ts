export const RESERVATION_EVENTS_CLIENT = 'RESERVATION_EVENTS_CLIENT';

export enum ReservationEventPattern {
  HOLD_CREATED = 'hold.created',
  HOLD_EXPIRED = 'hold.expired',
  PURCHASE_COMPLETED = 'purchase.completed',
  PURCHASE_CANCELLED = 'purchase.cancelled',
}

export interface HoldEventPayload {
  holdId: string;
  flightId: string;
  customer: string;
  seats: string[];
  expiresAt: string;
  timestamp: string;
}

export interface PurchaseEventPayload {
  purchaseId: string;
  flightId: string;
  customer: string;
  seats: string[];
  purchasedAt: string;
  timestamp: string;
}

export enum PurchaseStatus {
  ACTIVE = 'ACTIVE',
  CANCELLED = 'CANCELLED',
}

export interface Purchase {
  readonly id: string;
  readonly flightId: string;
  readonly seats: readonly string[];
  readonly customer: string;
  readonly purchasedAt: Date;
  status: PurchaseStatus;
}

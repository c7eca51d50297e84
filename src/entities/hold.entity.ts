export enum HoldStatus {
  ACTIVE = 'ACTIVE',
  EXPIRED = 'EXPIRED',
  CONVERTED = 'CONVERTED',
}

export interface Hold {
  readonly id: string;
  readonly flightId: string;
  /** Request or assignment order. */
  readonly seats: readonly string[];
  readonly customer: string;
  readonly expiresAt: Date;
  status: HoldStatus;
}

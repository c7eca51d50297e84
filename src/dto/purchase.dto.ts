import { ApiProperty } from '@nestjs/swagger';
import { Purchase, PurchaseStatus } from '../entities';

export class PurchaseResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  flightId!: string;

  @ApiProperty()
  customer!: string;

  @ApiProperty({ type: [String] })
  seats!: string[];

  @ApiProperty()
  purchasedAt!: Date;

  @ApiProperty({ enum: PurchaseStatus })
  status!: PurchaseStatus;
}

export function toPurchaseResponse(purchase: Purchase): PurchaseResponseDto {
  return {
    id: purchase.id,
    flightId: purchase.flightId,
    customer: purchase.customer,
    seats: [...purchase.seats],
    purchasedAt: purchase.purchasedAt,
    status: purchase.status,
  };
}

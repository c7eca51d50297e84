import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { ArrayMinSize, IsArray, IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';
import { Hold, HoldStatus } from '../entities';

export class CreateHoldDto {
  @ApiProperty({ example: 'F-SFO-PDX-20250301-0845', description: 'Flight to hold seats on' })
  @IsString()
  @IsNotEmpty()
  flightId!: string;

  @ApiProperty({ example: 'customer-42', description: 'Opaque customer identifier' })
  @IsString()
  @IsNotEmpty()
  customer!: string;

  @ApiPropertyOptional({ example: ['12A', '12B'], description: 'Explicit seats, in order. Excludes count.' })
  @IsOptional()
  @IsArray()
  @ArrayMinSize(1)
  @IsString({ each: true })
  seats?: string[];

  @ApiPropertyOptional({ example: 2, description: 'Auto-assign the first N available seats. Excludes seats.' })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Type(() => Number)
  count?: number;

  @ApiPropertyOptional({ example: 10, description: 'Override the default hold TTL (minutes)' })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Type(() => Number)
  holdMinutes?: number;
}

/** Filters for hold and purchase listings. */
export class LedgerQueryDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  customer?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  flightId?: string;
}

export class HoldResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  flightId!: string;

  @ApiProperty()
  customer!: string;

  @ApiProperty({ type: [String] })
  seats!: string[];

  @ApiProperty()
  expiresAt!: Date;

  @ApiProperty({ enum: HoldStatus })
  status!: HoldStatus;
}

export function toHoldResponse(hold: Hold): HoldResponseDto {
  return {
    id: hold.id,
    flightId: hold.flightId,
    customer: hold.customer,
    seats: [...hold.seats],
    expiresAt: hold.expiresAt,
    status: hold.status,
  };
}

import { ApiProperty } from '@nestjs/swagger';
import { Flight, SeatStatus } from '../entities';
import { compareSeats, parseSeat } from '../utils/seat.util';

export class SeatDto {
  @ApiProperty({ example: '12C' })
  seat!: string;

  @ApiProperty({ example: 12 })
  row!: number;

  @ApiProperty({ example: 'C' })
  column!: string;

  @ApiProperty({ enum: SeatStatus })
  status!: SeatStatus;

  @ApiProperty()
  isAvailable!: boolean;
}

export class FlightSeatMapDto {
  @ApiProperty()
  flightId!: string;

  @ApiProperty()
  totalSeats!: number;

  @ApiProperty()
  availableSeats!: number;

  @ApiProperty()
  heldSeats!: number;

  @ApiProperty()
  purchasedSeats!: number;

  @ApiProperty({ type: [SeatDto] })
  seats!: SeatDto[];
}

export function toFlightSeatMap(flight: Flight): FlightSeatMapDto {
  const seats: SeatDto[] = flight.seatMap
    .entries()
    .sort(([a], [b]) => compareSeats(a, b))
    .map(([seat, status]) => {
      const position = parseSeat(seat);
      return {
        seat,
        row: position?.row ?? 0,
        column: position?.column ?? '',
        status,
        isAvailable: status === SeatStatus.AVAILABLE,
      };
    });

  return {
    flightId: flight.id,
    totalSeats: flight.seatMap.size,
    availableSeats: flight.seatMap.count(SeatStatus.AVAILABLE),
    heldSeats: flight.seatMap.count(SeatStatus.HELD),
    purchasedSeats: flight.seatMap.count(SeatStatus.PURCHASED),
    seats,
  };
}

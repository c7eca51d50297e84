import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, Matches, Min } from 'class-validator';
import { Flight, SeatStatus } from '../entities';

const ADMIN_DATETIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}$/;

export class CreateFlightDto {
  @ApiProperty({ example: 'Seattle', description: 'Departure city' })
  @IsString()
  @IsNotEmpty()
  departureCity!: string;

  @ApiProperty({ example: 'Los Angeles', description: 'Arrival city' })
  @IsString()
  @IsNotEmpty()
  arrivalCity!: string;

  @ApiProperty({ example: 'SEA', description: '3-letter IATA code' })
  @IsString()
  departureAirport!: string;

  @ApiProperty({ example: 'LAX', description: '3-letter IATA code' })
  @IsString()
  arrivalAirport!: string;

  @ApiProperty({ example: '2025-03-02T14:30', description: 'UTC, YYYY-MM-DDTHH:MM' })
  @Matches(ADMIN_DATETIME, { message: "departureDatetime must be 'YYYY-MM-DDTHH:MM' (or 'YYYY-MM-DD HH:MM')" })
  departureDatetime!: string;

  @ApiProperty({ example: '2025-03-02T17:10', description: 'UTC, YYYY-MM-DDTHH:MM' })
  @Matches(ADMIN_DATETIME, { message: "arrivalDatetime must be 'YYYY-MM-DDTHH:MM' (or 'YYYY-MM-DD HH:MM')" })
  arrivalDatetime!: string;

  @ApiPropertyOptional({ example: 24, description: 'Number of seat rows (A-F layout)', default: 24 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Type(() => Number)
  rows?: number;

  @ApiPropertyOptional({ example: 'F-SEA-LAX-20250302-1430', description: 'Explicit flight id' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  flightId?: string;
}

export class SearchFlightsQueryDto {
  @ApiPropertyOptional({ example: 'san fran', description: 'Case-insensitive substring' })
  @IsOptional()
  @IsString()
  departingCity?: string;

  @ApiPropertyOptional({ example: 'portland', description: 'Case-insensitive substring' })
  @IsOptional()
  @IsString()
  arrivingCity?: string;

  @ApiPropertyOptional({ example: '20250301 08:', description: 'Substring of "YYYYMMDD HH:MM:SS"' })
  @IsOptional()
  @IsString()
  departureTime?: string;

  @ApiPropertyOptional({ example: '20250301 10:', description: 'Substring of "YYYYMMDD HH:MM:SS"' })
  @IsOptional()
  @IsString()
  arrivalTime?: string;

  @ApiPropertyOptional({ example: '2025-03-01', description: 'Exact match, YYYY-MM-DD' })
  @IsOptional()
  @IsString()
  departureDate?: string;
}

export class FlightResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  departureCity!: string;

  @ApiProperty()
  arrivalCity!: string;

  @ApiProperty()
  departureAirport!: string;

  @ApiProperty()
  arrivalAirport!: string;

  @ApiProperty({ example: '20250301 08:45:00' })
  departureTime!: string;

  @ApiProperty({ example: '20250301 10:05:00' })
  arrivalTime!: string;

  @ApiProperty({ example: '2025-03-01' })
  departureDate!: string;

  @ApiProperty()
  totalSeats!: number;

  @ApiProperty()
  availableSeats!: number;
}

export function toFlightResponse(flight: Flight): FlightResponseDto {
  return {
    id: flight.id,
    departureCity: flight.departureCity,
    arrivalCity: flight.arrivalCity,
    departureAirport: flight.departureAirport,
    arrivalAirport: flight.arrivalAirport,
    departureTime: flight.departureTime,
    arrivalTime: flight.arrivalTime,
    departureDate: flight.departureDate,
    totalSeats: flight.seatMap.size,
    availableSeats: flight.seatMap.count(SeatStatus.AVAILABLE),
  };
}

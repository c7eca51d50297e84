import { Flight, SeatMap } from '../entities';

/** Flights present on a first run, before any state file exists. */
export function seedFlights(): Flight[] {
  return [
    {
      id: 'F-SFO-PDX-20250301-0845',
      departureCity: 'San Francisco',
      arrivalCity: 'Portland',
      departureAirport: 'SFO',
      arrivalAirport: 'PDX',
      departureTime: '20250301 08:45:00',
      arrivalTime: '20250301 10:05:00',
      departureDate: '2025-03-01',
      seatMap: SeatMap.withRows(24),
    },
  ];
}

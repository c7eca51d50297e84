import { SeatMap } from './seat-map';

export interface Flight {
  id: string;
  departureCity: string;
  arrivalCity: string;
  departureAirport: string;
  arrivalAirport: string;
  /** UTC, formatted `YYYYMMDD HH:MM:SS` */
  departureTime: string;
  /** UTC, formatted `YYYYMMDD HH:MM:SS` */
  arrivalTime: string;
  /** UTC, formatted `YYYY-MM-DD` */
  departureDate: string;
  seatMap: SeatMap;
}

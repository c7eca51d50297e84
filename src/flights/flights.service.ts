import { Injectable, Logger } from '@nestjs/common';
import { Flight, SeatMap } from '../entities';
import { CreateFlightDto } from '../dto/flight.dto';
import { FlightAlreadyExistsException, InvalidRequestException, UnknownFlightException } from '../errors/reservation.errors';
import { StateStore } from '../state/state.store';
import {
  formatFlightDate,
  formatFlightIdStamp,
  formatFlightTimestamp,
  parseUtcMinute,
} from '../utils/datetime.util';

export interface FlightSearchCriteria {
  departingCity?: string;
  arrivingCity?: string;
  departureTime?: string;
  arrivalTime?: string;
  departureDate?: string;
}

const DEFAULT_ROWS = 24;
const AIRPORT_CODE = /^[A-Z]{3}$/;

@Injectable()
export class FlightsService {
  private readonly logger = new Logger(FlightsService.name);

  constructor(private readonly store: StateStore) {}

  getFlight(flightId: string): Flight {
    const flight = this.store.flights.get(flightId);
    if (!flight) {
      throw new UnknownFlightException(flightId);
    }
    return flight;
  }

  listFlights(): Flight[] {
    return this.sortByDeparture([...this.store.flights.values()]);
  }

  search(criteria: FlightSearchCriteria): Flight[] {
    const norm = (value: string) => value.trim().toLowerCase();
    const present = (value: string | undefined): value is string => value !== undefined && value.trim() !== '';

    const matches = [...this.store.flights.values()].filter((flight) => {
      if (present(criteria.departingCity) && !norm(flight.departureCity).includes(norm(criteria.departingCity))) {
        return false;
      }
      if (present(criteria.arrivingCity) && !norm(flight.arrivalCity).includes(norm(criteria.arrivingCity))) {
        return false;
      }
      if (present(criteria.departureTime) && !flight.departureTime.includes(criteria.departureTime.trim())) {
        return false;
      }
      if (present(criteria.arrivalTime) && !flight.arrivalTime.includes(criteria.arrivalTime.trim())) {
        return false;
      }
      if (present(criteria.departureDate) && flight.departureDate !== criteria.departureDate.trim()) {
        return false;
      }
      return true;
    });

    return this.sortByDeparture(matches);
  }

  /** Adds the flight to the catalog in memory; the caller writes the snapshot. */
  addFlight(createFlightDto: CreateFlightDto): Flight {
    const departure = parseUtcMinute(createFlightDto.departureDatetime);
    const arrival = parseUtcMinute(createFlightDto.arrivalDatetime);
    if (!departure) {
      throw new InvalidRequestException("Invalid departure datetime. Use 'YYYY-MM-DDTHH:MM' (or 'YYYY-MM-DD HH:MM').");
    }
    if (!arrival) {
      throw new InvalidRequestException("Invalid arrival datetime. Use 'YYYY-MM-DDTHH:MM' (or 'YYYY-MM-DD HH:MM').");
    }
    if (departure.getTime() >= arrival.getTime()) {
      throw new InvalidRequestException('Departure time must be before arrival time.');
    }

    const rows = createFlightDto.rows ?? DEFAULT_ROWS;
    if (!Number.isInteger(rows) || rows <= 0) {
      throw new InvalidRequestException('rows must be a positive integer.', { rows });
    }

    const departureAirport = createFlightDto.departureAirport.trim().toUpperCase();
    const arrivalAirport = createFlightDto.arrivalAirport.trim().toUpperCase();
    if (!AIRPORT_CODE.test(departureAirport)) {
      throw new InvalidRequestException('Departure airport must be a 3-letter IATA code (e.g. SFO).', {
        departureAirport: createFlightDto.departureAirport,
      });
    }
    if (!AIRPORT_CODE.test(arrivalAirport)) {
      throw new InvalidRequestException('Arrival airport must be a 3-letter IATA code (e.g. PDX).', {
        arrivalAirport: createFlightDto.arrivalAirport,
      });
    }

    const flightId =
      createFlightDto.flightId?.trim() ||
      `F-${departureAirport}-${arrivalAirport}-${formatFlightIdStamp(departure)}`;
    if (this.store.flights.has(flightId)) {
      throw new FlightAlreadyExistsException(flightId);
    }

    const flight: Flight = {
      id: flightId,
      departureCity: createFlightDto.departureCity.trim(),
      arrivalCity: createFlightDto.arrivalCity.trim(),
      departureAirport,
      arrivalAirport,
      departureTime: formatFlightTimestamp(departure),
      arrivalTime: formatFlightTimestamp(arrival),
      departureDate: formatFlightDate(departure),
      seatMap: SeatMap.withRows(rows),
    };

    this.store.flights.set(flight.id, flight);

    this.logger.log(`Flight added: ${flight.id} (${departureAirport} -> ${arrivalAirport}, ${rows} rows)`);
    return flight;
  }

  private sortByDeparture(flights: Flight[]): Flight[] {
    return flights.sort((a, b) => a.departureTime.localeCompare(b.departureTime));
  }
}

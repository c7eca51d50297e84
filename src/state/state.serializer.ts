import { plainToInstance } from 'class-transformer';
import { ArrayMinSize, IsArray, IsEnum, IsISO8601, IsNotEmpty, IsObject, IsString, validateSync } from 'class-validator';
import { Flight, Hold, HoldStatus, Purchase, PurchaseStatus, SeatMap, SeatStatus } from '../entities';

/**
 * On-disk records. Field names and status strings are the persisted format;
 * do not rename them without migrating existing state files.
 */
export class FlightRecord {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  departure_city!: string;

  @IsString()
  arrival_city!: string;

  @IsString()
  departure_airport!: string;

  @IsString()
  arrival_airport!: string;

  @IsString()
  departure_time!: string;

  @IsString()
  arrival_time!: string;

  @IsString()
  departure_date!: string;

  @IsObject()
  seat_map!: Record<string, string>;
}

export class HoldRecord {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  flight_id!: string;

  @IsArray()
  @ArrayMinSize(1)
  @IsString({ each: true })
  seats!: string[];

  @IsString()
  customer!: string;

  @IsISO8601()
  time_expires!: string;

  @IsEnum(HoldStatus)
  hold_status!: HoldStatus;
}

export class PurchaseRecord {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  flight_id!: string;

  @IsArray()
  @ArrayMinSize(1)
  @IsString({ each: true })
  seats!: string[];

  @IsString()
  customer!: string;

  @IsISO8601()
  time_purchased!: string;

  @IsEnum(PurchaseStatus)
  purchased_status!: PurchaseStatus;
}

export interface StateSnapshot {
  flights: Record<string, FlightRecord>;
  holds: Record<string, HoldRecord>;
  purchases: Record<string, PurchaseRecord>;
}

export interface StoreState {
  flights: Map<string, Flight>;
  holds: Map<string, Hold>;
  purchases: Map<string, Purchase>;
}

export class StateSnapshotError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StateSnapshotError';
  }
}

export function serializeState(state: StoreState): StateSnapshot {
  const snapshot: StateSnapshot = { flights: {}, holds: {}, purchases: {} };

  for (const flight of state.flights.values()) {
    snapshot.flights[flight.id] = {
      id: flight.id,
      departure_city: flight.departureCity,
      arrival_city: flight.arrivalCity,
      departure_airport: flight.departureAirport,
      arrival_airport: flight.arrivalAirport,
      departure_time: flight.departureTime,
      arrival_time: flight.arrivalTime,
      departure_date: flight.departureDate,
      seat_map: flight.seatMap.toRecord(),
    };
  }

  for (const hold of state.holds.values()) {
    snapshot.holds[hold.id] = {
      id: hold.id,
      flight_id: hold.flightId,
      seats: [...hold.seats],
      customer: hold.customer,
      time_expires: hold.expiresAt.toISOString(),
      hold_status: hold.status,
    };
  }

  for (const purchase of state.purchases.values()) {
    snapshot.purchases[purchase.id] = {
      id: purchase.id,
      flight_id: purchase.flightId,
      seats: [...purchase.seats],
      customer: purchase.customer,
      time_purchased: purchase.purchasedAt.toISOString(),
      purchased_status: purchase.status,
    };
  }

  return snapshot;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection<T extends object>(
  raw: Record<string, unknown>,
  section: keyof StateSnapshot,
  recordClass: new () => T,
): T[] {
  const entries = raw[section] ?? {};
  if (!isRecord(entries)) {
    throw new StateSnapshotError(`Section "${section}" must be an object`);
  }

  return Object.entries(entries).map(([key, entry]) => {
    if (!isRecord(entry)) {
      throw new StateSnapshotError(`Invalid ${section} record "${key}": not an object`);
    }
    const record = plainToInstance(recordClass, entry);
    const errors = validateSync(record);
    if (errors.length > 0) {
      throw new StateSnapshotError(`Invalid ${section} record "${key}": ${errors.toString()}`);
    }
    return record;
  });
}

function parseSeatStatus(flightId: string, seat: string, raw: string): SeatStatus {
  const status = Object.values(SeatStatus).find((value) => value === raw);
  if (status === undefined) {
    throw new StateSnapshotError(`Flight ${flightId} seat ${seat} has unknown status "${raw}"`);
  }
  return status;
}

function parseTimestamp(raw: string, field: string): Date {
  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) {
    throw new StateSnapshotError(`Invalid ${field}: ${raw}`);
  }
  return date;
}

export function deserializeState(raw: unknown): StoreState {
  if (!isRecord(raw)) {
    throw new StateSnapshotError('State snapshot must be a JSON object');
  }

  const state: StoreState = { flights: new Map(), holds: new Map(), purchases: new Map() };

  for (const record of readSection(raw, 'flights', FlightRecord)) {
    const seats = Object.entries(record.seat_map).map(
      ([seat, status]) => [seat, parseSeatStatus(record.id, seat, String(status))] as const,
    );
    state.flights.set(record.id, {
      id: record.id,
      departureCity: record.departure_city,
      arrivalCity: record.arrival_city,
      departureAirport: record.departure_airport,
      arrivalAirport: record.arrival_airport,
      departureTime: record.departure_time,
      arrivalTime: record.arrival_time,
      departureDate: record.departure_date,
      seatMap: new SeatMap(seats),
    });
  }

  for (const record of readSection(raw, 'holds', HoldRecord)) {
    state.holds.set(record.id, {
      id: record.id,
      flightId: record.flight_id,
      seats: [...record.seats],
      customer: record.customer,
      expiresAt: parseTimestamp(record.time_expires, `hold ${record.id} time_expires`),
      status: record.hold_status,
    });
  }

  for (const record of readSection(raw, 'purchases', PurchaseRecord)) {
    state.purchases.set(record.id, {
      id: record.id,
      flightId: record.flight_id,
      seats: [...record.seats],
      customer: record.customer,
      purchasedAt: parseTimestamp(record.time_purchased, `purchase ${record.id} time_purchased`),
      status: record.purchased_status,
    });
  }

  return state;
}

import { Flight, Hold, Purchase, SeatMap } from '../src/entities';
import { serializeState, StateSnapshot, StoreState } from '../src/state/state.serializer';
import { Clock, IdGenerator, IdPrefix } from '../src/state/state.tokens';

export class FixedClock implements Clock {
  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(date: Date): void {
    this.current = date;
  }

  advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60_000);
  }
}

/** `H-1`, `H-2`, ... and `P-1`, `P-2`, ... */
export class SequentialIdGenerator implements IdGenerator {
  private readonly counters: Record<IdPrefix, number> = { H: 0, P: 0 };

  next(prefix: IdPrefix): string {
    this.counters[prefix] += 1;
    return `${prefix}-${this.counters[prefix]}`;
  }
}

export function buildFlight(id = 'F-TEST-0001', rows = 1): Flight {
  return {
    id,
    departureCity: 'Testville',
    arrivalCity: 'Mocktown',
    departureAirport: 'TST',
    arrivalAirport: 'MCK',
    departureTime: '20250301 08:45:00',
    arrivalTime: '20250301 10:05:00',
    departureDate: '2025-03-01',
    seatMap: SeatMap.withRows(rows),
  };
}

/** Stand-in for StateStore: same maps, no file behind them. */
export interface InMemoryStore extends StoreState {
  persist: jest.Mock<Promise<void>, []>;
  snapshot(): StateSnapshot;
  replace(state: StoreState): void;
}

export function createInMemoryStore(...flights: Flight[]): InMemoryStore {
  const flightMap = new Map<string, Flight>(flights.map((flight) => [flight.id, flight]));
  const holds = new Map<string, Hold>();
  const purchases = new Map<string, Purchase>();

  return {
    flights: flightMap,
    holds,
    purchases,
    persist: jest.fn<Promise<void>, []>().mockResolvedValue(undefined),
    snapshot: () => serializeState({ flights: flightMap, holds, purchases }),
    replace: (state: StoreState) => {
      flightMap.clear();
      holds.clear();
      purchases.clear();
      state.flights.forEach((flight, id) => flightMap.set(id, flight));
      state.holds.forEach((hold, id) => holds.set(id, hold));
      state.purchases.forEach((purchase, id) => purchases.set(id, purchase));
    },
  };
}

import { Test, TestingModule } from '@nestjs/testing';
import { LeaseLedgerService } from './lease-ledger.service';
import { StateStore } from '../state/state.store';
import { ID_GENERATOR } from '../state/state.tokens';
import { Flight, Hold, HoldStatus, SeatStatus } from '../entities';
import {
  InsufficientInventoryException,
  InvalidRequestException,
  InvalidSeatException,
  SeatUnavailableException,
} from '../errors/reservation.errors';
import { buildFlight, createInMemoryStore, InMemoryStore, SequentialIdGenerator } from '../../test/test-helpers';

describe('LeaseLedgerService', () => {
  let service: LeaseLedgerService;
  let store: InMemoryStore;
  let flight: Flight;

  const now = new Date('2025-03-01T08:00:00.000Z');

  beforeEach(async () => {
    flight = buildFlight('F-TEST-0001', 1);
    store = createInMemoryStore(flight);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LeaseLedgerService,
        { provide: StateStore, useValue: store },
        { provide: ID_GENERATOR, useValue: new SequentialIdGenerator() },
      ],
    }).compile();

    service = module.get<LeaseLedgerService>(LeaseLedgerService);
    jest.spyOn(service['logger'], 'log').mockImplementation();
    jest.spyOn(service['logger'], 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('createHold', () => {
    it('should hold explicit seats in request order', () => {
      const hold = service.createHold(flight, { seats: ['1c', ' 1A '] }, ' alice ', 10, now);

      expect(hold).toEqual({
        id: 'H-1',
        flightId: 'F-TEST-0001',
        seats: ['1C', '1A'],
        customer: 'alice',
        expiresAt: new Date('2025-03-01T08:10:00.000Z'),
        status: HoldStatus.ACTIVE,
      });
      expect(flight.seatMap.get('1C')).toBe(SeatStatus.HELD);
      expect(flight.seatMap.get('1A')).toBe(SeatStatus.HELD);
      expect(store.holds.get('H-1')).toBe(hold);
    });

    it('should auto-assign the first available seats for a count', () => {
      flight.seatMap.set('1A', SeatStatus.PURCHASED);

      const hold = service.createHold(flight, { count: 2 }, 'alice', 10, now);

      expect(hold.seats).toEqual(['1B', '1C']);
    });

    it('should allow taking exactly the remaining seats and nothing more', () => {
      service.createHold(flight, { count: 6 }, 'alice', 10, now);

      expect(flight.seatMap.count(SeatStatus.AVAILABLE)).toBe(0);
      expect(() => service.createHold(flight, { count: 1 }, 'bob', 10, now)).toThrow(
        'Not enough available seats. Requested=1, available=0',
      );
    });

    it('should leave everything untouched when asking for more seats than exist', () => {
      expect(() => service.createHold(flight, { count: 7 }, 'alice', 10, now)).toThrow(
        InsufficientInventoryException,
      );
      expect(flight.seatMap.count(SeatStatus.AVAILABLE)).toBe(6);
      expect(store.holds.size).toBe(0);
    });

    it('should reject a seat held by someone else and hold none of the request', () => {
      service.createHold(flight, { seats: ['1A'] }, 'alice', 10, now);

      expect(() => service.createHold(flight, { seats: ['1C', '1A'] }, 'bob', 10, now)).toThrow(
        new SeatUnavailableException('1A', SeatStatus.HELD),
      );
      expect(() => service.createHold(flight, { seats: ['1C', '1A'] }, 'bob', 10, now)).toThrow(
        'Seat not available: 1A (status=HOLD)',
      );
      expect(flight.seatMap.get('1C')).toBe(SeatStatus.AVAILABLE);
      expect(store.holds.size).toBe(1);
    });

    it('should reject a seat that is not on the flight', () => {
      expect(() => service.createHold(flight, { seats: ['1A', '9Z'] }, 'alice', 10, now)).toThrow(
        InvalidSeatException,
      );
      expect(() => service.createHold(flight, { seats: ['9Z'] }, 'alice', 10, now)).toThrow(
        'Invalid seat for flight F-TEST-0001: 9Z',
      );
      expect(flight.seatMap.get('1A')).toBe(SeatStatus.AVAILABLE);
    });

    it('should reject malformed selections', () => {
      expect(() => service.createHold(flight, { seats: ['1A'], count: 1 }, 'alice', 10, now)).toThrow(
        'Use either seats or count, not both.',
      );
      expect(() => service.createHold(flight, {}, 'alice', 10, now)).toThrow('Must provide seats or count.');
      expect(() => service.createHold(flight, { seats: ['1A', '1a'] }, 'alice', 10, now)).toThrow(
        'Seat requested more than once: 1A',
      );
      expect(() => service.createHold(flight, { seats: [' '] }, 'alice', 10, now)).toThrow('Empty seat.');
      expect(() => service.createHold(flight, { count: 0 }, 'alice', 10, now)).toThrow(InvalidRequestException);
      expect(store.holds.size).toBe(0);
    });

    it('should reject a blank customer and a non-positive TTL', () => {
      expect(() => service.createHold(flight, { count: 1 }, '  ', 10, now)).toThrow('customer is required.');
      expect(() => service.createHold(flight, { count: 1 }, 'alice', 0, now)).toThrow(
        'Hold minutes must be a positive integer.',
      );
    });
  });

  describe('sweepExpired', () => {
    it('should expire holds at their expiry time and free their seats', () => {
      const hold = service.createHold(flight, { seats: ['1A', '1B'] }, 'alice', 10, now);
      const expired: Hold[] = [];

      expect(service.sweepExpired(new Date('2025-03-01T08:09:59.999Z'))).toBe(0);
      expect(hold.status).toBe(HoldStatus.ACTIVE);

      expect(service.sweepExpired(new Date('2025-03-01T08:10:00.000Z'), (h) => expired.push(h))).toBe(1);
      expect(hold.status).toBe(HoldStatus.EXPIRED);
      expect(expired).toEqual([hold]);
      expect(flight.seatMap.get('1A')).toBe(SeatStatus.AVAILABLE);
      expect(flight.seatMap.get('1B')).toBe(SeatStatus.AVAILABLE);
    });

    it('should be idempotent', () => {
      service.createHold(flight, { seats: ['1A'] }, 'alice', 10, now);
      const later = new Date('2025-03-01T09:00:00.000Z');

      expect(service.sweepExpired(later)).toBe(1);
      expect(service.sweepExpired(later)).toBe(0);
    });

    it('should leave a seat that is no longer held as it is', () => {
      service.createHold(flight, { seats: ['1A', '1B'] }, 'alice', 10, now);
      flight.seatMap.set('1A', SeatStatus.PURCHASED);

      service.sweepExpired(new Date('2025-03-01T08:30:00.000Z'));

      expect(flight.seatMap.get('1A')).toBe(SeatStatus.PURCHASED);
      expect(flight.seatMap.get('1B')).toBe(SeatStatus.AVAILABLE);
      expect(service['logger'].warn).toHaveBeenCalledWith(
        'Seat 1A of expiring hold H-1 is PURCHASED; left unchanged',
      );
    });
  });

  describe('getHold / listHolds', () => {
    it('should filter by customer and flight', () => {
      const other = buildFlight('F-TEST-0002', 1);
      store.flights.set(other.id, other);
      service.createHold(flight, { count: 1 }, 'alice', 10, now);
      service.createHold(other, { count: 1 }, 'alice', 10, now);
      service.createHold(flight, { count: 1 }, 'bob', 10, now);

      expect(service.listHolds().map((hold) => hold.id)).toEqual(['H-1', 'H-2', 'H-3']);
      expect(service.listHolds({ customer: 'alice' }).map((hold) => hold.id)).toEqual(['H-1', 'H-2']);
      expect(service.listHolds({ customer: 'alice', flightId: 'F-TEST-0001' }).map((hold) => hold.id)).toEqual([
        'H-1',
      ]);
    });

    it('should throw for an unknown hold', () => {
      expect(() => service.getHold('H-404')).toThrow('Unknown hold: H-404');
    });
  });
});

import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { PurchaseLedgerService } from './purchase-ledger.service';
import { LeaseLedgerService } from '../holds/lease-ledger.service';
import { FlightsService } from '../flights/flights.service';
import { StateStore } from '../state/state.store';
import { ID_GENERATOR } from '../state/state.tokens';
import { Flight, HoldStatus, PurchaseStatus, SeatStatus } from '../entities';
import {
  HoldAlreadyConvertedException,
  HoldExpiredException,
  HoldNotFoundException,
  PurchaseAlreadyCancelledException,
  PurchaseNotFoundException,
  SeatStateMismatchException,
} from '../errors/reservation.errors';
import { buildFlight, createInMemoryStore, InMemoryStore, SequentialIdGenerator } from '../../test/test-helpers';

describe('PurchaseLedgerService', () => {
  let service: PurchaseLedgerService;
  let leaseLedger: LeaseLedgerService;
  let store: InMemoryStore;
  let flight: Flight;

  const now = new Date('2025-03-01T08:00:00.000Z');
  const later = new Date('2025-03-01T08:03:00.000Z');

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();

    flight = buildFlight('F-TEST-0001', 1);
    store = createInMemoryStore(flight);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PurchaseLedgerService,
        LeaseLedgerService,
        FlightsService,
        { provide: StateStore, useValue: store },
        { provide: ID_GENERATOR, useValue: new SequentialIdGenerator() },
      ],
    }).compile();

    service = module.get<PurchaseLedgerService>(PurchaseLedgerService);
    leaseLedger = module.get<LeaseLedgerService>(LeaseLedgerService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('convert', () => {
    it('should turn an active hold into a purchase with the same seats in order', () => {
      const hold = leaseLedger.createHold(flight, { seats: ['1B', '1A'] }, 'alice', 10, now);

      const purchase = service.convert(hold.id, later);

      expect(purchase).toEqual({
        id: 'P-1',
        flightId: 'F-TEST-0001',
        seats: ['1B', '1A'],
        customer: 'alice',
        purchasedAt: later,
        status: PurchaseStatus.ACTIVE,
      });
      expect(flight.seatMap.get('1A')).toBe(SeatStatus.PURCHASED);
      expect(flight.seatMap.get('1B')).toBe(SeatStatus.PURCHASED);
      expect(hold.status).toBe(HoldStatus.CONVERTED);
      expect(store.purchases.get('P-1')).toBe(purchase);
    });

    it('should refuse to convert the same hold twice', () => {
      const hold = leaseLedger.createHold(flight, { seats: ['1A'] }, 'alice', 10, now);
      service.convert(hold.id, later);

      expect(() => service.convert(hold.id, later)).toThrow(HoldAlreadyConvertedException);
      expect(() => service.convert(hold.id, later)).toThrow('Hold H-1 already converted to a purchase');
      expect(store.purchases.size).toBe(1);
    });

    it('should refuse an expired hold', () => {
      const hold = leaseLedger.createHold(flight, { seats: ['1A'] }, 'alice', 10, now);
      leaseLedger.sweepExpired(new Date('2025-03-01T08:10:00.000Z'));

      expect(() => service.convert(hold.id, later)).toThrow(HoldExpiredException);
      expect(flight.seatMap.get('1A')).toBe(SeatStatus.AVAILABLE);
    });

    it('should refuse an unknown hold', () => {
      expect(() => service.convert('H-404', later)).toThrow(HoldNotFoundException);
    });

    it('should change nothing when a seat is no longer held', () => {
      const hold = leaseLedger.createHold(flight, { seats: ['1A', '1B'] }, 'alice', 10, now);
      flight.seatMap.set('1B', SeatStatus.AVAILABLE);

      expect(() => service.convert(hold.id, later)).toThrow(SeatStateMismatchException);
      expect(() => service.convert(hold.id, later)).toThrow(
        'Seat state mismatch for 1B. Expected HOLD, found AVAILABLE',
      );
      expect(flight.seatMap.get('1A')).toBe(SeatStatus.HELD);
      expect(hold.status).toBe(HoldStatus.ACTIVE);
      expect(store.purchases.size).toBe(0);
    });
  });

  describe('cancel', () => {
    it('should release the seats and keep the hold converted', () => {
      const hold = leaseLedger.createHold(flight, { seats: ['1A', '1B'] }, 'alice', 10, now);
      const purchase = service.convert(hold.id, later);

      const cancelled = service.cancel(purchase.id);

      expect(cancelled.status).toBe(PurchaseStatus.CANCELLED);
      expect(flight.seatMap.get('1A')).toBe(SeatStatus.AVAILABLE);
      expect(flight.seatMap.get('1B')).toBe(SeatStatus.AVAILABLE);
      expect(hold.status).toBe(HoldStatus.CONVERTED);
    });

    it('should refuse to cancel twice', () => {
      const hold = leaseLedger.createHold(flight, { seats: ['1A'] }, 'alice', 10, now);
      const purchase = service.convert(hold.id, later);
      service.cancel(purchase.id);

      expect(() => service.cancel(purchase.id)).toThrow(PurchaseAlreadyCancelledException);
      expect(() => service.cancel(purchase.id)).toThrow('Purchase P-1 already cancelled');
    });

    it('should release a seat even when it was not purchased', () => {
      const hold = leaseLedger.createHold(flight, { seats: ['1A'] }, 'alice', 10, now);
      const purchase = service.convert(hold.id, later);
      flight.seatMap.set('1A', SeatStatus.HELD);

      service.cancel(purchase.id);

      expect(flight.seatMap.get('1A')).toBe(SeatStatus.AVAILABLE);
      expect(Logger.prototype.warn).toHaveBeenCalledWith('Seat 1A of purchase P-1 is HOLD; releasing anyway');
    });

    it('should refuse an unknown purchase', () => {
      expect(() => service.cancel('P-404')).toThrow(PurchaseNotFoundException);
      expect(() => service.getPurchase('P-404')).toThrow('Unknown purchase: P-404');
    });
  });

  describe('listPurchases', () => {
    it('should filter by customer', () => {
      const first = leaseLedger.createHold(flight, { seats: ['1A'] }, 'alice', 10, now);
      const second = leaseLedger.createHold(flight, { seats: ['1B'] }, 'bob', 10, now);
      service.convert(first.id, later);
      service.convert(second.id, later);

      expect(service.listPurchases({ customer: 'bob' }).map((purchase) => purchase.seats)).toEqual([['1B']]);
      expect(service.listPurchases()).toHaveLength(2);
    });
  });
});

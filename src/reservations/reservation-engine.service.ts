import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Hold } from '../entities';
import { CreateFlightDto, FlightResponseDto, SearchFlightsQueryDto, toFlightResponse } from '../dto/flight.dto';
import { CreateHoldDto, HoldResponseDto, LedgerQueryDto, toHoldResponse } from '../dto/hold.dto';
import { PurchaseResponseDto, toPurchaseResponse } from '../dto/purchase.dto';
import { FlightSeatMapDto, toFlightSeatMap } from '../dto/seat-map.dto';
import { ReservationEventsPublisher } from '../events/reservation-events.publisher';
import { FlightsService } from '../flights/flights.service';
import { LeaseLedgerService } from '../holds/lease-ledger.service';
import { PurchaseLedgerService } from '../purchases/purchase-ledger.service';
import { deserializeState, StateSnapshot } from '../state/state.serializer';
import { StateStore } from '../state/state.store';
import { CLOCK, Clock } from '../state/state.tokens';
import { KeyedMutex } from '../utils/keyed-mutex.util';
import { renderSeatGrid } from '../utils/seat-grid.util';

const DEFAULT_HOLD_TTL_MINUTES = 10;
const STATE_LOCK = 'state';

/**
 * Entry point for every customer-facing operation.
 *
 * Each call reads the clock, sweeps expired holds, applies its own transition,
 * writes the snapshot and then publishes events. Calls run one at a time:
 * the snapshot covers the whole store, so a failed write can only be undone
 * while no other operation has touched it.
 */
@Injectable()
export class ReservationEngineService {
  private readonly logger = new Logger(ReservationEngineService.name);
  private readonly lock = new KeyedMutex();
  private readonly holdTtlMinutes: number;

  constructor(
    private readonly store: StateStore,
    private readonly flightsService: FlightsService,
    private readonly leaseLedger: LeaseLedgerService,
    private readonly purchaseLedger: PurchaseLedgerService,
    private readonly events: ReservationEventsPublisher,
    private readonly configService: ConfigService,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {
    this.holdTtlMinutes = this.configService.get<number>('app.holdTtlMinutes', DEFAULT_HOLD_TTL_MINUTES);
  }

  async listFlights(): Promise<FlightResponseDto[]> {
    return this.run('listFlights', () => this.flightsService.listFlights().map(toFlightResponse));
  }

  async addFlight(createFlightDto: CreateFlightDto): Promise<FlightResponseDto> {
    return this.run('addFlight', () => toFlightResponse(this.flightsService.addFlight(createFlightDto)));
  }

  async search(criteria: SearchFlightsQueryDto): Promise<FlightResponseDto[]> {
    return this.run('search', () => this.flightsService.search(criteria).map(toFlightResponse));
  }

  async viewSeats(flightId: string): Promise<FlightSeatMapDto> {
    return this.run('viewSeats', () => toFlightSeatMap(this.flightsService.getFlight(flightId)));
  }

  async viewSeatGrid(flightId: string): Promise<string> {
    return this.run('viewSeatGrid', () => {
      const flight = this.flightsService.getFlight(flightId);
      return `Flight: ${flight.id}\n${renderSeatGrid(flight.seatMap)}`;
    });
  }

  async reserve(createHoldDto: CreateHoldDto): Promise<HoldResponseDto> {
    const hold = await this.run(
      'reserve',
      (now) =>
        this.leaseLedger.createHold(
          this.flightsService.getFlight(createHoldDto.flightId),
          { seats: createHoldDto.seats, count: createHoldDto.count },
          createHoldDto.customer,
          createHoldDto.holdMinutes ?? this.holdTtlMinutes,
          now,
        ),
      (created, now) => this.events.holdCreated(created, now),
    );
    return toHoldResponse(hold);
  }

  async purchase(holdId: string): Promise<PurchaseResponseDto> {
    const purchase = await this.run(
      'purchase',
      (now) => this.purchaseLedger.convert(holdId, now),
      (completed, now) => this.events.purchaseCompleted(completed, now),
    );
    return toPurchaseResponse(purchase);
  }

  async cancel(purchaseId: string): Promise<PurchaseResponseDto> {
    const purchase = await this.run(
      'cancel',
      () => this.purchaseLedger.cancel(purchaseId),
      (cancelled, now) => this.events.purchaseCancelled(cancelled, now),
    );
    return toPurchaseResponse(purchase);
  }

  async listHolds(filter: LedgerQueryDto): Promise<HoldResponseDto[]> {
    return this.run('listHolds', () => this.leaseLedger.listHolds(filter).map(toHoldResponse));
  }

  async getHold(holdId: string): Promise<HoldResponseDto> {
    return this.run('getHold', () => toHoldResponse(this.leaseLedger.getHold(holdId)));
  }

  async listPurchases(filter: LedgerQueryDto): Promise<PurchaseResponseDto[]> {
    return this.run('listPurchases', () => this.purchaseLedger.listPurchases(filter).map(toPurchaseResponse));
  }

  async getPurchase(purchaseId: string): Promise<PurchaseResponseDto> {
    return this.run('getPurchase', () => toPurchaseResponse(this.purchaseLedger.getPurchase(purchaseId)));
  }

  /**
   * Sweep, transition, snapshot, publish. When the transition fails after the
   * sweep expired something, the sweep alone is still written.
   */
  private async run<T>(
    operation: string,
    transition: (now: Date) => T,
    publish?: (result: T, now: Date) => void,
  ): Promise<T> {
    return this.lock.runExclusive(STATE_LOCK, async () => {
      const now = this.clock.now();
      const before = this.store.snapshot();
      const expired: Hold[] = [];
      this.leaseLedger.sweepExpired(now, (hold) => expired.push(hold));

      let result: T;
      try {
        result = transition(now);
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(`${operation} failed: ${errorMessage}`, error instanceof Error ? error.stack : undefined);
        if (expired.length > 0) {
          await this.commit(operation, before);
          this.publishExpired(expired, now);
        }
        throw error;
      }

      await this.commit(operation, before);
      this.publishExpired(expired, now);
      publish?.(result, now);
      return result;
    });
  }

  /** Writes the snapshot, or puts the store back to `before` when the write fails. */
  private async commit(operation: string, before: StateSnapshot): Promise<void> {
    try {
      await this.store.persist();
    } catch (error) {
      this.store.replace(deserializeState(before));
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `${operation}: state write failed, changes rolled back: ${errorMessage}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw error;
    }
  }

  private publishExpired(expired: Hold[], now: Date): void {
    for (const hold of expired) {
      this.events.holdExpired(hold, now);
    }
  }
}

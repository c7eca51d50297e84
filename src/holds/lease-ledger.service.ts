import { Inject, Injectable, Logger } from '@nestjs/common';
import { Flight, Hold, HoldStatus, SeatStatus } from '../entities';
import {
  HoldNotFoundException,
  InsufficientInventoryException,
  InvalidRequestException,
  InvalidSeatException,
  SeatUnavailableException,
} from '../errors/reservation.errors';
import { StateStore } from '../state/state.store';
import { ID_GENERATOR, IdGenerator } from '../state/state.tokens';
import { availableSeatsInOrder, normalizeSeat } from '../utils/seat.util';

/** Exactly one of `seats` or `count` must be given. */
export interface SeatSelection {
  seats?: readonly string[];
  count?: number;
}

export interface LedgerFilter {
  customer?: string;
  flightId?: string;
}

const MINUTE_MS = 60_000;

@Injectable()
export class LeaseLedgerService {
  private readonly logger = new Logger(LeaseLedgerService.name);

  constructor(
    private readonly store: StateStore,
    @Inject(ID_GENERATOR)
    private readonly ids: IdGenerator,
  ) {}

  /**
   * Expires every ACTIVE hold whose expiry is at or before `now` and frees its
   * seats. A seat is only released while it is still HOLD; anything else is
   * left as found and logged.
   *
   * Idempotent for a given `now`.
   */
  sweepExpired(now: Date, onExpired?: (hold: Hold) => void): number {
    let expiredCount = 0;

    for (const hold of this.store.holds.values()) {
      if (hold.status !== HoldStatus.ACTIVE || hold.expiresAt.getTime() > now.getTime()) {
        continue;
      }

      const flight = this.store.flights.get(hold.flightId);
      if (flight) {
        for (const seat of hold.seats) {
          const status = flight.seatMap.get(seat);
          if (status === SeatStatus.HELD) {
            flight.seatMap.set(seat, SeatStatus.AVAILABLE);
          } else {
            this.logger.warn(`Seat ${seat} of expiring hold ${hold.id} is ${status ?? 'missing'}; left unchanged`);
          }
        }
      } else {
        this.logger.warn(`Hold ${hold.id} references unknown flight ${hold.flightId}; expiring without releasing seats`);
      }

      hold.status = HoldStatus.EXPIRED;
      expiredCount++;
      this.logger.log(`Hold ${hold.id} expired (seats ${hold.seats.join(', ')})`);
      onExpired?.(hold);
    }

    return expiredCount;
  }

  /**
   * Validates every requested seat first and only then marks them all HOLD,
   * so a failed request leaves the seat map untouched.
   */
  createHold(flight: Flight, selection: SeatSelection, customer: string, ttlMinutes: number, now: Date): Hold {
    const owner = customer.trim();
    if (!owner) {
      throw new InvalidRequestException('customer is required.');
    }
    if (!Number.isInteger(ttlMinutes) || ttlMinutes <= 0) {
      throw new InvalidRequestException('Hold minutes must be a positive integer.', { ttlMinutes });
    }

    const requested = this.resolveSeats(flight, selection);

    for (const seat of requested) {
      const status = flight.seatMap.get(seat);
      if (status === undefined) {
        throw new InvalidSeatException(flight.id, seat);
      }
      if (status !== SeatStatus.AVAILABLE) {
        throw new SeatUnavailableException(seat, status);
      }
    }

    for (const seat of requested) {
      flight.seatMap.set(seat, SeatStatus.HELD);
    }

    const hold: Hold = {
      id: this.ids.next('H'),
      flightId: flight.id,
      seats: requested,
      customer: owner,
      expiresAt: new Date(now.getTime() + ttlMinutes * MINUTE_MS),
      status: HoldStatus.ACTIVE,
    };
    this.store.holds.set(hold.id, hold);

    this.logger.log(
      `Hold ${hold.id} created for ${owner} on ${flight.id}: ${requested.join(', ')} (expires ${hold.expiresAt.toISOString()})`,
    );
    return hold;
  }

  getHold(holdId: string): Hold {
    const hold = this.store.holds.get(holdId);
    if (!hold) {
      throw new HoldNotFoundException(holdId);
    }
    return hold;
  }

  listHolds(filter: LedgerFilter = {}): Hold[] {
    return [...this.store.holds.values()].filter(
      (hold) =>
        (filter.customer === undefined || hold.customer === filter.customer) &&
        (filter.flightId === undefined || hold.flightId === filter.flightId),
    );
  }

  private resolveSeats(flight: Flight, { seats, count }: SeatSelection): string[] {
    const explicit = seats ?? [];

    if (explicit.length > 0 && count !== undefined) {
      throw new InvalidRequestException('Use either seats or count, not both.');
    }

    if (explicit.length > 0) {
      const requested: string[] = [];
      for (const raw of explicit) {
        const seat = normalizeSeat(raw);
        if (seat === null) {
          throw new InvalidRequestException('Empty seat.');
        }
        if (requested.includes(seat)) {
          throw new InvalidRequestException(`Seat requested more than once: ${seat}`, { seat });
        }
        requested.push(seat);
      }
      return requested;
    }

    if (count === undefined) {
      throw new InvalidRequestException('Must provide seats or count.');
    }
    if (!Number.isInteger(count) || count <= 0) {
      throw new InvalidRequestException('count must be a positive integer.', { count });
    }

    const available = availableSeatsInOrder(flight.seatMap);
    if (available.length < count) {
      throw new InsufficientInventoryException(count, available.length);
    }
    return available.slice(0, count);
  }
}

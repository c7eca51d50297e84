import { Inject, Injectable, Logger } from '@nestjs/common';
import { HoldStatus, Purchase, PurchaseStatus, SeatStatus } from '../entities';
import {
  HoldAlreadyConvertedException,
  HoldExpiredException,
  HoldNotActiveException,
  PurchaseAlreadyCancelledException,
  PurchaseNotActiveException,
  PurchaseNotFoundException,
  SeatStateMismatchException,
} from '../errors/reservation.errors';
import { FlightsService } from '../flights/flights.service';
import { LeaseLedgerService, LedgerFilter } from '../holds/lease-ledger.service';
import { StateStore } from '../state/state.store';
import { ID_GENERATOR, IdGenerator } from '../state/state.tokens';

@Injectable()
export class PurchaseLedgerService {
  private readonly logger = new Logger(PurchaseLedgerService.name);

  constructor(
    private readonly store: StateStore,
    private readonly flightsService: FlightsService,
    private readonly leaseLedger: LeaseLedgerService,
    @Inject(ID_GENERATOR)
    private readonly ids: IdGenerator,
  ) {}

  /**
   * Converts an ACTIVE hold into a purchase. Payment is stubbed: once the hold
   * and its seats check out, the conversion always succeeds.
   */
  convert(holdId: string, now: Date): Purchase {
    const hold = this.leaseLedger.getHold(holdId);

    switch (hold.status) {
      case HoldStatus.EXPIRED:
        throw new HoldExpiredException(hold.id);
      case HoldStatus.CONVERTED:
        throw new HoldAlreadyConvertedException(hold.id);
      case HoldStatus.ACTIVE:
        break;
      default:
        throw new HoldNotActiveException(hold.id, String(hold.status));
    }

    const flight = this.flightsService.getFlight(hold.flightId);

    for (const seat of hold.seats) {
      const status = flight.seatMap.get(seat);
      if (status !== SeatStatus.HELD) {
        throw new SeatStateMismatchException(seat, SeatStatus.HELD, status);
      }
    }

    for (const seat of hold.seats) {
      flight.seatMap.set(seat, SeatStatus.PURCHASED);
    }
    hold.status = HoldStatus.CONVERTED;

    const purchase: Purchase = {
      id: this.ids.next('P'),
      flightId: hold.flightId,
      seats: [...hold.seats],
      customer: hold.customer,
      purchasedAt: now,
      status: PurchaseStatus.ACTIVE,
    };
    this.store.purchases.set(purchase.id, purchase);

    this.logger.log(`Hold ${hold.id} converted to purchase ${purchase.id}: ${purchase.seats.join(', ')}`);
    return purchase;
  }

  /**
   * Cancels an ACTIVE purchase and returns its seats to AVAILABLE whatever their
   * current status. The hold it came from stays CONVERTED.
   */
  cancel(purchaseId: string): Purchase {
    const purchase = this.getPurchase(purchaseId);

    switch (purchase.status) {
      case PurchaseStatus.CANCELLED:
        throw new PurchaseAlreadyCancelledException(purchase.id);
      case PurchaseStatus.ACTIVE:
        break;
      default:
        throw new PurchaseNotActiveException(purchase.id, String(purchase.status));
    }

    const flight = this.flightsService.getFlight(purchase.flightId);

    for (const seat of purchase.seats) {
      const status = flight.seatMap.get(seat);
      if (status !== SeatStatus.PURCHASED) {
        this.logger.warn(`Seat ${seat} of purchase ${purchase.id} is ${status ?? 'missing'}; releasing anyway`);
      }
      if (status !== undefined) {
        flight.seatMap.set(seat, SeatStatus.AVAILABLE);
      }
    }
    purchase.status = PurchaseStatus.CANCELLED;

    this.logger.log(`Purchase ${purchase.id} cancelled, seats ${purchase.seats.join(', ')} released`);
    return purchase;
  }

  getPurchase(purchaseId: string): Purchase {
    const purchase = this.store.purchases.get(purchaseId);
    if (!purchase) {
      throw new PurchaseNotFoundException(purchaseId);
    }
    return purchase;
  }

  listPurchases(filter: LedgerFilter = {}): Purchase[] {
    return [...this.store.purchases.values()].filter(
      (purchase) =>
        (filter.customer === undefined || purchase.customer === filter.customer) &&
        (filter.flightId === undefined || purchase.flightId === filter.flightId),
    );
  }
}

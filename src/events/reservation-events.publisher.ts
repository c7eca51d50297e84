import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ClientProxy } from '@nestjs/microservices';
import { Hold, Purchase } from '../entities';
import {
  HoldEventPayload,
  PurchaseEventPayload,
  RESERVATION_EVENTS_CLIENT,
  ReservationEventPattern,
} from './reservation-events';

/**
 * Emits domain events after state has been committed. Publication is
 * fire-and-forget: a broker failure is logged and never fails the operation
 * that triggered it.
 */
@Injectable()
export class ReservationEventsPublisher {
  private readonly logger = new Logger(ReservationEventsPublisher.name);
  private readonly enabled: boolean;

  constructor(
    @Inject(RESERVATION_EVENTS_CLIENT)
    private readonly client: ClientProxy,
    private readonly configService: ConfigService,
  ) {
    this.enabled = this.configService.get<boolean>('app.eventsEnabled', false);
  }

  holdCreated(hold: Hold, at: Date): void {
    this.publish(ReservationEventPattern.HOLD_CREATED, this.holdPayload(hold, at));
  }

  holdExpired(hold: Hold, at: Date): void {
    this.publish(ReservationEventPattern.HOLD_EXPIRED, this.holdPayload(hold, at));
  }

  purchaseCompleted(purchase: Purchase, at: Date): void {
    this.publish(ReservationEventPattern.PURCHASE_COMPLETED, this.purchasePayload(purchase, at));
  }

  purchaseCancelled(purchase: Purchase, at: Date): void {
    this.publish(ReservationEventPattern.PURCHASE_CANCELLED, this.purchasePayload(purchase, at));
  }

  private publish(pattern: ReservationEventPattern, payload: HoldEventPayload | PurchaseEventPayload): void {
    if (!this.enabled) {
      this.logger.debug(`Event ${pattern} not published (events disabled)`);
      return;
    }

    this.client.emit(pattern, payload).subscribe({
      error: (error: unknown) => {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(
          `Failed to publish ${pattern}: ${errorMessage}`,
          error instanceof Error ? error.stack : undefined,
        );
      },
    });
  }

  private holdPayload(hold: Hold, at: Date): HoldEventPayload {
    return {
      holdId: hold.id,
      flightId: hold.flightId,
      customer: hold.customer,
      seats: [...hold.seats],
      expiresAt: hold.expiresAt.toISOString(),
      timestamp: at.toISOString(),
    };
  }

  private purchasePayload(purchase: Purchase, at: Date): PurchaseEventPayload {
    return {
      purchaseId: purchase.id,
      flightId: purchase.flightId,
      customer: purchase.customer,
      seats: [...purchase.seats],
      purchasedAt: purchase.purchasedAt.toISOString(),
      timestamp: at.toISOString(),
    };
  }
}

import { Controller, Logger } from '@nestjs/common';
import { Ctx, EventPattern, Payload, RmqContext } from '@nestjs/microservices';
import type { Channel, Message } from 'amqplib';
import { HoldEventPayload, PurchaseEventPayload, ReservationEventPattern } from './reservation-events';

/**
 * Listens on the events queue when the RMQ microservice is connected. Every
 * handler only logs, then acks; a handler failure nacks with requeue.
 */
@Controller()
export class ReservationEventsConsumer {
  private readonly logger = new Logger(ReservationEventsConsumer.name);

  @EventPattern(ReservationEventPattern.HOLD_CREATED)
  handleHoldCreated(@Payload() data: HoldEventPayload, @Ctx() context: RmqContext): void {
    this.acknowledge(context, ReservationEventPattern.HOLD_CREATED, () =>
      this.logger.log(
        `Hold created: ${data.holdId} for ${data.customer} on ${data.flightId} - seats ${data.seats.join(', ')} (expires: ${data.expiresAt})`,
      ),
    );
  }

  @EventPattern(ReservationEventPattern.HOLD_EXPIRED)
  handleHoldExpired(@Payload() data: HoldEventPayload, @Ctx() context: RmqContext): void {
    this.acknowledge(context, ReservationEventPattern.HOLD_EXPIRED, () =>
      this.logger.log(`Hold expired: ${data.holdId} on ${data.flightId} - seats ${data.seats.join(', ')} released`),
    );
  }

  @EventPattern(ReservationEventPattern.PURCHASE_COMPLETED)
  handlePurchaseCompleted(@Payload() data: PurchaseEventPayload, @Ctx() context: RmqContext): void {
    this.acknowledge(context, ReservationEventPattern.PURCHASE_COMPLETED, () =>
      this.logger.log(
        `Purchase completed: ${data.purchaseId} for ${data.customer} on ${data.flightId} - seats ${data.seats.join(', ')}`,
      ),
    );
  }

  @EventPattern(ReservationEventPattern.PURCHASE_CANCELLED)
  handlePurchaseCancelled(@Payload() data: PurchaseEventPayload, @Ctx() context: RmqContext): void {
    this.acknowledge(context, ReservationEventPattern.PURCHASE_CANCELLED, () =>
      this.logger.log(`Purchase cancelled: ${data.purchaseId} on ${data.flightId} - seats ${data.seats.join(', ')}`),
    );
  }

  private acknowledge(context: RmqContext, pattern: ReservationEventPattern, handle: () => void): void {
    const channel: Channel = context.getChannelRef();
    const originalMsg = context.getMessage() as Message;

    try {
      handle();
      channel.ack(originalMsg);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to process ${pattern}: ${errorMessage}`, error instanceof Error ? error.stack : undefined);
      channel.nack(originalMsg, false, true);
    }
  }
}

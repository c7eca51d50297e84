import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ClientsModule, Transport } from '@nestjs/microservices';
import { RESERVATION_EVENTS_QUEUE } from '../config/rabbitmq.config';
import { RESERVATION_EVENTS_CLIENT } from './reservation-events';
import { ReservationEventsConsumer } from './reservation-events.consumer';
import { ReservationEventsPublisher } from './reservation-events.publisher';

@Module({
  imports: [
    ClientsModule.registerAsync([
      {
        name: RESERVATION_EVENTS_CLIENT,
        imports: [ConfigModule],
        useFactory: (configService: ConfigService) => ({
          transport: Transport.RMQ,
          options: {
            urls: [configService.get<string>('rabbitmq.url', 'amqp://localhost:5672')],
            queue: configService.get<string>('rabbitmq.queue', RESERVATION_EVENTS_QUEUE),
            queueOptions: {
              durable: true,
            },
          },
        }),
        inject: [ConfigService],
      },
    ]),
  ],
  controllers: [ReservationEventsConsumer],
  providers: [ReservationEventsPublisher],
  exports: [ReservationEventsPublisher],
})
export class EventsModule {}

import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD } from '@nestjs/core';
import rabbitmqConfig from './config/rabbitmq.config';
import appConfig from './config/app.config';
import { validate } from './config/env.validation';
import { StateModule } from './state/state.module';
import { FlightsModule } from './flights/flights.module';
import { HoldsModule } from './holds/holds.module';
import { PurchasesModule } from './purchases/purchases.module';
import { EventsModule } from './events/events.module';
import { ReservationEngineModule } from './reservations/reservation-engine.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [appConfig, rabbitmqConfig],
      validate,
    }),
    ThrottlerModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => [
        {
          ttl: config.get<number>('app.rateLimitTtl', 60) * 1000, // Convert to milliseconds
          limit: config.get<number>('app.rateLimitMax', 100),
        },
      ],
    }),
    StateModule,
    FlightsModule,
    HoldsModule,
    PurchasesModule,
    EventsModule,
    ReservationEngineModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}

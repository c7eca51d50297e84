import { Module } from '@nestjs/common';
import { EventsModule } from '../events/events.module';
import { FlightsModule } from '../flights/flights.module';
import { HoldsModule } from '../holds/holds.module';
import { PurchasesModule } from '../purchases/purchases.module';
import { FlightsController } from './flights.controller';
import { HoldsController } from './holds.controller';
import { PurchasesController } from './purchases.controller';
import { ReservationEngineService } from './reservation-engine.service';

@Module({
  imports: [FlightsModule, HoldsModule, PurchasesModule, EventsModule],
  controllers: [FlightsController, HoldsController, PurchasesController],
  providers: [ReservationEngineService],
  exports: [ReservationEngineService],
})
export class ReservationEngineModule {}

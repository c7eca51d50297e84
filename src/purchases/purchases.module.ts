import { Module } from '@nestjs/common';
import { FlightsModule } from '../flights/flights.module';
import { HoldsModule } from '../holds/holds.module';
import { PurchaseLedgerService } from './purchase-ledger.service';

@Module({
  imports: [FlightsModule, HoldsModule],
  providers: [PurchaseLedgerService],
  exports: [PurchaseLedgerService],
})
export class PurchasesModule {}

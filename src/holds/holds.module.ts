import { Module } from '@nestjs/common';
import { LeaseLedgerService } from './lease-ledger.service';

@Module({
  providers: [LeaseLedgerService],
  exports: [LeaseLedgerService],
})
export class HoldsModule {}

import { Global, Module } from '@nestjs/common';
import { StateStore } from './state.store';
import { CLOCK, ID_GENERATOR, SystemClock, UuidGenerator } from './state.tokens';

@Global()
@Module({
  providers: [
    StateStore,
    { provide: CLOCK, useClass: SystemClock },
    { provide: ID_GENERATOR, useClass: UuidGenerator },
  ],
  exports: [StateStore, CLOCK, ID_GENERATOR],
})
export class StateModule {}

import { randomUUID } from 'crypto';

export const CLOCK = 'CLOCK';
export const ID_GENERATOR = 'ID_GENERATOR';

export interface Clock {
  now(): Date;
}

export type IdPrefix = 'H' | 'P';

export interface IdGenerator {
  next(prefix: IdPrefix): string;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

export class UuidGenerator implements IdGenerator {
  next(prefix: IdPrefix): string {
    return `${prefix}-${randomUUID()}`;
  }
}

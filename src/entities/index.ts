export * from './seat-map';
export * from './flight.entity';
export * from './hold.entity';
export * from './purchase.entity';

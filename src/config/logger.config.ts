import { LoggerService } from '@nestjs/common';
import { WinstonModule, utilities as nestWinstonModuleUtilities } from 'nest-winston';
import * as winston from 'winston';

export function createWinstonLogger(level: string, production: boolean): LoggerService {
  const format = production
    ? winston.format.combine(winston.format.timestamp(), winston.format.json())
    : winston.format.combine(
        winston.format.timestamp(),
        winston.format.ms(),
        nestWinstonModuleUtilities.format.nestLike('SeatInventory', { colors: true, prettyPrint: true }),
      );

  return WinstonModule.createLogger({
    level,
    transports: [new winston.transports.Console({ format })],
  });
}

export const winstonConfig = createWinstonLogger(
  process.env.LOG_LEVEL ?? 'info',
  process.env.NODE_ENV === 'production',
);

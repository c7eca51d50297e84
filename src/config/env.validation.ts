import { plainToInstance, Transform, TransformFnParams } from 'class-transformer';
import { IsBoolean, IsEnum, IsIn, IsNotEmpty, IsNumber, IsString, Max, Min, validateSync } from 'class-validator';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.Development;

  @IsNumber()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsIn(LOG_LEVELS)
  LOG_LEVEL: LogLevel = 'info';

  // Inventory
  @IsNumber()
  @Min(1)
  @Max(1440)
  HOLD_TTL_MINUTES: number = 10;

  @IsString()
  @IsNotEmpty()
  STATE_FILE: string = 'airline_state.json';

  // RabbitMQ
  // read the raw value: implicit conversion would turn the string 'false' into true
  @Transform(({ obj, key }: TransformFnParams) => obj[key] === true || obj[key] === 'true')
  @IsBoolean()
  EVENTS_ENABLED: boolean = false;

  @IsString()
  RABBITMQ_HOST: string = 'localhost';

  @IsNumber()
  @Min(1)
  @Max(65535)
  RABBITMQ_PORT: number = 5672;

  @IsString()
  RABBITMQ_USER: string = 'guest';

  @IsString()
  RABBITMQ_PASSWORD: string = 'guest';

  // Rate limiting
  @IsNumber()
  @Min(1)
  @Max(1000)
  RATE_LIMIT_TTL: number = 60;

  @IsNumber()
  @Min(1)
  @Max(10000)
  RATE_LIMIT_MAX: number = 100;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }

  return validatedConfig;
}

import { registerAs } from '@nestjs/config';
import { validate } from './env.validation';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: string;
  holdTtlMinutes: number;
  stateFile: string;
  eventsEnabled: boolean;
  rateLimitTtl: number;
  rateLimitMax: number;
}

export default registerAs('app', (): AppConfig => {
  const env = validate(process.env);

  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    holdTtlMinutes: env.HOLD_TTL_MINUTES,
    stateFile: env.STATE_FILE,
    eventsEnabled: env.EVENTS_ENABLED,
    rateLimitTtl: env.RATE_LIMIT_TTL,
    rateLimitMax: env.RATE_LIMIT_MAX,
  };
});

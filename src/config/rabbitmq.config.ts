import { registerAs } from '@nestjs/config';
import { validate } from './env.validation';

export const RESERVATION_EVENTS_QUEUE = 'seat_inventory_events';

export default registerAs('rabbitmq', () => {
  const env = validate(process.env);

  const url = `amqp://${env.RABBITMQ_USER}:${env.RABBITMQ_PASSWORD}@${env.RABBITMQ_HOST}:${env.RABBITMQ_PORT}`;

  return {
    host: env.RABBITMQ_HOST,
    port: env.RABBITMQ_PORT,
    user: env.RABBITMQ_USER,
    password: env.RABBITMQ_PASSWORD,
    url,
    queue: RESERVATION_EVENTS_QUEUE,
  };
});

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { MicroserviceOptions, Transport } from '@nestjs/microservices';
import { AppModule } from './app.module';
import { winstonConfig } from './config/logger.config';
import { RESERVATION_EVENTS_QUEUE } from './config/rabbitmq.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: winstonConfig,
  });
  const configService = app.get(ConfigService);
  const logger = new Logger('Bootstrap');

  // Consume our own domain events only when publishing is switched on
  const eventsEnabled = configService.get<boolean>('app.eventsEnabled', false);
  if (eventsEnabled) {
    app.connectMicroservice<MicroserviceOptions>({
      transport: Transport.RMQ,
      options: {
        urls: [configService.get<string>('rabbitmq.url', 'amqp://localhost:5672')],
        queue: configService.get<string>('rabbitmq.queue', RESERVATION_EVENTS_QUEUE),
        noAck: false,
        prefetchCount: 1,
        queueOptions: {
          durable: true,
        },
      },
    });

    await app.startAllMicroservices();
  }

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('Seat Inventory API')
    .setDescription('Flight seat holds with expiry, purchases and cancellations')
    .setVersion('1.0')
    .addTag('flights', 'Flight catalog, search and seat maps')
    .addTag('holds', 'Time-limited seat holds')
    .addTag('purchases', 'Confirmed purchases')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api-docs', app, document);

  const port = configService.get<number>('app.port', 3000);
  await app.listen(port);
  logger.log(`Application is running on: http://localhost:${port}`);
  logger.log(`API Documentation: http://localhost:${port}/api-docs`);
  if (eventsEnabled) {
    logger.log(`RabbitMQ consumer connected to queue ${configService.get<string>('rabbitmq.queue', RESERVATION_EVENTS_QUEUE)}`);
  }
}
void bootstrap();

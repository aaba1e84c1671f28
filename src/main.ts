import 'reflect-metadata';
import 'dotenv/config';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

import { AppModule } from './app.module.js';
import { SettingsService } from './settings/settings.service.js';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), {
    logger: ['error', 'warn', 'log', 'debug', 'verbose'],
  });

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('PR Sync API')
    .setDescription('Pull-request sync, normalization and dashboard rollups')
    .setVersion('1.0.0')
    .build();

  const doc = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, doc);

  const settings = app.get(SettingsService).current;
  await app.listen(settings.port, '0.0.0.0');

  const logger = new Logger('Bootstrap');
  logger.log(`📚 Swagger documentation: http://localhost:${settings.port}/docs`);
  logger.log(`🌍 Environment: ${settings.environment}`);
  logger.log(`📦 Repository: ${settings.github.owner}/${settings.github.repo}`);
  logger.log(`⏰ Scheduler: ${settings.schedulerEnabled ? 'enabled' : 'disabled'}`);
}
bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error('Application failed to start', err instanceof Error ? err.stack : String(err));
  process.exit(1);
});

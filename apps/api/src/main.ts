import 'reflect-metadata';
import * as dotenv from 'dotenv';
dotenv.config();

import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { logLevelsFor } from './common/logging';

/**
 * Bootstrap the NestJS application
 * Configures global pipes, CORS, and starts the server
 */
async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  try {
    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
      logger: logLevelsFor(process.env.LOG_LEVEL),
    });

    // Security middleware
    app.use(helmet());

    // Statement exports can be large
    app.useBodyParser('json', { limit: '10mb' });

    // Validation
    app.useGlobalPipes(
      new ValidationPipe({
        transform: true,
        whitelist: true,
        forbidNonWhitelisted: true,
        transformOptions: {
          enableImplicitConversion: true,
        },
      }),
    );

    // Global prefix
    app.setGlobalPrefix('api');

    // CORS
    app.enableCors({
      origin: process.env.CORS_ORIGIN?.split(',') || '*',
      methods: ['GET', 'POST'],
    });

    const port = Number(process.env.PORT) || 3000;
    await app.listen(port, '0.0.0.0');

    logger.log(`Application is running on: http://0.0.0.0:${port}/api`);
    logger.log(`Environment: ${process.env.NODE_ENV ?? 'development'}`);
  } catch (error: unknown) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error('Failed to start application', err.stack);
    process.exit(1);
  }
}

void bootstrap();

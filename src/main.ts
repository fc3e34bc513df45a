import 'reflect-metadata';
import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { json } from 'express';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { validateEnv, type AppEnv } from './common/config/env.validation';
import { INVALID_PAYLOAD_MESSAGE } from './common/constants/error-messages.constants';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { buildCorsOriginHandler, resolveCorsMode } from './common/http/cors-policy';
import { requestIdMiddleware } from './common/middleware/request-id.middleware';
import { createLogger, logger } from './common/utils/logger';

async function bootstrap(): Promise<void> {
  logger.boot();

  const validatedEnv = validateEnv(process.env);
  const nestLogLevel = validatedEnv.LOG_LEVEL === 'info' ? 'log' : validatedEnv.LOG_LEVEL;
  const app = await NestFactory.create(AppModule, {
    logger: [nestLogLevel, 'warn', 'error'],
  });

  app.use(helmet());
  app.use(json({ limit: '64kb' }));
  app.use(requestIdMiddleware);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: () => new BadRequestException(INVALID_PAYLOAD_MESSAGE),
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableShutdownHooks();

  configureCors(app, validatedEnv);

  await app.listen(validatedEnv.PORT);

  createLogger('Bootstrap').info(`Catalog print service listening on port ${validatedEnv.PORT}`);
}

function configureCors(app: Awaited<ReturnType<typeof NestFactory.create>>, env: AppEnv): void {
  createLogger('Bootstrap').info('cors_configuration', {
    event: 'cors_configuration',
    cors_mode: resolveCorsMode(env),
    allowed_origins_count: env.ALLOWED_ORIGINS.length,
  });

  app.enableCors({
    origin: buildCorsOriginHandler(env),
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'x-request-id'],
    exposedHeaders: ['x-request-id', 'Content-Disposition'],
  });
}

bootstrap().catch((error: unknown) => {
  createLogger('Bootstrap').error(
    'Failed to bootstrap catalog print service',
    error instanceof Error ? error : undefined,
  );
  process.exit(1);
});

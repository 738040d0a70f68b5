import 'reflect-metadata';
import { HttpAdapterHost, NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import multipart from '@fastify/multipart';
import { PersistenceExceptionFilter } from '@/shared/common/filters/persistence-exception.filter';
import { VALIDATION_PIPE_OPTIONS } from '@/shared/common/validation/validation-options';
import { setupGracefulShutdown } from '@/shared/utils/graceful-shutdown';
import { ApiAppModule } from './app.module';
import { MULTIPART_LIMITS } from './ban-check/multipart-upload';

async function bootstrap() {
  const logger = new Logger('Api');
  const app = await NestFactory.create<NestFastifyApplication>(
    ApiAppModule,
    new FastifyAdapter({ trustProxy: true }),
  );

  const httpAdapter = app.get(HttpAdapterHost);
  app.useGlobalFilters(
    new PersistenceExceptionFilter(httpAdapter.httpAdapter),
  );

  await app.register(multipart, { limits: MULTIPART_LIMITS });

  app.enableCors({
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    credentials: true,
  });
  app.useGlobalPipes(new ValidationPipe(VALIDATION_PIPE_OPTIONS));
  setupGracefulShutdown(app);

  const port = app.get(ConfigService).get<number>('API_PORT') ?? 3000;
  await app.listen(port, '0.0.0.0');
  logger.log(`API listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Api').error(`API failed to start: ${String(error)}`);
  process.exit(1);
});

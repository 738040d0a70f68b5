import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setupGracefulShutdown } from '@/shared/utils/graceful-shutdown';
import { WorkerAppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Worker');
  const app = await NestFactory.createApplicationContext(WorkerAppModule);

  const configService = app.get(ConfigService);
  const concurrency = configService.get<number>('WORKER_CONCURRENCY') || 4;

  setupGracefulShutdown(app);

  logger.log(`Worker started with concurrency: ${concurrency}`);
  logger.log('Listening for ban-check jobs...');
}

bootstrap().catch((error: unknown) => {
  new Logger('Worker').error(`Worker failed to start: ${String(error)}`);
  process.exit(1);
});

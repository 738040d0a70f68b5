import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { BullModule } from '@nestjs/bullmq';
import { ScheduleModule } from '@nestjs/schedule';
import { loadEnv } from '@/shared/config/load-env';
import { validationSchema } from '@/shared/config/env.validation';
import { QUEUE_NAMES } from '@/shared/queue/queue.constants';
import { DatabaseModule } from '@/shared/database/database.module';
import { BanCheckModule } from '@/shared/ban-check/ban-check.module';
import { BanCheckProcessor } from './processors/ban-check.processor';
import { StaleTaskSweeperService } from './services/stale-task-sweeper.service';

loadEnv();

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema,
      ignoreEnvFile: true,
    }),
    ScheduleModule.forRoot(),
    BullModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        connection: {
          host: configService.get<string>('REDIS_HOST'),
          port: configService.get<number>('REDIS_PORT'),
        },
      }),
      inject: [ConfigService],
    }),
    BullModule.registerQueue({
      name: QUEUE_NAMES.BAN_CHECK_QUEUE,
    }),
    DatabaseModule,
    BanCheckModule,
  ],
  providers: [BanCheckProcessor, StaleTaskSweeperService],
})
export class WorkerAppModule {}

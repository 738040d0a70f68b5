import { Module } from '@nestjs/common';
import { loadEnv } from '@/shared/config/load-env';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { BullModule } from '@nestjs/bullmq';
import { CacheModule } from '@nestjs/cache-manager';
import { redisStore } from 'cache-manager-redis-yet';
import { validationSchema } from '@/shared/config/env.validation';
import { QUEUE_NAMES } from '@/shared/queue/queue.constants';
import { DatabaseModule } from '@/shared/database/database.module';
import { HealthController } from './controllers/health.controller';
import { BanCheckApiModule } from './ban-check/ban-check.module';

loadEnv();

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema,
      ignoreEnvFile: true,
    }),
    CacheModule.registerAsync({
      isGlobal: true,
      imports: [ConfigModule],
      useFactory: async (configService: ConfigService) => ({
        store: await redisStore({
          socket: {
            host: configService.get<string>('REDIS_HOST') || 'localhost',
            port: configService.get<number>('REDIS_PORT') ?? 6379,
          },
        }),
      }),
      inject: [ConfigService],
    }),
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
    BanCheckApiModule,
  ],
  controllers: [HealthController],
})
export class ApiAppModule {}

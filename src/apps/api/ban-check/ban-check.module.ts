import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { BanCheckModule } from '@/shared/ban-check/ban-check.module';
import { QUEUE_NAMES } from '@/shared/queue/queue.constants';
import { ApiKeyGuard } from '../guards/api-key.guard';
import { PollingThrottleGuard } from '../guards/polling-throttle.guard';
import { BanCheckController } from './ban-check.controller';
import { BanCheckService } from './ban-check.service';

@Module({
  imports: [
    BanCheckModule,
    BullModule.registerQueue({
      name: QUEUE_NAMES.BAN_CHECK_QUEUE,
    }),
  ],
  controllers: [BanCheckController],
  providers: [BanCheckService, ApiKeyGuard, PollingThrottleGuard],
})
export class BanCheckApiModule {}

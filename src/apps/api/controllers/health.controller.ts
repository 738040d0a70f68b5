import { Controller, Get, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { errorMessage } from '@/shared/lib/util';
import { QUEUE_NAMES } from '@/shared/queue/queue.constants';

export type QueueHealth =
  | { status: 'connected'; counts: Record<string, number> }
  | { status: 'disconnected'; error: string };

@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    @InjectQueue(QUEUE_NAMES.BAN_CHECK_QUEUE)
    private readonly banCheckQueue: Queue,
  ) {}

  @Get()
  async getHealth() {
    const queue = await this.getQueueHealth();

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'api',
      queue,
    };
  }

  private async getQueueHealth(): Promise<QueueHealth> {
    try {
      const counts = await this.banCheckQueue.getJobCounts();
      return {
        status: 'connected',
        counts,
      };
    } catch (error) {
      this.logger.error(`Queue health check failed: ${errorMessage(error)}`);
      return {
        status: 'disconnected',
        error: errorMessage(error),
      };
    }
  }
}

import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Job } from 'bullmq';
import { BanCheckOrchestratorService } from '@/shared/ban-check/services/ban-check-orchestrator.service';
import { TaskStatus } from '@/shared/ban-check/interfaces/task.interface';
import { errorMessage, errorStack } from '@/shared/lib/util';
import { BanCheckJob } from '@/shared/queue/interfaces/ban-check-job.interface';
import { QUEUE_NAMES } from '@/shared/queue/queue.constants';

export interface BanCheckJobResult {
  taskId: string;
  status: TaskStatus;
  resultCount: number;
}

@Processor(QUEUE_NAMES.BAN_CHECK_QUEUE)
export class BanCheckProcessor
  extends WorkerHost
  implements OnApplicationBootstrap
{
  private readonly logger = new Logger(BanCheckProcessor.name);
  private readonly concurrency: number;

  constructor(
    private readonly orchestrator: BanCheckOrchestratorService,
    private readonly configService: ConfigService,
  ) {
    super();
    this.concurrency =
      this.configService.get<number>('WORKER_CONCURRENCY') || 4;
  }

  onApplicationBootstrap(): void {
    this.worker.concurrency = this.concurrency;
  }

  async process(job: Job<BanCheckJob>): Promise<BanCheckJobResult> {
    const { taskId, steamIds } = job.data;

    if (!taskId || !Array.isArray(steamIds)) {
      throw new Error(`Job ${job.id} (${job.name}) carries no task payload`);
    }

    this.logger.log(`Processing ban-check task ${taskId} (${steamIds.length} ids)`);

    try {
      const task = await this.orchestrator.run(job.data);
      this.logger.log(`Task ${taskId} finished as ${task.status}: ${task.message}`);
      return {
        taskId,
        status: task.status,
        resultCount: task.results.length,
      };
    } catch (error) {
      this.logger.error(
        `Task ${taskId} threw error: ${errorMessage(error)}`,
        errorStack(error),
      );
      throw error;
    }
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectQueue } from '@nestjs/bullmq';
import { Cron, CronExpression } from '@nestjs/schedule';
import { Queue } from 'bullmq';
import { isTerminal } from '@/shared/ban-check/interfaces/task.interface';
import { TaskStoreService } from '@/shared/ban-check/services/task-store.service';
import { errorMessage } from '@/shared/lib/util';
import { QUEUE_NAMES } from '@/shared/queue/queue.constants';

export const ABANDONED_TASK_MESSAGE = 'Task abandoned: no progress reported';
const SWEEP_BATCH_LIMIT = 100;
// Job states in which a worker has yet to pick the task up.
const QUEUED_STATES = new Set(['waiting', 'delayed', 'prioritized', 'waiting-children']);

/**
 * Fails tasks whose worker died mid-run: anything still PENDING or
 * PROCESSING that has not been written to for STALE_TASK_AFTER_MS, unless
 * its job is still waiting in the queue.
 */
@Injectable()
export class StaleTaskSweeperService {
  private readonly logger = new Logger(StaleTaskSweeperService.name);
  private sweeping = false;

  constructor(
    private readonly taskStore: TaskStoreService,
    private readonly configService: ConfigService,
    @InjectQueue(QUEUE_NAMES.BAN_CHECK_QUEUE)
    private readonly banCheckQueue: Queue,
  ) {}

  @Cron(CronExpression.EVERY_MINUTE)
  async sweep(now: Date = new Date()): Promise<number> {
    if (this.sweeping) return 0;
    this.sweeping = true;

    try {
      const staleAfterMs =
        this.configService.get<number>('STALE_TASK_AFTER_MS') ?? 60 * 60_000;
      const cutoff = new Date(now.getTime() - staleAfterMs);
      const stale = await this.taskStore.findStale(cutoff, SWEEP_BATCH_LIMIT);

      let failed = 0;
      for (const task of stale) {
        try {
          const latest = await this.taskStore.findById(task.taskId);
          if (
            !latest ||
            isTerminal(latest.status) ||
            latest.updatedAt.getTime() >= cutoff.getTime()
          ) {
            continue;
          }
          const jobState = await this.queuedJobState(task.taskId);
          if (jobState) {
            this.logger.debug(`Task ${task.taskId} is stale but its job is ${jobState}, skipping`);
            continue;
          }

          const writer = this.taskStore.openWriter(latest, []);
          await writer.fail(ABANDONED_TASK_MESSAGE);
          if (writer.closedElsewhere) continue;
          failed++;
          this.logger.warn(
            `Task ${task.taskId} was ${task.status} since ${task.updatedAt.toISOString()}, marked FAILED`,
          );
        } catch (error) {
          this.logger.error(
            `Could not fail stale task ${task.taskId}: ${errorMessage(error)}`,
          );
        }
      }
      return failed;
    } catch (error) {
      this.logger.error(`Stale task sweep failed: ${errorMessage(error)}`);
      return 0;
    } finally {
      this.sweeping = false;
    }
  }

  private async queuedJobState(taskId: string): Promise<string | null> {
    const job = await this.banCheckQueue.getJob(taskId);
    if (!job) return null;
    const state = await job.getState();
    return QUEUED_STATES.has(state) ? state : null;
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InFlightCounter } from '@/shared/lib/concurrency';
import { errorMessage, errorStack } from '@/shared/lib/util';
import { DIRECT_ROUTE } from '@/shared/proxy/interfaces/proxy.interface';
import { ProxyPoolFactory } from '@/shared/proxy/services/proxy-pool.factory';
import type { BanCheckJob } from '@/shared/queue/interfaces/ban-check-job.interface';
import { balanceParameters } from '../balancing/parameter-balancer';
import {
  IProfileFetcher,
  PROFILE_FETCHER,
} from '../checker/profile-fetcher.interface';
import { TaskClosedError } from '../errors/ban-check.errors';
import {
  INVALID_STEAM_ID_DETAILS,
  isSteamId64,
} from '../identifiers/steam-id';
import type { EffectiveOptions } from '../interfaces/check-options.interface';
import {
  BanCheckTask,
  CheckResult,
  isTerminal,
  StatusSummary,
} from '../interfaces/task.interface';
import { BatchScheduler } from './batch-scheduler';
import { TIMED_OUT_DETAILS } from './check-worker';
import { TaskStoreService } from './task-store.service';
import { TaskWriter } from './task-writer';

export class TaskTimeoutError extends Error {
  readonly name = 'TaskTimeoutError';

  constructor(timeoutMs: number) {
    super(`Task exceeded its ${timeoutMs}ms time limit`);
  }
}

function unscheduledError(steamId: string, details: string): CheckResult {
  return {
    steamId,
    statusSummary: StatusSummary.ERROR,
    details,
    proxyUsed: DIRECT_ROUTE,
    batchId: null,
    attempts: 0,
  };
}

function describeOptions(options: EffectiveOptions): string {
  return (
    `batch=${options.logicalBatchSize} batches=${options.maxConcurrentBatches} ` +
    `workers=${options.maxWorkersPerBatch} submitDelay=${options.interRequestSubmitDelay}s ` +
    `retries=${options.maxRetriesPerUrl} retryDelay=${options.retryDelaySeconds}s ` +
    `(${options.useAutoBalancing ? 'auto' : 'manual'})`
  );
}

/**
 * Runs one ban-check task end to end: balances parameters, builds the task's
 * proxy pool, schedules the batches under the task time limit and hands every
 * outcome to the task's single writer.
 */
@Injectable()
export class BanCheckOrchestratorService {
  private readonly logger = new Logger(BanCheckOrchestratorService.name);

  constructor(
    private readonly taskStore: TaskStoreService,
    private readonly proxyPoolFactory: ProxyPoolFactory,
    @Inject(PROFILE_FETCHER) private readonly fetcher: IProfileFetcher,
    private readonly configService: ConfigService,
  ) {}

  async run(job: BanCheckJob): Promise<BanCheckTask> {
    const task = await this.taskStore.findById(job.taskId);
    if (!task) {
      throw new Error(`Task ${job.taskId} not found`);
    }
    if (isTerminal(task.status)) {
      this.logger.warn(`Task ${task.taskId} is already ${task.status}, skipping`);
      return task;
    }

    const writer = this.taskStore.openWriter(task, job.steamIds);
    try {
      await this.process(job, writer);
      await writer.flush();
      return writer.snapshot();
    } catch (error) {
      this.logger.error(
        `Task ${job.taskId} failed: ${errorMessage(error)}`,
        errorStack(error),
      );
      await this.failBestEffort(writer, `Task failed: ${errorMessage(error)}`);
      throw error;
    } finally {
      await this.fetcher.release(job.taskId);
    }
  }

  private async process(job: BanCheckJob, writer: TaskWriter): Promise<void> {
    const taskId = job.taskId;
    const valid = job.steamIds.filter(isSteamId64);
    const invalid = job.steamIds.filter((id) => !isSteamId64(id));
    const options = balanceParameters(job.steamIds.length, job.options);
    this.logger.log(
      `Task ${taskId}: ${job.steamIds.length} ids (${invalid.length} invalid), ${describeOptions(options)}`,
    );

    if (invalid.length > 0) {
      await writer.recordResults(
        invalid.map((id) => unscheduledError(id, INVALID_STEAM_ID_DETAILS)),
      );
    }
    if (valid.length === 0) {
      await writer.complete();
      return;
    }

    const resolved = this.proxyPoolFactory.resolve({
      file: job.proxyFile,
      list: options.proxyList,
    });
    if (resolved.rejected.length > 0) {
      this.logger.warn(
        `Task ${taskId}: ignored ${resolved.rejected.length} malformed proxy entries`,
      );
    }
    if (resolved.source === 'none' && this.proxyPoolFactory.proxyRequired) {
      await writer.fail('No proxies supplied and direct connections are disabled');
      return;
    }
    const pool = this.proxyPoolFactory.create(resolved.proxies);
    writer.trackProxyStats(() => pool.stats());
    this.logger.log(
      `Task ${taskId}: ${pool.size > 0 ? `${pool.size} proxies (${resolved.source})` : 'direct connections'}`,
    );

    const timeoutMs = this.configService.get<number>('TASK_TIMEOUT_MS') ?? 30 * 60_000;
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new TaskTimeoutError(timeoutMs)),
      timeoutMs,
    );
    const stopIfClosed = (): void => {
      if (writer.closedElsewhere && !controller.signal.aborted) {
        this.logger.warn(`Task ${taskId} was closed by another writer, stopping`);
        controller.abort(new TaskClosedError(writer.snapshot()));
      }
    };
    const inFlight = new InFlightCounter();
    const batchCount = Math.ceil(valid.length / options.logicalBatchSize);
    let processingMarked = false;

    const scheduler = new BatchScheduler({
      taskId,
      options,
      pool,
      fetcher: this.fetcher,
      inFlight,
      rateLimitCooldownMs:
        this.configService.get<number>('RATE_LIMIT_COOLDOWN_MS') ?? 30_000,
      signal: controller.signal,
      onBatchStart: async (batch) => {
        const position = `batch ${batch.batchId} of ${batchCount}`;
        if (processingMarked) {
          await writer.setMessage(`Processing ${valid.length} ids, ${position}`);
        } else {
          processingMarked = true;
          await writer.markProcessing(`Processing ${valid.length} ids, ${position}`);
        }
        stopIfClosed();
      },
      onResult: async (result) => {
        await writer.recordResult(result);
        stopIfClosed();
      },
    });

    try {
      const summary = await scheduler.run(valid);
      this.logger.log(
        `Task ${taskId}: ${summary.batchesStarted}/${summary.batches} batches run, ` +
          `${summary.failedBatches} failed, ${summary.rateLimitPauses} rate-limit pauses, ` +
          `peak in-flight ${inFlight.peak}`,
      );
    } finally {
      clearTimeout(timer);
    }

    await writer.flush();
    if (controller.signal.reason instanceof TaskTimeoutError) {
      const unresolved = valid.filter((id) => !writer.hasResult(id));
      this.logger.warn(
        `Task ${taskId} timed out after ${timeoutMs}ms with ${unresolved.length} ids unresolved`,
      );
      await writer.recordResults(
        unresolved.map((id) => unscheduledError(id, TIMED_OUT_DETAILS)),
      );
    }
    // Normally a no-op: the last result completes the task.
    await writer.complete();
  }

  private async failBestEffort(writer: TaskWriter, message: string): Promise<void> {
    try {
      await writer.fail(message);
    } catch (error) {
      this.logger.error(
        `Task ${writer.taskId} could not be marked FAILED: ${errorMessage(error)}`,
      );
    }
  }
}

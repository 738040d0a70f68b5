import { Logger } from '@nestjs/common';
import {
  BackoffGate,
  InFlightCounter,
  runWithConcurrency,
  SubmitThrottle,
} from '@/shared/lib/concurrency';
import { chunkArray, errorMessage } from '@/shared/lib/util';
import type { IProxyPool } from '@/shared/proxy/interfaces/proxy.interface';
import { DIRECT_ROUTE } from '@/shared/proxy/interfaces/proxy.interface';
import { PersistenceError } from '../errors/ban-check.errors';
import type { IProfileFetcher } from '../checker/profile-fetcher.interface';
import type { EffectiveOptions } from '../interfaces/check-options.interface';
import { CheckResult, StatusSummary } from '../interfaces/task.interface';
import { CheckWorker } from './check-worker';

export const NO_USABLE_PROXY_DETAILS = 'No usable proxy available';

export interface Batch {
  batchId: number;
  steamIds: string[];
}

export interface BatchSchedulerContext {
  taskId: string;
  options: EffectiveOptions;
  pool: IProxyPool;
  fetcher: IProfileFetcher;
  inFlight: InFlightCounter;
  rateLimitCooldownMs: number;
  signal: AbortSignal;
  /** Called once per batch, before any of its identifiers is checked. */
  onBatchStart?: (batch: Batch) => Promise<void>;
  /** Called exactly once per identifier that reaches a final outcome. */
  onResult: (result: CheckResult) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

export interface ScheduleSummary {
  batches: number;
  batchesStarted: number;
  failedBatches: number;
  rateLimitPauses: number;
}

/** 1-based batches of at most `size` identifiers, in submission order. */
export function partitionIntoBatches(
  steamIds: readonly string[],
  size: number,
): Batch[] {
  return chunkArray(steamIds, Math.max(1, size)).map((ids, index) => ({
    batchId: index + 1,
    steamIds: ids,
  }));
}

/**
 * Runs every batch of a task through a bounded pool of concurrent batches,
 * each with its own bounded pool of workers. Submissions across the whole
 * task are spaced by `interRequestSubmitDelay`.
 *
 * Identifiers left unchecked when the abort signal fires are not reported;
 * the caller owns those.
 */
export class BatchScheduler {
  private readonly logger = new Logger(BatchScheduler.name);
  private fatalError: PersistenceError | null = null;

  constructor(private readonly ctx: BatchSchedulerContext) {}

  async run(steamIds: readonly string[]): Promise<ScheduleSummary> {
    const { options, signal } = this.ctx;
    const batches = partitionIntoBatches(steamIds, options.logicalBatchSize);
    const throttle = new SubmitThrottle(
      options.interRequestSubmitDelay * 1000,
      this.ctx.now,
    );
    const summary: ScheduleSummary = {
      batches: batches.length,
      batchesStarted: 0,
      failedBatches: 0,
      rateLimitPauses: 0,
    };

    this.logger.log(
      `[Task ${this.ctx.taskId}] Scheduling ${steamIds.length} ids in ${batches.length} batches ` +
        `(${options.maxConcurrentBatches} concurrent, ${options.maxWorkersPerBatch} workers each)`,
    );

    const outer = await runWithConcurrency(
      batches,
      options.maxConcurrentBatches,
      async (batch) => {
        summary.batchesStarted++;
        await this.runBatch(batch, throttle, summary);
      },
      () => this.canContinue(),
    );

    if (this.fatalError) throw this.fatalError;
    const [firstFailure] = outer.failures;
    if (firstFailure) throw firstFailure.reason;

    if (signal.aborted) {
      this.logger.warn(
        `[Task ${this.ctx.taskId}] Aborted after starting ${summary.batchesStarted} of ${batches.length} batches`,
      );
    }
    return summary;
  }

  private canContinue(): boolean {
    return !this.ctx.signal.aborted && this.fatalError === null;
  }

  private async runBatch(
    batch: Batch,
    throttle: SubmitThrottle,
    summary: ScheduleSummary,
  ): Promise<void> {
    const prefix = `[Task ${this.ctx.taskId} | Batch ${batch.batchId}]`;
    const resolved = new Set<string>();
    const emit = async (result: CheckResult): Promise<void> => {
      resolved.add(result.steamId);
      await this.ctx.onResult(result);
    };

    try {
      await this.ctx.onBatchStart?.(batch);

      if (!this.ctx.pool.hasUsableRoute()) {
        this.logger.warn(`${prefix} No usable proxy, failing ${batch.steamIds.length} ids`);
        for (const steamId of batch.steamIds) {
          await emit(this.errorResult(steamId, batch.batchId, NO_USABLE_PROXY_DETAILS));
        }
        return;
      }

      const gate = new BackoffGate(this.ctx.now);
      const worker = new CheckWorker({
        taskId: this.ctx.taskId,
        batchId: batch.batchId,
        options: this.ctx.options,
        pool: this.ctx.pool,
        fetcher: this.ctx.fetcher,
        throttle,
        gate,
        inFlight: this.ctx.inFlight,
        rateLimitCooldownMs: this.ctx.rateLimitCooldownMs,
        signal: this.ctx.signal,
        random: this.ctx.random,
      });

      this.logger.debug(`${prefix} Started with ${batch.steamIds.length} ids`);
      const inner = await runWithConcurrency(
        batch.steamIds,
        this.ctx.options.maxWorkersPerBatch,
        async (steamId) => emit(await worker.check(steamId)),
        () => this.canContinue(),
      );
      summary.rateLimitPauses += gate.pauseCount;

      const [firstFailure] = inner.failures;
      if (firstFailure) throw firstFailure.reason;
      this.logger.debug(`${prefix} Finished`);
    } catch (error) {
      if (error instanceof PersistenceError) {
        this.fatalError ??= error;
        throw error;
      }

      summary.failedBatches++;
      this.logger.error(`${prefix} Failed: ${errorMessage(error)}`);
      for (const steamId of batch.steamIds) {
        if (resolved.has(steamId)) continue;
        await emit(
          this.errorResult(steamId, batch.batchId, `Batch failed: ${errorMessage(error)}`),
        );
      }
    }
  }

  private errorResult(
    steamId: string,
    batchId: number,
    details: string,
  ): CheckResult {
    return {
      steamId,
      statusSummary: StatusSummary.ERROR,
      details,
      proxyUsed: DIRECT_ROUTE,
      batchId,
      attempts: 0,
    };
  }
}

import { Logger } from '@nestjs/common';
import { errorMessage, sleep } from '@/shared/lib/util';
import type { ProxyStats } from '@/shared/proxy/interfaces/proxy.interface';
import { PersistenceError, TaskClosedError } from '../errors/ban-check.errors';
import {
  BanCheckTask,
  CheckResult,
  isTerminal,
  StatusSummary,
  TaskStatus,
} from '../interfaces/task.interface';
import type { TaskRepository } from '../repositories/task.repository';

export interface PersistRetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
}

type Mutation = (draft: BanCheckTask) => void;

interface PendingMutation {
  mutate: Mutation;
  resolve: (task: BanCheckTask) => void;
  reject: (error: unknown) => void;
}

/** Percentage floored to two decimals; 100 only once every id is resolved. */
export function computeProgress(resolved: number, total: number): number {
  if (total <= 0 || resolved >= total) return 100;
  return Math.floor((resolved / total) * 10_000) / 100;
}

export function summarizeResults(results: readonly CheckResult[]): string {
  const count = (status: StatusSummary) =>
    results.filter((r) => r.statusSummary === status).length;

  return (
    `Processing complete: ${results.length} checked, ` +
    `${count(StatusSummary.BANNED)} banned, ${count(StatusSummary.PRIVATE)} private, ` +
    `${count(StatusSummary.CLEAN)} clean, ${count(StatusSummary.ERROR)} errors.`
  );
}

function cloneTask(task: BanCheckTask): BanCheckTask {
  return structuredClone(task);
}

/**
 * The only writer of one task's row while it is being processed.
 *
 * Mutations are queued and applied in arrival order to a copy of the last
 * persisted snapshot. Everything queued while a write is in flight goes out
 * together in the next write. A snapshot becomes current only after it has
 * been persisted; once the task is terminal every further mutation is a no-op.
 * When the stored row turns out to be terminal already (another process
 * closed it), that stored task becomes current and {@link closedElsewhere}
 * is set.
 */
export class TaskWriter {
  private readonly logger = new Logger(TaskWriter.name);
  private readonly queue: PendingMutation[] = [];
  private readonly order: Map<string, number>;
  private current: BanCheckTask;
  private draining: Promise<void> | null = null;
  private proxyStatsSource: (() => ProxyStats) | null = null;
  private closedByOtherWriter = false;

  constructor(
    initial: BanCheckTask,
    submissionOrder: readonly string[],
    private readonly repository: TaskRepository,
    private readonly retryPolicy: PersistRetryPolicy,
  ) {
    this.current = cloneTask(initial);
    this.order = new Map(submissionOrder.map((id, index) => [id, index]));
  }

  get taskId(): string {
    return this.current.taskId;
  }

  /** Copy of the last persisted snapshot. */
  snapshot(): BanCheckTask {
    return cloneTask(this.current);
  }

  get closedElsewhere(): boolean {
    return this.closedByOtherWriter;
  }

  hasResult(steamId: string): boolean {
    return this.current.results.some((r) => r.steamId === steamId);
  }

  markProcessing(message: string): Promise<BanCheckTask> {
    return this.enqueue((draft) => {
      if (draft.status !== TaskStatus.PENDING) return;
      draft.status = TaskStatus.PROCESSING;
      draft.message = message;
    });
  }

  setMessage(message: string): Promise<BanCheckTask> {
    return this.enqueue((draft) => {
      draft.message = message;
    });
  }

  recordResult(result: CheckResult): Promise<BanCheckTask> {
    return this.recordResults([result]);
  }

  /**
   * Upserts results by steamId (a repeated id keeps its first result),
   * recomputes progress and completes the task once every id is resolved.
   */
  recordResults(results: readonly CheckResult[]): Promise<BanCheckTask> {
    return this.enqueue((draft) => {
      const seen = new Set(draft.results.map((r) => r.steamId));
      for (const result of results) {
        if (seen.has(result.steamId)) continue;
        seen.add(result.steamId);
        draft.results.push({ ...result });
      }

      if (draft.results.length >= draft.totalCount) {
        this.finish(draft, TaskStatus.COMPLETED, summarizeResults(draft.results));
      } else {
        draft.progress = Math.max(
          draft.progress,
          computeProgress(draft.results.length, draft.totalCount),
        );
      }
    });
  }

  /** Every later write stamps a fresh proxy snapshot from `source`. */
  trackProxyStats(source: () => ProxyStats): void {
    this.proxyStatsSource = source;
  }

  /** Completes the task with whatever results it has. */
  complete(message?: string): Promise<BanCheckTask> {
    return this.enqueue((draft) => {
      this.finish(draft, TaskStatus.COMPLETED, message ?? summarizeResults(draft.results));
    });
  }

  fail(message: string): Promise<BanCheckTask> {
    return this.enqueue((draft) => {
      this.finish(draft, TaskStatus.FAILED, message);
    });
  }

  /** Resolves once every mutation queued so far has been written or rejected. */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private finish(draft: BanCheckTask, status: TaskStatus, message: string): void {
    draft.status = status;
    draft.message = message;
    draft.progress = 100;
    draft.results.sort(
      (a, b) =>
        (this.order.get(a.steamId) ?? Number.MAX_SAFE_INTEGER) -
        (this.order.get(b.steamId) ?? Number.MAX_SAFE_INTEGER),
    );
  }

  private enqueue(mutate: Mutation): Promise<BanCheckTask> {
    return new Promise<BanCheckTask>((resolve, reject) => {
      this.queue.push({ mutate, resolve, reject });
      if (!this.draining) {
        this.draining = Promise.resolve().then(() => this.drain());
      }
    });
  }

  private async drain(): Promise<void> {
    while (this.queue.length > 0) {
      const pending = this.queue.splice(0, this.queue.length);

      if (isTerminal(this.current.status)) {
        const snapshot = this.snapshot();
        pending.forEach((p) => p.resolve(snapshot));
        continue;
      }

      const draft = cloneTask(this.current);
      for (const p of pending) {
        if (isTerminal(draft.status)) break;
        p.mutate(draft);
      }
      if (this.proxyStatsSource) {
        draft.proxyStats = this.proxyStatsSource();
      }

      try {
        this.current = await this.persist(draft);
        const snapshot = this.snapshot();
        pending.forEach((p) => p.resolve(snapshot));
      } catch (error) {
        if (!(error instanceof TaskClosedError)) {
          pending.forEach((p) => p.reject(error));
          continue;
        }
        this.logger.warn(
          `[Task ${this.taskId}] Stored task is already ${error.task.status}, dropping ${pending.length} queued updates`,
        );
        this.current = cloneTask(error.task);
        this.closedByOtherWriter = true;
        const snapshot = this.snapshot();
        pending.forEach((p) => p.resolve(snapshot));
      }
    }
    this.draining = null;
  }

  private async persist(draft: BanCheckTask): Promise<BanCheckTask> {
    const { maxRetries, baseDelayMs } = this.retryPolicy;
    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await this.repository.save(draft);
      } catch (error) {
        if (error instanceof TaskClosedError) throw error;
        lastError = error;
        if (attempt < maxRetries) {
          const delayMs = baseDelayMs * 2 ** attempt;
          this.logger.warn(
            `[Task ${draft.taskId}] Persist attempt ${attempt + 1} failed, retrying in ${delayMs}ms: ${errorMessage(error)}`,
          );
          await sleep(delayMs);
        }
      }
    }

    this.logger.error(
      `[Task ${draft.taskId}] Persist failed after ${maxRetries + 1} attempts: ${errorMessage(lastError)}`,
    );
    throw new PersistenceError(
      `Could not persist task ${draft.taskId}: ${errorMessage(lastError)}`,
      { cause: lastError },
    );
  }
}

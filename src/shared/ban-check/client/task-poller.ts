import { Logger } from '@nestjs/common';
import { errorMessage } from '@/shared/lib/util';
import { isTerminal } from '../interfaces/task.interface';
import { TaskFetchError, TaskFetcher, TaskView } from './task-view';

export type PollerState = 'not_polling' | 'polling' | 'backing_off';

export interface TaskPollerOptions {
  baseIntervalMs?: number;
  /** Upper bound of the random delay added to every interval. */
  jitterMs?: number;
  maxBackoffMs?: number;
  random?: () => number;
}

export interface TaskPollerListener {
  onUpdate?(task: TaskView): void;
  onComplete?(task: TaskView): void;
  onError?(error: unknown): void;
  onStateChange?(state: PollerState): void;
}

const DEFAULTS = {
  baseIntervalMs: 2_000,
  jitterMs: 500,
  maxBackoffMs: 30_000,
};

/**
 * Polls one task until it is COMPLETED or FAILED.
 *
 *   not_polling --start--> polling <--429/ok--> backing_off
 *   polling|backing_off --terminal/404/error/stop--> not_polling
 *
 * At most one timer is pending at any time, and none once the poller is
 * back in `not_polling`.
 */
export class TaskPoller {
  private readonly logger = new Logger(TaskPoller.name);
  private readonly options: Required<TaskPollerOptions>;
  private currentState: PollerState = 'not_polling';
  private timer: NodeJS.Timeout | null = null;
  private abortController: AbortController | null = null;
  private taskId: string | null = null;
  private consecutiveRateLimits = 0;
  // Bumped on every start/stop so late responses from a previous run are dropped.
  private generation = 0;

  constructor(
    private readonly fetcher: TaskFetcher,
    private readonly listener: TaskPollerListener = {},
    options: TaskPollerOptions = {},
  ) {
    this.options = { ...DEFAULTS, random: Math.random, ...options };
  }

  get state(): PollerState {
    return this.currentState;
  }

  get hasPendingTimer(): boolean {
    return this.timer !== null;
  }

  start(taskId: string): void {
    this.stop();
    this.taskId = taskId;
    this.consecutiveRateLimits = 0;
    this.abortController = new AbortController();
    this.setState('polling');
    this.schedule(0);
  }

  stop(): void {
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.abortController?.abort();
    this.abortController = null;
    this.setState('not_polling');
  }

  private schedule(delayMs: number): void {
    const generation = this.generation;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.poll(generation).catch((error: unknown) => this.halt(error));
    }, delayMs);
  }

  private async poll(generation: number): Promise<void> {
    const taskId = this.taskId;
    const signal = this.abortController?.signal;
    if (taskId === null) return;

    let task: TaskView;
    try {
      task = await this.fetcher.fetchTask(taskId, signal);
    } catch (error) {
      if (generation !== this.generation) return;
      this.onFetchError(error);
      return;
    }
    if (generation !== this.generation) return;

    this.consecutiveRateLimits = 0;
    this.setState('polling');
    this.listener.onUpdate?.(task);

    if (isTerminal(task.status)) {
      this.stop();
      this.listener.onComplete?.(task);
      return;
    }
    this.schedule(this.nextInterval());
  }

  private onFetchError(error: unknown): void {
    if (error instanceof TaskFetchError && error.statusCode === 429) {
      this.consecutiveRateLimits++;
      const delayMs = this.backoffDelay();
      this.logger.warn(
        `Polling task ${this.taskId} rate limited (${this.consecutiveRateLimits} in a row), backing off ${delayMs}ms`,
      );
      this.setState('backing_off');
      this.schedule(delayMs);
      return;
    }
    this.halt(error);
  }

  private halt(error: unknown): void {
    this.logger.error(`Polling task ${this.taskId} stopped: ${errorMessage(error)}`);
    this.stop();
    this.listener.onError?.(error);
  }

  private nextInterval(): number {
    const jitter = Math.floor(this.options.random() * this.options.jitterMs);
    return this.options.baseIntervalMs + jitter;
  }

  /** Doubles per consecutive 429, capped at maxBackoffMs. */
  private backoffDelay(): number {
    const delay =
      this.options.baseIntervalMs * 2 ** this.consecutiveRateLimits;
    return Math.min(this.options.maxBackoffMs, delay);
  }

  private setState(state: PollerState): void {
    if (state === this.currentState) return;
    this.currentState = state;
    this.listener.onStateChange?.(state);
  }
}

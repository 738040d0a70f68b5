import { sleep } from './util';

export interface PoolRunSummary {
  started: number;
  failures: Array<{ index: number; reason: unknown }>;
}

/**
 * Runs `handler` over `items` with at most `limit` handlers in flight.
 * A new item starts as soon as a lane frees up. A rejected handler is recorded
 * and does not stop its siblings. `shouldContinue` is consulted before each
 * item is started.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  handler: (item: T, index: number) => Promise<void>,
  shouldContinue: () => boolean = () => true,
): Promise<PoolRunSummary> {
  const summary: PoolRunSummary = { started: 0, failures: [] };
  const laneCount = Math.max(1, Math.min(limit, items.length));
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length && shouldContinue()) {
      const index = next++;
      summary.started++;
      try {
        await handler(items[index], index);
      } catch (reason) {
        summary.failures.push({ index, reason });
      }
    }
  };

  await Promise.all(Array.from({ length: laneCount }, () => lane()));
  return summary;
}

/**
 * Spaces successive acquisitions by a fixed interval across every caller
 * sharing the instance. Slots are reserved synchronously, so concurrent
 * callers queue up in call order.
 */
export class SubmitThrottle {
  private nextSlotAt = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  async acquire(signal?: AbortSignal): Promise<void> {
    if (this.intervalMs <= 0) return;

    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.intervalMs;
    await sleep(slot - now, signal);
  }
}

/**
 * Pool-wide pause switch. Any member may trigger a pause; every member waits
 * for it to elapse before submitting new work.
 */
export class BackoffGate {
  private pausedUntil = 0;
  private pauses = 0;

  constructor(private readonly now: () => number = Date.now) {}

  trigger(cooldownMs: number): void {
    const until = this.now() + cooldownMs;
    if (until > this.pausedUntil) {
      this.pausedUntil = until;
      this.pauses++;
    }
  }

  isPaused(): boolean {
    return this.now() < this.pausedUntil;
  }

  get pauseCount(): number {
    return this.pauses;
  }

  async wait(signal?: AbortSignal): Promise<void> {
    // Re-check after waking: another member may have extended the pause.
    while (this.isPaused()) {
      await sleep(this.pausedUntil - this.now(), signal);
    }
  }
}

export class InFlightCounter {
  private current = 0;
  private highWater = 0;

  async track<T>(work: () => Promise<T>): Promise<T> {
    this.current++;
    this.highWater = Math.max(this.highWater, this.current);
    try {
      return await work();
    } finally {
      this.current--;
    }
  }

  get inFlight(): number {
    return this.current;
  }

  get peak(): number {
    return this.highWater;
  }
}

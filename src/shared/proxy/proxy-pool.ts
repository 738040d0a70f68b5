import { Logger } from '@nestjs/common';
import { ProxyExhaustionError } from '@/shared/ban-check/errors/ban-check.errors';
import {
  DIRECT_ROUTE,
  IProxyPool,
  ProxyCounters,
  ProxyLease,
  ProxyPoolPolicy,
  ProxyRecord,
  ProxyStats,
} from './interfaces/proxy.interface';

const DIRECT_LEASE: ProxyLease = { uri: null, label: DIRECT_ROUTE };

/**
 * Owns every ProxyRecord of one task. All mutation goes through this object
 * and each method runs to completion without awaiting, so concurrent workers
 * on the event loop never observe a half-updated record.
 */
export class ProxyPool implements IProxyPool {
  private readonly logger = new Logger(ProxyPool.name);
  private readonly records: ProxyRecord[];
  private readonly byUri = new Map<string, ProxyRecord>();
  private cursor = 0;
  private directFallbacks = 0;

  constructor(
    uris: readonly string[],
    private readonly policy: ProxyPoolPolicy,
    private readonly now: () => number = Date.now,
  ) {
    this.records = uris.map((uri) => ({
      uri,
      consecutiveFailures: 0,
      disabled: false,
      attempts: 0,
      successes: 0,
      failures: 0,
      rateLimited: 0,
      totalLatencyMs: 0,
    }));
    for (const record of this.records) {
      this.byUri.set(record.uri, record);
    }
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Round-robin over enabled proxies. `exclude` is skipped when any other
   * proxy is enabled, which rotates a retry onto a different route.
   */
  acquire(exclude?: string | null): ProxyLease {
    if (this.records.length === 0) {
      return DIRECT_LEASE;
    }

    this.reviveCooledDown();
    const enabledCount = this.records.filter((r) => !r.disabled).length;

    if (enabledCount === 0) {
      if (this.policy.allowDirectFallback) {
        this.directFallbacks++;
        this.logger.warn('All proxies disabled, falling back to direct connection');
        return DIRECT_LEASE;
      }
      throw new ProxyExhaustionError(
        `All ${this.records.length} proxies are disabled`,
      );
    }

    for (let step = 0; step < this.records.length; step++) {
      const index = (this.cursor + step) % this.records.length;
      const record = this.records[index];
      if (record.disabled) continue;
      if (exclude && record.uri === exclude && enabledCount > 1) continue;

      this.cursor = index + 1;
      record.attempts++;
      record.lastUsedAt = this.now();
      return { uri: record.uri, label: record.uri };
    }

    // Unreachable while enabledCount > 0.
    throw new ProxyExhaustionError();
  }

  recordSuccess(uri: string | null, latencyMs: number): void {
    const record = uri ? this.byUri.get(uri) : undefined;
    if (!record) return;

    record.successes++;
    record.consecutiveFailures = 0;
    record.totalLatencyMs += latencyMs;
  }

  recordFailure(uri: string | null, opts: { rateLimited?: boolean } = {}): void {
    const record = uri ? this.byUri.get(uri) : undefined;
    if (!record) return;

    record.failures++;
    record.consecutiveFailures++;
    if (opts.rateLimited) record.rateLimited++;

    if (
      !record.disabled &&
      record.consecutiveFailures >= this.policy.failureThreshold
    ) {
      record.disabled = true;
      record.disabledAt = this.now();
      this.logger.warn(
        `Proxy ${record.uri} disabled after ${record.consecutiveFailures} consecutive failures (cooldown ${this.policy.cooldownMs}ms)`,
      );
    }
  }

  hasUsableRoute(): boolean {
    if (this.records.length === 0) return true;
    this.reviveCooledDown();
    return (
      this.records.some((r) => !r.disabled) || this.policy.allowDirectFallback
    );
  }

  isDisabled(uri: string): boolean {
    this.reviveCooledDown();
    return this.byUri.get(uri)?.disabled ?? false;
  }

  stats(): ProxyStats {
    const proxies: Record<string, ProxyCounters> = {};
    for (const r of this.records) {
      proxies[r.uri] = {
        attempts: r.attempts,
        successes: r.successes,
        failures: r.failures,
        rateLimited: r.rateLimited,
        avgLatencyMs:
          r.successes > 0 ? Math.round(r.totalLatencyMs / r.successes) : 0,
        disabled: r.disabled,
      };
    }

    return {
      totalProxies: this.records.length,
      enabledProxies: this.records.filter((r) => !r.disabled).length,
      directFallbacks: this.directFallbacks,
      proxies,
    };
  }

  private reviveCooledDown(): void {
    const now = this.now();
    for (const record of this.records) {
      if (
        record.disabled &&
        record.disabledAt !== undefined &&
        now - record.disabledAt >= this.policy.cooldownMs
      ) {
        record.disabled = false;
        record.disabledAt = undefined;
        record.consecutiveFailures = 0;
        this.logger.log(`Proxy ${record.uri} re-enabled after cooldown`);
      }
    }
  }
}

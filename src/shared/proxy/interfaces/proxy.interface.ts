export const DIRECT_ROUTE = 'direct';

export interface ProxyRecord {
  uri: string;
  consecutiveFailures: number;
  disabled: boolean;
  disabledAt?: number;
  lastUsedAt?: number;
  attempts: number;
  successes: number;
  failures: number;
  rateLimited: number;
  totalLatencyMs: number;
}

/**
 * A route handed to one external call. `uri` is null for a direct connection.
 */
export interface ProxyLease {
  uri: string | null;
  label: string;
}

export interface ProxyCounters {
  attempts: number;
  successes: number;
  failures: number;
  rateLimited: number;
  avgLatencyMs: number;
  disabled: boolean;
}

export interface ProxyStats {
  totalProxies: number;
  enabledProxies: number;
  directFallbacks: number;
  proxies: Record<string, ProxyCounters>;
}

export interface ProxyPoolPolicy {
  failureThreshold: number;
  cooldownMs: number;
  /** Use a direct connection when every proxy is disabled. */
  allowDirectFallback: boolean;
}

export interface IProxyPool {
  acquire(exclude?: string | null): ProxyLease;
  recordSuccess(uri: string | null, latencyMs: number): void;
  recordFailure(uri: string | null, opts?: { rateLimited?: boolean }): void;
  hasUsableRoute(): boolean;
  stats(): ProxyStats;
}

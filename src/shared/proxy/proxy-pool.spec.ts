import { ProxyExhaustionError } from '@/shared/ban-check/errors/ban-check.errors';
import { ProxyPoolPolicy } from './interfaces/proxy.interface';
import { ProxyPool } from './proxy-pool';

const A = 'http://10.0.0.1:8080';
const B = 'http://10.0.0.2:8080';
const C = 'http://10.0.0.3:8080';

describe('ProxyPool', () => {
  let clock: number;
  const now = () => clock;
  const policy: ProxyPoolPolicy = {
    failureThreshold: 3,
    cooldownMs: 60_000,
    allowDirectFallback: false,
  };

  beforeEach(() => {
    clock = 1_000;
  });

  it('hands out direct leases when it holds no proxies', () => {
    const pool = new ProxyPool([], policy, now);

    expect(pool.acquire()).toEqual({ uri: null, label: 'direct' });
    expect(pool.hasUsableRoute()).toBe(true);
  });

  it('rotates round-robin over the proxies', () => {
    const pool = new ProxyPool([A, B, C], policy, now);

    const order = [1, 2, 3, 4].map(() => pool.acquire().uri);

    expect(order).toEqual([A, B, C, A]);
    expect(pool.stats().proxies[A].attempts).toBe(2);
  });

  it('skips the excluded proxy while another one is enabled', () => {
    const pool = new ProxyPool([A, B], policy, now);

    expect(pool.acquire(A).uri).toBe(B);
    expect(new ProxyPool([A], policy, now).acquire(A).uri).toBe(A);
  });

  it('disables a proxy after consecutive failures reach the threshold', () => {
    const pool = new ProxyPool([A, B], policy, now);

    pool.recordFailure(A);
    pool.recordFailure(A);
    expect(pool.isDisabled(A)).toBe(false);
    pool.recordFailure(A);

    expect(pool.isDisabled(A)).toBe(true);
    expect([1, 2, 3].map(() => pool.acquire().uri)).toEqual([B, B, B]);
    expect(pool.stats()).toMatchObject({ totalProxies: 2, enabledProxies: 1 });
  });

  it('resets the consecutive failure count on success', () => {
    const pool = new ProxyPool([A], policy, now);

    pool.recordFailure(A);
    pool.recordFailure(A);
    pool.recordSuccess(A, 10);
    pool.recordFailure(A);

    expect(pool.isDisabled(A)).toBe(false);
    expect(pool.stats().proxies[A]).toMatchObject({ successes: 1, failures: 3 });
  });

  it('re-enables a disabled proxy once the cooldown has elapsed', () => {
    const pool = new ProxyPool([A], policy, now);
    [1, 2, 3].forEach(() => pool.recordFailure(A));

    clock += 59_999;
    expect(pool.isDisabled(A)).toBe(true);
    clock += 1;
    expect(pool.isDisabled(A)).toBe(false);

    // Counters were reset: one new failure does not disable it again.
    pool.recordFailure(A);
    expect(pool.isDisabled(A)).toBe(false);
  });

  it('throws ProxyExhaustionError when every proxy is disabled and direct fallback is off', () => {
    const pool = new ProxyPool([A], { ...policy, failureThreshold: 1 }, now);
    pool.recordFailure(A);

    expect(pool.hasUsableRoute()).toBe(false);
    expect(() => pool.acquire()).toThrow(ProxyExhaustionError);
    expect(() => pool.acquire()).toThrow('All 1 proxies are disabled');
  });

  it('falls back to a direct lease when allowed', () => {
    const pool = new ProxyPool(
      [A],
      { ...policy, failureThreshold: 1, allowDirectFallback: true },
      now,
    );
    pool.recordFailure(A);

    expect(pool.hasUsableRoute()).toBe(true);
    expect(pool.acquire()).toEqual({ uri: null, label: 'direct' });
    expect(pool.stats().directFallbacks).toBe(1);
  });

  it('reports latency and rate-limit counters per proxy', () => {
    const pool = new ProxyPool([A], policy, now);
    pool.acquire();
    pool.recordSuccess(A, 100);
    pool.acquire();
    pool.recordSuccess(A, 301);
    pool.acquire();
    pool.recordFailure(A, { rateLimited: true });

    expect(pool.stats()).toEqual({
      totalProxies: 1,
      enabledProxies: 1,
      directFallbacks: 0,
      proxies: {
        [A]: {
          attempts: 3,
          successes: 2,
          failures: 1,
          rateLimited: 1,
          avgLatencyMs: 201,
          disabled: false,
        },
      },
    });
  });

  it('ignores outcomes reported for the direct route', () => {
    const pool = new ProxyPool([A], policy, now);

    pool.recordFailure(null);
    pool.recordSuccess(null, 5);

    expect(pool.stats().proxies[A]).toMatchObject({ failures: 0, successes: 0 });
  });
});

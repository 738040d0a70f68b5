import { clamp } from '@/shared/lib/util';
import {
  CheckOptions,
  EffectiveOptions,
  MANUAL_DEFAULTS,
  OPTION_RANGES,
  TunableField,
} from '../interfaces/check-options.interface';

/**
 * Upper bound on maxConcurrentBatches × maxWorkersPerBatch for one task.
 */
export const GLOBAL_CONCURRENCY_CEILING = 50;

interface BalancingTier {
  /** Inclusive lower bound on the identifier count. */
  minCount: number;
  params: Record<TunableField, number>;
}

// Ordered by minCount. Every column is non-decreasing down the table.
const BALANCING_TIERS: readonly BalancingTier[] = [
  {
    minCount: 0,
    params: {
      logicalBatchSize: 10,
      maxConcurrentBatches: 6,
      maxWorkersPerBatch: 3,
      interRequestSubmitDelay: 0.2,
      maxRetriesPerUrl: 3,
      retryDelaySeconds: 5,
    },
  },
  {
    minCount: 50,
    params: {
      logicalBatchSize: 20,
      maxConcurrentBatches: 6,
      maxWorkersPerBatch: 3,
      interRequestSubmitDelay: 0.2,
      maxRetriesPerUrl: 3,
      retryDelaySeconds: 5,
    },
  },
  {
    minCount: 200,
    params: {
      logicalBatchSize: 30,
      maxConcurrentBatches: 8,
      maxWorkersPerBatch: 4,
      interRequestSubmitDelay: 0.3,
      maxRetriesPerUrl: 3,
      retryDelaySeconds: 5,
    },
  },
  {
    minCount: 500,
    params: {
      logicalBatchSize: 50,
      maxConcurrentBatches: 10,
      maxWorkersPerBatch: 5,
      interRequestSubmitDelay: 0.5,
      maxRetriesPerUrl: 3,
      retryDelaySeconds: 10,
    },
  },
];

function clampField(field: TunableField, value: number | undefined): number {
  const range = OPTION_RANGES[field];
  if (value === undefined || !Number.isFinite(value)) {
    return MANUAL_DEFAULTS[field];
  }
  const bounded = clamp(value, range.min, range.max);
  return range.integer ? Math.round(bounded) : bounded;
}

function tierFor(count: number): BalancingTier {
  let selected = BALANCING_TIERS[0];
  for (const tier of BALANCING_TIERS) {
    if (count >= tier.minCount) selected = tier;
  }
  return selected;
}

/**
 * Derives the effective batching/concurrency/retry parameters for a task of
 * `count` distinct identifiers.
 *
 * Manual mode clamps each field to its range (missing fields take the manual
 * defaults). Auto mode ignores every caller field except `proxyList` and picks
 * the tier for `count`, then trims workers until the total concurrency fits
 * under {@link GLOBAL_CONCURRENCY_CEILING}.
 */
export function balanceParameters(
  count: number,
  options: CheckOptions = {},
): EffectiveOptions {
  const useAutoBalancing = options.useAutoBalancing ?? true;

  if (!useAutoBalancing) {
    return {
      useAutoBalancing,
      proxyList: options.proxyList,
      logicalBatchSize: clampField('logicalBatchSize', options.logicalBatchSize),
      maxConcurrentBatches: clampField(
        'maxConcurrentBatches',
        options.maxConcurrentBatches,
      ),
      maxWorkersPerBatch: clampField(
        'maxWorkersPerBatch',
        options.maxWorkersPerBatch,
      ),
      interRequestSubmitDelay: clampField(
        'interRequestSubmitDelay',
        options.interRequestSubmitDelay,
      ),
      maxRetriesPerUrl: clampField('maxRetriesPerUrl', options.maxRetriesPerUrl),
      retryDelaySeconds: clampField(
        'retryDelaySeconds',
        options.retryDelaySeconds,
      ),
    };
  }

  const params = { ...tierFor(Math.max(0, count)).params };
  while (
    params.maxConcurrentBatches * params.maxWorkersPerBatch >
      GLOBAL_CONCURRENCY_CEILING &&
    params.maxWorkersPerBatch > 1
  ) {
    params.maxWorkersPerBatch--;
  }

  return { useAutoBalancing, proxyList: options.proxyList, ...params };
}

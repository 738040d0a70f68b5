/**
 * Caller-supplied tuning knobs. Every field is optional; missing values fall
 * back to {@link MANUAL_DEFAULTS} or to the auto-balanced tier.
 */
export interface CheckOptions {
  useAutoBalancing?: boolean;
  proxyList?: string;
  logicalBatchSize?: number;
  maxConcurrentBatches?: number;
  maxWorkersPerBatch?: number;
  interRequestSubmitDelay?: number;
  maxRetriesPerUrl?: number;
  retryDelaySeconds?: number;
}

export interface EffectiveOptions {
  useAutoBalancing: boolean;
  proxyList?: string;
  logicalBatchSize: number;
  maxConcurrentBatches: number;
  maxWorkersPerBatch: number;
  /** Seconds between outbound submissions, task wide. */
  interRequestSubmitDelay: number;
  maxRetriesPerUrl: number;
  retryDelaySeconds: number;
}

export type TunableField = Exclude<
  keyof EffectiveOptions,
  'useAutoBalancing' | 'proxyList'
>;

export const OPTION_RANGES: Record<TunableField, { min: number; max: number; integer: boolean }> = {
  logicalBatchSize: { min: 1, max: 50, integer: true },
  maxConcurrentBatches: { min: 1, max: 10, integer: true },
  maxWorkersPerBatch: { min: 1, max: 10, integer: true },
  interRequestSubmitDelay: { min: 0, max: 1, integer: false },
  maxRetriesPerUrl: { min: 0, max: 5, integer: true },
  retryDelaySeconds: { min: 0, max: 10, integer: false },
};

export const MANUAL_DEFAULTS: Record<TunableField, number> = {
  logicalBatchSize: 20,
  maxConcurrentBatches: 3,
  maxWorkersPerBatch: 3,
  interRequestSubmitDelay: 0.1,
  maxRetriesPerUrl: 2,
  retryDelaySeconds: 5,
};

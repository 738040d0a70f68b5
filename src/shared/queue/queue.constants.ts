export const QUEUE_NAMES = {
  BAN_CHECK_QUEUE: 'ban-check-queue',
} as const;

export const JOB_NAMES = {
  RUN_BAN_CHECK: 'run-ban-check',
} as const;

/**
 * The orchestrator retries individual checks itself, so a job is never
 * replayed: a second run would race the first on the same task row.
 */
export const QUEUE_CONFIG = {
  attempts: 1,
  removeOnComplete: false,
  removeOnFail: false,
};

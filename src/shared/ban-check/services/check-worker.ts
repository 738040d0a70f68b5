import { HttpStatus, Logger } from '@nestjs/common';
import {
  BackoffGate,
  InFlightCounter,
  SubmitThrottle,
} from '@/shared/lib/concurrency';
import { errorMessage, sleep, withJitter } from '@/shared/lib/util';
import {
  DIRECT_ROUTE,
  IProxyPool,
  ProxyLease,
} from '@/shared/proxy/interfaces/proxy.interface';
import {
  PermanentExternalError,
  ProxyExhaustionError,
  TransientExternalError,
} from '../errors/ban-check.errors';
import {
  classifyProfilePage,
  ProfileClassification,
} from '../checker/profile-classifier';
import type {
  IProfileFetcher,
  ProfileFetchResponse,
} from '../checker/profile-fetcher.interface';
import type { EffectiveOptions } from '../interfaces/check-options.interface';
import { CheckResult, StatusSummary } from '../interfaces/task.interface';

export const TIMED_OUT_DETAILS = 'Timed out before a result was obtained';

const RETRYABLE_STATUS = new Set<number>([
  HttpStatus.TOO_MANY_REQUESTS,
  HttpStatus.INTERNAL_SERVER_ERROR,
  HttpStatus.BAD_GATEWAY,
  HttpStatus.SERVICE_UNAVAILABLE,
  HttpStatus.GATEWAY_TIMEOUT,
]);

/**
 * Turns a raw profile response into a classification, or throws the error
 * class that decides whether the call is retried.
 */
export function interpretResponse(
  response: ProfileFetchResponse,
): ProfileClassification {
  const { statusCode } = response;

  if (statusCode >= 200 && statusCode < 300) {
    const classification = classifyProfilePage(response.body);
    if (!classification) {
      throw new PermanentExternalError('Unexpected profile page structure');
    }
    return classification;
  }
  if (RETRYABLE_STATUS.has(statusCode)) {
    throw new TransientExternalError(`HTTP ${statusCode}`, statusCode);
  }
  if (statusCode === HttpStatus.NOT_FOUND) {
    throw new PermanentExternalError('Profile not found', statusCode);
  }
  throw new PermanentExternalError(`HTTP ${statusCode}`, statusCode);
}

export interface CheckWorkerContext {
  taskId: string;
  batchId: number;
  options: Pick<EffectiveOptions, 'maxRetriesPerUrl' | 'retryDelaySeconds'>;
  pool: IProxyPool;
  fetcher: IProfileFetcher;
  /** Task-wide spacing of outbound submissions. */
  throttle: SubmitThrottle;
  /** Batch-wide pause raised by rate-limit responses. */
  gate: BackoffGate;
  inFlight: InFlightCounter;
  rateLimitCooldownMs: number;
  signal: AbortSignal;
  random?: () => number;
}

/**
 * Performs one identifier's status check with retry, jittered backoff and
 * proxy rotation. Every per-identifier outcome, including proxy exhaustion
 * and task timeout, comes back as a CheckResult.
 */
export class CheckWorker {
  private readonly logger = new Logger(CheckWorker.name);

  constructor(private readonly ctx: CheckWorkerContext) {}

  async check(steamId: string): Promise<CheckResult> {
    const { options, pool, signal } = this.ctx;
    const maxAttempts = options.maxRetriesPerUrl + 1;
    const logPrefix = `[Task ${this.ctx.taskId} | Batch ${this.ctx.batchId}] ${steamId}`;

    let lastReason = 'No attempts made';
    let previousProxy: string | null = null;
    let route = DIRECT_ROUTE;
    let attempts = 0;

    const result = (statusSummary: StatusSummary, details: string): CheckResult => ({
      steamId,
      statusSummary,
      details,
      proxyUsed: route,
      batchId: this.ctx.batchId,
      attempts,
    });

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal.aborted) return result(StatusSummary.ERROR, TIMED_OUT_DETAILS);

      let lease: ProxyLease;
      try {
        await this.ctx.gate.wait(signal);
        await this.ctx.throttle.acquire(signal);
        lease = pool.acquire(previousProxy);
      } catch (error) {
        if (signal.aborted) return result(StatusSummary.ERROR, TIMED_OUT_DETAILS);
        if (error instanceof ProxyExhaustionError) {
          this.logger.warn(`${logPrefix} - ${error.message}`);
          return result(StatusSummary.ERROR, error.message);
        }
        throw error;
      }

      const proxyUri = lease.uri;
      route = lease.label;
      previousProxy = proxyUri;
      attempts = attempt;
      const startedAt = Date.now();

      try {
        const response = await this.ctx.inFlight.track(() =>
          this.ctx.fetcher.fetchProfile({
            taskId: this.ctx.taskId,
            steamId,
            proxyUri,
            signal,
          }),
        );
        const classification = interpretResponse(response);
        pool.recordSuccess(proxyUri, Date.now() - startedAt);
        this.logger.debug(`${logPrefix} - ${classification.statusSummary}`);
        return result(classification.statusSummary, classification.details);
      } catch (error) {
        if (signal.aborted) return result(StatusSummary.ERROR, TIMED_OUT_DETAILS);

        if (error instanceof PermanentExternalError) {
          // The route worked; the answer is simply not usable.
          pool.recordSuccess(proxyUri, Date.now() - startedAt);
          return result(StatusSummary.ERROR, error.message);
        }
        if (!(error instanceof TransientExternalError)) {
          this.logger.error(`${logPrefix} - Unexpected error: ${errorMessage(error)}`);
          return result(StatusSummary.ERROR, `Unexpected error: ${errorMessage(error)}`);
        }

        lastReason = error.message;
        pool.recordFailure(proxyUri, { rateLimited: error.rateLimited });
        if (error.rateLimited) {
          this.ctx.gate.trigger(this.ctx.rateLimitCooldownMs);
          this.logger.warn(
            `${logPrefix} - Rate limited via ${route}, pausing batch for ${this.ctx.rateLimitCooldownMs}ms`,
          );
        }
      }

      if (attempt < maxAttempts) {
        const delayMs = withJitter(options.retryDelaySeconds * 1000, this.ctx.random);
        this.logger.warn(
          `${logPrefix} - ${lastReason} (attempt ${attempt} of ${maxAttempts}), retrying in ${delayMs}ms`,
        );
        try {
          await sleep(delayMs, signal);
        } catch {
          return result(StatusSummary.ERROR, TIMED_OUT_DETAILS);
        }
      }
    }

    this.logger.warn(`${logPrefix} - Max retries reached. Final error: ${lastReason}`);
    return result(
      StatusSummary.ERROR,
      `Retries exhausted after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastReason}`,
    );
  }
}

import { HttpException, HttpStatus } from '@nestjs/common';
import type { BanCheckTask } from '../interfaces/task.interface';

/**
 * Failure of one external status call that is worth retrying:
 * timeouts, connection/proxy errors, HTTP 429 and 5xx.
 */
export class TransientExternalError extends Error {
  readonly name = 'TransientExternalError';

  constructor(
    message: string,
    readonly statusCode?: number,
  ) {
    super(message);
  }

  get rateLimited(): boolean {
    return this.statusCode === HttpStatus.TOO_MANY_REQUESTS;
  }
}

/** A response that will not change on retry (404, other 4xx, unknown page). */
export class PermanentExternalError extends Error {
  readonly name = 'PermanentExternalError';

  constructor(
    message: string,
    readonly statusCode?: number,
  ) {
    super(message);
  }
}

export class ProxyExhaustionError extends Error {
  readonly name = 'ProxyExhaustionError';

  constructor(message = 'No usable proxy available') {
    super(message);
  }
}

export class PersistenceError extends Error {
  readonly name = 'PersistenceError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A write lost to another writer that already made the stored task terminal. */
export class TaskClosedError extends Error {
  readonly name = 'TaskClosedError';

  constructor(readonly task: BanCheckTask) {
    super(`Task ${task.taskId} is already ${task.status}`);
  }
}

export class PollingRateLimitError extends HttpException {
  constructor(retryAfterSeconds: number) {
    super(
      {
        statusCode: HttpStatus.TOO_MANY_REQUESTS,
        message: 'Too many status requests, slow down polling',
        error: 'Too Many Requests',
        retryAfter: retryAfterSeconds,
      },
      HttpStatus.TOO_MANY_REQUESTS,
    );
  }
}

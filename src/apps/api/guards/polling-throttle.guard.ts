import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { ConfigService } from '@nestjs/config';
import { Cache } from 'cache-manager';
import { PollingRateLimitError } from '@/shared/ban-check/errors/ban-check.errors';
import { errorMessage } from '@/shared/lib/util';
import type { CallerRequest } from '../auth/entities/caller.entity';

/**
 * Fixed-window limit on status polls per caller per task.
 *
 * Key format: poll:{callerId}:{taskId}:{windowIndex}
 */
@Injectable()
export class PollingThrottleGuard implements CanActivate {
  private readonly logger = new Logger(PollingThrottleGuard.name);
  private readonly KEY_PREFIX = 'poll:';
  private readonly limit: number;
  private readonly windowMs: number;

  constructor(
    @Inject(CACHE_MANAGER) private readonly cache: Cache,
    private readonly configService: ConfigService,
  ) {
    this.limit = this.configService.get<number>('POLL_RATE_LIMIT') ?? 60;
    this.windowMs =
      this.configService.get<number>('POLL_RATE_WINDOW_MS') ?? 60_000;
  }

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<CallerRequest>();
    const callerId = request.caller?.id ?? 'anonymous';
    const taskId = request.params?.taskId ?? '';

    const now = Date.now();
    const windowIndex = Math.floor(now / this.windowMs);
    const key = `${this.KEY_PREFIX}${callerId}:${taskId}:${windowIndex}`;

    let count: number;
    try {
      count = (await this.cache.get<number>(key)) ?? 0;
      if (count < this.limit) {
        await this.cache.set(key, count + 1, this.windowMs);
      }
    } catch (error) {
      // Fail open: a cache outage must not block status reads
      this.logger.error(`Polling counter unavailable: ${errorMessage(error)}`);
      return true;
    }

    if (count >= this.limit) {
      const retryAfterSeconds = Math.ceil(
        ((windowIndex + 1) * this.windowMs - now) / 1000,
      );
      this.logger.warn(
        `Caller ${callerId} exceeded ${this.limit} polls for task ${taskId}`,
      );
      throw new PollingRateLimitError(retryAfterSeconds);
    }
    return true;
  }
}

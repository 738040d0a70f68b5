import { ArgumentsHost, Catch, HttpStatus, Logger } from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import { PersistenceError } from '@/shared/ban-check/errors/ban-check.errors';

/** Storage outages surface as 503 so callers retry instead of giving up. */
@Catch(PersistenceError)
export class PersistenceExceptionFilter extends BaseExceptionFilter {
  private readonly logger = new Logger(PersistenceExceptionFilter.name);

  catch(exception: PersistenceError, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<{ url?: string }>();

    this.logger.error(`Persistence error: ${exception.message}`);

    if (!this.applicationRef) {
      super.catch(exception, host);
      return;
    }

    const status = HttpStatus.SERVICE_UNAVAILABLE;
    this.applicationRef.reply(
      ctx.getResponse(),
      {
        statusCode: status,
        message: 'Task storage is temporarily unavailable',
        error: 'Service Unavailable',
        path: request.url,
        timestamp: new Date().toISOString(),
      },
      status,
    );
  }
}

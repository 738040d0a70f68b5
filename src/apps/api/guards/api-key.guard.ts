import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { CallerRequest } from '../auth/entities/caller.entity';

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Checks the shared API key and attaches the caller identity forwarded in
 * `x-owner-id` / `x-owner-role`.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly apiKey: string;

  constructor(private readonly configService: ConfigService) {
    this.apiKey = this.configService.get<string>('API_KEY') || '';
    if (!this.apiKey) {
      throw new Error('API_KEY must be configured');
    }
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<CallerRequest>();
    const providedKey = headerValue(request.headers['x-api-key']);

    if (!providedKey) {
      this.logger.warn('Missing API key in request');
      throw new UnauthorizedException('API key required');
    }

    if (providedKey !== this.apiKey) {
      this.logger.warn('Invalid API key provided');
      throw new UnauthorizedException('Invalid API key');
    }

    const ownerId = headerValue(request.headers['x-owner-id']);
    if (!ownerId) {
      throw new UnauthorizedException('Caller identity required');
    }
    const role = headerValue(request.headers['x-owner-role']);
    request.caller = { id: ownerId, role: role === 'admin' ? 'admin' : 'user' };

    return true;
  }
}

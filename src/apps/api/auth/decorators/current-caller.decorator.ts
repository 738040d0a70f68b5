import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import type { Caller, CallerRequest } from '../entities/caller.entity';

export const CurrentCaller = createParamDecorator(
  (data: unknown, ctx: ExecutionContext): Caller => {
    const request = ctx.switchToHttp().getRequest<CallerRequest>();
    if (!request.caller) {
      throw new UnauthorizedException('Caller identity required');
    }
    return request.caller;
  },
);

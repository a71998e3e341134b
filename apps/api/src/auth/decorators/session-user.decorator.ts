import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { User } from '@almanac/database';
import type { SessionRequest } from '../interfaces';

/**
 * Parameter decorator for the dashboard user resolved by SessionCookieGuard.
 * Yields null for anonymous visitors.
 */
export const SessionUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): User | null => {
    const request = ctx.switchToHttp().getRequest<SessionRequest>();
    return request.sessionUser ?? null;
  },
);

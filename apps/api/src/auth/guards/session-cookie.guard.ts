import {
  Injectable,
  CanActivate,
  ExecutionContext,
  Logger,
} from '@nestjs/common';
import type { User } from '@almanac/database';
import { AuthGateService } from '../auth-gate.service';
import { BEARER_PREFIX, SESSION_COOKIE_NAME } from '../auth.constants';
import { InvalidTokenException } from '../exceptions';
import type { SessionRequest } from '../interfaces';

/**
 * Read the raw token from the session cookie, stripping the `Bearer ` prefix.
 */
export function extractSessionToken(
  cookies: Record<string, unknown> | undefined,
): string | null {
  const value = cookies?.[SESSION_COOKIE_NAME];

  if (typeof value !== 'string') {
    return null;
  }

  const token = value.startsWith(BEARER_PREFIX)
    ? value.slice(BEARER_PREFIX.length)
    : value;

  return token.length > 0 ? token : null;
}

/**
 * Session Cookie Guard — resolves the dashboard user from the session cookie.
 *
 * Never blocks the request: an absent cookie or an invalid token leaves
 * `request.sessionUser` as null and the page handler redirects to the login
 * page. Only token rejections are downgraded; any other failure (e.g. the
 * database being unreachable) propagates.
 */
@Injectable()
export class SessionCookieGuard implements CanActivate {
  private readonly logger = new Logger(SessionCookieGuard.name);

  constructor(private readonly authGate: AuthGateService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<SessionRequest>();
    request.sessionUser = await this.resolveSessionUser(request);
    return true;
  }

  private async resolveSessionUser(
    request: SessionRequest,
  ): Promise<User | null> {
    const token = extractSessionToken(request.cookies);

    if (!token) {
      return null;
    }

    try {
      return await this.authGate.authenticate(token);
    } catch (error) {
      if (error instanceof InvalidTokenException) {
        this.logger.debug(`Session cookie rejected: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}

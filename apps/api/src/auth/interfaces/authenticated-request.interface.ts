import type { Request } from 'express';
import type { User } from '@almanac/database';

/**
 * Express Request after the bearer guard has run.
 * `user` is populated by JwtStrategy.validate() and attached by Passport.
 */
export interface AuthenticatedRequest extends Request {
  user: User;
}

/**
 * Express Request after SessionCookieGuard has run.
 * `sessionUser` is null for anonymous visitors.
 */
export interface SessionRequest extends Request {
  cookies: Record<string, unknown>;
  sessionUser?: User | null;
}

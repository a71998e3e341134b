import { Injectable } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { Strategy, ExtractJwt } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import type { User } from '@almanac/database';
import { AuthGateService } from '../auth-gate.service';
import { readJwtSecret } from '../auth.config';
import { TOKEN_ALGORITHM } from '../auth.constants';

/**
 * JWT Strategy — validates Bearer tokens on admin routes.
 *
 * Flow:
 * 1. Passport extracts the JWT from the Authorization header
 * 2. passport-jwt verifies signature and expiry with the signing secret
 * 3. validate() hands the claims to AuthGateService
 * 4. The returned User is attached to request.user
 *
 * Tokens are stateless, so the user is re-loaded on every request: a token
 * whose user was removed stops working immediately.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor(
    configService: ConfigService,
    private readonly authGate: AuthGateService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: readJwtSecret(configService),
      algorithms: [TOKEN_ALGORITHM],
    });
  }

  /**
   * Called after the JWT signature is verified.
   * Must return the user to attach to request.user, or throw to reject.
   */
  validate(payload: unknown): Promise<User> {
    return this.authGate.resolveClaims(payload);
  }
}

import { Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { DEFAULT_TOKEN_TTL_SECONDS } from './auth.constants';
import { InvalidTokenException } from './exceptions';
import type { TokenClaims } from './interfaces';

/**
 * Extract the subject from decoded claims.
 *
 * @throws InvalidTokenException if `sub` is missing, empty or not a string
 */
export function readSubject(claims: unknown): string {
  const subject =
    typeof claims === 'object' && claims !== null && 'sub' in claims
      ? claims.sub
      : undefined;

  if (typeof subject !== 'string' || subject.length === 0) {
    throw new InvalidTokenException('Token subject is missing');
  }

  return subject;
}

/**
 * TokenService — issues and validates signed, time-limited identity tokens.
 *
 * Tokens are self-contained JWTs; nothing is stored server-side, so an
 * expired token simply stops validating and the caller logs in again.
 */
@Injectable()
export class TokenService {
  constructor(private readonly jwtService: JwtService) {}

  /**
   * Sign a token for `subject` that expires `ttlSeconds` from now.
   */
  issue(
    subject: string,
    ttlSeconds: number = DEFAULT_TOKEN_TTL_SECONDS,
  ): Promise<string> {
    const claims: TokenClaims = { sub: subject };
    return this.jwtService.signAsync(claims, { expiresIn: ttlSeconds });
  }

  /**
   * Verify signature and expiry, then return the subject.
   *
   * @throws InvalidTokenException on any verification failure
   */
  async validate(token: string): Promise<string> {
    let claims: TokenClaims;

    try {
      claims = await this.jwtService.verifyAsync<TokenClaims>(token);
    } catch (error) {
      const reason = describeTokenError(error);

      if (reason) {
        throw new InvalidTokenException(reason);
      }
      throw error;
    }

    return readSubject(claims);
  }
}

/** Error names raised by the JWT verifier for a rejected token */
const TOKEN_ERROR_NAMES: ReadonlySet<string> = new Set([
  'JsonWebTokenError',
  'TokenExpiredError',
  'NotBeforeError',
]);

/**
 * Map a verifier failure to a client-facing reason, or null when the error
 * is not a token rejection. Matched by name: @nestjs/jwt may load its own
 * copy of jsonwebtoken, so class identity cannot be relied on.
 */
function describeTokenError(error: unknown): string | null {
  const name =
    typeof error === 'object' && error !== null && 'name' in error
      ? error.name
      : undefined;

  if (typeof name !== 'string' || !TOKEN_ERROR_NAMES.has(name)) {
    return null;
  }

  if (name === 'TokenExpiredError') {
    return 'Authentication token has expired';
  }

  return 'Invalid authentication token';
}

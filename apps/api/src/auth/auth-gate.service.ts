import { Injectable, Logger } from '@nestjs/common';
import type { User } from '@almanac/database';
import { UsersService } from '../users/users.service';
import { TokenService, readSubject } from './token.service';
import { InvalidTokenException } from './exceptions';

/**
 * AuthGateService — turns a token into the User it identifies.
 *
 * Shared by both transports:
 * - the bearer strategy (admin API) calls resolveClaims() after Passport
 *   has verified the Authorization header token
 * - the session cookie guard (dashboard) calls authenticate() with the
 *   raw cookie token
 *
 * Both reject tokens whose subject no longer exists. The callers decide how
 * a rejection is surfaced (401 vs anonymous).
 */
@Injectable()
export class AuthGateService {
  private readonly logger = new Logger(AuthGateService.name);

  constructor(
    private readonly tokenService: TokenService,
    private readonly usersService: UsersService,
  ) {}

  /**
   * @throws InvalidTokenException if the token or its subject is invalid
   */
  async authenticate(token: string): Promise<User> {
    const subject = await this.tokenService.validate(token);
    return this.resolveSubject(subject);
  }

  /**
   * @throws InvalidTokenException if the claims carry no usable subject
   */
  resolveClaims(claims: unknown): Promise<User> {
    return this.resolveSubject(readSubject(claims));
  }

  private async resolveSubject(username: string): Promise<User> {
    const user = await this.usersService.findByUsername(username);

    if (!user) {
      this.logger.warn(`Token rejected: user ${username} not found`);
      throw new InvalidTokenException('User no longer exists');
    }

    return user;
  }
}

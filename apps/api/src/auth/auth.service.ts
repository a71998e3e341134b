import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { User } from '@almanac/database';
import { UsersService } from '../users/users.service';
import { PasswordHasherService } from '../users/password-hasher.service';
import { TokenService } from './token.service';
import { DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES } from './auth.constants';
import { TokenResponseDto } from './dto';

/**
 * AuthService — credential checks and token issuance.
 *
 * Responsibilities:
 * - Username/password verification via bcrypt
 * - API access tokens (POST /token, 30 minutes by default)
 * - Dashboard session tokens (TokenService default lifetime)
 *
 * Security considerations:
 * - An unknown username still pays for one hash, so response time does not
 *   reveal which usernames exist
 * - Password hashes never leave this service
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private readonly accessTokenTtlSeconds: number;

  constructor(
    private readonly usersService: UsersService,
    private readonly passwordHasher: PasswordHasherService,
    private readonly tokenService: TokenService,
    configService: ConfigService,
  ) {
    const minutes = parseInt(
      configService.get<string>(
        'ACCESS_TOKEN_EXPIRE_MINUTES',
        String(DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES),
      ),
      10,
    );
    this.accessTokenTtlSeconds =
      (Number.isInteger(minutes) && minutes > 0
        ? minutes
        : DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES) * 60;
  }

  /**
   * Return the user when the password matches, null otherwise.
   */
  async verifyCredentials(
    username: string,
    password: string,
  ): Promise<User | null> {
    const user = await this.usersService.findByUsername(username);

    if (!user) {
      await this.passwordHasher.hash(password);
      this.logger.debug(`Login failed: unknown user ${username}`);
      return null;
    }

    const isPasswordValid = await this.passwordHasher.verify(
      password,
      user.passwordHash,
    );

    if (!isPasswordValid) {
      this.logger.debug(`Login failed: wrong password for ${username}`);
      return null;
    }

    return user;
  }

  /**
   * Issue an API access token wrapped in the OAuth2 response shape.
   */
  async issueAccessToken(user: User): Promise<TokenResponseDto> {
    const accessToken = await this.tokenService.issue(
      user.username,
      this.accessTokenTtlSeconds,
    );

    this.logger.log(`Access token issued for ${user.username}`);

    return new TokenResponseDto(accessToken);
  }

  /**
   * Issue a dashboard session token with the default lifetime.
   */
  async issueSessionToken(user: User): Promise<string> {
    const token = await this.tokenService.issue(user.username);

    this.logger.log(`Dashboard session started for ${user.username}`);

    return token;
  }
}

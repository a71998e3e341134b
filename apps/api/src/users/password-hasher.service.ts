import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';

/** bcrypt cost factor when BCRYPT_SALT_ROUNDS is unset */
const DEFAULT_BCRYPT_SALT_ROUNDS = 12;

/**
 * PasswordHasherService — one-way password hashing and verification.
 *
 * Every hash embeds its own random salt and cost factor, so hashing the same
 * password twice yields two different strings that both verify.
 */
@Injectable()
export class PasswordHasherService {
  private readonly logger = new Logger(PasswordHasherService.name);
  private readonly saltRounds: number;

  constructor(configService: ConfigService) {
    const configured = parseInt(
      configService.get<string>(
        'BCRYPT_SALT_ROUNDS',
        String(DEFAULT_BCRYPT_SALT_ROUNDS),
      ),
      10,
    );
    this.saltRounds = Number.isInteger(configured)
      ? configured
      : DEFAULT_BCRYPT_SALT_ROUNDS;
  }

  hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.saltRounds);
  }

  /**
   * Compare a plaintext password against a stored hash.
   * A malformed hash verifies as false instead of throwing.
   */
  async verify(plain: string, passwordHash: string): Promise<boolean> {
    try {
      return await bcrypt.compare(plain, passwordHash);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(`Password verification failed: ${cause.message}`);
      return false;
    }
  }
}

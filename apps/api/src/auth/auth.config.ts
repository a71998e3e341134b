import { ConfigService } from '@nestjs/config';

/**
 * Read the token signing secret.
 *
 * The secret is loaded once per process; changing it invalidates every
 * outstanding token.
 */
export function readJwtSecret(configService: ConfigService): string {
  const secret = configService.get<string>('JWT_SECRET');

  if (!secret) {
    throw new Error(
      'JWT_SECRET is not defined in environment variables. ' +
        'The application cannot start without a token signing secret.',
    );
  }

  return secret;
}

import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown when a token cannot be turned into a user: bad signature,
 * malformed structure, missing subject, expiry in the past, or a subject
 * that no longer exists.
 *
 * The dashboard treats this exception as "anonymous"; the admin API
 * surfaces it as 401.
 */
export class InvalidTokenException extends UnauthorizedException {
  constructor(reason: string) {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: reason,
    });
  }
}

import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown when login credentials are invalid (wrong username or password).
 *
 * HTTP 401 Unauthorized. The message does not say which of the two was wrong.
 */
export class InvalidCredentialsException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Incorrect username or password',
    });
  }
}

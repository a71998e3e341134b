import { ConflictException } from '@nestjs/common';

/**
 * Thrown when attempting to create a user with a username
 * that already exists in the database.
 *
 * HTTP 409 Conflict.
 */
export class UsernameTakenException extends ConflictException {
  constructor(username: string) {
    super({
      statusCode: 409,
      error: 'Conflict',
      message: `User "${username}" already exists`,
    });
  }
}

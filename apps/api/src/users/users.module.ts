import { Module } from '@nestjs/common';
import { DatabaseModule } from '@almanac/database';
import { UsersService } from './users.service';
import { PasswordHasherService } from './password-hasher.service';

/**
 * UsersModule — user accounts and password hashing.
 *
 * Exported to AuthModule (credential checks, token subjects) and to the
 * bootstrap and CLI code that provisions the admin account.
 */
@Module({
  imports: [DatabaseModule.forFeature()],
  providers: [UsersService, PasswordHasherService],
  exports: [UsersService, PasswordHasherService],
})
export class UsersModule {}

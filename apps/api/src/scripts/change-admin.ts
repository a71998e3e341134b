import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { UsersService } from '../users/users.service';
import { AdminCliModule } from './admin-cli.module';

/**
 * Set the password of a dashboard/API user, creating the user if needed.
 *
 * Usage:
 *   npm run change-admin -- <username> <password>
 */
async function main(argv: string[]): Promise<void> {
  const logger = new Logger('ChangeAdmin');
  const [username, password] = argv;

  if (!username || !password) {
    logger.error('Usage: npm run change-admin -- <username> <password>');
    process.exitCode = 1;
    return;
  }

  const app = await NestFactory.createApplicationContext(AdminCliModule, {
    logger: ['log', 'error', 'warn'],
  });

  try {
    const { created } = await app.get(UsersService).setPassword(
      username,
      password,
    );
    logger.log(
      created
        ? `User "${username}" created`
        : `Password changed for "${username}"`,
    );
  } finally {
    await app.close();
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  new Logger('ChangeAdmin').error(
    'Failed to change admin credentials',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});

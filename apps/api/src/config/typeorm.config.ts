import { ConfigService } from '@nestjs/config';
import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { createDataSourceOptions } from '@almanac/database';

const DEFAULT_DATABASE_PATH = 'almanac.db';

/**
 * TypeORM options for AppModule, resolved from the environment.
 *
 * DATABASE_URL selects PostgreSQL; without it the API runs on the SQLite
 * file at DATABASE_PATH, synchronized unless DATABASE_SYNCHRONIZE=false.
 */
export function createTypeOrmOptions(
  configService: ConfigService,
): TypeOrmModuleOptions {
  return createDataSourceOptions({
    url: configService.get<string>('DATABASE_URL') || undefined,
    path: configService.get<string>('DATABASE_PATH', DEFAULT_DATABASE_PATH),
    synchronize:
      configService.get<string>('DATABASE_SYNCHRONIZE', 'true') !== 'false',
    logging: configService.get<string>('NODE_ENV') === 'development',
  });
}

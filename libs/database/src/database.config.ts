import type { DataSourceOptions } from 'typeorm';
import { ENTITIES } from './database.module';
import { InitialSchema1760000000000 } from './migrations/1760000000000-InitialSchema';

/**
 * Connection settings resolved from the environment by the host application.
 */
export interface DatabaseSettings {
  /** PostgreSQL connection URL. When absent, SQLite is used. */
  url?: string;
  /** SQLite file path (or `:memory:`), used only without a URL. */
  path: string;
  /** Create/alter the SQLite schema from the entities on startup. */
  synchronize: boolean;
  logging: boolean;
}

/**
 * Builds TypeORM DataSource options.
 *
 * PostgreSQL runs the hand-written migrations on startup and never
 * synchronizes. SQLite (better-sqlite3) is meant for local runs and tests;
 * TypeORM enables `PRAGMA foreign_keys` on it, so ON DELETE CASCADE holds
 * for both drivers.
 */
export function createDataSourceOptions(
  settings: DatabaseSettings,
): DataSourceOptions {
  if (settings.url) {
    return {
      type: 'postgres',
      url: settings.url,
      entities: [...ENTITIES],
      migrations: [InitialSchema1760000000000],
      migrationsRun: true,
      synchronize: false,
      logging: settings.logging,
    };
  }

  return {
    type: 'better-sqlite3',
    database: settings.path,
    entities: [...ENTITIES],
    synchronize: settings.synchronize,
    logging: settings.logging,
  };
}

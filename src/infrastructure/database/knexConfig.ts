/**
 * Knex configuration per storage backend
 * Layer: Infrastructure
 *
 * Shared by the runtime pool (connection.ts), the knexfile (CLI migrations)
 * and the seed script, so all three always talk to the same database.
 *
 * SQLite is pinned to a single pooled connection: a `:memory:` database lives
 * inside one connection, and a file database gains nothing from more since
 * SQLite serialises writers anyway. Every SQLite connection gets the user
 * functions from sqliteFunctions.ts before it is handed out.
 */
import path from 'node:path';

import { config, type DatabaseClient } from '@core/config';
import type Database from 'better-sqlite3';
import type { Knex } from 'knex';

import { registerSqliteFunctions } from './sqliteFunctions';

export const MIGRATIONS_DIRECTORY = path.join(__dirname, 'migrations');

export function buildKnexConfig(client: DatabaseClient = config.database.client): Knex.Config {
  const migrations: Knex.MigratorConfig = {
    directory: MIGRATIONS_DIRECTORY,
    extension: 'ts',
    loadExtensions: ['.ts', '.js'],
  };

  if (client === 'sqlite') {
    return {
      client: 'better-sqlite3',
      connection: { filename: config.database.sqliteFilename },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
        afterCreate: (
          conn: Database.Database,
          done: (err: Error | null, conn: Database.Database) => void,
        ) => {
          registerSqliteFunctions(conn);
          done(null, conn);
        },
      },
      migrations,
    };
  }

  return {
    client: 'pg',
    connection: {
      connectionString: config.database.url,
      ssl: config.database.ssl ? { rejectUnauthorized: false } : false,
    },
    pool: {
      min: config.database.pool.min,
      max: config.database.pool.max,
    },
    acquireConnectionTimeout: 10000,
    migrations,
  };
}

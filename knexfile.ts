/**
 * Knex Configuration (knexfile.ts)
 *
 * Used by the Knex CLI (`npm run migrate`, `npm run migrate:rollback`), which
 * runs under tsx so the .ts migrations load directly. Settings come from
 * src/core/config.ts through buildKnexConfig(), so DB_CLIENT picks SQLite or
 * PostgreSQL here exactly as it does for the running server.
 */
import type { Knex } from 'knex';

import { buildKnexConfig } from './src/infrastructure/database/knexConfig';

const knexConfig: Record<string, Knex.Config> = {
  development: buildKnexConfig(),
  test: buildKnexConfig(),
  production: buildKnexConfig(),
};

export default knexConfig;

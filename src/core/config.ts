/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * All settings (port, storage backend, pool sizes, search defaults) are read
 * here and nowhere else; every other module imports `config`.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * (e.g. "5432" → 5432) at startup. Anything missing or invalid stops the
 * process immediately. The result is a nested `config` object exported
 * `as const`.
 *
 * DB_CLIENT is the one switch that decides which geo strategy the container
 * binds: `sqlite` → naive (bounding box + haversine in memory), `postgres` →
 * native (PostGIS ST_DWithin). It is read once at boot.
 */
import 'dotenv/config';

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  /** Storage backend. Also selects the geo query strategy. */
  DB_CLIENT: z.enum(['sqlite', 'postgres']).default('sqlite'),
  /** Full PostgreSQL connection URL, used when DB_CLIENT=postgres. */
  DATABASE_URL: z.string().min(1).default('postgres://postgres:@localhost:5432/geopost'),
  DB_SSL: booleanFlag,
  /** SQLite database file, used when DB_CLIENT=sqlite. ':memory:' is accepted. */
  SQLITE_FILENAME: z.string().min(1).default('./data/posts.db'),

  DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
  /** Upper bound for a single storage query; PostgreSQL queries are cancelled server-side. */
  DB_QUERY_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),

  WEB_CONCURRENCY: z.coerce.number().default(0),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  /** Radius used when a coordinate search omits `radius`. */
  SEARCH_DEFAULT_RADIUS_KM: z.coerce.number().positive().default(10),
  /** Rows pulled per storage round-trip when a text post-filter has to see a whole result set. */
  SEARCH_BATCH_SIZE: z.coerce.number().int().min(100).max(50_000).default(1000),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export type DatabaseClient = (typeof env)['DB_CLIENT'];

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  database: {
    client: env.DB_CLIENT,
    url: env.DATABASE_URL,
    ssl: env.DB_SSL,
    sqliteFilename: env.SQLITE_FILENAME,
    pool: {
      min: env.DB_POOL_MIN,
      max: env.DB_POOL_MAX,
    },
    queryTimeoutMs: env.DB_QUERY_TIMEOUT_MS,
  },

  cluster: {
    workers: env.WEB_CONCURRENCY,
  },

  log: {
    level: env.LOG_LEVEL,
  },

  search: {
    defaultRadiusKm: env.SEARCH_DEFAULT_RADIUS_KM,
    batchSize: env.SEARCH_BATCH_SIZE,
  },
} as const;

/**
 * In-memory test databases
 * Layer: Test Helpers
 *
 * `createTestDb()` returns a knex instance on a private `:memory:` SQLite
 * database with migration 001 applied and the production SQLite functions
 * (fold_case) registered. Each call is a separate database, so test files
 * never see each other's rows.
 *
 * With `{ postgis: true }` the handful of PostGIS functions the native geo
 * strategy calls are registered as SQLite user functions on PostGIS's own
 * sphere (R = 6371008.7714 m, the WGS84 mean radius):
 *
 *   ST_MakePoint(x, y)          → 'x y' (longitude first, as in PostGIS)
 *   ST_SetSRID(p, srid)         → p
 *   geography(p)                → p
 *   ST_Distance(a, b, sph)      → metres
 *   ST_DWithin(a, b, m, sph)    → 1 when ST_Distance(a, b) <= m
 *
 * That is enough to run NativeGeoQueryStrategy's real SQL (filter, ordering,
 * tie-break, LIMIT/OFFSET) without a PostgreSQL server.
 */
import { distanceKm, EARTH_RADIUS_KM } from '@domain/geo/geoMath';
import type { NewPost } from '@domain/entities/Post';
import { up as createPostsTable } from '@infrastructure/database/migrations/001_create_posts';
import { registerSqliteFunctions } from '@infrastructure/database/sqliteFunctions';
import { POSTGIS_SPHERE_RADIUS_M } from '@infrastructure/geo/NativeGeoQueryStrategy';
import { toRow } from '@infrastructure/repositories/postRowMapper';
import { POSTS_TABLE } from '@shared/constants';
import type Database from 'better-sqlite3';
import knex, { Knex } from 'knex';

function parsePoint(value: unknown): { lat: number; lng: number } {
  const [x, y] = String(value).split(' ').map(Number);
  return { lat: y, lng: x };
}

/** Same central angle as geoMath, measured on the larger PostGIS sphere. */
function sphericalDistanceMeters(a: unknown, b: unknown): number {
  const p = parsePoint(a);
  const q = parsePoint(b);
  return distanceKm(p.lat, p.lng, q.lat, q.lng) * (POSTGIS_SPHERE_RADIUS_M / EARTH_RADIUS_KM);
}

function registerPostgisFunctions(conn: Database.Database): void {
  const deterministic = { deterministic: true };
  conn.function('ST_MakePoint', deterministic, (x: unknown, y: unknown) => `${Number(x)} ${Number(y)}`);
  // better-sqlite3 takes each function's arity from its parameter list.
  conn.function('ST_SetSRID', deterministic, (point: unknown, _srid: unknown) => String(point));
  conn.function('geography', deterministic, (point: unknown) => String(point));
  conn.function('ST_Distance', deterministic, (a: unknown, b: unknown, _useSpheroid: unknown) =>
    sphericalDistanceMeters(a, b),
  );
  conn.function(
    'ST_DWithin',
    deterministic,
    (a: unknown, b: unknown, meters: unknown, _useSpheroid: unknown) =>
      sphericalDistanceMeters(a, b) <= Number(meters) ? 1 : 0,
  );
}

export async function createTestDb(options: { postgis?: boolean } = {}): Promise<Knex> {
  const db = knex({
    client: 'better-sqlite3',
    connection: { filename: ':memory:' },
    useNullAsDefault: true,
    pool: {
      min: 1,
      max: 1,
      afterCreate: (
        conn: Database.Database,
        done: (err: Error | null, conn: Database.Database) => void,
      ) => {
        registerSqliteFunctions(conn);
        if (options.postgis) registerPostgisFunctions(conn);
        done(null, conn);
      },
    },
  });

  await createPostsTable(db);
  return db;
}

/** Inserts rows directly, bypassing the repository under test. */
export async function insertPosts(db: Knex, posts: NewPost[]): Promise<void> {
  if (posts.length === 0) return;
  await db(POSTS_TABLE).insert(posts.map((post) => toRow(post)));
}

/**
 * Migration 002 — PostGIS Spatial Index
 * Layer: Infrastructure (Database)
 *
 * PostgreSQL only; a no-op on SQLite, which has no spatial index and is served
 * by the naive geo strategy instead.
 *
 * The GiST index is built on the exact expression the native geo strategy
 * filters and orders by:
 *
 *   geography(ST_SetSRID(ST_MakePoint(longitude, latitude), 4326))
 *
 * PostgreSQL only uses an expression index when the query repeats the
 * expression verbatim, so NativeGeoQueryStrategy.ROW_GEOGRAPHY must stay in
 * sync with this migration. Using `geography` (not `geometry`) makes
 * ST_DWithin take its distance in metres instead of degrees.
 */
import { config } from '@core/config';
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  if (config.database.client !== 'postgres') return;

  await knex.raw('CREATE EXTENSION IF NOT EXISTS postgis');
  await knex.raw(`
    CREATE INDEX IF NOT EXISTS idx_posts_location
    ON posts USING GIST (geography(ST_SetSRID(ST_MakePoint(longitude, latitude), 4326)))
  `);
}

export async function down(knex: Knex): Promise<void> {
  if (config.database.client !== 'postgres') return;

  await knex.raw('DROP INDEX IF EXISTS idx_posts_location');
}

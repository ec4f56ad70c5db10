/**
 * Migration 001 — Create the `posts` Table
 * Layer: Infrastructure (Database)
 *
 * Runs unchanged on SQLite and PostgreSQL.
 *
 *   - `latitude`/`longitude` are nullable doubles that are set or cleared
 *     together. PostgreSQL enforces that (and the ranges) with CHECK
 *     constraints; on SQLite the writer is the only guard, since knex cannot
 *     add table constraints there after the fact.
 *   - `idx_posts_city` backs exact city lookups.
 *   - `idx_posts_lat_lng` is the composite index the naive geo strategy's
 *     bounding-box prefilter (`latitude BETWEEN .. AND longitude BETWEEN ..`)
 *     ranges over. The PostGIS index lives in migration 002.
 *   - `idx_posts_created_at` serves the default most-recent-first ordering.
 */
import { config } from '@core/config';
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('posts', (table) => {
    table.string('id', 36).primary();
    table.string('user_id', 128).notNullable();
    table.text('content').notNullable();
    table.text('image_url');
    table.string('city', 200);
    table.double('latitude');
    table.double('longitude');
    table.jsonb('metadata');
    table.timestamp('created_at').notNullable();
    table.timestamp('updated_at').notNullable();

    table.index('user_id', 'idx_posts_user_id');
    table.index('city', 'idx_posts_city');
    table.index(['latitude', 'longitude'], 'idx_posts_lat_lng');
    table.index('created_at', 'idx_posts_created_at');
  });

  if (config.database.client === 'postgres') {
    await knex.raw(`
      ALTER TABLE posts
        ADD CONSTRAINT chk_posts_coordinates_paired
          CHECK ((latitude IS NULL) = (longitude IS NULL)),
        ADD CONSTRAINT chk_posts_latitude_range
          CHECK (latitude IS NULL OR latitude BETWEEN -90 AND 90),
        ADD CONSTRAINT chk_posts_longitude_range
          CHECK (longitude IS NULL OR longitude BETWEEN -180 AND 180)
    `);
  }
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('posts');
}

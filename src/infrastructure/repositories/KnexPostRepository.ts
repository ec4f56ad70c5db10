/**
 * Knex Post Repository — storage adapter for SQLite and PostgreSQL
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements IPostRepository, IPostWriter)
 *
 * City and text lookups are plain SQL that both dialects share; only the
 * case-insensitive match differs. PostgreSQL uses ILIKE. SQLite's LIKE
 * ignores ASCII case only, so there the content goes through `fold_case`
 * and the needle is lower-cased before the pattern is built.
 *
 * `findNearby` is delegated to the geo strategy injected at construction:
 * naive for SQLite, native for PostGIS. The repository never branches on which one it got.
 *
 * @injectable so tsyringe injects Knex, Logger and the bound geo strategy.
 */
import { config } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { NewPost, Post } from '@domain/entities/Post';
import type { IGeoQueryStrategy } from '@domain/interfaces/IGeoQueryStrategy';
import type { IPostRepository } from '@domain/interfaces/IPostRepository';
import type { IPostWriter } from '@domain/interfaces/IPostWriter';
import { guardStorage, QUERY_TIMEOUT } from '@infrastructure/database/queryGuard';
import { FOLD_CASE_FUNCTION } from '@infrastructure/database/sqliteFunctions';
import { POSTS_TABLE } from '@shared/constants';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

import { toPost, toRow } from './postRowMapper';

/** Rows per INSERT statement; keeps SQLite under its bound-parameter limit. */
const INSERT_CHUNK_SIZE = 200;

@injectable()
export class KnexPostRepository implements IPostRepository, IPostWriter {
  private readonly textMatch =
    config.database.client === 'postgres'
      ? `content ILIKE ? ESCAPE '\\'`
      : `${FOLD_CASE_FUNCTION}(content) LIKE ? ESCAPE '\\'`;

  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
    @inject(TOKENS.GeoQueryStrategy) private geo: IGeoQueryStrategy,
  ) {}

  listByCity(city: string, limit: number, offset: number): Promise<Post[]> {
    return guardStorage('listByCity', this.log, async () => {
      const rows: unknown[] = await this.db(POSTS_TABLE)
        .select('*')
        .where('city', city)
        .orderBy('created_at', 'desc')
        .orderBy('id', 'asc')
        .limit(limit)
        .offset(offset)
        .timeout(QUERY_TIMEOUT.ms, QUERY_TIMEOUT.options);
      return rows.map(toPost);
    });
  }

  findNearby(
    lat: number,
    lng: number,
    radiusKm: number,
    limit: number,
    offset: number,
  ): Promise<Post[]> {
    return this.geo.findNearby({ latitude: lat, longitude: lng, radiusKm, limit, offset });
  }

  searchByText(query: string, limit: number, offset: number): Promise<Post[]> {
    const pattern = `%${escapeLike(query.toLowerCase())}%`;
    return guardStorage('searchByText', this.log, async () => {
      const rows: unknown[] = await this.db(POSTS_TABLE)
        .select('*')
        .whereRaw(this.textMatch, [pattern])
        .orderBy('created_at', 'desc')
        .orderBy('id', 'asc')
        .limit(limit)
        .offset(offset)
        .timeout(QUERY_TIMEOUT.ms, QUERY_TIMEOUT.options);
      return rows.map(toPost);
    });
  }

  ping(): Promise<number> {
    return guardStorage('ping', this.log, async () => {
      const startMs = Date.now();
      await this.db
        .select(this.db.raw('1 AS ok'))
        .timeout(QUERY_TIMEOUT.ms, QUERY_TIMEOUT.options);
      return Date.now() - startMs;
    });
  }

  async insertMany(posts: NewPost[]): Promise<number> {
    if (posts.length === 0) return 0;

    // Validation happens before the transaction opens, so a bad row inserts nothing.
    const rows = posts.map((post) => toRow(post));

    await guardStorage('insertMany', this.log, () =>
      this.db.transaction(async (trx) => {
        for (let i = 0; i < rows.length; i += INSERT_CHUNK_SIZE) {
          await trx(POSTS_TABLE).insert(rows.slice(i, i + INSERT_CHUNK_SIZE));
        }
      }),
    );

    this.log.debug({ count: rows.length }, 'insertMany complete');
    return rows.length;
  }
}

/** Escape %, _ and the escape character itself for use inside LIKE/ILIKE. */
export function escapeLike(term: string): string {
  return term.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}

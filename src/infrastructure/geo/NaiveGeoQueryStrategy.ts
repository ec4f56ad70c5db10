/**
 * Naive Geo Query Strategy — bounding box + haversine in memory
 * Layer: Infrastructure
 * Pattern: Strategy Pattern (implements IGeoQueryStrategy)
 *
 * For stores without a spatial index (SQLite). Four steps:
 *
 *   1. estimateBoundingBox() → one indexed range scan over (latitude,
 *      longitude), ordered created_at DESC, id ASC so the candidate list is
 *      deterministic.
 *   2. Exact haversine distance per candidate; keep distance <= radius.
 *   3. Stable sort nearest-first (equal distances keep step-1 order, which is
 *      the same tie-break the native strategy applies in SQL).
 *   4. Slice [offset, offset + limit) out of the filtered list.
 *
 * Pagination cannot be pushed into SQL here: the box over-selects, so row N
 * of the scan is not post N of the result.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { Post } from '@domain/entities/Post';
import { type BoundingBox, crossesAntimeridian, distanceKm, estimateBoundingBox } from '@domain/geo/geoMath';
import type { IGeoQueryStrategy, NearbyQuery } from '@domain/interfaces/IGeoQueryStrategy';
import { guardStorage, QUERY_TIMEOUT } from '@infrastructure/database/queryGuard';
import { toPost } from '@infrastructure/repositories/postRowMapper';
import { POSTS_TABLE } from '@shared/constants';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

interface RankedPost {
  post: Post;
  distanceKm: number;
}

@injectable()
export class NaiveGeoQueryStrategy implements IGeoQueryStrategy {
  readonly name = 'naive' as const;

  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async findNearby(query: NearbyQuery): Promise<Post[]> {
    const box = estimateBoundingBox(query.latitude, query.longitude, query.radiusKm);
    const candidates = await this.fetchCandidates(box);
    const ranked = rankByDistance(candidates, query);

    this.log.debug(
      {
        strategy: this.name,
        radiusKm: query.radiusKm,
        candidates: candidates.length,
        matched: ranked.length,
      },
      'Naive nearby search',
    );

    return paginate(ranked, query.limit, query.offset).map((r) => r.post);
  }

  /** Posts with a coordinate inside the box, newest first. */
  private fetchCandidates(box: BoundingBox): Promise<Post[]> {
    return guardStorage('findNearby', this.log, async () => {
      const qb = this.db(POSTS_TABLE)
        .select('*')
        .whereNotNull('latitude')
        .whereNotNull('longitude')
        .whereBetween('latitude', [box.latMin, box.latMax]);

      if (crossesAntimeridian(box)) {
        qb.where((w) => {
          w.where('longitude', '>=', box.lngMin).orWhere('longitude', '<=', box.lngMax);
        });
      } else {
        qb.whereBetween('longitude', [box.lngMin, box.lngMax]);
      }

      const rows: unknown[] = await qb
        .orderBy('created_at', 'desc')
        .orderBy('id', 'asc')
        .timeout(QUERY_TIMEOUT.ms, QUERY_TIMEOUT.options);
      return rows.map(toPost);
    });
  }
}

/** Exact filter + nearest-first stable sort. Posts without a location are dropped. */
export function rankByDistance(candidates: Post[], query: NearbyQuery): RankedPost[] {
  const ranked: RankedPost[] = [];
  for (const post of candidates) {
    if (!post.location) continue;
    const d = distanceKm(
      query.latitude,
      query.longitude,
      post.location.latitude,
      post.location.longitude,
    );
    if (d <= query.radiusKm) ranked.push({ post, distanceKm: d });
  }
  return ranked.sort((a, b) => a.distanceKm - b.distanceKm);
}

export function paginate<T>(items: T[], limit: number, offset: number): T[] {
  if (offset >= items.length) return [];
  return items.slice(offset, Math.min(offset + limit, items.length));
}

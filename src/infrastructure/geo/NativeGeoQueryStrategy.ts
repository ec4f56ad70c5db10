/**
 * Native Geo Query Strategy — PostGIS
 * Layer: Infrastructure
 * Pattern: Strategy Pattern (implements IGeoQueryStrategy)
 *
 * Radius filter, distance ordering and LIMIT/OFFSET all run in PostgreSQL:
 *
 *   ST_DWithin(row, centre, metres, false)   — uses idx_posts_location
 *   ORDER BY ST_Distance(row, centre, false), created_at DESC, id ASC
 *
 * `use_spheroid = false` keeps PostGIS on a sphere, the same model as the
 * haversine in geoMath, and the created_at/id tie-break matches the naive
 * strategy's candidate order. PostGIS's sphere is slightly larger than
 * geoMath's 6371 km, so the radius is converted to metres on that sphere:
 * the same central angle, and a post exactly `radiusKm` away by haversine
 * stays inside here too.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { Post } from '@domain/entities/Post';
import { EARTH_RADIUS_KM } from '@domain/geo/geoMath';
import type { IGeoQueryStrategy, NearbyQuery } from '@domain/interfaces/IGeoQueryStrategy';
import { guardStorage, QUERY_TIMEOUT } from '@infrastructure/database/queryGuard';
import { toPost } from '@infrastructure/repositories/postRowMapper';
import { POSTS_TABLE } from '@shared/constants';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

/** Must match the expression indexed in migration 002. */
export const ROW_GEOGRAPHY = 'geography(ST_SetSRID(ST_MakePoint(longitude, latitude), 4326))';
/** Bindings: longitude, latitude (x before y). */
export const CENTRE_GEOGRAPHY = 'geography(ST_SetSRID(ST_MakePoint(?, ?), 4326))';

/** Radius PostGIS uses when `use_spheroid = false`: WGS84 (2a + b) / 3. */
export const POSTGIS_SPHERE_RADIUS_M = 6371008.7714;

/** Metres on the PostGIS sphere per geoMath kilometre. */
const METRES_PER_KM = POSTGIS_SPHERE_RADIUS_M / EARTH_RADIUS_KM;

@injectable()
export class NativeGeoQueryStrategy implements IGeoQueryStrategy {
  readonly name = 'native' as const;

  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async findNearby(query: NearbyQuery): Promise<Post[]> {
    const posts = await guardStorage('findNearby', this.log, async () => {
      const rows: unknown[] = await this.buildQuery(query).timeout(
        QUERY_TIMEOUT.ms,
        QUERY_TIMEOUT.options,
      );
      return rows.map(toPost);
    });

    this.log.debug(
      { strategy: this.name, radiusKm: query.radiusKm, returned: posts.length },
      'Native nearby search',
    );
    return posts;
  }

  buildQuery(query: NearbyQuery): Knex.QueryBuilder {
    const radiusMeters = query.radiusKm * METRES_PER_KM;
    return this.db(POSTS_TABLE)
      .select(`${POSTS_TABLE}.*`)
      .whereNotNull('latitude')
      .whereNotNull('longitude')
      .whereRaw(`ST_DWithin(${ROW_GEOGRAPHY}, ${CENTRE_GEOGRAPHY}, ?, false)`, [
        query.longitude,
        query.latitude,
        radiusMeters,
      ])
      .orderByRaw(`ST_Distance(${ROW_GEOGRAPHY}, ${CENTRE_GEOGRAPHY}, false) ASC`, [
        query.longitude,
        query.latitude,
      ])
      .orderBy('created_at', 'desc')
      .orderBy('id', 'asc')
      .limit(query.limit)
      .offset(query.offset);
  }
}

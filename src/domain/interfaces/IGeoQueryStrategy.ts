/**
 * Geo Query Strategy Interface
 * Layer: Domain
 * Pattern: Strategy Pattern
 *
 * Two implementations sit behind this:
 *   - naive:  bounding-box prefilter in SQL, haversine + sort + page in memory
 *             (stores without spatial indexing, i.e. SQLite).
 *   - native: radius test, distance ordering and LIMIT/OFFSET pushed into
 *             PostGIS.
 *
 * Both must return the same posts in the same order for the same data and
 * query. The container binds exactly one of them at boot.
 */
import type { Post } from '@domain/entities/Post';

export type GeoStrategyName = 'naive' | 'native';

export interface NearbyQuery {
  latitude: number;
  longitude: number;
  /** Kilometres, > 0. */
  radiusKm: number;
  limit: number;
  offset: number;
}

export interface IGeoQueryStrategy {
  readonly name: GeoStrategyName;
  findNearby(query: NearbyQuery): Promise<Post[]>;
}

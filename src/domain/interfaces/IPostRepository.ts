/**
 * Post Repository Interface — the storage adapter contract
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * The search coordinator depends on this interface only. Each storage backend
 * implements it once; whether `findNearby` runs a bounding-box scan in memory
 * or a spatial-index query is decided by the geo strategy the implementation
 * was constructed with, never by the caller.
 *
 * All list methods take `limit`/`offset` and return one fully filtered,
 * ordered page. A storage failure rejects with StorageUnavailableError; no
 * method ever returns a truncated page instead.
 */
import type { Post } from '@domain/entities/Post';

export interface IPostRepository {
  /** Exact, case-sensitive match on `city`, most recent first. */
  listByCity(city: string, limit: number, offset: number): Promise<Post[]>;

  /** Posts whose great-circle distance from (lat, lng) is <= radiusKm, nearest first. */
  findNearby(
    lat: number,
    lng: number,
    radiusKm: number,
    limit: number,
    offset: number,
  ): Promise<Post[]>;

  /** Case-insensitive substring match on `content`, most recent first. */
  searchByText(query: string, limit: number, offset: number): Promise<Post[]>;

  /** Round-trips a trivial query; resolves with the latency in ms. */
  ping(): Promise<number>;
}

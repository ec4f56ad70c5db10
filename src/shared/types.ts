/**
 * Shared Type Definitions
 * Layer: Shared
 *
 * PostSearchCriteria is what the controller hands the search coordinator;
 * PaginatedResult<T> is the list response shape every posts endpoint returns.
 */
export interface PostSearchCriteria {
  /** Free-text query, matched as a case-insensitive substring of `content`. */
  text?: string;
  /** Exact, case-sensitive city label (already URL-decoded). */
  city?: string;
  latitude?: number;
  longitude?: number;
  /** Kilometres; defaults to config.search.defaultRadiusKm when a coordinate is given. */
  radiusKm?: number;
  page: number;
  limit: number;
}

/** Which retrieval path the coordinator took. */
export type SearchPath = 'nearby' | 'city' | 'text';

export interface SearchResultMeta {
  path?: SearchPath;
  /** Wall-clock time from request arrival to response sent (ms). */
  totalTimeMs?: number;
  /** Time spent in storage calls and in-process filtering (ms). */
  queryTimeMs?: number;
}

export interface PaginatedResult<T> {
  data: T[];
  pagination: {
    page: number;
    limit: number;
    offset: number;
    /** Items on this page. */
    count: number;
  };
  meta?: SearchResultMeta;
}

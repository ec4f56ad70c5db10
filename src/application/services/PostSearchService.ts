/**
 * Post Search Service — the search coordinator
 * Layer: Application
 * Pattern: Facade
 *
 * Resolves a request into one retrieval path (see searchPlan.ts) and runs it
 * against the storage adapter contract. It never knows which backend or geo
 * strategy is behind the repository.
 *
 * Where filtering happens is a deliberate split:
 *   - The primary criterion (radius, city, or text) always runs in storage.
 *   - A text query combined with coordinates or a city is NOT pushed into
 *     storage. It is applied here, in process, to the primary result. That
 *     keeps the storage contract at three single-criterion methods for both
 *     backends, at the cost of reading more rows than the final page.
 *
 * Pagination happens once, at the end: in storage when there is no
 * post-filter, in memory after the post-filter otherwise (the filter can
 * shrink the set, so storage offsets would be wrong). In the post-filter
 * case the primary result is read in batches of config.search.batchSize until
 * enough matches exist to fill the requested window or storage runs dry.
 */
import { config } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { Post } from '@domain/entities/Post';
import type { IPostRepository } from '@domain/interfaces/IPostRepository';
import { normalizeLimit, normalizePage, pageOffset } from '@shared/pagination';
import type { PaginatedResult, PostSearchCriteria } from '@shared/types';
import { inject, injectable } from 'tsyringe';

import { resolveSearchPlan, type SearchPlan } from './searchPlan';

type PageFetcher = (limit: number, offset: number) => Promise<Post[]>;

@injectable()
export class PostSearchService {
  constructor(
    @inject(TOKENS.PostRepository) private repo: IPostRepository,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async search(criteria: PostSearchCriteria): Promise<PaginatedResult<Post>> {
    const plan = resolveSearchPlan(criteria, config.search.defaultRadiusKm);
    const page = normalizePage(criteria.page);
    const limit = normalizeLimit(criteria.limit);
    const offset = pageOffset(page, limit);

    const startMs = Date.now();
    const data = await this.execute(plan, limit, offset);
    const queryTimeMs = Math.round(Date.now() - startMs);

    const postFilter = plan.kind !== 'text' && plan.text !== undefined;
    this.log.debug({ path: plan.kind, postFilter, count: data.length }, 'Post search complete');

    return {
      data,
      pagination: { page, limit, offset, count: data.length },
      meta: { path: plan.kind, queryTimeMs },
    };
  }

  private execute(plan: SearchPlan, limit: number, offset: number): Promise<Post[]> {
    switch (plan.kind) {
      case 'nearby': {
        const { latitude, longitude, radiusKm } = plan;
        const fetchPage: PageFetcher = (l, o) =>
          this.repo.findNearby(latitude, longitude, radiusKm, l, o);
        return plan.text === undefined
          ? fetchPage(limit, offset)
          : this.filterThenPaginate(fetchPage, plan.text, limit, offset);
      }
      case 'city': {
        const { city } = plan;
        const fetchPage: PageFetcher = (l, o) => this.repo.listByCity(city, l, o);
        return plan.text === undefined
          ? fetchPage(limit, offset)
          : this.filterThenPaginate(fetchPage, plan.text, limit, offset);
      }
      case 'text':
        return this.repo.searchByText(plan.text, limit, offset);
    }
  }

  /**
   * Case-insensitive substring filter over the full primary result, then the
   * [offset, offset + limit) window. Batches preserve storage order, so the
   * first offset + limit matches are final as soon as they are seen.
   */
  private async filterThenPaginate(
    fetchPage: PageFetcher,
    text: string,
    limit: number,
    offset: number,
  ): Promise<Post[]> {
    const needle = text.toLowerCase();
    const wanted = offset + limit;
    const batchSize = config.search.batchSize;
    const matched: Post[] = [];

    for (let cursor = 0; matched.length < wanted; cursor += batchSize) {
      const batch = await fetchPage(batchSize, cursor);
      for (const post of batch) {
        if (post.content.toLowerCase().includes(needle)) matched.push(post);
      }
      if (batch.length < batchSize) break;
    }

    return matched.slice(offset, wanted);
  }
}

import type { NewPost } from '@domain/entities/Post';

/**
 * Bulk insert used by the seed script and test fixtures. Enforces the
 * coordinate invariants (paired, in range) before anything reaches storage.
 */
export interface IPostWriter {
  insertMany(posts: NewPost[]): Promise<number>;
}

/**
 * Post Metadata — schema-less key/value bag
 * Layer: Domain
 *
 * Clients attach arbitrary JSON to a post (mood, tags, client build, ...).
 * It is modelled as a string-keyed map of JSON values, never as `any`: the
 * Zod schema is the single decoder for both backends (SQLite hands back a
 * JSON string, PostgreSQL a parsed jsonb object), and `serializeMetadata` is
 * the single encoder. Key order carries no meaning.
 */
import { z } from 'zod';

export const postMetadataSchema = z.record(z.string(), z.json());

export type PostMetadata = z.infer<typeof postMetadataSchema>;

/** Decode a stored metadata column. NULL and empty strings become `{}`. */
export function parseMetadata(stored: unknown): PostMetadata {
  if (stored == null || stored === '') return {};
  const value: unknown = typeof stored === 'string' ? JSON.parse(stored) : stored;
  return postMetadataSchema.parse(value);
}

export function serializeMetadata(metadata: PostMetadata): string {
  return JSON.stringify(metadata);
}

/**
 * Row ⇄ entity mapping for `posts`
 * Layer: Infrastructure
 *
 * The single place where snake_case rows become Post entities and back.
 * Rows are validated with Zod instead of cast field by field, because the two
 * drivers disagree on representation: better-sqlite3 returns timestamps as
 * epoch milliseconds and jsonb as text, pg returns Date objects and parsed
 * JSON.
 */
import { randomUUID } from 'node:crypto';

import type { NewPost, Post, PostRow } from '@domain/entities/Post';
import { assertValidLocation } from '@domain/entities/Post';
import { parseMetadata, serializeMetadata } from '@domain/entities/PostMetadata';
import { z } from 'zod';

const timestamp = z.union([z.date(), z.number(), z.string()]).transform((value) => new Date(value));

const postRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  content: z.string(),
  image_url: z.string().nullish(),
  city: z.string().nullish(),
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
  metadata: z.unknown(),
  created_at: timestamp,
  updated_at: timestamp,
});

export function toPost(row: unknown): Post {
  const r = postRowSchema.parse(row);
  const location =
    r.latitude != null && r.longitude != null
      ? { latitude: r.latitude, longitude: r.longitude }
      : null;
  return {
    id: r.id,
    userId: r.user_id,
    content: r.content,
    imageUrl: r.image_url ?? null,
    city: r.city ?? null,
    location,
    metadata: parseMetadata(r.metadata),
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

/** Validates coordinates and fills id/timestamps. Throws ValidationError on bad input. */
export function toRow(post: NewPost, now: Date = new Date()): PostRow {
  if (post.location) assertValidLocation(post.location);
  const createdAt = post.createdAt ?? now;
  return {
    id: post.id ?? randomUUID(),
    user_id: post.userId,
    content: post.content,
    image_url: post.imageUrl ?? null,
    city: post.city ?? null,
    latitude: post.location?.latitude ?? null,
    longitude: post.location?.longitude ?? null,
    metadata: serializeMetadata(post.metadata ?? {}),
    created_at: createdAt,
    updated_at: createdAt,
  };
}

/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Named coordinates plus a `newPost()` builder. Timestamps are fixed and ids
 * are explicit so ordering assertions are deterministic.
 */
import type { GeoPoint, NewPost, Post } from '@domain/entities/Post';

export const SAN_FRANCISCO: GeoPoint = { latitude: 37.7749, longitude: -122.4194 };
export const OAKLAND: GeoPoint = { latitude: 37.8044, longitude: -122.2712 };
export const LOS_ANGELES: GeoPoint = { latitude: 34.0522, longitude: -118.2437 };
export const NEW_YORK: GeoPoint = { latitude: 40.7128, longitude: -74.006 };

/** Roughly 1 km north of SAN_FRANCISCO (0.009° of latitude ≈ 1.0 km). */
export const NEAR_SAN_FRANCISCO: GeoPoint = { latitude: 37.7839, longitude: -122.4194 };

export const BASE_TIME = new Date('2025-01-01T00:00:00.000Z');

/** BASE_TIME plus `minutes`; larger values are more recent. */
export function minutesAfterBase(minutes: number): Date {
  return new Date(BASE_TIME.getTime() + minutes * 60_000);
}

let sequence = 0;

export function newPost(overrides: Partial<NewPost> = {}): NewPost {
  sequence += 1;
  return {
    id: `post-${String(sequence).padStart(4, '0')}`,
    userId: 'user-1',
    content: `post number ${sequence}`,
    city: null,
    location: null,
    metadata: {},
    createdAt: minutesAfterBase(sequence),
    ...overrides,
  };
}

/** A complete Post entity, as a repository would return it. */
export function samplePost(overrides: Partial<Post> = {}): Post {
  return {
    id: 'post-sample',
    userId: 'user-1',
    content: 'Coffee by the water',
    imageUrl: null,
    city: 'San Francisco',
    location: { ...SAN_FRANCISCO },
    metadata: { mood: 'calm' },
    createdAt: BASE_TIME,
    updatedAt: BASE_TIME,
    ...overrides,
  };
}

/**
 * Small deterministic PRNG (LCG) so "random" datasets are identical on every
 * run and on every machine.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x1_0000_0000;
  };
}

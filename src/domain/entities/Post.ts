/**
 * Post Entity
 * Layer: Domain
 *
 * Two shapes for the same record, as elsewhere in the codebase:
 *
 *   Post     — camelCase, what services and controllers handle.
 *   PostRow  — snake_case, the exact columns of the `posts` table.
 *
 * A post's coordinate is modelled as one optional `GeoPoint` rather than two
 * independent nullable numbers, so "latitude without longitude" cannot be
 * expressed in application code. The row keeps two nullable columns; the
 * row mapper only builds a `GeoPoint` when both are set.
 */
import { ValidationError } from '@shared/errors/AppError';

import type { PostMetadata } from './PostMetadata';

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface Post {
  id: string;
  userId: string;
  content: string;
  imageUrl: string | null;
  city: string | null;
  location: GeoPoint | null;
  metadata: PostMetadata;
  createdAt: Date;
  updatedAt: Date;
}

/** Input accepted by the bulk writer. Omitted id/createdAt are assigned on insert. */
export interface NewPost {
  id?: string;
  userId: string;
  content: string;
  imageUrl?: string | null;
  city?: string | null;
  location?: GeoPoint | null;
  metadata?: PostMetadata;
  createdAt?: Date;
}

export interface PostRow {
  id: string;
  user_id: string;
  content: string;
  image_url: string | null;
  city: string | null;
  latitude: number | null;
  longitude: number | null;
  metadata: string;
  created_at: Date;
  updated_at: Date;
}

export const LATITUDE_RANGE = { min: -90, max: 90 } as const;
export const LONGITUDE_RANGE = { min: -180, max: 180 } as const;

export function isValidLatitude(value: number): boolean {
  return Number.isFinite(value) && value >= LATITUDE_RANGE.min && value <= LATITUDE_RANGE.max;
}

export function isValidLongitude(value: number): boolean {
  return Number.isFinite(value) && value >= LONGITUDE_RANGE.min && value <= LONGITUDE_RANGE.max;
}

/** Throws ValidationError unless both components are finite and in range. */
export function assertValidLocation(point: GeoPoint): void {
  if (!isValidLatitude(point.latitude)) {
    throw new ValidationError(`latitude must be between -90 and 90, got ${point.latitude}`);
  }
  if (!isValidLongitude(point.longitude)) {
    throw new ValidationError(`longitude must be between -180 and 180, got ${point.longitude}`);
  }
}

/**
 * Search plan resolution
 * Layer: Application
 *
 * Turns loose criteria into exactly one retrieval path, highest priority
 * first: coordinates, then city, then text. Anything the coordinator cannot
 * act on is rejected here with ValidationError, before storage is touched.
 */
import { isValidLatitude, isValidLongitude } from '@domain/entities/Post';
import { ValidationError } from '@shared/errors/AppError';
import type { PostSearchCriteria } from '@shared/types';

export type SearchPlan =
  | { kind: 'nearby'; latitude: number; longitude: number; radiusKm: number; text?: string }
  | { kind: 'city'; city: string; text?: string }
  | { kind: 'text'; text: string };

export function resolveSearchPlan(criteria: PostSearchCriteria, defaultRadiusKm: number): SearchPlan {
  const text = normalizeText(criteria.text);
  const city = criteria.city === '' ? undefined : criteria.city;
  const { latitude, longitude } = criteria;

  if ((latitude === undefined) !== (longitude === undefined)) {
    throw new ValidationError('lat and lng must be supplied together');
  }

  if (latitude !== undefined && longitude !== undefined) {
    if (!isValidLatitude(latitude)) {
      throw new ValidationError('lat must be between -90 and 90');
    }
    if (!isValidLongitude(longitude)) {
      throw new ValidationError('lng must be between -180 and 180');
    }
    const radiusKm = criteria.radiusKm ?? defaultRadiusKm;
    if (!Number.isFinite(radiusKm) || radiusKm <= 0) {
      throw new ValidationError('radius must be a number greater than 0');
    }
    return { kind: 'nearby', latitude, longitude, radiusKm, text };
  }

  if (city !== undefined) {
    return { kind: 'city', city, text };
  }

  if (text !== undefined) {
    return { kind: 'text', text };
  }

  throw new ValidationError('At least one search criterion (q, city, or lat/lng) is required');
}

function normalizeText(raw: string | undefined): string | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('q must not be empty');
  }
  return trimmed;
}

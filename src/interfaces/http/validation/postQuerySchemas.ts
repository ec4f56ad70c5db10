/**
 * Query-string schemas for the posts endpoints
 * Layer: Interfaces (HTTP)
 *
 *   lat     float, [-90, 90], only together with lng
 *   lng     float, [-180, 180], only together with lat
 *   radius  float km, > 0 (default applied by the search service)
 *   city    string, exact match
 *   q       string, non-empty when present
 *   page    int, default 1, floored at 1
 *   limit   int, default 20, clamped to [1, 100]
 *
 * Numbers that do not parse are rejected; page/limit never are, they fall
 * back to their defaults. Pairing and "at least one criterion" are checked
 * by the search service so every caller gets the same rules.
 */
import { normalizeLimit, normalizePage } from '@shared/pagination';
import { z } from 'zod';

function numberParam(name: string) {
  return z.string().transform((raw, ctx) => {
    const trimmed = raw.trim();
    const value = Number(trimmed);
    if (trimmed === '' || !Number.isFinite(value)) {
      ctx.addIssue({ code: 'custom', message: `${name} must be a number` });
      return z.NEVER;
    }
    return value;
  });
}

const latitude = numberParam('lat').pipe(
  z.number().min(-90, 'lat must be between -90 and 90').max(90, 'lat must be between -90 and 90'),
);

const longitude = numberParam('lng').pipe(
  z
    .number()
    .min(-180, 'lng must be between -180 and 180')
    .max(180, 'lng must be between -180 and 180'),
);

const radius = numberParam('radius').pipe(z.number().positive('radius must be greater than 0'));

const page = z.unknown().transform(normalizePage);
const limit = z.unknown().transform(normalizeLimit);

export const paginationQuerySchema = z.object({ page, limit });

export const searchQuerySchema = z.object({
  q: z.string().optional(),
  city: z.string().optional(),
  lat: latitude.optional(),
  lng: longitude.optional(),
  radius: radius.optional(),
  page,
  limit,
});

export const nearbyQuerySchema = z
  .object({
    lat: latitude.optional(),
    lng: longitude.optional(),
    radius: radius.optional(),
    page,
    limit,
  })
  .refine((query) => query.lat !== undefined && query.lng !== undefined, {
    error: 'lat and lng query parameters are required',
  });

/**
 * GeoMath — spherical-earth helpers for radius search
 * Layer: Domain
 *
 * Pure functions, no state. Used by the naive geo strategy (prefilter + exact
 * filter) and by tests that check the PostGIS-backed strategy against it.
 *
 * `estimateBoundingBox` returns a lat/lng rectangle that is always a superset
 * of the radius circle. Candidates inside the box still have to pass
 * `distanceKm(...) <= radiusKm`; the box only keeps that exact check off
 * rows that are obviously too far away.
 */
export const EARTH_RADIUS_KM = 6371;

/** Rough km per degree of latitude used for the prefilter box. */
export const KM_PER_DEGREE = 111.0;

/** 20% head-room on the prefilter box. */
export const BOUNDING_BOX_MARGIN = 1.2;

/** Below this cos(lat) the longitude span is treated as unbounded. */
const MIN_COS_LATITUDE = 1e-6;

/**
 * Inclusive lat/lng rectangle. When `lngMin > lngMax` the box crosses the
 * antimeridian and covers `lng >= lngMin || lng <= lngMax`.
 */
export interface BoundingBox {
  latMin: number;
  latMax: number;
  lngMin: number;
  lngMax: number;
}

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;
const toDegrees = (radians: number): number => (radians * 180) / Math.PI;

function unboundedLongitude(latMin: number, latMax: number): BoundingBox {
  return { latMin, latMax, lngMin: -180, lngMax: 180 };
}

export function estimateBoundingBox(lat: number, lng: number, radiusKm: number): BoundingBox {
  const latDelta = (radiusKm * BOUNDING_BOX_MARGIN) / KM_PER_DEGREE;
  const latMin = Math.max(-90, lat - latDelta);
  const latMax = Math.min(90, lat + latDelta);

  // A circle that reaches a pole spans every meridian.
  const cosLat = Math.cos(toRadians(lat));
  if (lat - latDelta <= -90 || lat + latDelta >= 90 || cosLat < MIN_COS_LATITUDE) {
    return unboundedLongitude(latMin, latMax);
  }

  // The linear estimate undershoots for wide circles at high latitude, so take
  // the larger of it and the exact half-width of a spherical cap.
  const sinRatio = Math.sin(radiusKm / EARTH_RADIUS_KM) / cosLat;
  if (sinRatio >= 1) {
    return unboundedLongitude(latMin, latMax);
  }
  const lngDelta = Math.max(
    (radiusKm * BOUNDING_BOX_MARGIN) / (KM_PER_DEGREE * cosLat),
    toDegrees(Math.asin(sinRatio)),
  );
  if (lngDelta >= 180) {
    return unboundedLongitude(latMin, latMax);
  }

  let lngMin = lng - lngDelta;
  let lngMax = lng + lngDelta;
  if (lngMin < -180) lngMin += 360;
  if (lngMax > 180) lngMax -= 360;

  return { latMin, latMax, lngMin, lngMax };
}

export function crossesAntimeridian(box: BoundingBox): boolean {
  return box.lngMin > box.lngMax;
}

export function isInBoundingBox(box: BoundingBox, lat: number, lng: number): boolean {
  if (lat < box.latMin || lat > box.latMax) return false;
  if (crossesAntimeridian(box)) {
    return lng >= box.lngMin || lng <= box.lngMax;
  }
  return lng >= box.lngMin && lng <= box.lngMax;
}

/** Great-circle distance (haversine, R = 6371 km). */
export function distanceKm(lat1: number, lng1: number, lat2: number, lng2: number): number {
  const dLat = toRadians(lat2 - lat1);
  const dLng = toRadians(lng2 - lng1);
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLng / 2) * Math.sin(dLng / 2);
  // Rounding can push `a` a hair above 1 for antipodal points.
  const clamped = Math.min(1, a);
  const c = 2 * Math.atan2(Math.sqrt(clamped), Math.sqrt(1 - clamped));
  return EARTH_RADIUS_KM * c;
}

/** Inclusive: a point exactly on the circle counts as inside. */
export function isWithinRadius(
  centerLat: number,
  centerLng: number,
  lat: number,
  lng: number,
  radiusKm: number,
): boolean {
  return distanceKm(centerLat, centerLng, lat, lng) <= radiusKm;
}

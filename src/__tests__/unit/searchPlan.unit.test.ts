/**
 * Unit Tests — resolveSearchPlan
 *
 * Priority is coordinates > city > text; a lower-priority text query is kept
 * on the plan as a post-filter, a lower-priority city is dropped.
 */
import { resolveSearchPlan } from '@application/services/searchPlan';
import { ValidationError } from '@shared/errors/AppError';

const base = { page: 1, limit: 20 };

describe('resolveSearchPlan', () => {
  it('should resolve coordinates to a nearby plan with the default radius', () => {
    expect(resolveSearchPlan({ ...base, latitude: 1, longitude: 2 }, 10)).toEqual({
      kind: 'nearby',
      latitude: 1,
      longitude: 2,
      radiusKm: 10,
      text: undefined,
    });
  });

  it('should keep text as a post-filter on a nearby plan and drop the city', () => {
    expect(
      resolveSearchPlan({ ...base, latitude: 1, longitude: 2, radiusKm: 3, city: 'Lima', text: ' surf ' }, 10),
    ).toEqual({ kind: 'nearby', latitude: 1, longitude: 2, radiusKm: 3, text: 'surf' });
  });

  it('should resolve a city to a city plan', () => {
    expect(resolveSearchPlan({ ...base, city: 'Lima', text: 'surf' }, 10)).toEqual({
      kind: 'city',
      city: 'Lima',
      text: 'surf',
    });
  });

  it('should resolve text alone to a text plan', () => {
    expect(resolveSearchPlan({ ...base, text: 'surf' }, 10)).toEqual({ kind: 'text', text: 'surf' });
  });

  it('should accept the exact range limits', () => {
    expect(resolveSearchPlan({ ...base, latitude: -90, longitude: 180 }, 10).kind).toBe('nearby');
    expect(resolveSearchPlan({ ...base, latitude: 90, longitude: -180 }, 10).kind).toBe('nearby');
  });

  it.each([
    [{ latitude: 1 }, 'lat and lng must be supplied together'],
    [{ longitude: 1 }, 'lat and lng must be supplied together'],
    [{ latitude: 90.0001, longitude: 0 }, 'lat must be between -90 and 90'],
    [{ latitude: 0, longitude: -180.0001 }, 'lng must be between -180 and 180'],
    [{ latitude: Number.NaN, longitude: 0 }, 'lat must be between -90 and 90'],
    [{ latitude: 0, longitude: 0, radiusKm: -1 }, 'radius must be a number greater than 0'],
    [{ latitude: 0, longitude: 0, radiusKm: Number.POSITIVE_INFINITY }, 'radius must be a number greater than 0'],
    [{ text: '' }, 'q must not be empty'],
    [{}, 'At least one search criterion (q, city, or lat/lng) is required'],
    [{ city: '' }, 'At least one search criterion (q, city, or lat/lng) is required'],
  ])('should reject %p', (criteria, message) => {
    expect(() => resolveSearchPlan({ ...base, ...criteria }, 10)).toThrow(new ValidationError(message));
  });
});

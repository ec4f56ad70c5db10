/**
 * Request Parsing Helper
 * Layer: Interfaces (HTTP)
 *
 * Runs a Zod schema over one part of the request and either returns the
 * parsed, coerced value or throws ValidationError (400) listing every issue.
 * Controllers call this directly instead of going through a middleware
 * because Express 5 exposes `req.query` as a read-only getter, so parsed
 * values cannot be written back onto the request.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { z } from 'zod';

export function parseRequest<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const messages = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ValidationError(messages);
  }

  return result.data;
}

/**
 * City path segments are query-unescaped once more after Express has decoded
 * the path, so `San+Francisco` and `San%2520Francisco` both reach storage as
 * `San Francisco`. Matching stays exact and case-sensitive.
 */
export function decodeCityParam(raw: string): string {
  let city: string;
  try {
    city = decodeURIComponent(raw.replace(/\+/g, ' '));
  } catch {
    throw new ValidationError('Invalid city name format');
  }
  if (city.length === 0) {
    throw new ValidationError('city must not be empty');
  }
  return city;
}

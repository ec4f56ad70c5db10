import { DEFAULT_PAGE, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from './constants';

/**
 * Lenient page/limit handling shared by the HTTP schema and the search
 * service: unparsable → default, page floored at 1, limit clamped to
 * [1, MAX_PAGE_SIZE]. A limit of 0 falls back to the default page size.
 */
export function normalizePage(raw: unknown): number {
  const page = toInteger(raw);
  return Math.max(DEFAULT_PAGE, page || DEFAULT_PAGE);
}

export function normalizeLimit(raw: unknown): number {
  const limit = toInteger(raw);
  return Math.min(MAX_PAGE_SIZE, Math.max(1, limit || DEFAULT_PAGE_SIZE));
}

export function pageOffset(page: number, limit: number): number {
  return (page - 1) * limit;
}

function toInteger(raw: unknown): number {
  if (typeof raw === 'number') return Math.trunc(raw);
  if (typeof raw === 'string') return parseInt(raw, 10);
  return NaN;
}

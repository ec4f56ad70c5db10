/**
 * SQLite user functions
 * Layer: Infrastructure
 *
 * SQLite's built-in LIKE and lower() only fold ASCII letters. `fold_case`
 * lower-cases with the same JavaScript rules the search service uses for its
 * in-process text filter, so "CAFÉ" matches "café" on every path.
 *
 * Registered on each pooled connection from knexConfig's `afterCreate`.
 */
import type Database from 'better-sqlite3';

export const FOLD_CASE_FUNCTION = 'fold_case';

export function registerSqliteFunctions(conn: Database.Database): void {
  conn.function(FOLD_CASE_FUNCTION, { deterministic: true }, (value: unknown) =>
    value === null ? null : String(value).toLowerCase(),
  );
}

/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable seam gets a `Symbol.for` token. Grouped by layer so the
 * set of swappable pieces is visible at a glance.
 */
export const TOKENS = {
  // Infrastructure
  Knex: Symbol.for('Knex'),
  Logger: Symbol.for('Logger'),

  // Repositories — the storage adapter contract and the bulk writer
  PostRepository: Symbol.for('PostRepository'),
  PostWriter: Symbol.for('PostWriter'),

  // Strategies — bound once at boot from DB_CLIENT
  GeoQueryStrategy: Symbol.for('GeoQueryStrategy'),

  // Services
  PostSearchService: Symbol.for('PostSearchService'),
} as const;

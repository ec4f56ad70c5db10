/**
 * Geo Query Strategy Factory
 * Layer: Application
 * Pattern: Factory Pattern
 *
 * Maps the configured storage backend to the geo strategy that can serve it:
 * sqlite → NaiveGeoQueryStrategy, postgres → NativeGeoQueryStrategy. The
 * container calls `create()` once at boot and caches the instance, so the
 * choice is made exactly once per process rather than per request.
 */
import type { DatabaseClient } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { IGeoQueryStrategy } from '@domain/interfaces/IGeoQueryStrategy';
import { NaiveGeoQueryStrategy } from '@infrastructure/geo/NaiveGeoQueryStrategy';
import { NativeGeoQueryStrategy } from '@infrastructure/geo/NativeGeoQueryStrategy';
import { AppError } from '@shared/errors/AppError';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

@injectable()
export class GeoQueryStrategyFactory {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  create(client: DatabaseClient): IGeoQueryStrategy {
    let strategy: IGeoQueryStrategy;
    switch (client) {
      case 'sqlite':
        strategy = new NaiveGeoQueryStrategy(this.db, this.log);
        break;
      case 'postgres':
        strategy = new NativeGeoQueryStrategy(this.db, this.log);
        break;
      default:
        throw new AppError(`No geo query strategy for database client: ${String(client)}`, 500, false);
    }
    this.log.info({ client, strategy: strategy.name }, 'Geo query strategy bound');
    return strategy;
  }
}

/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The one place where tokens are bound to implementations.
 *
 *   - `reflect-metadata` must load first so tsyringe can read constructor
 *     parameter metadata written by @inject/@injectable.
 *   - The geo strategy is produced by GeoQueryStrategyFactory from
 *     DB_CLIENT through `instanceCachingFactory`: resolved lazily on first
 *     use, then reused for the life of the process. Nothing downstream ever
 *     asks which backend is active.
 *   - PostWriter is an alias of PostRepository (one class, two contracts).
 */
import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { GeoQueryStrategyFactory } from '@application/factories/GeoQueryStrategyFactory';
import { PostSearchService } from '@application/services/PostSearchService';
import type { IGeoQueryStrategy } from '@domain/interfaces/IGeoQueryStrategy';
import { getDbConnection } from '@infrastructure/database/connection';
import { KnexPostRepository } from '@infrastructure/repositories/KnexPostRepository';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.Knex, { useValue: getDbConnection() });
container.register<IGeoQueryStrategy>(TOKENS.GeoQueryStrategy, {
  useFactory: instanceCachingFactory((c) =>
    c.resolve(GeoQueryStrategyFactory).create(config.database.client),
  ),
});
container.register(TOKENS.PostRepository, { useClass: KnexPostRepository });
container.register(TOKENS.PostWriter, { useToken: TOKENS.PostRepository });
container.register(TOKENS.PostSearchService, { useClass: PostSearchService });

export { container };

/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per line in production; piped through pino-pretty in
 * development. Test runs set LOG_LEVEL=silent (see jest.setup.ts).
 *
 * Every log line carries the active storage backend so lines from a SQLite
 * deployment and a PostGIS deployment can be told apart in a shared sink.
 * Consumers depend on the exported `Logger` type, not on pino itself.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  name: 'geopost',
  level: config.log.level,
  base: { pid: process.pid, dbClient: config.database.client },
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;

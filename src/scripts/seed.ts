/**
 * Seed CLI Script — load sample posts
 * Layer: Entry Point (CLI, not HTTP)
 *
 *   npm run seed [-- --file path] [--migrate] [--reset]
 *
 * Reads a JSON seed file (default data/sample-posts.json), optionally runs
 * the knex migrations first and/or empties `posts`, then writes through the
 * same IPostWriter the tests use. DB_CLIENT picks the target exactly as it
 * does for the server.
 */
import 'reflect-metadata';

import fs from 'node:fs';
import path from 'node:path';

import { config } from '@core/config';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { IPostWriter } from '@domain/interfaces/IPostWriter';
import { destroyDbConnection, getDbConnection } from '@infrastructure/database/connection';
import { POSTS_TABLE } from '@shared/constants';

import { parseSeedFile } from './seedFile';

const args = process.argv.slice(2);

function getArg(flag: string, fallback: string): string {
  const idx = args.indexOf(flag);
  const value = idx !== -1 ? args[idx + 1] : undefined;
  return value ?? fallback;
}

const hasFlag = (flag: string): boolean => args.includes(flag);

const defaultFile = path.resolve(__dirname, '../../data/sample-posts.json');
const filePath = path.resolve(getArg('--file', defaultFile));

async function main(): Promise<void> {
  // eslint-disable-next-line no-console
  const log = console.log;

  log('');
  log(`  Seed file:  ${filePath}`);
  log(
    `  Database:   ${config.database.client} (${
      config.database.client === 'sqlite' ? config.database.sqliteFilename : 'DATABASE_URL'
    })`,
  );
  log('');

  if (!fs.existsSync(filePath)) {
    log(`  ERROR: File not found: ${filePath}`);
    log('  Use --file <path> to specify the seed file.');
    process.exitCode = 1;
    return;
  }

  const posts = parseSeedFile(JSON.parse(fs.readFileSync(filePath, 'utf8')));
  const db = getDbConnection();

  try {
    if (hasFlag('--migrate')) {
      log('  Running migrations...');
      const [batch, applied]: [number, string[]] = await db.migrate.latest();
      log(`  Migrations complete (batch ${batch}, ${applied.length} applied).`);
    }

    if (hasFlag('--reset')) {
      const removed = await db(POSTS_TABLE).del();
      log(`  Removed ${removed} existing posts.`);
    }

    const startTime = Date.now();
    const writer = container.resolve<IPostWriter>(TOKENS.PostWriter);
    const inserted = await writer.insertMany(posts);

    log(`  ✓ Inserted ${inserted} posts in ${Date.now() - startTime}ms`);
    log('');
  } finally {
    await destroyDbConnection();
  }
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Seed failed:', err);
  process.exitCode = 1;
});

import knex, { type Knex } from 'knex';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { logger } from '../utils/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

const POOL_MIN = 2;
const POOL_MAX = 10;

// Compiled layout: dist/src/db/connection.js -> dist/db/migrations
export const MIGRATIONS_DIRECTORY = resolve(__dirname, '..', '..', 'db', 'migrations');

export function createDb(connectionUrl: string): Knex {
  const db = knex({
    client: 'pg',
    connection: connectionUrl,
    pool: { min: POOL_MIN, max: POOL_MAX },
  });

  logger.info({ poolMin: POOL_MIN, poolMax: POOL_MAX }, 'Database connection pool created');

  return db;
}

export async function runMigrations(db: Knex, directory: string = MIGRATIONS_DIRECTORY): Promise<string[]> {
  const [batch, applied] = await db.migrate.latest({
    directory,
    loadExtensions: ['.js'],
  });

  logger.info({ batch, applied }, 'Database migrations applied');
  return applied;
}

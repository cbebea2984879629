/**
 * Database Connection Pool — Singleton
 * Layer: Infrastructure
 * Pattern: Singleton
 *
 * One Knex pool per process. In the clustered setup (server.ts) every worker
 * calls getDbConnection() itself and gets its own pool, which is what we want:
 * processes cannot share sockets.
 *
 * The driver follows the scheme of DATABASE_URL:
 *   postgres:// or postgresql://  →  pg, with the configured pool bounds
 *   sqlite:<path>                 →  better-sqlite3, a single connection
 *
 * `destroyDbConnection()` runs during graceful shutdown.
 */
import knex, { Knex } from 'knex';
import { config } from '@core/config';
import { logger } from '@core/logger';

interface DbOptions {
  url: string;
  ssl: boolean;
  pool: { min: number; max: number };
}

const SQLITE_PREFIX = 'sqlite:';

export function buildKnexConfig(options: DbOptions): Knex.Config {
  if (options.url.startsWith(SQLITE_PREFIX)) {
    const filename = options.url.slice(SQLITE_PREFIX.length).replace(/^\/\//, '');
    return {
      client: 'better-sqlite3',
      connection: { filename: filename || ':memory:' },
      useNullAsDefault: true,
      pool: { min: 1, max: 1 },
    };
  }

  if (/^postgres(ql)?:\/\//.test(options.url)) {
    return {
      client: 'pg',
      connection: {
        connectionString: options.url,
        ssl: options.ssl ? { rejectUnauthorized: false } : false,
      },
      pool: {
        min: options.pool.min,
        max: options.pool.max,
        afterCreate: (conn: unknown, done: (err: Error | null, conn: unknown) => void) => {
          logger.debug('New database connection established');
          done(null, conn);
        },
      },
      acquireConnectionTimeout: 10000,
    };
  }

  throw new Error(`Unsupported DATABASE_URL scheme: ${options.url.split(':')[0]}`);
}

let instance: Knex | null = null;

export function getDbConnection(): Knex {
  if (!instance) {
    const knexConfig = buildKnexConfig(config.database);
    instance = knex(knexConfig);

    logger.info({ client: knexConfig.client }, 'Database connection pool initialized');
  }

  return instance;
}

/** Tears down the pool (SIGTERM, end of migration run). */
export async function destroyDbConnection(): Promise<void> {
  if (instance) {
    await instance.destroy();
    instance = null;
    logger.info('Database connection pool destroyed');
  }
}

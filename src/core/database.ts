import pg from 'pg';

import { appConfig } from './env.js';

const { Pool } = pg;

/** The slice of a pooled pg client the ledger talks to. */
export interface DatabaseConnection {
  query<R extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<pg.QueryResult<R>>;
  release(): void;
}

/** Hands out a dedicated connection; the caller must release it. */
export type ConnectionSource = () => Promise<DatabaseConnection>;

class PooledConnection implements DatabaseConnection {
  constructor(private readonly client: pg.PoolClient) {}

  query<R extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<pg.QueryResult<R>> {
    return this.client.query<R>(text, values);
  }

  release(): void {
    this.client.release();
  }
}

let pool: pg.Pool | null = null;

export function getPool(): pg.Pool {
  if (!pool) {
    pool = new Pool(buildPoolConfig());
  }

  return pool;
}

export function pooledConnections(source: pg.Pool): ConnectionSource {
  return async () => new PooledConnection(await source.connect());
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

function resolveSsl(): pg.PoolConfig['ssl'] {
  const enabled = appConfig.dbSsl ?? appConfig.NODE_ENV === 'production';
  return enabled ? { rejectUnauthorized: false } : false;
}

function buildPoolConfig(): pg.PoolConfig {
  // One writer at a time holds the state row lock, so a small pool is enough.
  const max = 5;

  if (appConfig.DATABASE_URL) {
    return { connectionString: appConfig.DATABASE_URL, ssl: resolveSsl(), max };
  }

  if (appConfig.DB_HOST && appConfig.DB_NAME && appConfig.DB_USER) {
    return {
      host: appConfig.DB_HOST,
      port: appConfig.DB_PORT ?? 5432,
      database: appConfig.DB_NAME,
      user: appConfig.DB_USER,
      password: appConfig.DB_PASSWORD,
      ssl: resolveSsl(),
      max
    };
  }

  throw new Error(
    'Database configuration missing. Provide DATABASE_URL or DB_HOST/DB_NAME/DB_USER variables.'
  );
}

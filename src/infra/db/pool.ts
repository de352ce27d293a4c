import pg, { type Pool as PgPool, type QueryResult, type QueryResultRow } from 'pg';
import type { SafeLogger } from '../logger.js';

const { Pool } = pg;

/**
 * The part of pg.Pool the repositories use. Tests supply an in-process fake.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
}

export function asQueryable(pool: PgPool): Queryable {
  return {
    query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) {
      return pool.query<R>(text, values);
    },
  };
}

export function createPool(databaseUrl: string, logger: SafeLogger): PgPool {
  const pool = new Pool({
    connectionString: databaseUrl,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.debug({}, 'Database connection established');
  });

  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database error');
  });

  return pool;
}

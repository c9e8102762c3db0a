import pg from 'pg';
import type { DatabaseParams } from '../config/database.js';
import { createChildLogger } from '../utils/logger.js';

const log = createChildLogger('pg-pool');

export interface DbQueryResult {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

/** The part of `pg.PoolClient` the connection wrapper relies on. */
export interface DbClient {
  query(text: string, values?: unknown[]): Promise<DbQueryResult>;
  /** Passing an error destroys the client instead of returning it to the pool. */
  release(err?: Error | boolean): void;
}

export interface DbPool {
  connect(): Promise<DbClient>;
  end(): Promise<void>;
}

export interface PoolSettings {
  max: number;
  statementTimeoutMs: number;
}

export type PoolFactory = (name: string, params: DatabaseParams, settings: PoolSettings) => DbPool;

/** Builds a `pg.Pool` for one named handle. */
export const createPgPool: PoolFactory = (name, params, settings) => {
  const pool = new pg.Pool({
    host: params.host,
    port: params.port,
    database: params.database,
    user: params.user,
    password: params.password,
    max: settings.max,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    ...(settings.statementTimeoutMs > 0 && { statement_timeout: settings.statementTimeoutMs }),
    application_name: 'workflow-settings',
  });

  // Idle clients that lose their backend emit here; the next acquire() replaces them
  pool.on('error', (err) => {
    log.error({ err, database: name }, 'Unexpected PostgreSQL pool error');
  });

  return {
    async connect() {
      const client = await pool.connect();
      return {
        query: async (text, values) => {
          const result = await client.query(text, values);
          return { rows: result.rows, rowCount: result.rowCount };
        },
        release: (err) => client.release(err),
      };
    },
    end: () => pool.end(),
  };
};

import { AsyncLocalStorage } from 'node:async_hooks';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from 'pino';
import type { DatabaseParams } from '../config/database.js';
import { createChildLogger } from '../utils/logger.js';
import { DatabaseUnavailableError, TransactionScopeError } from './errors.js';
import { convertPlaceholders } from './placeholders.js';
import { createPgPool, type DbClient, type DbPool, type PoolFactory } from './pg-pool.js';
import type { SqlResult, SqlStatement } from './sql-result.js';

export interface RetryPolicy {
  /** Delay before the second attempt. */
  initialDelayMs: number;
  /** Growth factor applied to the delay after every failed attempt; 1 keeps it fixed. */
  multiplier: number;
  maxDelayMs: number;
  /** 0 retries until the database answers. */
  maxAttempts: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  initialDelayMs: 5000,
  multiplier: 1,
  maxDelayMs: 60_000,
  maxAttempts: 0,
};

export interface PgConnectionOptions {
  autoCommit: boolean;
  retry?: Partial<RetryPolicy>;
  poolMax?: number;
  statementTimeoutMs?: number;
  createPool?: PoolFactory;
  logger?: Logger;
}

interface UnitOfWork {
  owner: PgConnection;
  client: DbClient;
  inTransaction: boolean;
}

// Shared by every connection; each unit records which connection owns it
const units = new AsyncLocalStorage<UnitOfWork>();

const LIVENESS_SQL = 'SELECT version()';

export function retryDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * policy.multiplier ** (attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * One named PostgreSQL database.
 *
 * Clients are checked out of a pool per statement, or per unit of work when the
 * connection runs with auto-commit off. Checkout probes the client and keeps
 * retrying per the retry policy, so callers see a slow database rather than a
 * missing one.
 */
export class PgConnection {
  readonly name: string;
  readonly autoCommit: boolean;
  readonly retryPolicy: RetryPolicy;

  private readonly pool: DbPool;
  private readonly log: Logger;
  private closed = false;

  constructor(name: string, params: DatabaseParams, options: PgConnectionOptions) {
    this.name = name;
    this.autoCommit = options.autoCommit;
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.log = (options.logger ?? createChildLogger('pg-connection')).child({ database: name });

    const createPool = options.createPool ?? createPgPool;
    this.pool = createPool(name, params, {
      max: options.poolMax ?? 5,
      statementTimeoutMs: options.statementTimeoutMs ?? 0,
    });
  }

  /**
   * Checks out a live client. Loops per the retry policy; rejects with
   * DatabaseUnavailableError only when a finite `maxAttempts` runs out.
   */
  async acquire(): Promise<DbClient> {
    const policy = this.retryPolicy;
    let lastError: unknown;

    for (let attempt = 1; policy.maxAttempts === 0 || attempt <= policy.maxAttempts; attempt++) {
      if (this.closed) {
        throw new DatabaseUnavailableError(this.name, attempt - 1, { cause: lastError });
      }

      try {
        const client = await this.pool.connect();
        if (await this.isAlive(client)) {
          return client;
        }
        client.release(new Error('liveness probe failed'));
        lastError = new Error('liveness probe failed');
      } catch (err) {
        lastError = err;
      }

      if (policy.maxAttempts !== 0 && attempt >= policy.maxAttempts) break;

      const delayMs = retryDelay(policy, attempt);
      this.log.error({ err: lastError, attempt, delayMs }, 'DB Connection failed. Retrying...');
      await sleep(delayMs);
    }

    this.log.error({ err: lastError, attempts: policy.maxAttempts }, 'DB Connection failed. Giving up');
    throw new DatabaseUnavailableError(this.name, policy.maxAttempts, { cause: lastError });
  }

  /** Liveness probe: false on any error or when no version row comes back. */
  async isAlive(client: DbClient | null | undefined): Promise<boolean> {
    if (!client) return false;
    try {
      const { rows } = await client.query(LIVENESS_SQL);
      return rows.length > 0;
    } catch {
      return false;
    }
  }

  /** Acquires a client, probes it, and hands it straight back. */
  async healthCheck(): Promise<boolean> {
    let client: DbClient;
    try {
      client = await this.pool.connect();
    } catch {
      return false;
    }
    const alive = await this.isAlive(client);
    client.release(alive ? undefined : new Error('liveness probe failed'));
    return alive;
  }

  /**
   * Runs one statement. Never throws for SQL errors: they are logged and come
   * back as `{ status: 'failed' }`.
   */
  async execute<T = Record<string, unknown>>(
    statement: SqlStatement,
    expectRows = true,
  ): Promise<SqlResult<T>> {
    const unit = this.currentUnit();
    if (unit) {
      return this.run<T>(unit, statement, expectRows);
    }
    // Outside a unit: a single-statement unit, committed by itself only in auto-commit mode
    return this.unitOfWork(() => this.execute<T>(statement, expectRows));
  }

  /**
   * Runs `fn` on one dedicated client. With auto-commit off, statements issued
   * inside `fn` share one transaction that is rolled back unless `commit()` ran
   * after the last of them.
   */
  async unitOfWork<T>(fn: () => Promise<T>): Promise<T> {
    if (this.currentUnit()) {
      return fn();
    }

    const client = await this.acquire();
    const unit: UnitOfWork = { owner: this, client, inTransaction: false };
    let releaseError: Error | undefined;

    try {
      return await units.run(unit, fn);
    } finally {
      if (unit.inTransaction) {
        try {
          await client.query('ROLLBACK');
          this.log.debug('Rolled back uncommitted statements');
        } catch (err) {
          this.log.error({ err }, 'Rollback failed; dropping client');
          releaseError = err instanceof Error ? err : new Error(String(err));
        }
      }
      client.release(releaseError);
    }
  }

  /** Commits the open transaction of the current unit of work. */
  async commit(): Promise<void> {
    const unit = this.currentUnit();
    if (!unit) {
      throw new TransactionScopeError(this.name, 'commit');
    }
    if (this.autoCommit || !unit.inTransaction) {
      return;
    }
    await unit.client.query('COMMIT');
    unit.inTransaction = false;
  }

  /** Ends the pool. Errors are logged, never thrown. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.pool.end();
      this.log.info('PostgreSQL pool closed');
    } catch (err) {
      this.log.error({ err }, 'Error detected closing the PostgreSQL pool');
    }
  }

  private currentUnit(): UnitOfWork | undefined {
    const unit = units.getStore();
    return unit?.owner === this ? unit : undefined;
  }

  private async run<T>(unit: UnitOfWork, statement: SqlStatement, expectRows: boolean): Promise<SqlResult<T>> {
    const text = convertPlaceholders(statement.text);

    try {
      if (!this.autoCommit && !unit.inTransaction) {
        await unit.client.query('BEGIN');
        unit.inTransaction = true;
      }

      const result = await unit.client.query(text, statement.values ?? []);

      if (!expectRows) {
        return { status: 'executed', rowCount: result.rowCount ?? 0 };
      }
      if (result.rows.length === 0) {
        return { status: 'empty' };
      }
      // Row shape is dictated by the stored procedure being called
      return { status: 'rows', rows: result.rows as T[] };
    } catch (err) {
      this.log.error({ err, sql: statement.text }, 'Error detected executing SQL');
      return { status: 'failed', error: err };
    }
  }
}

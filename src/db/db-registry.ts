import type { DatabaseParams } from '../config/database.js';
import { createChildLogger } from '../utils/logger.js';
import { UnknownDatabaseError } from './errors.js';
import { PgConnection, type PgConnectionOptions } from './pg-connection.js';
import type { SqlResult, SqlStatement } from './sql-result.js';

const log = createChildLogger('db-registry');

export type RegistryDefaults = Omit<PgConnectionOptions, 'autoCommit'>;

/**
 * Holds one PgConnection per logical database name and dispatches by name.
 * Owned by the composition root; routes receive it (or a repository built on it)
 * through plugin options.
 */
export class DbRegistry {
  private readonly connections = new Map<string, PgConnection>();

  constructor(private readonly defaults: RegistryDefaults = {}) {}

  register(name: string, params: DatabaseParams, autoCommit: boolean): PgConnection {
    if (this.connections.has(name)) {
      throw new Error(`Database "${name}" is already registered`);
    }
    const connection = new PgConnection(name, params, { ...this.defaults, autoCommit });
    this.connections.set(name, connection);
    log.info({ database: name, host: params.host, autoCommit }, 'Database registered');
    return connection;
  }

  get(name: string): PgConnection {
    const connection = this.connections.get(name);
    if (!connection) {
      throw new UnknownDatabaseError(name);
    }
    return connection;
  }

  names(): string[] {
    return [...this.connections.keys()];
  }

  execute<T = Record<string, unknown>>(
    name: string,
    statement: SqlStatement,
    expectRows = true,
  ): Promise<SqlResult<T>> {
    return this.get(name).execute<T>(statement, expectRows);
  }

  commit(name: string): Promise<void> {
    return this.get(name).commit();
  }

  unitOfWork<T>(name: string, fn: () => Promise<T>): Promise<T> {
    return this.get(name).unitOfWork(fn);
  }

  async healthCheck(): Promise<Record<string, boolean>> {
    const entries = await Promise.all(
      [...this.connections.entries()].map(async ([name, connection]) =>
        [name, await connection.healthCheck()] as const),
    );
    return Object.fromEntries(entries);
  }

  async close(): Promise<void> {
    const connections = [...this.connections.values()];
    this.connections.clear();
    await Promise.all(connections.map((connection) => connection.close()));
  }
}

export class UnknownDatabaseError extends Error {
  public readonly code = 'ERR_UNKNOWN_DATABASE';

  constructor(public readonly databaseName: string) {
    super(`No database registered under the name "${databaseName}"`);
    this.name = 'UnknownDatabaseError';
  }
}

export class DatabaseUnavailableError extends Error {
  public readonly code = 'ERR_DATABASE_UNAVAILABLE';

  constructor(
    public readonly databaseName: string,
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(`Database "${databaseName}" is unreachable after ${attempts} connection attempt(s)`, options);
    this.name = 'DatabaseUnavailableError';
  }
}

/**
 * Raised by repository reads when the statement failed. The message names the
 * procedure only; the SQL error itself is logged where it happened.
 */
export class StatementFailedError extends Error {
  public readonly code = 'ERR_STATEMENT_FAILED';

  constructor(public readonly procedure: string, options?: { cause?: unknown }) {
    super(`Statement calling ${procedure} failed`, options);
    this.name = 'StatementFailedError';
  }
}

export class TransactionScopeError extends Error {
  public readonly code = 'ERR_TRANSACTION_SCOPE';

  constructor(databaseName: string, operation: string) {
    super(`${operation} on database "${databaseName}" must run inside a unit of work`);
    this.name = 'TransactionScopeError';
  }
}

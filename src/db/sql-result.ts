/**
 * Outcome of a single statement.
 *
 * - `rows`: rows were expected and at least one came back
 * - `empty`: rows were expected and none came back
 * - `executed`: rows were not expected; carries the affected row count
 * - `failed`: the statement threw; the error is kept for logging only
 */
export type SqlResult<T = Record<string, unknown>> =
  | { status: 'rows'; rows: T[] }
  | { status: 'empty' }
  | { status: 'executed'; rowCount: number }
  | { status: 'failed'; error: unknown };

export interface SqlStatement {
  /** SQL text with `?` placeholders. */
  text: string;
  values?: unknown[];
}

export function sql(text: string, ...values: unknown[]): SqlStatement {
  return { text, values };
}

export function isFailed<T>(result: SqlResult<T>): result is { status: 'failed'; error: unknown } {
  return result.status === 'failed';
}

/** First column of the first row, the shape every `SELECT public.fn(...)` call returns. */
export function firstValue(result: SqlResult): unknown {
  if (result.status !== 'rows') return null;
  const [row] = result.rows;
  const [value] = Object.values(row ?? {});
  return value ?? null;
}

import type { PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type { LogContext } from '../../interfaces/index.js';
import { PgAppendOnlyLog, type LogDatabase } from './append-only-log.js';

/**
 * Stream names used when both logs share the `log_lines` table.
 */
export const PG_STREAMS = {
  predictions: 'predictions.jsonl',
  halts: 'halts.jsonl',
} as const;

/**
 * Create a LogContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: config.databaseUrl });
 * const logs = createPgLogContext(db);
 * ```
 */
export function createPgLogContext<TQueryResult extends PgQueryResultHKT>(
  db: LogDatabase<TQueryResult>
): LogContext {
  return {
    predictions: new PgAppendOnlyLog(db, PG_STREAMS.predictions),
    halts: new PgAppendOnlyLog(db, PG_STREAMS.halts),
  };
}

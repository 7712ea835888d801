export { PgAppendOnlyLog, type LogDatabase } from './append-only-log.js';
export { createPgLogContext, PG_STREAMS } from './context.js';

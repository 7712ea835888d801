import { pgTable, bigserial, integer, text, timestamp, index, uniqueIndex } from 'drizzle-orm/pg-core';

/**
 * Log lines table - every append-only stream in one table.
 *
 * Design notes:
 * - Append-only: no updates or deletes in normal operation
 * - `line` keeps the exact NDJSON text so reads return the appended bytes
 * - `line_no` is 1-based per stream and matches the "<stream>@<n>" evidence ref
 */
export const logLines = pgTable(
  'log_lines',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    stream: text('stream').notNull(), // e.g., "predictions.jsonl", "halts.jsonl"
    lineNo: integer('line_no').notNull(),
    line: text('line').notNull(),
    appendedAt: timestamp('appended_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('log_lines_stream_line_idx').on(table.stream, table.lineNo),
    index('log_lines_appended_at_idx').on(table.appendedAt),
  ]
);

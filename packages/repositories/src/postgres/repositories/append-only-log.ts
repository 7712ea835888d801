import { asc, eq, max } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type { CapabilityAdapterGate, EvidenceRef, JsonObject } from '@ledgerline/protocol';
import { stringifyNdjsonLine } from '@ledgerline/protocol';
import * as schema from '../schema/index.js';
import type { AppendOnlyLog } from '../../interfaces/index.js';
import { enforceCapabilityGate } from '../../gate.js';

/**
 * Any Drizzle Postgres database carrying the log schema: postgres-js in
 * production, an embedded driver in tests.
 */
export type LogDatabase<TQueryResult extends PgQueryResultHKT = PgQueryResultHKT> = PgDatabase<
  TQueryResult,
  typeof schema
>;

/**
 * AppendOnlyLog stored as rows of the `log_lines` table, one stream per name.
 * Assumes a single writer per stream; the unique (stream, line_no) index
 * rejects a second writer racing for the same line.
 */
export class PgAppendOnlyLog<TQueryResult extends PgQueryResultHKT> implements AppendOnlyLog {
  constructor(
    private db: LogDatabase<TQueryResult>,
    readonly name: string
  ) {}

  async append(record: JsonObject, gate: CapabilityAdapterGate): Promise<EvidenceRef> {
    enforceCapabilityGate(`append to ${this.name}`, gate);

    const line = stringifyNdjsonLine(record).trimEnd();

    const lineNo = await this.db.transaction(async (tx) => {
      const [row] = await tx
        .select({ last: max(schema.logLines.lineNo) })
        .from(schema.logLines)
        .where(eq(schema.logLines.stream, this.name));

      const next = (row?.last ?? 0) + 1;

      await tx.insert(schema.logLines).values({
        stream: this.name,
        lineNo: next,
        line,
      });

      return next;
    });

    return { kind: 'jsonl', ref: `${this.name}@${lineNo}` };
  }

  async read(): Promise<string> {
    const rows = await this.db
      .select({ line: schema.logLines.line })
      .from(schema.logLines)
      .where(eq(schema.logLines.stream, this.name))
      .orderBy(asc(schema.logLines.lineNo));

    return rows.map((row) => row.line + '\n').join('');
  }
}

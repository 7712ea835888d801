// In-memory AppendOnlyLog implementation for development and testing
//
// Data does not persist between restarts.

import type { CapabilityAdapterGate, EvidenceRef, JsonObject } from '@ledgerline/protocol';
import { isRecord, stringifyNdjsonLine } from '@ledgerline/protocol';
import type { AppendOnlyLog, LogContext } from '../interfaces/index.js';
import { enforceCapabilityGate } from '../gate.js';

/**
 * In-memory log with direct access to its lines (for inspection in tests).
 */
export interface InMemoryAppendOnlyLog extends AppendOnlyLog {
  /** Appended lines, each without its trailing newline */
  readonly lines: readonly string[];
  /** Parsed records in append order */
  records(): JsonObject[];
}

/**
 * Create an in-memory AppendOnlyLog.
 *
 * @param name - Stream name used in evidence refs
 * @param initialContent - Optional NDJSON content to start from (e.g. a copied log)
 */
export function createInMemoryLog(name: string, initialContent = ''): InMemoryAppendOnlyLog {
  const lines: string[] = initialContent
    .split('\n')
    .filter((line) => line.trim().length > 0);

  return {
    name,
    lines,

    async append(record: JsonObject, gate: CapabilityAdapterGate): Promise<EvidenceRef> {
      enforceCapabilityGate(`append to ${name}`, gate);
      lines.push(stringifyNdjsonLine(record).trimEnd());
      return { kind: 'jsonl', ref: `${name}@${lines.length}` };
    },

    async read(): Promise<string> {
      return lines.map((line) => line + '\n').join('');
    },

    records(): JsonObject[] {
      const parsed: JsonObject[] = [];
      for (const line of lines) {
        const value: unknown = JSON.parse(line);
        if (isRecord(value)) {
          parsed.push(value);
        }
      }
      return parsed;
    },
  };
}

/**
 * LogContext whose streams are in-memory logs.
 */
export interface InMemoryLogContext extends LogContext {
  readonly predictions: InMemoryAppendOnlyLog;
  readonly halts: InMemoryAppendOnlyLog;
}

/**
 * Create a complete in-memory LogContext.
 */
export function createInMemoryLogContext(): InMemoryLogContext {
  return {
    predictions: createInMemoryLog('predictions.jsonl'),
    halts: createInMemoryLog('halts.jsonl'),
  };
}

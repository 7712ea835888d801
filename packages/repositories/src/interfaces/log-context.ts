import type { AppendOnlyLog } from './append-only-log.js';

/**
 * LogContext bundles the two append-only streams.
 *
 * Pass a LogContext to any code that persists lineage, and swap the backing
 * store (filesystem, Postgres, in-memory) without changing the consumer.
 *
 * Example usage:
 * ```typescript
 * const logs = createFilesystemLogContext({ predictionLogPath, haltLogPath });
 * await appendHaltRecord(logs, halt, gate);
 * ```
 */
export interface LogContext {
  /**
   * Predictions, corrections, repair events and outbox events
   */
  readonly predictions: AppendOnlyLog;

  /**
   * Halt payloads
   */
  readonly halts: AppendOnlyLog;
}

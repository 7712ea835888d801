// Lineage iteration - typed entries from raw log content

import type {
  HaltRecord,
  LineageEntry,
  LineageEventKind,
  NdjsonSkipReason,
} from '@ledgerline/protocol';
import {
  HaltPayloadValidationError,
  LINEAGE_EVENT_KINDS,
  iterateNdjsonObjects,
  parseHaltRecord,
  parseLineageEvent,
} from '@ledgerline/protocol';

export type LineageSkipReason =
  | NdjsonSkipReason
  | 'unknown_event_kind'
  | 'invalid_event'
  | 'invalid_halt';

export type LineageSkipHandler = (lineNumber: number, reason: LineageSkipReason) => void;

function isLineageEventKind(value: unknown): value is LineageEventKind {
  return LINEAGE_EVENT_KINDS.some((kind) => kind === value);
}

/**
 * Yield every valid event or halt in NDJSON content, in order.
 *
 * Rows with an `eventKind` are parsed as lineage events; rows without one as
 * halt payloads. Anything else is skipped and reported through `onSkip`.
 */
export function* iterateLineageEvents(
  content: string,
  onSkip?: LineageSkipHandler
): Generator<LineageEntry> {
  for (const { lineNumber, record } of iterateNdjsonObjects(content, onSkip)) {
    if ('eventKind' in record) {
      if (!isLineageEventKind(record.eventKind)) {
        onSkip?.(lineNumber, 'unknown_event_kind');
        continue;
      }
      const event = parseLineageEvent(record);
      if (!event) {
        onSkip?.(lineNumber, 'invalid_event');
        continue;
      }
      yield { kind: 'event', event };
      continue;
    }

    let halt: HaltRecord;
    try {
      halt = parseHaltRecord(record);
    } catch (error) {
      if (!(error instanceof HaltPayloadValidationError)) throw error;
      onSkip?.(lineNumber, 'invalid_halt');
      continue;
    }
    yield { kind: 'halt', halt };
  }
}

// NDJSON (Newline Delimited JSON) helpers
// Used for the append-only prediction and halt logs

import { isRecord } from '../validation/guards.js';

/**
 * Stringify a single item as an NDJSON line (for appending)
 */
export function stringifyNdjsonLine<T>(item: T): string {
  return JSON.stringify(item) + '\n';
}

/**
 * Count the non-empty lines of NDJSON content.
 * Line numbers in evidence refs are 1-based positions among these lines.
 */
export function countNdjsonLines(content: string): number {
  if (!content) {
    return 0;
  }
  return content.split('\n').filter((line) => line.trim().length > 0).length;
}

/**
 * Why a line was skipped by `iterateNdjsonObjects`
 */
export type NdjsonSkipReason = 'invalid_json' | 'not_an_object';

/**
 * A JSON object read from one NDJSON line
 */
export type NdjsonObjectLine = {
  /** 1-based position among the non-empty lines, matching `file@N` refs */
  lineNumber: number;
  record: Record<string, unknown>;
};

/**
 * Yield every line of the content that parses as a JSON object.
 *
 * Blank lines are ignored. Invalid JSON and non-object values are skipped and
 * reported through `onSkip`; one corrupt line never stops the rest.
 */
export function* iterateNdjsonObjects(
  content: string,
  onSkip?: (lineNumber: number, reason: NdjsonSkipReason) => void
): Generator<NdjsonObjectLine> {
  let lineNumber = 0;

  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!line) continue;
    lineNumber += 1;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      onSkip?.(lineNumber, 'invalid_json');
      continue;
    }

    if (!isRecord(parsed)) {
      onSkip?.(lineNumber, 'not_an_object');
      continue;
    }

    yield { lineNumber, record: parsed };
  }
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isRecord(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      if (value[key] !== undefined) {
        sorted[key] = sortKeys(value[key]);
      }
    }
    return sorted;
  }
  return value;
}

/**
 * Stringify with object keys sorted at every depth, so equal values always
 * serialize to identical bytes.
 */
export function stringifyCanonical(value: unknown, indent?: number): string {
  return JSON.stringify(sortKeys(value), null, indent) ?? 'null';
}

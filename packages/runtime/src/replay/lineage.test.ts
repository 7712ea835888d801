// Tests for lineage iteration over raw log content

import { describe, it, expect } from 'vitest';
import { iterateLineageEvents, type LineageSkipReason } from './lineage.js';

// --- Test Fixtures ---

const REQUEST = {
  eventKind: 'ask_outbox_request',
  requestId: 'ask:1',
  scope: 'start',
  reason: 'operator review',
  evidenceRefs: [],
  createdAt: '2026-03-01T12:00:00.000Z',
  metadata: {},
};

const HALT = {
  haltId: 'halt:abc',
  stage: 'pre-decision:pre_consume',
  invariantId: 'prediction_availability.v1',
  reason: 'Action selection requires at least one projected current prediction.',
  details: { message: 'Action selection requires at least one projected current prediction.' },
  evidence: [{ kind: 'scope', ref: 'decision_stage' }],
  retryability: true,
  timestamp: '2026-03-01T12:00:00.000Z',
};

describe('iterateLineageEvents', () => {
  it('yields events and halts in log order', () => {
    const content = [JSON.stringify(HALT), JSON.stringify(REQUEST)].join('\n');

    const entries = [...iterateLineageEvents(content)];

    expect(entries.map((entry) => entry.kind)).toEqual(['halt', 'event']);
    const [halt, event] = entries;
    expect(halt.kind === 'halt' && halt.halt.haltId).toBe('halt:abc');
    expect(event.kind === 'event' && event.event.eventKind).toBe('ask_outbox_request');
  });

  it('reports skipped rows with their line numbers', () => {
    const skipped: Array<[number, LineageSkipReason]> = [];
    const content = [
      JSON.stringify({ eventKind: 'mystery' }),
      JSON.stringify({ ...REQUEST, requestId: 7 }),
      JSON.stringify({ stage: 'pre-output' }),
    ].join('\n');

    const entries = [...iterateLineageEvents(content, (lineNumber, reason) => {
      skipped.push([lineNumber, reason]);
    })];

    expect(entries).toEqual([]);
    expect(skipped).toEqual([
      [1, 'unknown_event_kind'],
      [2, 'invalid_event'],
      [3, 'invalid_halt'],
    ]);
  });
});

// Tests for outcome binding

import { describe, it, expect } from 'vitest';
import type { PredictionRecord } from '@ledgerline/protocol';
import { bindPredictionOutcome } from './binder.js';

// --- Test Fixtures ---

function createMockPrediction(overrides: Partial<PredictionRecord> = {}): PredictionRecord {
  return {
    predictionId: 'pred:1',
    scopeKey: 'turn:1',
    targetVariable: 'user_response_present',
    expectation: 0.75,
    wasCorrected: false,
    correctionRevision: 0,
    issuedAt: '2026-03-01T11:00:00.000Z',
    assumptions: [],
    evidenceRefs: [],
    ...overrides,
  };
}

describe('bindPredictionOutcome', () => {
  it('computes the signed and absolute error', () => {
    const { prediction, outcome } = bindPredictionOutcome(
      createMockPrediction(),
      1,
      '2026-03-01T12:00:00.000Z'
    );

    expect(outcome).toEqual({
      predictionId: 'pred:1',
      scopeKey: 'turn:1',
      targetVariable: 'user_response_present',
      observedOutcome: 1,
      errorMetric: 0.25,
      absoluteError: 0.25,
      recordedAt: '2026-03-01T12:00:00.000Z',
    });
    expect(prediction.predictionError).toBe(0.25);
    expect(prediction.absoluteError).toBe(0.25);
  });

  it('marks the record corrected and starts its lineage at itself', () => {
    const { prediction } = bindPredictionOutcome(createMockPrediction(), 0, '2026-03-01T12:00:00.000Z');

    expect(prediction).toMatchObject({
      predictionId: 'pred:1',
      wasCorrected: true,
      correctionRevision: 1,
      correctionParentPredictionId: 'pred:1',
      correctionRootPredictionId: 'pred:1',
      observedValue: 0,
      comparedAt: '2026-03-01T12:00:00.000Z',
      correctedAt: '2026-03-01T12:00:00.000Z',
    });
    expect(prediction.absoluteError).toBe(0.75);
  });

  it('keeps an existing root and advances the revision', () => {
    const { prediction } = bindPredictionOutcome(
      createMockPrediction({ correctionRootPredictionId: 'pred:0', correctionRevision: 2 }),
      1,
      '2026-03-01T12:00:00.000Z'
    );

    expect(prediction.correctionRootPredictionId).toBe('pred:0');
    expect(prediction.correctionRevision).toBe(3);
  });

  it('reports zero error without an expectation', () => {
    const { outcome } = bindPredictionOutcome(
      createMockPrediction({ expectation: undefined }),
      1,
      '2026-03-01T12:00:00.000Z'
    );

    expect(outcome.errorMetric).toBe(0);
    expect(outcome.absoluteError).toBe(0);
  });

  it('does not modify the input', () => {
    const original = createMockPrediction();

    bindPredictionOutcome(original, 1, '2026-03-01T12:00:00.000Z');

    expect(original.wasCorrected).toBe(false);
    expect(original.correctionRevision).toBe(0);
  });
});

// Outcome binding - compare an observed value to a prediction

import type { PredictionOutcome, PredictionRecord, Timestamp } from '@ledgerline/protocol';

export type BoundPrediction = {
  prediction: PredictionRecord;
  outcome: PredictionOutcome;
};

/**
 * Bind an observed value to a prediction.
 *
 * The returned record keeps the prediction id, advances the correction
 * revision by one and keeps the chain's root (the record itself when it has
 * none yet). Without an expectation the error is 0.
 */
export function bindPredictionOutcome(
  prediction: PredictionRecord,
  observedOutcome: number,
  recordedAt: Timestamp
): BoundPrediction {
  const error = prediction.expectation === undefined ? 0 : observedOutcome - prediction.expectation;
  const absoluteError = Math.abs(error);

  return {
    prediction: {
      ...prediction,
      observedValue: observedOutcome,
      predictionError: error,
      absoluteError,
      observedAt: recordedAt,
      comparedAt: recordedAt,
      correctedAt: recordedAt,
      wasCorrected: true,
      correctionParentPredictionId: prediction.predictionId,
      correctionRootPredictionId: prediction.correctionRootPredictionId ?? prediction.predictionId,
      correctionRevision: prediction.correctionRevision + 1,
    },
    outcome: {
      predictionId: prediction.predictionId,
      scopeKey: prediction.scopeKey,
      targetVariable: prediction.targetVariable,
      observedOutcome,
      errorMetric: error,
      absoluteError,
      recordedAt,
    },
  };
}

// Prediction types - forward-looking statements and their materialized view

import type { EvidenceRef, Id, Timestamp } from './common.js';

/**
 * A single forward-looking statement made by the agent.
 *
 * A freshly issued record has `wasCorrected: false` and `correctionRevision: 0`.
 * Binding an observed outcome produces a new record with the comparison
 * fields set and the correction lineage advanced by one revision.
 */
export type PredictionRecord = {
  predictionId: Id;

  /**
   * Unit of state the prediction concerns (e.g. "turn:3")
   */
  scopeKey: string;

  /**
   * Optional finer-grained addressing key (e.g. "turn:3:user_response_present")
   */
  predictionKey?: string;

  predictionTarget?: string;

  /**
   * Information set the prediction was conditioned on (e.g. "conversation:c-1")
   */
  filtrationId?: string;

  targetVariable: string;
  targetHorizon?: Timestamp;
  targetHorizonTurns?: number;

  confidence?: number;
  uncertainty?: number;

  /**
   * Expected value of the target variable; comparisons are skipped when absent
   */
  expectation?: number;
  variance?: number;

  observedValue?: number;
  predictionError?: number;
  absoluteError?: number;

  wasCorrected: boolean;

  /**
   * Immediate predecessor in the correction chain
   */
  correctionParentPredictionId?: Id;

  /**
   * First prediction in the correction chain
   */
  correctionRootPredictionId?: Id;

  /**
   * Monotonic counter from the root (0 = never corrected)
   */
  correctionRevision: number;

  issuedAt: Timestamp;
  observedAt?: Timestamp;
  comparedAt?: Timestamp;
  correctedAt?: Timestamp;

  assumptions: string[];
  evidenceRefs: EvidenceRef[];
};

/**
 * Standalone result of comparing an observed value to a prediction.
 */
export type PredictionOutcome = {
  predictionId: Id;
  scopeKey: string;
  targetVariable: string;
  observedOutcome: number;

  /**
   * observed - expectation (0 when the prediction has no expectation)
   */
  errorMetric: number;
  absoluteError: number;
  recordedAt: Timestamp;
};

/**
 * Aggregate comparison metrics carried on the projection.
 */
export type CorrectionMetrics = {
  comparisons: number;
  absoluteErrorTotal: number;
  meanAbsoluteError: number;
};

/**
 * The current materialized view: a pure fold over the prediction log.
 */
export type ProjectionState = {
  /**
   * scopeKey -> latest record for that scope
   */
  currentPredictions: Record<string, PredictionRecord>;

  /**
   * Every record folded into the view, in fold order
   */
  predictionHistory: PredictionRecord[];

  correctionMetrics: CorrectionMetrics;
  lastComparisonAt: Timestamp | null;
  updatedAt: Timestamp;
};

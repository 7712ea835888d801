// Repair types - the audit pair recorded in repair-events mode

import type { Id, Timestamp } from './common.js';
import type { PredictionOutcome, PredictionRecord } from './predictions.js';

export type RepairDecision = 'accepted' | 'rejected';

/**
 * Points a repair event back at the prediction it concerns.
 */
export type RepairLineageRef = {
  conversationId?: Id;
  episodeId?: Id;
  turnIndex?: number;
  scopeKey: string;
  predictionId: Id;
  correctionRootPredictionId: Id;
};

/**
 * Proposes a corrected prediction without mutating the original record.
 */
export type RepairProposalEvent = {
  readonly eventKind: 'repair_proposal';
  readonly repairId: Id;
  readonly proposedAt: Timestamp;
  readonly reason: string;
  readonly invariantId: string;
  readonly lineageRef: Readonly<RepairLineageRef>;
  readonly proposedPrediction: Readonly<PredictionRecord>;
  readonly predictionOutcome: Readonly<PredictionOutcome>;
};

type RepairResolutionBase = {
  readonly eventKind: 'repair_resolution';
  readonly repairId: Id;
  readonly proposalEventKind: 'repair_proposal';
  readonly resolvedAt: Timestamp;
  readonly lineageRef: Readonly<RepairLineageRef>;
};

/**
 * Records the decision on a proposal. Only accepted resolutions change the
 * projection on replay.
 */
export type RepairResolutionEvent =
  | (RepairResolutionBase & {
      readonly decision: 'accepted';
      readonly acceptedPrediction: Readonly<PredictionRecord>;
    })
  | (RepairResolutionBase & {
      readonly decision: 'rejected';
      readonly rejectionReason: string;
    });

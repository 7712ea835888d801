// Log event types - what the append-only prediction log holds

import type { Id } from './common.js';
import type { HaltRecord } from './halts.js';
import type { PredictionRecord, ProjectionState } from './predictions.js';
import type { RepairProposalEvent, RepairResolutionEvent } from './repairs.js';
import type { AskOutboxRequestEvent, AskOutboxResponseEvent } from './outbox.js';

/**
 * Event kinds recognized in the prediction log.
 */
export const LINEAGE_EVENT_KINDS = [
  'prediction',
  'prediction_record',
  'repair_proposal',
  'repair_resolution',
  'ask_outbox_request',
  'ask_outbox_response',
] as const;

export type LineageEventKind = (typeof LINEAGE_EVENT_KINDS)[number];

/**
 * A prediction as persisted in the log, tagged with the episode that wrote it.
 */
export type PredictionLogEvent = PredictionRecord & {
  eventKind: 'prediction' | 'prediction_record';
  episodeId?: Id;
  conversationId?: Id;
  turnIndex?: number;
};

/**
 * Any record appended to the prediction log.
 */
export type LineageEvent =
  | PredictionLogEvent
  | RepairProposalEvent
  | RepairResolutionEvent
  | AskOutboxRequestEvent
  | AskOutboxResponseEvent;

/**
 * One validated row read back from a log: either a lineage event or a halt.
 * Halts are persisted without an `eventKind`, so rows are tagged on read.
 */
export type LineageEntry =
  | { kind: 'event'; event: LineageEvent }
  | { kind: 'halt'; halt: HaltRecord };

/**
 * Correction cost billed back to the root of a correction chain.
 */
export type CorrectionCostAttribution = {
  rootPredictionId: Id;
  correctionCount: number;
  correctionCostTotal: number;
};

/**
 * Analytics derivable from persisted lineage alone.
 */
export type ProjectionAnalyticsSnapshot = {
  correctionCount: number;
  haltCount: number;
  correctionCostTotal: number;
  correctionCostMean: number;
  correctionCostAttribution: Record<Id, CorrectionCostAttribution>;
  outstandingHumanRequests: Record<Id, AskOutboxRequestEvent>;
  resolvedHumanRequests: Record<Id, AskOutboxResponseEvent>;

  /**
   * requestId -> response status
   */
  requestOutcomeLinkage: Record<Id, string>;
};

export type ProjectionReplayResult = {
  projectionState: ProjectionState;
  analyticsSnapshot: ProjectionAnalyticsSnapshot;
  recordsProcessed: number;
};

// Projection - the current view as a pure fold over the prediction log
//
// `projectCurrent` is the online step; `replayProjectionAnalytics` rebuilds
// the same view offline from persisted lineage alone. Replaying identical
// content always yields an identical result.

import type {
  AskOutboxRequestEvent,
  AskOutboxResponseEvent,
  CorrectionCostAttribution,
  CorrectionMetrics,
  Id,
  LineageEntry,
  PredictionRecord,
  ProjectionAnalyticsSnapshot,
  ProjectionReplayResult,
  ProjectionState,
  RepairResolutionEvent,
  Timestamp,
} from '@ledgerline/protocol';
import { EPOCH_TIMESTAMP } from '@ledgerline/protocol';
import type { AppendOnlyLog } from '@ledgerline/repositories';
import type { LineageSkipHandler } from './lineage.js';
import { iterateLineageEvents } from './lineage.js';

export const EMPTY_CORRECTION_METRICS: CorrectionMetrics = {
  comparisons: 0,
  absoluteErrorTotal: 0,
  meanAbsoluteError: 0,
};

export function createEmptyProjection(updatedAt: Timestamp = EPOCH_TIMESTAMP): ProjectionState {
  return {
    currentPredictions: {},
    predictionHistory: [],
    correctionMetrics: { ...EMPTY_CORRECTION_METRICS },
    lastComparisonAt: null,
    updatedAt,
  };
}

/**
 * When a record took effect: correction, then comparison, then issue time.
 */
export function predictionEventTime(record: PredictionRecord): Timestamp {
  return record.correctedAt ?? record.comparedAt ?? record.issuedAt;
}

/**
 * Fold one record into the view: it becomes current for its scope and is
 * appended to the history.
 */
export function projectCurrent(
  record: PredictionRecord,
  state: ProjectionState,
  updatedAt: Timestamp = predictionEventTime(record)
): ProjectionState {
  return {
    currentPredictions: { ...state.currentPredictions, [record.scopeKey]: record },
    predictionHistory: [...state.predictionHistory, record],
    correctionMetrics: { ...state.correctionMetrics },
    lastComparisonAt: state.lastComparisonAt,
    updatedAt,
  };
}

/**
 * Apply a repair resolution. Only accepted resolutions change the view.
 */
export function applyRepairResolution(
  state: ProjectionState,
  resolution: RepairResolutionEvent
): ProjectionState {
  if (resolution.decision !== 'accepted') {
    return state;
  }
  return projectCurrent(resolution.acceptedPrediction, state, resolution.resolvedAt);
}

/**
 * Identity used to fold each logical record once, although a prediction is
 * persisted as both a `prediction` and a `prediction_record` event.
 */
export function predictionFingerprint(record: PredictionRecord): string {
  return JSON.stringify([
    record.predictionId,
    record.correctionRevision,
    record.comparedAt ?? null,
    record.correctedAt ?? null,
    record.wasCorrected,
    record.absoluteError ?? null,
    record.expectation ?? null,
  ]);
}

function correctedFingerprint(record: PredictionRecord): string {
  return JSON.stringify([
    record.predictionId,
    record.correctionRevision,
    record.comparedAt ?? null,
    record.correctedAt ?? null,
    record.absoluteError ?? null,
  ]);
}

/**
 * The prediction an entry carries, if any.
 */
function predictionOf(entry: LineageEntry): PredictionRecord | null {
  if (entry.kind !== 'event') return null;
  const { event } = entry;
  switch (event.eventKind) {
    case 'prediction':
    case 'prediction_record': {
      const { eventKind, episodeId, conversationId, turnIndex, ...record } = event;
      return record;
    }
    case 'repair_resolution':
      return event.decision === 'accepted' ? event.acceptedPrediction : null;
    default:
      return null;
  }
}

/**
 * Analytics derived from persisted lineage alone: corrections and their cost
 * per correction root, halts, and human-request outcomes.
 */
export function deriveProjectionAnalytics(
  entries: Iterable<LineageEntry>
): ProjectionAnalyticsSnapshot {
  let correctionCount = 0;
  let correctionCostTotal = 0;
  let haltCount = 0;
  const attribution: Record<Id, CorrectionCostAttribution> = {};
  const outstanding = new Map<Id, AskOutboxRequestEvent>();
  const resolved: Record<Id, AskOutboxResponseEvent> = {};
  const linkage: Record<Id, string> = {};
  const seen = new Set<string>();

  for (const entry of entries) {
    if (entry.kind === 'halt') {
      haltCount += 1;
      continue;
    }

    const { event } = entry;
    if (event.eventKind === 'ask_outbox_request') {
      outstanding.set(event.requestId, event);
      continue;
    }
    if (event.eventKind === 'ask_outbox_response') {
      resolved[event.requestId] = event;
      linkage[event.requestId] = event.status;
      outstanding.delete(event.requestId);
      continue;
    }

    const record = predictionOf(entry);
    if (!record || !record.wasCorrected || record.absoluteError === undefined) continue;

    const fingerprint = correctedFingerprint(record);
    if (seen.has(fingerprint)) continue;
    seen.add(fingerprint);

    correctionCount += 1;
    correctionCostTotal += record.absoluteError;

    const rootId = record.correctionRootPredictionId ?? record.predictionId;
    const previous = attribution[rootId];
    attribution[rootId] = {
      rootPredictionId: rootId,
      correctionCount: (previous?.correctionCount ?? 0) + 1,
      correctionCostTotal: (previous?.correctionCostTotal ?? 0) + record.absoluteError,
    };
  }

  return {
    correctionCount,
    haltCount,
    correctionCostTotal,
    correctionCostMean: correctionCount > 0 ? correctionCostTotal / correctionCount : 0,
    correctionCostAttribution: attribution,
    outstandingHumanRequests: Object.fromEntries(outstanding),
    resolvedHumanRequests: resolved,
    requestOutcomeLinkage: linkage,
  };
}

export type ReplayOptions = {
  onSkip?: LineageSkipHandler;
};

/**
 * Rebuild the projection and analytics from prediction-log content.
 *
 * Predictions fold at their event time and accepted repair resolutions at
 * their resolution time; each logical record is folded once. Correction
 * metrics come from the analytics.
 */
export function replayProjectionAnalytics(
  content: string,
  options: ReplayOptions = {}
): ProjectionReplayResult {
  const entries = [...iterateLineageEvents(content, options.onSkip)];
  let projection = createEmptyProjection();
  let recordsProcessed = 0;
  const seen = new Set<string>();

  for (const entry of entries) {
    if (entry.kind !== 'event') continue;
    const { event } = entry;
    if (
      event.eventKind !== 'prediction' &&
      event.eventKind !== 'prediction_record' &&
      event.eventKind !== 'repair_resolution'
    ) {
      continue;
    }

    const record = predictionOf(entry);
    if (!record) continue;

    const fingerprint = predictionFingerprint(record);
    if (seen.has(fingerprint)) continue;
    seen.add(fingerprint);

    projection =
      event.eventKind === 'repair_resolution'
        ? applyRepairResolution(projection, event)
        : projectCurrent(record, projection);
    recordsProcessed += 1;
  }

  const analyticsSnapshot = deriveProjectionAnalytics(entries);
  const lastCorrected = [...projection.predictionHistory]
    .reverse()
    .find((record) => record.wasCorrected);

  return {
    projectionState: {
      ...projection,
      correctionMetrics:
        analyticsSnapshot.correctionCount > 0
          ? {
              comparisons: analyticsSnapshot.correctionCount,
              absoluteErrorTotal: analyticsSnapshot.correctionCostTotal,
              meanAbsoluteError: analyticsSnapshot.correctionCostMean,
            }
          : { ...EMPTY_CORRECTION_METRICS },
      lastComparisonAt: lastCorrected
        ? (lastCorrected.comparedAt ?? lastCorrected.correctedAt ?? null)
        : null,
    },
    analyticsSnapshot,
    recordsProcessed,
  };
}

/**
 * Replay several logs as if their content were one, in the given order.
 */
export async function replayLogs(
  logs: AppendOnlyLog[],
  options: ReplayOptions = {}
): Promise<ProjectionReplayResult> {
  const contents: string[] = [];
  for (const log of logs) {
    const content = await log.read();
    contents.push(content.length > 0 && !content.endsWith('\n') ? `${content}\n` : content);
  }
  return replayProjectionAnalytics(contents.join(''), options);
}

export type LineageViolationCode = 'missing_root' | 'unknown_parent' | 'revision_gap';

export type LineageViolation = {
  predictionId: Id;
  correctionRevision: number;
  code: LineageViolationCode;
  message: string;
};

/**
 * Check that every correction names its root, points at a parent already in
 * the history, and advances its chain's revision by exactly one.
 */
export function verifyCorrectionLineage(history: readonly PredictionRecord[]): LineageViolation[] {
  const violations: LineageViolation[] = [];
  const seenIds = new Set<Id>();
  const lastRevision = new Map<Id, number>();

  for (const record of history) {
    const rootId = record.correctionRootPredictionId ?? record.predictionId;
    const violation = (code: LineageViolationCode, message: string) =>
      violations.push({
        predictionId: record.predictionId,
        correctionRevision: record.correctionRevision,
        code,
        message,
      });

    if (record.wasCorrected) {
      if (!record.correctionRootPredictionId) {
        violation('missing_root', 'corrected record has no correction root');
      }
      if (record.correctionParentPredictionId && !seenIds.has(record.correctionParentPredictionId)) {
        violation(
          'unknown_parent',
          `parent ${record.correctionParentPredictionId} is not earlier in the history`
        );
      }
      const previous = lastRevision.get(rootId);
      if (previous !== undefined && record.correctionRevision !== previous + 1) {
        violation(
          'revision_gap',
          `revision ${record.correctionRevision} does not follow revision ${previous}`
        );
      }
    }

    seenIds.add(record.predictionId);
    lastRevision.set(rootId, record.correctionRevision);
  }

  return violations;
}

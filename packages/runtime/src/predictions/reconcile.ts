// Reconciliation - bind this turn's observation to outstanding predictions
//
// In strict_halt mode the corrected record is appended directly. In
// repair_events mode a repair proposal and its resolution are appended
// instead, and only an accepted resolution changes the projection.

import type {
  Episode,
  EvidenceRef,
  InvariantHandlingMode,
  PredictionRecord,
  ProjectionState,
  RepairLineageRef,
  RepairProposalEvent,
} from '@ledgerline/protocol';
import { createRepairProposal, createRepairResolution } from '@ledgerline/protocol';
import type { RuntimeContext } from '../context.js';
import { shortHash } from '../hashing.js';
import { createCheckContext, runInvariant } from '../invariants/registry.js';
import { currentPredictionIds } from '../gates/evaluator.js';
import { issueSystemGate } from '../capabilities/policy.js';
import { appendRepairEvent } from '../persistence/appenders.js';
import { appendArtifact } from '../episodes/artifacts.js';
import { extractUserUtterance } from '../episodes/episode.js';
import { applyRepairResolution, projectCurrent } from '../replay/projection.js';
import { appendPredictionRecord } from './append.js';
import { bindPredictionOutcome } from './binder.js';

export const USER_RESPONSE_PRESENT = 'user_response_present';

/**
 * Decision on a repair proposal.
 */
export type RepairChoice = { decision: 'accepted' } | { decision: 'rejected'; reason: string };

export type RepairResolver = (proposal: RepairProposalEvent) => RepairChoice;

export const acceptAllRepairs: RepairResolver = () => ({ decision: 'accepted' });

export type ReconcileOptions = {
  mode?: InvariantHandlingMode;
  resolveRepair?: RepairResolver;
};

export function stableRepairId(scopeKey: string, predictionId: string, comparedAt: string): string {
  return `repair:${shortHash(scopeKey, predictionId, comparedAt)}`;
}

function lineageRefFor(episode: Episode, prediction: PredictionRecord): RepairLineageRef {
  return {
    conversationId: episode.conversationId,
    episodeId: episode.id,
    turnIndex: episode.turnIndex,
    scopeKey: prediction.scopeKey,
    predictionId: prediction.predictionId,
    correctionRootPredictionId: prediction.correctionRootPredictionId ?? prediction.predictionId,
  };
}

/**
 * Predictions this turn's observation answers: current, about whether the
 * user responded, with an expectation, and not yet compared.
 */
function outstandingPredictions(projection: ProjectionState): PredictionRecord[] {
  return Object.values(projection.currentPredictions).filter(
    (record) =>
      record.targetVariable === USER_RESPONSE_PRESENT &&
      record.expectation !== undefined &&
      !record.wasCorrected
  );
}

/**
 * Bind the turn's observation (1 when the user said something, else 0) to
 * every outstanding prediction and persist the corrections.
 */
export async function reconcilePredictions(
  ctx: RuntimeContext,
  episode: Episode,
  projection: ProjectionState,
  options: ReconcileOptions = {}
): Promise<ProjectionState> {
  const mode = options.mode ?? 'strict_halt';
  const resolveRepair = options.resolveRepair ?? acceptAllRepairs;
  const observed = extractUserUtterance(episode) ? 1 : 0;

  let updated = projection;
  let compared = 0;
  let errorTotal = 0;
  let lastComparedAt: string | null = null;

  for (const prediction of outstandingPredictions(projection)) {
    const comparedAt = ctx.now();
    const bound = bindPredictionOutcome(prediction, observed, comparedAt);
    let applied = false;

    if (mode === 'repair_events') {
      const repairId = stableRepairId(prediction.scopeKey, prediction.predictionId, comparedAt);
      const lineageRef = lineageRefFor(episode, prediction);
      const proposal = createRepairProposal({
        repairId,
        proposedAt: comparedAt,
        reason: 'prediction outcome reconciliation proposed',
        invariantId: 'prediction_outcome_binding.v1',
        lineageRef,
        proposedPrediction: bound.prediction,
        predictionOutcome: bound.outcome,
      });
      const proposalEvidenceRef = await appendRepairEvent(ctx.logs, proposal, issueSystemGate(ctx));

      const choice = resolveRepair(proposal);
      const resolution =
        choice.decision === 'accepted'
          ? createRepairResolution({
              repairId,
              decision: 'accepted',
              resolvedAt: comparedAt,
              lineageRef,
              acceptedPrediction: bound.prediction,
            })
          : createRepairResolution({
              repairId,
              decision: 'rejected',
              resolvedAt: comparedAt,
              lineageRef,
              rejectionReason: choice.reason,
            });
      const resolutionEvidenceRef: EvidenceRef = await appendRepairEvent(
        ctx.logs,
        resolution,
        issueSystemGate(ctx)
      );

      updated = applyRepairResolution(updated, resolution);
      applied = resolution.decision === 'accepted';
      appendArtifact(episode, {
        artifactKind: 'repair_event',
        repairId,
        mode,
        proposal,
        resolution,
        proposalEvidenceRef,
        resolutionEvidenceRef,
      });
      ctx.logger.debug('Repair resolved', { repairId, decision: resolution.decision });
    } else {
      const result = await appendPredictionRecord(ctx, bound.prediction, {
        episode,
        projection: updated,
      });
      if (result.kind === 'appended') {
        updated = projectCurrent(bound.prediction, updated, comparedAt);
        applied = true;
      }
    }

    // Only records the projection took count toward the metrics.
    if (applied) {
      compared += 1;
      errorTotal += bound.outcome.absoluteError;
      lastComparedAt = comparedAt;
    }

    const binding = runInvariant(
      'prediction_outcome_binding.v1',
      createCheckContext({
        scope: prediction.scopeKey,
        predictionKey: prediction.scopeKey,
        currentPredictions: currentPredictionIds(updated),
        predictionOutcome: bound.outcome,
      })
    );
    appendArtifact(episode, {
      artifactKind: 'prediction_comparison',
      predictionId: bound.prediction.predictionId,
      scopeKey: prediction.scopeKey,
      expected: prediction.expectation ?? 0,
      observed,
      error: bound.outcome.errorMetric,
      absoluteError: bound.outcome.absoluteError,
      comparedAt,
      outcome: bound.outcome,
      binding,
      mode,
    });
  }

  if (compared === 0) {
    return updated;
  }

  const comparisons = updated.correctionMetrics.comparisons + compared;
  const absoluteErrorTotal = updated.correctionMetrics.absoluteErrorTotal + errorTotal;
  return {
    ...updated,
    correctionMetrics: {
      comparisons,
      absoluteErrorTotal,
      meanAbsoluteError: absoluteErrorTotal / comparisons,
    },
    lastComparisonAt: lastComparedAt,
  };
}

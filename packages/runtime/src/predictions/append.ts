// Prediction persistence behind the capability policy

import type {
  Episode,
  EvidenceRef,
  HaltRecord,
  PredictionRecord,
  ProjectionState,
} from '@ledgerline/protocol';
import type { RuntimeContext } from '../context.js';
import {
  decideCapabilityInvocation,
  gateFromDecision,
  persistPolicyDenial,
} from '../capabilities/policy.js';
import { appendPredictionEvent } from '../persistence/appenders.js';
import { createEmptyProjection } from '../replay/projection.js';

export type AppendPredictionOptions = {
  episode?: Episode | null;
  projection?: ProjectionState;

  /**
   * Whether the caller passed the gate that authorizes this write (default true)
   */
  explicitGatePassPresent?: boolean;
};

export type AppendPredictionResult =
  | { kind: 'appended'; evidenceRef: EvidenceRef; predictionEventRef: EvidenceRef }
  | { kind: 'halt'; halt: HaltRecord };

/**
 * Append a prediction to the log as a `prediction` event followed by a
 * `prediction_record` event that links back to it.
 *
 * The write is decided by the capability policy first; a denial is persisted
 * as a halt and nothing reaches the prediction log.
 */
export async function appendPredictionRecord(
  ctx: RuntimeContext,
  record: PredictionRecord,
  options: AppendPredictionOptions = {}
): Promise<AppendPredictionResult> {
  const episode = options.episode ?? null;
  let projection = options.projection ?? createEmptyProjection(ctx.now());
  if (Object.keys(projection.currentPredictions).length === 0) {
    projection = { ...projection, currentPredictions: { [record.scopeKey]: record } };
  }

  const decision = decideCapabilityInvocation(ctx, {
    observer: episode?.observer ?? null,
    projection,
    scopeKey: record.scopeKey,
    predictionKey: record.predictionKey ?? null,
    explicitGatePassPresent: options.explicitGatePassPresent ?? true,
    action: 'append_prediction_record_event',
    capability: 'prediction.persistence',
    requiredCapability: 'baseline.invariant_evaluation',
    stage: 'capability-invocation',
  });

  if (!decision.allowed) {
    const halt = await persistPolicyDenial(ctx, episode, decision);
    return { kind: 'halt', halt };
  }

  const gate = gateFromDecision(decision);
  const tags = episode
    ? { episodeId: episode.id, conversationId: episode.conversationId, turnIndex: episode.turnIndex }
    : {};

  const predictionEventRef = await appendPredictionEvent(ctx.logs, 'prediction', record, gate, tags);
  const evidenceRef = await appendPredictionEvent(
    ctx.logs,
    'prediction_record',
    { ...record, evidenceRefs: [...record.evidenceRefs, predictionEventRef] },
    gate,
    tags
  );

  ctx.logger.debug('Prediction appended', {
    predictionId: record.predictionId,
    scopeKey: record.scopeKey,
    evidenceRef: evidenceRef.ref,
  });
  return { kind: 'appended', evidenceRef, predictionEventRef };
}

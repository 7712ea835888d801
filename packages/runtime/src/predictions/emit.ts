// Turn predictions

import type { Episode, PredictionRecord } from '@ledgerline/protocol';
import type { RuntimeContext } from '../context.js';
import { USER_RESPONSE_PRESENT } from './reconcile.js';

/**
 * The prediction every turn makes: whether the user will respond.
 * Expected 1 when the ask went out cleanly, 0 otherwise.
 */
export function createTurnPrediction(ctx: RuntimeContext, episode: Episode): PredictionRecord {
  return {
    predictionId: ctx.newId('pred:'),
    scopeKey: `turn:${episode.turnIndex}`,
    predictionKey: `turn:${episode.turnIndex}:${USER_RESPONSE_PRESENT}`,
    predictionTarget: USER_RESPONSE_PRESENT,
    filtrationId: `conversation:${episode.conversationId}`,
    targetVariable: USER_RESPONSE_PRESENT,
    targetHorizon: episode.askedAt,
    targetHorizonTurns: 1,
    expectation: episode.ask.status === 'ok' ? 1 : 0,
    uncertainty: 0.5,
    wasCorrected: false,
    correctionRevision: 0,
    issuedAt: ctx.now(),
    assumptions: ['turn_observation_available'],
    evidenceRefs: [],
  };
}

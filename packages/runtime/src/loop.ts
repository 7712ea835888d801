// Mission loop - one conversational turn from prediction to interpretation
//
// Predictions are materialized before any decision stage, every stage is
// gated by invariants, and the intervention hook is consulted between
// stages. The first halt or terminal intervention ends the turn.

import type {
  BeliefState,
  Episode,
  HaltRecord,
  InterventionDecision,
  InterventionPhase,
  InvariantHandlingMode,
  ObservationFreshnessDecision,
  PredictionRecord,
  ProjectionState,
} from '@ledgerline/protocol';
import type { RuntimeContext } from './context.js';
import type {
  AskOutboxAdapter,
  InterventionHook,
  ObservationFreshnessPolicyAdapter,
  SchemaSelector,
} from './adapters.js';
import type { JustWrittenPrediction } from './invariants/registry.js';
import { evaluateInvariantGates } from './gates/evaluator.js';
import { appendArtifact, appendTurnSummary } from './episodes/artifacts.js';
import { ingestObservation } from './episodes/episode.js';
import { appendPredictionRecord } from './predictions/append.js';
import { createTurnPrediction } from './predictions/emit.js';
import { reconcilePredictions, type RepairResolver } from './predictions/reconcile.js';
import { projectCurrent } from './replay/projection.js';
import { applyInterventionHook } from './interventions/hook.js';
import { evaluateObservationFreshness } from './freshness/evaluator.js';
import { applySchemaInterpretation } from './interpretation/schema.js';
import { applyUtteranceInterpretation } from './interpretation/utterance.js';

/**
 * State carried into a turn
 */
export type MissionLoopInput = {
  episode: Episode;
  belief: BeliefState;
  projection: ProjectionState;

  /**
   * Predictions produced elsewhere this turn, persisted after the turn's own
   */
  pendingPredictions?: readonly PredictionRecord[];
};

/**
 * Options for running a turn
 */
export type MissionLoopOptions = {
  /**
   * Consulted at each lifecycle checkpoint (default: none, never intervenes)
   */
  hook?: InterventionHook;

  /**
   * Dispatches human-recruitment requests for checkpoints and freshness
   */
  outbox?: AskOutboxAdapter;

  /**
   * Supplies the turn's freshness contract (default: no freshness evaluation)
   */
  freshnessPolicy?: ObservationFreshnessPolicyAdapter;

  /**
   * Classifier for the turn's utterance (default: finds nothing)
   */
  schemaSelector?: SchemaSelector;

  /**
   * How corrections are persisted (default: strict_halt)
   */
  mode?: InvariantHandlingMode;

  /**
   * Decides repair proposals in repair_events mode (default: accept)
   */
  resolveRepair?: RepairResolver;
};

export type MissionLoopStatus = 'completed' | 'halted' | 'intervened';

/**
 * State after a turn
 */
export type MissionLoopResult = {
  status: MissionLoopStatus;
  episode: Episode;
  belief: BeliefState;
  projection: ProjectionState;

  /**
   * The halt that ended the turn, when status is "halted"
   */
  halt?: HaltRecord;

  /**
   * The decision that ended the turn, when status is "intervened"
   */
  decision?: InterventionDecision;

  freshness: ObservationFreshnessDecision | null;
};

/**
 * Run one turn.
 *
 * Order: start checkpoint, freshness, the turn's prediction, pending
 * predictions (each followed by a post-write gate), pre-decision gate,
 * checkpoint, observation ingestion, reconciliation, post-observation gate,
 * checkpoint, pre-output gate, checkpoint, schema then utterance
 * interpretation, and the turn summary.
 *
 * Every early exit also closes the turn with a summary.
 *
 * @example
 * ```typescript
 * const ctx = createRuntimeContext({ logs: createInMemoryLogContext() });
 * const episode = buildEpisode(ctx, { conversationId: 'conv:1', turnIndex: 0, ... });
 * const result = await runMissionLoop(ctx, {
 *   episode,
 *   belief: createInitialBeliefState(),
 *   projection: createEmptyProjection(),
 * });
 * ```
 */
export async function runMissionLoop(
  ctx: RuntimeContext,
  input: MissionLoopInput,
  options: MissionLoopOptions = {}
): Promise<MissionLoopResult> {
  const { hook, outbox, freshnessPolicy, schemaSelector, mode, resolveRepair } = options;
  let { episode, belief, projection } = input;
  let freshness: ObservationFreshnessDecision | null = null;

  const phase = (name: string): void => {
    ctx.logger.debug('Mission loop phase', { episodeId: episode.id, phase: name });
  };

  const finish = (
    status: MissionLoopStatus,
    extra: { halt?: HaltRecord; decision?: InterventionDecision } = {}
  ): MissionLoopResult => ({ status, episode, belief, projection, freshness, ...extra });

  const halted = (halt: HaltRecord): MissionLoopResult => {
    appendTurnSummary(episode);
    return finish('halted', { halt });
  };

  const checkpoint = async (
    checkpointPhase: InterventionPhase
  ): Promise<MissionLoopResult | null> => {
    phase(checkpointPhase);
    const { proceed, decision } = await applyInterventionHook(ctx, {
      episode,
      belief,
      projection,
      phase: checkpointPhase,
      hook,
      outbox,
    });
    if (proceed) return null;
    return finish('intervened', decision ? { decision } : {});
  };

  const started = await checkpoint('start');
  if (started) return started;

  if (freshnessPolicy) {
    phase('freshness');
    freshness = await evaluateObservationFreshness(ctx, {
      episode,
      belief,
      projection,
      policy: freshnessPolicy,
      outbox,
    });
  }

  // The turn's own prediction
  phase('prediction_emit');
  const turnPrediction = createTurnPrediction(ctx, episode);
  const emitted = await appendPredictionRecord(ctx, turnPrediction, { episode, projection });
  if (emitted.kind === 'halt') return halted(emitted.halt);

  projection = projectCurrent(turnPrediction, projection);
  appendArtifact(episode, {
    artifactKind: 'prediction_emit',
    predictionId: turnPrediction.predictionId,
    scopeKey: turnPrediction.scopeKey,
    targetVariable: turnPrediction.targetVariable,
    targetHorizon: turnPrediction.targetHorizon ?? null,
    evidenceRef: emitted.evidenceRef,
  });
  let lastWritten: JustWrittenPrediction = {
    key: turnPrediction.scopeKey,
    evidenceRefs: [emitted.evidenceRef],
  };

  // Pending predictions, each checked right after its write
  for (const pending of input.pendingPredictions ?? []) {
    phase('prediction_update');
    const appended = await appendPredictionRecord(ctx, pending, { episode, projection });
    if (appended.kind === 'halt') return halted(appended.halt);

    projection = projectCurrent(pending, projection);
    appendArtifact(episode, {
      artifactKind: 'prediction_update',
      predictionId: pending.predictionId,
      scopeKey: pending.scopeKey,
      filtrationId: pending.filtrationId ?? null,
      targetVariable: pending.targetVariable,
      evidenceRef: appended.evidenceRef,
      projectionUpdatedAt: projection.updatedAt,
    });
    lastWritten = { key: pending.scopeKey, evidenceRefs: [appended.evidenceRef] };

    const written = await evaluateInvariantGates(ctx, {
      episode,
      gatePoint: 'pending-prediction',
      scope: pending.scopeKey,
      predictionKey: pending.scopeKey,
      projection,
      justWritten: lastWritten,
    });
    if (written.kind === 'halt') return halted(written.halt);
  }

  const activeScope = Object.keys(projection.currentPredictions)[0] ?? 'decision_stage';

  phase('pre-decision');
  const preDecision = await evaluateInvariantGates(ctx, {
    episode,
    gatePoint: 'pre-decision',
    scope: activeScope,
    predictionKey: null,
    projection,
  });
  if (preDecision.kind === 'halt') return halted(preDecision.halt);

  const afterDecision = await checkpoint('post_pre_decision_gate');
  if (afterDecision) return afterDecision;

  phase('observation');
  episode = ingestObservation(ctx, episode);
  projection = await reconcilePredictions(ctx, episode, projection, { mode, resolveRepair });

  phase('post-observation');
  const postObservation = await evaluateInvariantGates(ctx, {
    episode,
    gatePoint: 'post-observation',
    scope: activeScope,
    predictionKey: null,
    projection,
  });
  if (postObservation.kind === 'halt') return halted(postObservation.halt);

  const afterObservation = await checkpoint('post_observation_gate');
  if (afterObservation) return afterObservation;

  phase('pre-output');
  const preOutput = await evaluateInvariantGates(ctx, {
    episode,
    gatePoint: 'pre-output',
    scope: activeScope,
    predictionKey: lastWritten.key,
    projection,
    justWritten: lastWritten,
  });
  if (preOutput.kind === 'halt') return halted(preOutput.halt);

  const afterOutput = await checkpoint('post_pre_output_gate');
  if (afterOutput) return afterOutput;

  phase('interpretation');
  belief = await applySchemaInterpretation(ctx, episode, belief, schemaSelector);
  belief = applyUtteranceInterpretation(ctx, episode, belief);

  appendTurnSummary(episode);
  return finish('completed');
}

// Episode artifact recording
//
// Artifacts are the turn's trace: append-only, one tagged entry per event.

import type {
  ArtifactKind,
  ArtifactOf,
  AuthorizationContext,
  Episode,
  EpisodeArtifact,
  EvidenceRef,
  HaltRecord,
  InterventionAction,
  TurnHaltSummary,
  TurnSummaryArtifact,
} from '@ledgerline/protocol';
import type { RuntimeContext } from '../context.js';
import { createCheckContext, runInvariant } from '../invariants/registry.js';
import { haltFromOutcome } from '../invariants/halts.js';

export const REVIEW_HALTS_OPERATOR_ACTION = 'review_halts_then_resume_next_turn';

export function appendArtifact(episode: Episode, artifact: EpisodeArtifact): void {
  episode.artifacts.push(artifact);
}

/**
 * Artifacts of one kind, in append order.
 */
export function findArtifacts<K extends ArtifactKind>(episode: Episode, kind: K): ArtifactOf<K>[] {
  const found: ArtifactOf<K>[] = [];
  for (const artifact of episode.artifacts) {
    if (isArtifactOf(artifact, kind)) {
      found.push(artifact);
    }
  }
  return found;
}

function isArtifactOf<K extends ArtifactKind>(
  artifact: EpisodeArtifact,
  kind: K
): artifact is ArtifactOf<K> {
  return artifact.artifactKind === kind;
}

/**
 * Add a `halt` observation and the matching `halt_observation` artifact.
 */
export function recordHaltObservation(
  ctx: RuntimeContext,
  episode: Episode,
  halt: HaltRecord,
  haltEvidenceRef: EvidenceRef,
  source: string
): void {
  const observationId = ctx.newId('obs:');
  episode.observations.push({
    id: observationId,
    observedAt: ctx.now(),
    type: 'halt',
    text: halt.reason,
    source,
  });
  appendArtifact(episode, {
    artifactKind: 'halt_observation',
    observationId,
    halt,
    haltEvidenceRef,
  });
}

/**
 * Record an observer that lacked the capability for an action: an
 * `authorization_issue` artifact and a `halt` observation. Returns the halt.
 */
export function recordAuthorizationIssue(
  ctx: RuntimeContext,
  episode: Episode,
  stage: string,
  authorization: AuthorizationContext
): HaltRecord {
  const outcome = runInvariant(
    'authorization.scope.v1',
    createCheckContext({ scope: stage, authorization })
  );
  const halt = haltFromOutcome(stage, outcome, ctx.now());

  appendArtifact(episode, {
    artifactKind: 'authorization_issue',
    halt,
    authorizationContext: authorization,
  });
  episode.observations.push({
    id: ctx.newId('obs:'),
    observedAt: ctx.now(),
    type: 'halt',
    text: halt.reason,
    source: `authorization:${authorization.action}`,
  });

  ctx.logger.warn('Observer not authorized', {
    action: authorization.action,
    requiredCapability: authorization.requiredCapability,
    haltId: halt.haltId,
  });
  return halt;
}

function summarizeHalts(episode: Episode): TurnHaltSummary[] {
  return findArtifacts(episode, 'halt_observation').map(({ halt, haltEvidenceRef }) => ({
    haltId: halt.haltId,
    stage: halt.stage,
    invariantId: halt.invariantId,
    reason: halt.reason,
    retryability: halt.retryability,
    timestamp: halt.timestamp,
    evidenceRef: haltEvidenceRef,
  }));
}

function lastInterventionAction(episode: Episode): InterventionAction {
  const actions = findArtifacts(episode, 'intervention_lifecycle')
    .map((artifact) => artifact.action)
    .filter((action) => action !== 'none');
  return actions.length > 0 ? actions[actions.length - 1] : 'none';
}

/**
 * Close the turn with a `turn_summary` artifact listing every halt recorded.
 */
export function appendTurnSummary(episode: Episode): TurnSummaryArtifact {
  const halts = summarizeHalts(episode);
  const summary: TurnSummaryArtifact = {
    artifactKind: 'turn_summary',
    turnIndex: episode.turnIndex,
    haltCount: halts.length,
    halts,
    action: lastInterventionAction(episode),
    operatorAction: halts.length > 0 ? REVIEW_HALTS_OPERATOR_ACTION : null,
  };
  appendArtifact(episode, summary);
  return summary;
}

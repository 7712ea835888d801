// Invariant gate evaluation
//
// A gate runs `pre_consume` (prediction availability) and, when a write just
// happened, `post_write` (evidence link completeness). The first stop becomes
// a halt. The pure pipeline is separate from the step that persists halts and
// records artifacts.

import type {
  Episode,
  EvidenceRef,
  GatePhase,
  HaltRecord,
  Id,
  InvariantAuditResult,
  InvariantId,
  InvariantOutcome,
  ObserverFrame,
  ProjectionState,
  Timestamp,
} from '@ledgerline/protocol';
import type { RuntimeContext } from '../context.js';
import type { InvariantRegistry, JustWrittenPrediction } from '../invariants/registry.js';
import { INVARIANT_REGISTRY, createCheckContext, runInvariant } from '../invariants/registry.js';
import { haltFromOutcome } from '../invariants/halts.js';
import { authorizeObserver, observerAllowsInvariant } from '../observer.js';
import { appendHaltRecord } from '../persistence/appenders.js';
import { issueSystemGate } from '../capabilities/policy.js';
import {
  appendArtifact,
  recordAuthorizationIssue,
  recordHaltObservation,
} from '../episodes/artifacts.js';

export type GatePipelineInput = {
  /**
   * Where in the turn the gate sits, e.g. "pre-decision"
   */
  gatePoint: string;
  scope: string;
  predictionKey: string | null;
  currentPredictions: Readonly<Record<string, Id>>;
  predictionLogAvailable: boolean;
  justWritten?: JustWrittenPrediction | null;
  observer?: ObserverFrame | null;
  timestamp: Timestamp;
  registry?: InvariantRegistry;
};

export type GateEvaluation = {
  phase: GatePhase;
  outcome: InvariantOutcome;
};

export type GateSuccess = {
  kind: 'success';
  preConsume: InvariantOutcome[];
  postWrite: InvariantOutcome[];
};

export type GateHalt = {
  kind: 'halt';
  halt: HaltRecord;
};

export type GateDecision = GateSuccess | GateHalt;

export type GatePipelineResult = {
  evaluations: GateEvaluation[];
  audit: InvariantAuditResult[];
  decision: GateDecision;
};

const GATE_PHASES: ReadonlyArray<{ phase: GatePhase; invariantId: InvariantId }> = [
  { phase: 'pre_consume', invariantId: 'prediction_availability.v1' },
  { phase: 'post_write', invariantId: 'evidence_link_completeness.v1' },
];

function outcomesFor(evaluations: GateEvaluation[], phase: GatePhase): InvariantOutcome[] {
  return evaluations.filter((item) => item.phase === phase).map((item) => item.outcome);
}

/**
 * Run the gate phases in order and stop at the first stop outcome.
 * Phases excluded by the observer's evaluation allow-list are skipped.
 */
export function evaluateGatePipeline(input: GatePipelineInput): GatePipelineResult {
  const registry = input.registry ?? INVARIANT_REGISTRY;
  const justWritten = input.justWritten ?? null;
  const checkContext = createCheckContext({
    scope: input.scope,
    predictionKey: input.predictionKey,
    currentPredictions: input.currentPredictions,
    predictionLogAvailable: input.predictionLogAvailable,
    justWritten,
  });

  const evaluations: GateEvaluation[] = [];
  for (const { phase, invariantId } of GATE_PHASES) {
    if (phase === 'post_write' && !justWritten) continue;
    if (!observerAllowsInvariant(input.observer ?? null, invariantId)) continue;

    const outcome = runInvariant(invariantId, checkContext, registry);
    evaluations.push({ phase, outcome });
    if (outcome.flow === 'stop') break;
  }

  const audit: InvariantAuditResult[] = evaluations.map(({ phase, outcome }) => ({
    ...outcome,
    gatePoint: `${input.gatePoint}:${phase}`,
  }));

  const stopped = evaluations.find(({ outcome }) => outcome.flow === 'stop');
  if (!stopped) {
    return {
      evaluations,
      audit,
      decision: {
        kind: 'success',
        preConsume: outcomesFor(evaluations, 'pre_consume'),
        postWrite: outcomesFor(evaluations, 'post_write'),
      },
    };
  }

  const haltValidation = registry['explainable_halt_payload.v1']({
    ...checkContext,
    haltCandidate: stopped.outcome,
  });
  audit.push({ ...haltValidation, gatePoint: 'halt_validation' });

  return {
    evaluations,
    audit,
    decision: {
      kind: 'halt',
      halt: haltFromOutcome(
        `${input.gatePoint}:${stopped.phase}`,
        stopped.outcome,
        input.timestamp
      ),
    },
  };
}

export type InvariantGateInput = {
  episode: Episode | null;
  gatePoint: string;
  scope: string;
  predictionKey: string | null;
  projection: ProjectionState;
  predictionLogAvailable?: boolean;
  justWritten?: JustWrittenPrediction | null;
  registry?: InvariantRegistry;
};

/**
 * Map of projected keys to prediction ids, as the checkers see them.
 */
export function currentPredictionIds(projection: ProjectionState): Record<string, Id> {
  const ids: Record<string, Id> = {};
  for (const [key, record] of Object.entries(projection.currentPredictions)) {
    ids[key] = record.predictionId;
  }
  return ids;
}

/**
 * Evaluate a gate for a turn: check the observer may evaluate gates, run the
 * pipeline, persist any halt and record the outcome on the episode.
 * Never writes to the prediction log.
 */
export async function evaluateInvariantGates(
  ctx: RuntimeContext,
  input: InvariantGateInput
): Promise<GateDecision> {
  const { episode } = input;
  const observer = episode?.observer ?? null;

  if (episode) {
    const authorization = authorizeObserver(
      observer,
      'evaluate_invariant_gates',
      'baseline.invariant_evaluation'
    );
    if (!authorization.authorized) {
      const halt = recordAuthorizationIssue(ctx, episode, input.gatePoint, authorization);
      const haltEvidenceRef = await appendHaltRecord(ctx.logs, halt, issueSystemGate(ctx));
      appendArtifact(episode, {
        artifactKind: 'halt_observation',
        observationId: null,
        halt,
        haltEvidenceRef,
      });
      return { kind: 'halt', halt };
    }
  }

  const result = evaluateGatePipeline({
    gatePoint: input.gatePoint,
    scope: input.scope,
    predictionKey: input.predictionKey,
    currentPredictions: currentPredictionIds(input.projection),
    predictionLogAvailable: input.predictionLogAvailable ?? true,
    justWritten: input.justWritten,
    observer,
    timestamp: ctx.now(),
    registry: input.registry,
  });

  let haltEvidenceRef: EvidenceRef | null = null;
  if (result.decision.kind === 'halt') {
    const { halt } = result.decision;
    haltEvidenceRef = await appendHaltRecord(ctx.logs, halt, issueSystemGate(ctx));
    ctx.logger.warn('Invariant gate halted', {
      gatePoint: input.gatePoint,
      invariantId: halt.invariantId,
      haltId: halt.haltId,
      reason: halt.reason,
    });
  } else {
    ctx.logger.debug('Invariant gate passed', { gatePoint: input.gatePoint, scope: input.scope });
  }

  if (episode) {
    const requested = episode.observer.evaluationInvariants ?? [];
    appendArtifact(episode, {
      artifactKind: 'invariant_outcomes',
      gatePoint: input.gatePoint,
      scope: input.scope,
      predictionKey: input.predictionKey,
      observerEnforcement: {
        requestedEvaluationInvariants: [...requested],
        enforced: requested.length > 0,
        observerRole: episode.observer.role,
        authorizationLevel: episode.observer.authorizationLevel,
      },
      preConsume: outcomesFor(result.evaluations, 'pre_consume'),
      postWrite: outcomesFor(result.evaluations, 'post_write'),
      audit: result.audit,
      result: result.decision.kind,
      halt: result.decision.kind === 'halt' ? result.decision.halt : null,
      haltEvidenceRef,
    });

    if (result.decision.kind === 'halt' && haltEvidenceRef) {
      const { halt } = result.decision;
      recordHaltObservation(ctx, episode, halt, haltEvidenceRef, `invariant:${halt.invariantId}`);
    }
  }

  return result.decision;
}

// Capability invocation policy
//
// Decides whether a side-effecting call may proceed and issues the adapter
// gate that the log or outbox will check. A denial becomes a halt with
// `details.policyCode` naming the reason.

import type {
  CapabilityAdapterGate,
  CapabilityInvocationAttempt,
  CapabilityInvocationDecision,
  CapabilityPolicyCode,
  Episode,
  HaltRecord,
  ObserverFrame,
  ProjectionState,
} from '@ledgerline/protocol';
import { CAPABILITY_POLICY_INVARIANT_ID, createHaltRecord } from '@ledgerline/protocol';
import type { RuntimeContext } from '../context.js';
import { shortHash } from '../hashing.js';
import { observerHasCapability } from '../observer.js';
import { appendHaltRecord } from '../persistence/appenders.js';
import { appendArtifact } from '../episodes/artifacts.js';

export type CapabilityInvocationRequest = {
  observer: ObserverFrame | null;
  projection: ProjectionState;
  scopeKey: string;
  predictionKey: string | null;
  explicitGatePassPresent: boolean;

  /**
   * e.g. "append_prediction_record_event"
   */
  action: string;

  /**
   * e.g. "prediction.persistence"
   */
  capability: string;

  requiredCapability: string;
  stage: string;
};

const DENIAL_REASONS: Record<CapabilityPolicyCode, string> = {
  current_prediction_required: 'capability invocation denied: current valid prediction is required',
  explicit_gate_pass_required: 'capability invocation denied: explicit gate pass is required',
  observer_scope_denied: 'capability invocation denied: observer scope does not permit action',
};

function denialCode(
  attempt: CapabilityInvocationAttempt,
  observer: ObserverFrame | null
): CapabilityPolicyCode | null {
  if (!attempt.currentPredictionAvailable) return 'current_prediction_required';
  if (!attempt.explicitGatePassPresent) return 'explicit_gate_pass_required';
  if (!observerHasCapability(observer, attempt.requiredCapability)) return 'observer_scope_denied';
  return null;
}

/**
 * Decide one invocation. Checks run in order: a current prediction must be
 * available (always true for unkeyed calls), an explicit gate pass must be
 * present, and the observer must hold the required capability.
 */
export function decideCapabilityInvocation(
  ctx: RuntimeContext,
  request: CapabilityInvocationRequest
): CapabilityInvocationDecision {
  const hasCurrent = Object.keys(request.projection.currentPredictions).length > 0;
  const attempt: CapabilityInvocationAttempt = {
    invocationId: ctx.newId('invoke:'),
    capability: request.capability,
    action: request.action,
    stage: request.stage,
    scopeKey: request.scopeKey,
    predictionKey: request.predictionKey,
    requiredCapability: request.requiredCapability,
    explicitGatePassPresent: request.explicitGatePassPresent,
    currentPredictionAvailable: request.predictionKey === null || hasCurrent,
    observerRole: request.observer?.role ?? null,
    observerAuthorizationLevel: request.observer?.authorizationLevel ?? null,
    observerCapabilities: [...(request.observer?.capabilities ?? [])],
  };

  const code = denialCode(attempt, request.observer);
  if (!code) {
    return { allowed: true, attempt };
  }

  const halt = createHaltRecord({
    haltId: `halt:${shortHash(request.stage, CAPABILITY_POLICY_INVARIANT_ID, code, attempt.invocationId)}`,
    stage: request.stage,
    invariantId: CAPABILITY_POLICY_INVARIANT_ID,
    reason: DENIAL_REASONS[code],
    details: { policyCode: code, attempt: { ...attempt } },
    evidence: [
      { kind: 'capability', ref: request.capability },
      { kind: 'action', ref: request.action },
      { kind: 'policy_code', ref: code },
    ],
    retryability: true,
    timestamp: ctx.now(),
  });

  return { allowed: false, attempt, denialCode: code, denialReason: DENIAL_REASONS[code], halt };
}

/**
 * The gate a decision grants.
 */
export function gateFromDecision(decision: CapabilityInvocationDecision): CapabilityAdapterGate {
  return { invocationId: decision.attempt.invocationId, allowed: decision.allowed };
}

/**
 * Gate for the runtime's own bookkeeping writes (halts), which are not
 * subject to the invocation policy.
 */
export function issueSystemGate(ctx: RuntimeContext): CapabilityAdapterGate {
  return { invocationId: ctx.newId('invoke:'), allowed: true };
}

/**
 * Append a denial's halt and, with an episode, record the denial and its
 * halt observation as artifacts.
 */
export async function persistPolicyDenial(
  ctx: RuntimeContext,
  episode: Episode | null,
  decision: Extract<CapabilityInvocationDecision, { allowed: false }>
): Promise<HaltRecord> {
  const { halt } = decision;
  const haltEvidenceRef = await appendHaltRecord(ctx.logs, halt, issueSystemGate(ctx));

  ctx.logger.warn('Capability invocation denied', {
    action: decision.attempt.action,
    policyCode: decision.denialCode,
    haltId: halt.haltId,
  });

  if (episode) {
    appendArtifact(episode, {
      artifactKind: 'capability_policy_denial',
      attempt: decision.attempt,
      denialCode: decision.denialCode,
      denialReason: decision.denialReason,
      halt,
      haltEvidenceRef,
    });
    appendArtifact(episode, {
      artifactKind: 'halt_observation',
      observationId: null,
      halt,
      haltEvidenceRef,
    });
  }

  return halt;
}

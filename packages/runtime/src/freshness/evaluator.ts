// Observation freshness
//
// A per-turn contract says how old the latest observation in a scope may be.
// Stale or missing observations produce an ask_request, dispatched through
// the Ask-Outbox when one is configured; an already outstanding request for
// the scope turns that into a hold.

import type {
  AskOutboxRequestEvent,
  BeliefState,
  Episode,
  JsonObject,
  Observation,
  ObservationFreshnessDecision,
  ObservationFreshnessOutcome,
  ProjectionState,
  Timestamp,
} from '@ledgerline/protocol';
import { parseObservationFreshnessPolicyContract } from '@ledgerline/protocol';
import type { RuntimeContext } from '../context.js';
import type { AskOutboxAdapter, ObservationFreshnessPolicyAdapter } from '../adapters.js';
import {
  decideCapabilityInvocation,
  gateFromDecision,
  persistPolicyDenial,
} from '../capabilities/policy.js';
import { appendAskOutboxEvent } from '../persistence/appenders.js';
import { appendArtifact } from '../episodes/artifacts.js';

export type FreshnessEvaluationInput = {
  episode: Episode;
  belief: BeliefState;
  projection: ProjectionState;
  policy: ObservationFreshnessPolicyAdapter;
  outbox?: AskOutboxAdapter;
};

const ZONED = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;

/**
 * Epoch milliseconds for an ISO timestamp, or null when it does not parse.
 * Date-times without a zone are read as UTC.
 */
export function parseTimestamp(value: string): number | null {
  const text = value.trim();
  if (!text) return null;
  const zoned = text.includes('T') && !ZONED.test(text) ? `${text}Z` : text;
  const millis = Date.parse(zoned);
  return Number.isNaN(millis) ? null : millis;
}

export function observationMatchesScope(observation: Observation, scope: string): boolean {
  const normalized = scope.trim().toLowerCase();
  return (
    observation.type.toLowerCase() === normalized ||
    observation.source.trim().toLowerCase() === normalized
  );
}

function latestInScope(episode: Episode, scope: string): Observation | null {
  let latest: Observation | null = null;
  for (const observation of episode.observations) {
    if (!observationMatchesScope(observation, scope)) continue;
    if (!latest || observation.observedAt > latest.observedAt) {
      latest = observation;
    }
  }
  return latest;
}

function assess(
  lastObservedAt: Timestamp | null,
  staleAfterSeconds: number,
  now: Timestamp
): { outcome: ObservationFreshnessOutcome; reason: string; ageSeconds?: number } {
  if (!lastObservedAt) {
    return { outcome: 'ask_request', reason: 'no observation available for freshness scope' };
  }

  const observed = parseTimestamp(lastObservedAt);
  const current = parseTimestamp(now);
  if (observed === null || current === null) {
    return { outcome: 'ask_request', reason: 'observation freshness timestamp invalid' };
  }

  const ageSeconds = Math.max(0, (current - observed) / 1000);
  if (ageSeconds > staleAfterSeconds) {
    return { outcome: 'ask_request', reason: 'observation is stale for freshness policy', ageSeconds };
  }
  return { outcome: 'continue', reason: 'observation freshness contract satisfied', ageSeconds };
}

/**
 * Evaluate the turn's freshness contract and record the decision on the
 * episode. For `ask_request` with an outbox, a capability-gated request for
 * a fresh observation is dispatched and logged.
 *
 * @throws ContractValidationError when the adapter returns a malformed contract
 */
export async function evaluateObservationFreshness(
  ctx: RuntimeContext,
  input: FreshnessEvaluationInput
): Promise<ObservationFreshnessDecision> {
  const { episode, belief, projection, policy, outbox } = input;

  const raw: unknown = await policy.getContract({ episode, belief, projection });
  if (raw === null || raw === undefined) {
    return {
      scope: 'none',
      outcome: 'continue',
      reason: 'freshness policy adapter returned no contract',
      staleAfterSeconds: 0,
      lastObservedAt: null,
      lastObservedValue: null,
      evidence: {},
    };
  }

  const contract = parseObservationFreshnessPolicyContract(raw);
  const latest = latestInScope(episode, contract.scope);
  const lastObservedAt = latest ? latest.observedAt : contract.observedAt ?? null;
  const lastObservedValue = latest?.text ?? null;

  const assessment = assess(lastObservedAt, contract.staleAfterSeconds, ctx.now());
  const { ageSeconds } = assessment;
  let { outcome, reason } = assessment;

  let outstandingRequestId: string | null = null;
  if (outcome === 'ask_request' && policy.hasOutstandingRequest) {
    outstandingRequestId = await policy.hasOutstandingRequest(contract.scope);
    if (outstandingRequestId) {
      outcome = 'hold';
      reason = 'freshness request already outstanding for scope';
    }
  }

  const evidence: JsonObject = {
    reason,
    scope: contract.scope,
    lastObservedAt,
    lastObservedValue,
    policyThresholdSeconds: contract.staleAfterSeconds,
  };
  if (ageSeconds !== undefined) evidence.observationAgeSeconds = ageSeconds;
  if (outstandingRequestId) evidence.outstandingRequestId = outstandingRequestId;

  const decision: ObservationFreshnessDecision = {
    scope: contract.scope,
    outcome,
    reason,
    staleAfterSeconds: contract.staleAfterSeconds,
    lastObservedAt,
    lastObservedValue,
    evidence,
  };
  if (contract.observedAt !== undefined) decision.observedAt = contract.observedAt;

  appendArtifact(episode, { artifactKind: 'observation_freshness_decision', decision });
  ctx.logger.debug('Observation freshness evaluated', { scope: decision.scope, outcome, reason });

  if (decision.outcome === 'ask_request' && outbox) {
    await requestFreshObservation(ctx, episode, projection, decision, outbox);
  }

  return decision;
}

async function requestFreshObservation(
  ctx: RuntimeContext,
  episode: Episode,
  projection: ProjectionState,
  decision: ObservationFreshnessDecision,
  outbox: AskOutboxAdapter
): Promise<void> {
  const policy = decideCapabilityInvocation(ctx, {
    observer: episode.observer,
    projection,
    scopeKey: `${episode.conversationId}:${episode.turnIndex}:freshness:${decision.scope}`,
    predictionKey: null,
    explicitGatePassPresent: true,
    action: 'create_ask_request',
    capability: 'ask.outbox',
    requiredCapability: 'baseline.dialog',
    stage: 'observation-freshness:ask-outbox',
  });
  if (!policy.allowed) {
    await persistPolicyDenial(ctx, episode, policy);
    return;
  }

  const context: JsonObject = {
    scope: decision.scope,
    reason: decision.reason,
    lastObservedAt: decision.lastObservedAt,
    lastObservedValue: decision.lastObservedValue,
    policyThresholdSeconds: decision.staleAfterSeconds,
  };
  const requestId = await outbox.createRequest(
    `Freshness check required: ${decision.scope}`,
    `Please provide a fresh observation for scope '${decision.scope}'.`,
    context
  );

  const event: AskOutboxRequestEvent = {
    eventKind: 'ask_outbox_request',
    requestId,
    scope: decision.scope,
    reason: decision.reason,
    evidenceRefs: [{ kind: 'episode', ref: episode.id }],
    createdAt: ctx.now(),
    metadata: context,
  };
  const evidenceRef = await appendAskOutboxEvent(ctx.logs, event, gateFromDecision(policy));

  appendArtifact(episode, {
    artifactKind: 'observation_freshness_ask_request',
    requestId,
    scope: decision.scope,
    reason: decision.reason,
    lastObservedAt: decision.lastObservedAt,
    lastObservedValue: decision.lastObservedValue,
    policyThresholdSeconds: decision.staleAfterSeconds,
    evidenceRef,
  });
  ctx.logger.info('Freshness request dispatched', { requestId, scope: decision.scope });
}

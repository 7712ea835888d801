// Intervention lifecycle hook
//
// At each checkpoint the hook is handed an InterventionRequest and answers
// with a decision. pause, timeout and escalate end the turn. With an
// Ask-Outbox adapter, every consultation is also dispatched as a
// human-recruitment request and its answer logged as the response.

import type {
  AskOutboxRequestEvent,
  AskOutboxResponseEvent,
  BeliefState,
  Episode,
  Id,
  InterventionDecision,
  InterventionPhase,
  InterventionRequest,
  ProjectionState,
  Timestamp,
} from '@ledgerline/protocol';
import { TERMINAL_INTERVENTION_ACTIONS, interventionDecisionInputSchema } from '@ledgerline/protocol';
import type { RuntimeContext } from '../context.js';
import type { AskOutboxAdapter, InterventionHook } from '../adapters.js';
import { InterventionProvenanceError, InvalidInterventionDecisionError } from '../errors.js';
import {
  decideCapabilityInvocation,
  gateFromDecision,
  issueSystemGate,
  persistPolicyDenial,
} from '../capabilities/policy.js';
import { appendAskOutboxEvent } from '../persistence/appenders.js';
import { appendArtifact, appendTurnSummary } from '../episodes/artifacts.js';

export type InterventionCheckpointInput = {
  episode: Episode;
  belief: BeliefState;
  projection: ProjectionState;
  phase: InterventionPhase;
  hook?: InterventionHook;
  outbox?: AskOutboxAdapter;
};

export type InterventionCheckpointResult = {
  proceed: boolean;
  decision: InterventionDecision | null;
};

/**
 * Validate a hook's raw answer. Nothing (null or undefined) means "none";
 * a `resume` without a timestamp is stamped with `respondedAtDefault`.
 *
 * @throws InvalidInterventionDecisionError when the answer is not a decision
 * @throws InterventionProvenanceError when `resume` lacks override source or provenance
 */
export function normalizeInterventionDecision(
  raw: unknown,
  respondedAtDefault: Timestamp
): InterventionDecision {
  const result = interventionDecisionInputSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new InvalidInterventionDecisionError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`)
    );
  }

  const decision: InterventionDecision = result.data;
  if (decision.action !== 'resume') {
    return decision;
  }

  const missing: string[] = [];
  if (!decision.overrideSource) missing.push('overrideSource');
  if (!decision.overrideProvenance?.trim()) missing.push('overrideProvenance');
  if (missing.length > 0) {
    throw new InterventionProvenanceError(missing);
  }

  return { ...decision, respondedAt: decision.respondedAt ?? respondedAtDefault };
}

function buildInterventionRequest(
  ctx: RuntimeContext,
  episode: Episode,
  projection: ProjectionState,
  phase: InterventionPhase
): InterventionRequest {
  return {
    requestId: ctx.newId('hitl:'),
    phase,
    episodeId: episode.id,
    conversationId: episode.conversationId,
    turnIndex: episode.turnIndex,
    projectionUpdatedAt: projection.updatedAt,
    createdAt: ctx.now(),
    metadata: {},
  };
}

type OutboxDispatch =
  | { kind: 'dispatched'; outboxRequestId: Id }
  | { kind: 'denied'; decision: InterventionDecision };

async function dispatchToOutbox(
  ctx: RuntimeContext,
  input: InterventionCheckpointInput & { outbox: AskOutboxAdapter },
  request: InterventionRequest
): Promise<OutboxDispatch> {
  const { episode, projection, phase, outbox } = input;

  const policy = decideCapabilityInvocation(ctx, {
    observer: episode.observer,
    projection,
    scopeKey: `${episode.conversationId}:${episode.turnIndex}:${phase}`,
    predictionKey: null,
    explicitGatePassPresent: true,
    action: 'create_ask_request',
    capability: 'ask.outbox',
    requiredCapability: 'baseline.dialog',
    stage: `${phase}:ask-outbox`,
  });
  if (!policy.allowed) {
    await persistPolicyDenial(ctx, episode, policy);
    appendTurnSummary(episode);
    return {
      kind: 'denied',
      decision: { action: 'escalate', reason: 'ask outbox denied by policy', metadata: {} },
    };
  }

  const context = {
    phase,
    requestId: request.requestId,
    conversationId: episode.conversationId,
    episodeId: episode.id,
    turnIndex: episode.turnIndex,
    projectionUpdatedAt: projection.updatedAt,
  };
  const outboxRequestId = await outbox.createRequest(
    `Human review required: ${phase}`,
    `Review intervention request for conversation ${episode.conversationId} turn ${episode.turnIndex}.`,
    context
  );

  const event: AskOutboxRequestEvent = {
    eventKind: 'ask_outbox_request',
    requestId: outboxRequestId,
    scope: phase,
    reason: 'human recruitment requested by intervention lifecycle',
    evidenceRefs: [{ kind: 'intervention_request', ref: request.requestId }],
    createdAt: request.createdAt,
    metadata: context,
  };
  const evidenceRef = await appendAskOutboxEvent(ctx.logs, event, gateFromDecision(policy));
  appendArtifact(episode, { artifactKind: 'ask_outbox_request', phase, request: event, evidenceRef });

  return { kind: 'dispatched', outboxRequestId };
}

/**
 * Consult the intervention hook at one lifecycle checkpoint.
 * Without a hook the turn proceeds and no artifacts are recorded.
 */
export async function applyInterventionHook(
  ctx: RuntimeContext,
  input: InterventionCheckpointInput
): Promise<InterventionCheckpointResult> {
  const { episode, belief, projection, phase, hook, outbox } = input;
  if (!hook) {
    return { proceed: true, decision: null };
  }

  const request = buildInterventionRequest(ctx, episode, projection, phase);
  appendArtifact(episode, { artifactKind: 'intervention_request', phase, request });

  let outboxRequestId: Id | null = null;
  if (outbox) {
    const dispatch = await dispatchToOutbox(ctx, { ...input, outbox }, request);
    if (dispatch.kind === 'denied') {
      return { proceed: false, decision: dispatch.decision };
    }
    outboxRequestId = dispatch.outboxRequestId;
  }

  const raw: unknown = await hook({ phase, request, episode, belief, projection });
  const decision = normalizeInterventionDecision(raw, ctx.now());

  if (outboxRequestId !== null) {
    const response: AskOutboxResponseEvent = {
      eventKind: 'ask_outbox_response',
      requestId: outboxRequestId,
      scope: phase,
      reason: decision.reason ?? 'intervention decision recorded',
      evidenceRefs: [{ kind: 'intervention_request', ref: request.requestId }],
      createdAt: request.createdAt,
      respondedAt: decision.respondedAt ?? ctx.now(),
      status: decision.action,
      escalation: decision.action === 'escalate',
      metadata: { ...decision.metadata },
    };
    const evidenceRef = await appendAskOutboxEvent(ctx.logs, response, issueSystemGate(ctx));
    appendArtifact(episode, { artifactKind: 'ask_outbox_response', phase, response, evidenceRef });
  }

  appendArtifact(episode, {
    artifactKind: 'intervention_response',
    phase,
    requestId: request.requestId,
    decision,
  });
  appendArtifact(episode, {
    artifactKind: 'intervention_lifecycle',
    phase,
    requestId: request.requestId,
    action: decision.action,
    reason: decision.reason ?? null,
    overrideSource: decision.overrideSource ?? null,
    overrideProvenance: decision.overrideProvenance ?? null,
    respondedAt: decision.respondedAt ?? null,
  });

  if (decision.action !== 'none') {
    ctx.logger.info('Intervention decision', {
      phase,
      requestId: request.requestId,
      action: decision.action,
      reason: decision.reason ?? null,
    });
  }

  if (TERMINAL_INTERVENTION_ACTIONS.includes(decision.action)) {
    appendArtifact(episode, {
      artifactKind: 'intervention_terminal',
      phase,
      requestId: request.requestId,
      action: decision.action,
      reason: decision.reason ?? null,
    });
    appendTurnSummary(episode);
    return { proceed: false, decision };
  }

  return { proceed: true, decision };
}

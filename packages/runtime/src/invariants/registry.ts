// Invariant registry
//
// Pure checkers keyed by versioned id. Each takes an InvariantCheckContext and
// returns an InvariantOutcome; none of them touch the logs.

import type {
  AuthorizationContext,
  EvidenceRef,
  Id,
  InvariantBranchBehavior,
  InvariantId,
  InvariantOutcome,
  JsonObject,
} from '@ledgerline/protocol';
import { isNonEmptyString } from '@ledgerline/protocol';

/**
 * What was just appended, for the post-write evidence check.
 */
export type JustWrittenPrediction = {
  key: string | null;
  evidenceRefs: EvidenceRef[];
};

/**
 * Everything a checker may look at.
 */
export type InvariantCheckContext = {
  scope: string;
  predictionKey: string | null;

  /**
   * Keys of the projection's current predictions, mapped to prediction ids
   */
  currentPredictions: Readonly<Record<string, Id>>;

  predictionLogAvailable: boolean;
  justWritten: JustWrittenPrediction | null;

  /**
   * Outcome examined by the explainable-halt meta check
   */
  haltCandidate: InvariantOutcome | null;

  /**
   * Untrusted outcome payload examined by the binding check
   */
  predictionOutcome: Readonly<Record<string, unknown>> | null;

  /**
   * null when no authorization check was requested
   */
  authorization: AuthorizationContext | null;
};

export type InvariantChecker = (ctx: InvariantCheckContext) => InvariantOutcome;

export type InvariantRegistry = Readonly<Record<InvariantId, InvariantChecker>>;

/**
 * Fill unspecified check context fields with "not applicable" values.
 */
export function createCheckContext(
  fields: Pick<InvariantCheckContext, 'scope'> & Partial<InvariantCheckContext>
): InvariantCheckContext {
  return {
    predictionKey: null,
    currentPredictions: {},
    predictionLogAvailable: true,
    justWritten: null,
    haltCandidate: null,
    predictionOutcome: null,
    authorization: null,
    ...fields,
  };
}

function ok(invariantId: InvariantId, code: string, details: JsonObject = {}): InvariantOutcome {
  const message = details.message;
  return {
    invariantId,
    passed: true,
    reason: typeof message === 'string' && message ? message : code,
    flow: 'continue',
    validity: 'valid',
    code,
    evidence: [],
    details,
  };
}

function stop(
  invariantId: InvariantId,
  code: string,
  message: string,
  evidence: EvidenceRef[],
  actionHints: Record<string, string>[],
  validity: InvariantOutcome['validity'] = 'invalid',
  extraDetails: JsonObject = {}
): InvariantOutcome {
  return {
    invariantId,
    passed: false,
    reason: message,
    flow: 'stop',
    validity,
    code,
    evidence,
    details: { message, ...extraDetails },
    actionHints,
  };
}

export function checkAuthorizationScope(ctx: InvariantCheckContext): InvariantOutcome {
  const authorization = ctx.authorization;
  if (!authorization) {
    return ok('authorization.scope.v1', 'authorization_not_applicable', {
      message: 'Authorization scope check not requested for this evaluation.',
    });
  }

  if (authorization.authorized) {
    return ok('authorization.scope.v1', 'authorization_scope_allowed', {
      message: `Observer is authorized for ${authorization.action}.`,
      authorizationContext: { ...authorization },
    });
  }

  return stop(
    'authorization.scope.v1',
    'authorization_scope_denied',
    `Observer is not authorized for ${authorization.action}.`,
    [
      { kind: 'authorization_scope', ref: `action:${authorization.action || 'unknown'}` },
      { kind: 'required_capability', ref: authorization.requiredCapability || 'unknown' },
    ],
    [{ kind: 'review_authorization', scope: ctx.scope }],
    'invalid',
    { authorizationContext: { ...authorization } }
  );
}

export function checkPredictionAvailability(ctx: InvariantCheckContext): InvariantOutcome {
  if (Object.keys(ctx.currentPredictions).length === 0) {
    return stop(
      'prediction_availability.v1',
      'no_predictions_projected',
      'Action selection requires at least one projected current prediction.',
      [{ kind: 'scope', ref: ctx.scope }],
      [{ kind: 'rebuild_view', scope: ctx.scope }]
    );
  }

  const key = ctx.predictionKey;
  if (!key) {
    return ok('prediction_availability.v1', 'availability_not_keyed');
  }

  if (!(key in ctx.currentPredictions)) {
    return stop(
      'prediction_availability.v1',
      'no_current_prediction',
      'Action selection attempted to consume a missing current prediction.',
      [
        { kind: 'scope', ref: ctx.scope },
        { kind: 'prediction_key', ref: key },
      ],
      [{ kind: 'rebuild_view', scope: ctx.scope }]
    );
  }

  return ok('prediction_availability.v1', 'current_prediction_available', { predictionKey: key });
}

export function checkEvidenceLinkCompleteness(ctx: InvariantCheckContext): InvariantOutcome {
  const written = ctx.justWritten;
  if (!written) {
    return ok('evidence_link_completeness.v1', 'evidence_check_not_applicable');
  }

  if (!ctx.predictionLogAvailable) {
    return stop(
      'evidence_link_completeness.v1',
      'prediction_log_unavailable',
      'Prediction write attempted without an available append log.',
      [],
      [{ kind: 'fallback', action: 'buffer_prediction' }]
    );
  }

  if (written.evidenceRefs.length === 0) {
    return stop(
      'evidence_link_completeness.v1',
      'missing_evidence_links',
      'Prediction append did not produce linked evidence.',
      [{ kind: 'scope', ref: ctx.scope }],
      [{ kind: 'retry_append', scope: ctx.scope }]
    );
  }

  const key = written.key || ctx.predictionKey || '';
  if (key && !(key in ctx.currentPredictions)) {
    return stop(
      'evidence_link_completeness.v1',
      'write_before_use_violation',
      'Prediction write did not materialize into current projections.',
      [{ kind: 'prediction_key', ref: key }],
      [{ kind: 'rebuild_view', scope: ctx.scope }]
    );
  }

  return ok('evidence_link_completeness.v1', 'evidence_links_complete', {
    predictionKey: key || null,
  });
}

export function checkPredictionOutcomeBinding(ctx: InvariantCheckContext): InvariantOutcome {
  const outcome = ctx.predictionOutcome;
  if (!outcome) {
    return ok('prediction_outcome_binding.v1', 'outcome_binding_not_applicable');
  }

  const predictionId = isNonEmptyString(outcome.predictionId) ? outcome.predictionId.trim() : '';
  if (!predictionId) {
    return stop(
      'prediction_outcome_binding.v1',
      'missing_prediction_id',
      'Prediction outcome must include predictionId.',
      [],
      [{ kind: 'repair_outcome', scope: ctx.scope }]
    );
  }

  if (typeof outcome.errorMetric !== 'number' || Number.isNaN(outcome.errorMetric)) {
    return stop(
      'prediction_outcome_binding.v1',
      'non_numeric_error_metric',
      'Prediction outcome must include numeric errorMetric.',
      [{ kind: 'prediction_id', ref: predictionId }],
      [{ kind: 'repair_outcome', scope: ctx.scope }]
    );
  }

  return ok('prediction_outcome_binding.v1', 'prediction_outcome_bound', { predictionId });
}

/**
 * Meta check: a stop must name its invariant and carry details and evidence,
 * otherwise it cannot become a halt.
 */
export function checkExplainableHaltPayload(ctx: InvariantCheckContext): InvariantOutcome {
  const candidate = ctx.haltCandidate;
  if (!candidate || candidate.flow !== 'stop') {
    return ok('explainable_halt_payload.v1', 'halt_check_not_applicable');
  }

  const hasInvariantId = candidate.invariantId.length > 0;
  const hasDetails = Object.keys(candidate.details).length > 0;
  const hasEvidence = candidate.evidence.length > 0;
  if (hasInvariantId && hasDetails && hasEvidence) {
    return ok('explainable_halt_payload.v1', 'halt_payload_explainable');
  }

  const offendingInvariant = candidate.invariantId || 'unknown';
  const offendingCode = candidate.code || 'unknown';
  return stop(
    'explainable_halt_payload.v1',
    'halt_payload_incomplete',
    'Stop outcomes must include invariantId, details, and evidence.',
    [
      { kind: 'invariant', ref: offendingInvariant },
      { kind: 'invariant_code', ref: offendingCode },
    ],
    [{ kind: 'normalize_halt_payload', invariant: offendingInvariant }],
    'degraded',
    { offendingInvariant, offendingCode, hasInvariantId, hasDetails, hasEvidence }
  );
}

export const INVARIANT_REGISTRY: InvariantRegistry = {
  'authorization.scope.v1': checkAuthorizationScope,
  'prediction_availability.v1': checkPredictionAvailability,
  'evidence_link_completeness.v1': checkEvidenceLinkCompleteness,
  'prediction_outcome_binding.v1': checkPredictionOutcomeBinding,
  'explainable_halt_payload.v1': checkExplainableHaltPayload,
};

export const INVARIANT_BRANCH_BEHAVIORS: Readonly<Record<InvariantId, InvariantBranchBehavior>> = {
  'authorization.scope.v1': {
    continueBehavior:
      'Continue when no authorization check is requested or the observer holds the required capability.',
    stopBehavior: 'Stop when the observer lacks the capability required for the action.',
  },
  'prediction_availability.v1': {
    continueBehavior:
      'Continue when at least one projected prediction exists and predictionKey resolves if provided.',
    stopBehavior:
      'Stop when no projected predictions exist or the requested predictionKey is absent from projections.',
  },
  'evidence_link_completeness.v1': {
    continueBehavior:
      'Continue when nothing was just written, or the append produced evidence links and projects current.',
    stopBehavior:
      'Stop when the append log is unavailable, evidence links are missing, or the write is not yet projected.',
  },
  'prediction_outcome_binding.v1': {
    continueBehavior:
      'Continue when no outcome is supplied, or the outcome has a predictionId and numeric errorMetric.',
    stopBehavior: 'Stop when the outcome omits predictionId or has a non-numeric errorMetric.',
  },
  'explainable_halt_payload.v1': {
    continueBehavior:
      'Continue when there is no stop candidate, or the candidate has invariantId, details and evidence.',
    stopBehavior: 'Stop when a stop candidate lacks invariantId, details or evidence.',
  },
};

/**
 * Run one checker. Every stop is passed through the explainable-halt meta
 * check, and a failing meta check replaces the original outcome.
 */
export function runInvariant(
  invariantId: InvariantId,
  ctx: InvariantCheckContext,
  registry: InvariantRegistry = INVARIANT_REGISTRY
): InvariantOutcome {
  const outcome = registry[invariantId](ctx);
  if (outcome.flow !== 'stop' || invariantId === 'explainable_halt_payload.v1') {
    return outcome;
  }

  const meta = registry['explainable_halt_payload.v1']({ ...ctx, haltCandidate: outcome });
  return meta.flow === 'stop' ? meta : outcome;
}

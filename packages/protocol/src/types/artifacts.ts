// Episode artifacts - the closed set of trace entries a turn can record
//
// Every entry is tagged by `artifactKind` so consumers can match exhaustively.
// The sequence on an episode is append-only.

import type { EvidenceRef, Id, Timestamp } from './common.js';
import type { AuthorizationContext } from './observer.js';
import type { HaltRecord } from './halts.js';
import type {
  InvariantAuditResult,
  InvariantHandlingMode,
  InvariantOutcome,
} from './invariants.js';
import type { PredictionOutcome } from './predictions.js';
import type { RepairProposalEvent, RepairResolutionEvent } from './repairs.js';
import type {
  InterventionAction,
  InterventionDecision,
  InterventionOverrideSource,
  InterventionPhase,
  InterventionRequest,
} from './interventions.js';
import type { AskOutboxRequestEvent, AskOutboxResponseEvent } from './outbox.js';
import type { CapabilityInvocationAttempt, CapabilityPolicyCode } from './capabilities.js';
import type { ObservationFreshnessDecision } from './freshness.js';
import type {
  Ambiguity,
  AmbiguityStatus,
  PendingAbout,
  SchemaHit,
  UtteranceType,
} from './schema-selection.js';

export type PolicyHypothesisArtifact = {
  artifactKind: 'policy_hypothesis';
  decisionId: Id;
  hypothesis: string | null;
  reasonCodes: string[];
};

export type InvariantOutcomesArtifact = {
  artifactKind: 'invariant_outcomes';
  gatePoint: string;
  scope: string;
  predictionKey: string | null;
  observerEnforcement: {
    requestedEvaluationInvariants: string[];
    enforced: boolean;
    observerRole: string;
    authorizationLevel: string;
  };
  preConsume: InvariantOutcome[];
  postWrite: InvariantOutcome[];
  audit: InvariantAuditResult[];
  result: 'success' | 'halt';
  halt: HaltRecord | null;
  haltEvidenceRef: EvidenceRef | null;
};

export type HaltObservationArtifact = {
  artifactKind: 'halt_observation';
  observationId: Id | null;
  halt: HaltRecord;
  haltEvidenceRef: EvidenceRef;
};

export type AuthorizationIssueArtifact = {
  artifactKind: 'authorization_issue';
  halt: HaltRecord;
  authorizationContext: AuthorizationContext;
};

export type CapabilityPolicyDenialArtifact = {
  artifactKind: 'capability_policy_denial';
  attempt: CapabilityInvocationAttempt;
  denialCode: CapabilityPolicyCode;
  denialReason: string;
  halt: HaltRecord;
  haltEvidenceRef: EvidenceRef;
};

export type PredictionEmitArtifact = {
  artifactKind: 'prediction_emit';
  predictionId: Id;
  scopeKey: string;
  targetVariable: string;
  targetHorizon: Timestamp | null;
  evidenceRef: EvidenceRef;
};

export type PredictionUpdateArtifact = {
  artifactKind: 'prediction_update';
  predictionId: Id;
  scopeKey: string;
  filtrationId: string | null;
  targetVariable: string;
  evidenceRef: EvidenceRef;
  projectionUpdatedAt: Timestamp;
};

export type PredictionComparisonArtifact = {
  artifactKind: 'prediction_comparison';
  predictionId: Id;
  scopeKey: string;
  expected: number;
  observed: number;
  error: number;
  absoluteError: number;
  comparedAt: Timestamp;
  outcome: PredictionOutcome;
  binding: InvariantOutcome;
  mode: InvariantHandlingMode;
};

export type RepairEventArtifact = {
  artifactKind: 'repair_event';
  repairId: Id;
  mode: InvariantHandlingMode;
  proposal: RepairProposalEvent;
  resolution: RepairResolutionEvent;
  proposalEvidenceRef: EvidenceRef;
  resolutionEvidenceRef: EvidenceRef;
};

export type InterventionRequestArtifact = {
  artifactKind: 'intervention_request';
  phase: InterventionPhase;
  request: InterventionRequest;
};

export type AskOutboxRequestArtifact = {
  artifactKind: 'ask_outbox_request';
  phase: InterventionPhase;
  request: AskOutboxRequestEvent;
  evidenceRef: EvidenceRef;
};

export type AskOutboxResponseArtifact = {
  artifactKind: 'ask_outbox_response';
  phase: InterventionPhase;
  response: AskOutboxResponseEvent;
  evidenceRef: EvidenceRef;
};

export type InterventionResponseArtifact = {
  artifactKind: 'intervention_response';
  phase: InterventionPhase;
  requestId: Id;
  decision: InterventionDecision;
};

export type InterventionLifecycleArtifact = {
  artifactKind: 'intervention_lifecycle';
  phase: InterventionPhase;
  requestId: Id;
  action: InterventionAction;
  reason: string | null;
  overrideSource: InterventionOverrideSource | null;
  overrideProvenance: string | null;
  respondedAt: Timestamp | null;
};

export type InterventionTerminalArtifact = {
  artifactKind: 'intervention_terminal';
  phase: InterventionPhase;
  requestId: Id;
  action: InterventionAction;
  reason: string | null;
};

export type ObservationFreshnessDecisionArtifact = {
  artifactKind: 'observation_freshness_decision';
  decision: ObservationFreshnessDecision;
};

export type ObservationFreshnessAskRequestArtifact = {
  artifactKind: 'observation_freshness_ask_request';
  requestId: Id;
  scope: string;
  reason: string;
  lastObservedAt: Timestamp | null;
  lastObservedValue: string | null;
  policyThresholdSeconds: number;
  evidenceRef: EvidenceRef;
};

export type SchemaSelectionArtifact = {
  artifactKind: 'schema_selection';
  schemas: SchemaHit[];
  ambiguities: Ambiguity[];
  ambiguityState: AmbiguityStatus;
  notes: string | null;
  pendingAbout: PendingAbout | null;
  pendingQuestion: string | null;
  pendingAttempts: number;
};

export type UtteranceInterpretationArtifact = {
  artifactKind: 'utterance_interpretation';
  observerRole: string;
  authorizationLevel: string;
  utteranceType: UtteranceType;
  textPreview: string | null;
  consecutiveNoResponse: number;
};

/**
 * One halt as listed in a turn summary.
 */
export type TurnHaltSummary = {
  haltId: Id;
  stage: string;
  invariantId: string;
  reason: string;
  retryability: boolean;
  timestamp: Timestamp;
  evidenceRef: EvidenceRef;
};

export type TurnSummaryArtifact = {
  artifactKind: 'turn_summary';
  turnIndex: number;
  haltCount: number;
  halts: TurnHaltSummary[];

  /**
   * Last non-"none" intervention action taken this turn, or "none"
   */
  action: InterventionAction;
  operatorAction: string | null;
};

export type EpisodeArtifact =
  | PolicyHypothesisArtifact
  | InvariantOutcomesArtifact
  | HaltObservationArtifact
  | AuthorizationIssueArtifact
  | CapabilityPolicyDenialArtifact
  | PredictionEmitArtifact
  | PredictionUpdateArtifact
  | PredictionComparisonArtifact
  | RepairEventArtifact
  | InterventionRequestArtifact
  | AskOutboxRequestArtifact
  | AskOutboxResponseArtifact
  | InterventionResponseArtifact
  | InterventionLifecycleArtifact
  | InterventionTerminalArtifact
  | ObservationFreshnessDecisionArtifact
  | ObservationFreshnessAskRequestArtifact
  | SchemaSelectionArtifact
  | UtteranceInterpretationArtifact
  | TurnSummaryArtifact;

export type ArtifactKind = EpisodeArtifact['artifactKind'];

/**
 * Narrow the artifact union to one kind.
 */
export type ArtifactOf<K extends ArtifactKind> = Extract<EpisodeArtifact, { artifactKind: K }>;

// Invariant types - checker identities and outcomes

import type { EvidenceRef, JsonObject } from './common.js';

/**
 * Stable checker identifiers. Changing a checker's semantics requires a new
 * versioned identifier; existing ones are never redefined.
 */
export const INVARIANT_IDS = [
  'authorization.scope.v1',
  'prediction_availability.v1',
  'evidence_link_completeness.v1',
  'prediction_outcome_binding.v1',
  'explainable_halt_payload.v1',
] as const;

export type InvariantId = (typeof INVARIANT_IDS)[number];

/**
 * Identifier used for halts raised by the capability invocation policy.
 * It is not a registered checker.
 */
export const CAPABILITY_POLICY_INVARIANT_ID = 'capability.invocation.policy.v1';

export type Flow = 'continue' | 'stop';

export type Validity = 'valid' | 'degraded' | 'invalid';

/**
 * How outcome corrections are persisted.
 * - strict_halt: the corrected record is appended directly (default)
 * - repair_events: a repair proposal and resolution pair is appended instead
 */
export type InvariantHandlingMode = 'strict_halt' | 'repair_events';

/**
 * Phases within one gate evaluation.
 */
export type GatePhase = 'pre_consume' | 'post_write';

/**
 * Suggested follow-up attached to a stop outcome, e.g.
 * { kind: "rebuild_view", scope: "turn:1" }
 */
export type ActionHint = Record<string, string>;

/**
 * Result of running one checker.
 */
export type InvariantOutcome = {
  invariantId: InvariantId;
  passed: boolean;
  reason: string;
  flow: Flow;
  validity: Validity;
  code: string;
  evidence: EvidenceRef[];
  details: JsonObject;
  actionHints?: ActionHint[];
};

/**
 * An outcome tagged with the gate point it ran at (e.g. "pre-decision:pre_consume").
 */
export type InvariantAuditResult = InvariantOutcome & {
  gatePoint: string;
};

/**
 * Documented continue/stop behaviour of a registered invariant.
 */
export type InvariantBranchBehavior = {
  continueBehavior: string;
  stopBehavior: string;
};
